// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it, beforeEach} from 'mocha';
import {DeploymentOrchestrator, type StateQueryReport} from '../../../src/core/deployment-orchestrator.js';
import {ExternalCommandFailedError} from '../../../src/core/errors/external-command-failed-error.js';
import {InvalidAccountReferenceError} from '../../../src/core/errors/invalid-account-reference-error.js';
import {MissingRequiredConfigError} from '../../../src/core/errors/missing-required-config-error.js';
import {mergeConfig} from '../../../src/data/configuration/config-merge.js';
import {type ResolvedConfig} from '../../../src/data/configuration/model/deploy-config.js';
import {FakeNearClient} from '../../helpers/fake-near-client.js';
import {RecordingLogger} from '../../helpers/recording-logger.js';

describe('DeploymentOrchestrator', () => {
  const config: ResolvedConfig = {
    walletIdentity: 'alice.testnet',
    seedCredential: 'test-secret',
    network: 'testnet',
    gasBudget: '100.0 Tgas',
    depositAmount: '1 NEAR',
    walletUiEndpoint: 'https://testnet.mynearwallet.com',
  };

  let client: FakeNearClient;
  let logger: RecordingLogger;
  let orchestrator: DeploymentOrchestrator;

  beforeEach(() => {
    client = new FakeNearClient();
    logger = new RecordingLogger();
    orchestrator = new DeploymentOrchestrator(config, client, logger);
  });

  async function rejection(promise: Promise<unknown>): Promise<unknown> {
    try {
      await promise;
    } catch (error) {
      return error;
    }
    throw new Error('expected the operation to reject');
  }

  it('should derive the account set on construction', () => {
    expect(orchestrator.accounts).to.deep.equal({
      main: 'alice.testnet',
      token: 'token.alice.testnet',
      htlc: 'htlc.alice.testnet',
    });
    expect(client.calls()).to.deep.equal([]);
  });

  it('should reject a malformed wallet before any invocation', () => {
    expect(() => new DeploymentOrchestrator({...config, walletIdentity: 'Alice'}, client, logger)).to.throw(
      InvalidAccountReferenceError,
    );
    expect(client.calls()).to.deep.equal([]);
  });

  describe('with a wallet at the maximum account id length', () => {
    const wallet: string = 'a'.repeat(64);
    const tooLong: string = 'account id must be between 2 and 64 characters';
    let longWallet: DeploymentOrchestrator;

    beforeEach(() => {
      longWallet = new DeploymentOrchestrator({...config, walletIdentity: wallet}, client, logger);
    });

    it('should still deploy to, query and log in with the main account', async () => {
      await longWallet.deployMain();
      await longWallet.queryState();
      await longWallet.login();

      expect(client.calls()).to.deep.equal([`deploy:${wallet}`, `state:${wallet}`, 'login']);
    });

    it('should reject the token deployment without invoking anything', async () => {
      const error: unknown = await rejection(longWallet.deployToken());

      expect(error).to.be.instanceOf(InvalidAccountReferenceError);
      if (error instanceof InvalidAccountReferenceError) {
        expect(error.message).to.equal(`invalid account reference 'token.${wallet}': ${tooLong}`);
      }
      expect(client.calls()).to.deep.equal([]);
    });

    it('should reject sub-account creation without invoking anything', async () => {
      const error: unknown = await rejection(longWallet.createSubaccounts());

      expect(error).to.be.instanceOf(InvalidAccountReferenceError);
      expect(client.calls()).to.deep.equal([]);
    });

    it('should report the derived accounts as failed state queries', async () => {
      const report: StateQueryReport = await longWallet.queryAllStates();

      expect(client.calls()).to.deep.equal([`state:${wallet}`]);
      expect(report.map((result): boolean => result.succeeded)).to.deep.equal([true, false, false]);
      expect(logger.messages('warn')).to.deep.equal([
        `invalid account reference 'token.${wallet}': ${tooLong}`,
        `invalid account reference 'htlc.${wallet}': ${tooLong}`,
      ]);
    });
  });

  describe('deploy', () => {
    it('should deploy each unit to its own account', async () => {
      await orchestrator.deployMain();
      await orchestrator.deployToken();
      await orchestrator.deployHtlc();

      expect(client.calls()).to.deep.equal([
        'deploy:alice.testnet',
        'deploy:token.alice.testnet',
        'deploy:htlc.alice.testnet',
      ]);
      expect(client.invocations[0]?.config).to.equal(config);
    });

    it('should deploy to the main account when no account is given', async () => {
      await orchestrator.deployDefault();
      expect(client.calls()).to.deep.equal(['deploy:alice.testnet']);
    });

    it('should deploy to an explicit account', async () => {
      await orchestrator.deployDefault('bob.testnet');
      expect(client.calls()).to.deep.equal(['deploy:bob.testnet']);
    });

    it('should reject an empty explicit account without invoking anything', async () => {
      const error: unknown = await rejection(orchestrator.deployDefault(''));

      expect(error).to.be.instanceOf(InvalidAccountReferenceError);
      expect(client.calls()).to.deep.equal([]);
    });

    it('should deploy all units in order', async () => {
      await orchestrator.deployAll();

      expect(client.calls()).to.deep.equal([
        'deploy:alice.testnet',
        'deploy:token.alice.testnet',
        'deploy:htlc.alice.testnet',
      ]);
    });

    it('should stop deploying at the first failure', async () => {
      client.failOn('deploy:token.alice.testnet');

      const error: unknown = await rejection(orchestrator.deployAll());

      expect(client.calls()).to.deep.equal(['deploy:alice.testnet', 'deploy:token.alice.testnet']);
      expect(error).to.be.instanceOf(ExternalCommandFailedError);
      if (error instanceof ExternalCommandFailedError) {
        expect(error.operation).to.equal('deploy');
        expect(error.accountId).to.equal('token.alice.testnet');
        expect(error.message).to.equal(
          "deploy failed for account 'token.alice.testnet': deploy:token.alice.testnet exited with code 1",
        );
      }
    });
  });

  describe('createSubaccounts', () => {
    it('should create token then htlc', async () => {
      await orchestrator.createSubaccounts();

      expect(client.calls()).to.deep.equal(['create-account:token.alice.testnet', 'create-account:htlc.alice.testnet']);
    });

    it('should not attempt htlc when token creation fails', async () => {
      const cause: Error = new Error('account already exists');
      client.failOn('create-account:token.alice.testnet', cause);

      const error: unknown = await rejection(orchestrator.createSubaccounts());

      expect(client.calls()).to.deep.equal(['create-account:token.alice.testnet']);
      expect(error).to.be.instanceOf(ExternalCommandFailedError);
      if (error instanceof ExternalCommandFailedError) {
        expect(error.operation).to.equal('create-account');
        expect(error.cause).to.equal(cause);
      }
    });
  });

  describe('queryState', () => {
    it('should query the main account by default and return the output', async () => {
      client.states.set('alice.testnet', ['Account alice.testnet', 'amount: 10']);

      expect(await orchestrator.queryState()).to.deep.equal(['Account alice.testnet', 'amount: 10']);
      expect(client.calls()).to.deep.equal(['state:alice.testnet']);
    });

    it('should query an explicit account', async () => {
      await orchestrator.queryState('htlc.alice.testnet');
      expect(client.calls()).to.deep.equal(['state:htlc.alice.testnet']);
    });

    it('should wrap a failed query', async () => {
      client.failOn('state:alice.testnet');

      const error: unknown = await rejection(orchestrator.queryState());

      expect(error).to.be.instanceOf(ExternalCommandFailedError);
      if (error instanceof ExternalCommandFailedError) {
        expect(error.operation).to.equal('state');
      }
    });
  });

  describe('queryAllStates', () => {
    it('should query main, token and htlc once each, in order', async () => {
      const report: StateQueryReport = await orchestrator.queryAllStates();

      expect(client.calls()).to.deep.equal(['state:alice.testnet', 'state:token.alice.testnet', 'state:htlc.alice.testnet']);
      expect(report.map((result): boolean => result.succeeded)).to.deep.equal([true, true, true]);
    });

    it('should attempt every query when some fail', async () => {
      client.failOn('state:alice.testnet').failOn('state:token.alice.testnet');
      client.states.set('htlc.alice.testnet', ['Account htlc.alice.testnet']);

      const report: StateQueryReport = await orchestrator.queryAllStates();

      expect(client.calls()).to.deep.equal(['state:alice.testnet', 'state:token.alice.testnet', 'state:htlc.alice.testnet']);
      expect(report).to.have.length(3);
      expect(report[0]?.accountId).to.equal('alice.testnet');
      expect(report[0]?.succeeded).to.be.false;
      expect(report[1]?.succeeded).to.be.false;
      const last = report[2];
      expect(last?.succeeded).to.be.true;
      if (last?.succeeded) {
        expect(last.output).to.deep.equal(['Account htlc.alice.testnet']);
      }
      expect(logger.messages('warn')).to.deep.equal([
        "state failed for account 'alice.testnet': state:alice.testnet exited with code 1",
        "state failed for account 'token.alice.testnet': state:token.alice.testnet exited with code 1",
      ]);
    });
  });

  it('should log in through the client', async () => {
    await orchestrator.login();
    expect(client.calls()).to.deep.equal(['login']);
  });

  it('should run the wallet example end to end', async () => {
    const resolved: ResolvedConfig = mergeConfig({walletIdentity: 'alice.testnet', seedCredential: 'test-secret'}, {});
    const example: DeploymentOrchestrator = new DeploymentOrchestrator(resolved, client, logger);

    await example.createSubaccounts();
    await example.deployAll();
    const report: StateQueryReport = await example.queryAllStates();

    expect(client.calls()).to.deep.equal([
      'create-account:token.alice.testnet',
      'create-account:htlc.alice.testnet',
      'deploy:alice.testnet',
      'deploy:token.alice.testnet',
      'deploy:htlc.alice.testnet',
      'state:alice.testnet',
      'state:token.alice.testnet',
      'state:htlc.alice.testnet',
    ]);
    expect(client.invocations.every((invocation): boolean => invocation.config.network === 'testnet')).to.be.true;
    expect(client.invocations[2]?.config.gasBudget).to.equal('100.0 Tgas');
    expect(report.every((result): boolean => result.succeeded)).to.be.true;
  });

  it('should invoke nothing when a required setting is missing', () => {
    expect(() => new DeploymentOrchestrator(mergeConfig({walletIdentity: 'alice.testnet'}, {}), client, logger)).to.throw(
      MissingRequiredConfigError,
    );
    expect(client.invocations).to.have.length(0);
  });
});
