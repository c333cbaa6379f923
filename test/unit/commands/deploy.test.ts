// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it, beforeEach, afterEach} from 'mocha';
import sinon, {type SinonSpy} from 'sinon';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {DeployCommand} from '../../../src/commands/deploy.js';
import {ExternalCommandFailedError} from '../../../src/core/errors/external-command-failed-error.js';
import {ConfigResolver} from '../../../src/data/configuration/impl/config-resolver.js';
import {type ArgvStruct} from '../../../src/types/index.js';
import {FakeNearClient} from '../../helpers/fake-near-client.js';
import {RecordingLogger} from '../../helpers/recording-logger.js';

describe('DeployCommand', () => {
  let directory: string;
  let logger: RecordingLogger;
  let client: FakeNearClient;
  let deployCommand: DeployCommand;

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'near-deploy-deploy-'));
    logger = new RecordingLogger();
    client = new FakeNearClient();
    const environment: NodeJS.ProcessEnv = {NEAR_WALLET: 'alice.testnet', NEAR_WALLET_SEED: 'test-secret'};
    deployCommand = new DeployCommand(logger, new ConfigResolver(logger, directory, environment), client);
  });

  afterEach(() => {
    sinon.restore();
    fs.rmSync(directory, {recursive: true, force: true});
  });

  function argv(values: Record<string, unknown> = {}): ArgvStruct {
    return {_: ['deploy'], $0: 'near-deploy', ...values};
  }

  it('should deploy to the main account when no account is given', async () => {
    expect(await deployCommand.account(argv())).to.be.true;
    expect(client.calls()).to.deep.equal(['deploy:alice.testnet']);
  });

  it('should deploy to the account given with --account', async () => {
    await deployCommand.account(argv({account: 'bob.testnet'}));
    expect(client.calls()).to.deep.equal(['deploy:bob.testnet']);
  });

  it('should deploy each unit to its account', async () => {
    await deployCommand.main(argv());
    await deployCommand.token(argv());
    await deployCommand.htlc(argv());

    expect(client.calls()).to.deep.equal([
      'deploy:alice.testnet',
      'deploy:token.alice.testnet',
      'deploy:htlc.alice.testnet',
    ]);
  });

  it('should pass command line settings to the client', async () => {
    const deployWithInit: SinonSpy = sinon.spy(client, 'deployWithInit');

    await deployCommand.main(argv({gas: '300.0 Tgas', deposit: '0 NEAR'}));

    expect(deployWithInit.calledOnce).to.be.true;
    expect(deployWithInit.firstCall.args[1]).to.include({gasBudget: '300.0 Tgas', depositAmount: '0 NEAR'});
  });

  it('should stop deploying all units at the first failure', async () => {
    client.failOn('deploy:token.alice.testnet');

    let failure: unknown;
    try {
      await deployCommand.all(argv());
    } catch (error) {
      failure = error;
    }

    expect(failure).to.be.instanceOf(ExternalCommandFailedError);
    expect(client.calls()).to.deep.equal(['deploy:alice.testnet', 'deploy:token.alice.testnet']);
  });
});
