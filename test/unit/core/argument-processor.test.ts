// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it, beforeEach, afterEach} from 'mocha';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {ArgumentProcessor} from '../../../src/argument-processor.js';
import {Container, type InstanceOverrides} from '../../../src/core/dependency-injection/container-init.js';
import {InjectTokens} from '../../../src/core/dependency-injection/inject-tokens.js';
import {type SingletonContainer} from '../../../src/core/dependency-injection/singleton-container.js';
import {ValueContainer} from '../../../src/core/dependency-injection/value-container.js';
import {DeployError} from '../../../src/core/errors/deploy-error.js';
import {FakeNearClient} from '../../helpers/fake-near-client.js';
import {RecordingLogger} from '../../helpers/recording-logger.js';

describe('ArgumentProcessor', () => {
  let directory: string;
  let logger: RecordingLogger;
  let client: FakeNearClient;
  let originalExitCode: typeof process.exitCode;

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'near-deploy-arguments-'));
    logger = new RecordingLogger();
    client = new FakeNearClient();
    originalExitCode = process.exitCode;

    const overrides: InstanceOverrides = new Map<symbol, SingletonContainer | ValueContainer>([
      [InjectTokens.DeployLogger, new ValueContainer(InjectTokens.DeployLogger, logger)],
      [InjectTokens.NearClient, new ValueContainer(InjectTokens.NearClient, client)],
      [InjectTokens.WorkingDirectory, new ValueContainer(InjectTokens.WorkingDirectory, directory)],
    ]);
    Container.getInstance().reset('debug', false, overrides, {
      NEAR_WALLET: 'alice.testnet',
      NEAR_WALLET_SEED: 'test-secret',
    });
  });

  afterEach(() => {
    process.exitCode = originalExitCode;
    fs.rmSync(directory, {recursive: true, force: true});
  });

  it('should route a command to its handler', async () => {
    await ArgumentProcessor.process(['node', 'near-deploy', 'deploy', 'main']);

    expect(client.calls()).to.deep.equal(['deploy:alice.testnet']);
    expect(logger.messages('info')).to.include("==== Running 'deploy main' ===");
  });

  it('should print the command header and start a new trace', async () => {
    await ArgumentProcessor.process(['node', 'near-deploy', 'account', 'state']);

    expect(logger.traceIds).to.equal(1);
    expect(logger.messages('user')[0]).to.include(':: account state');
  });

  it('should switch the logger to dev mode', async () => {
    await ArgumentProcessor.process(['node', 'near-deploy', 'account', 'create', '--dev']);

    expect(logger.developmentMode).to.be.true;
    expect(client.calls()).to.deep.equal(['create-account:token.alice.testnet', 'create-account:htlc.alice.testnet']);
  });

  it('should pass the account flag through', async () => {
    await ArgumentProcessor.process(['node', 'near-deploy', 'deploy', 'account', '--account', 'bob.testnet']);

    expect(client.calls()).to.deep.equal(['deploy:bob.testnet']);
  });

  it('should reject an unknown command without invoking anything', async () => {
    let failure: unknown;
    try {
      await ArgumentProcessor.process(['node', 'near-deploy', 'bogus']);
    } catch (error) {
      failure = error;
    }

    expect(failure).to.be.instanceOf(DeployError);
    if (failure instanceof DeployError) {
      expect(failure.message).to.equal('Unknown argument: bogus');
    }
    expect(process.exitCode).to.equal(1);
    expect(client.calls()).to.deep.equal([]);
  });
});
