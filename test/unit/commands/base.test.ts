// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it, beforeEach, afterEach} from 'mocha';
import {type ListrTask} from 'listr2';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {BaseCommand, type OrchestrationContext} from '../../../src/commands/base.js';
import {DeployError} from '../../../src/core/errors/deploy-error.js';
import {ConfigResolver} from '../../../src/data/configuration/impl/config-resolver.js';
import {type ArgvStruct} from '../../../src/types/index.js';
import {FakeNearClient} from '../../helpers/fake-near-client.js';
import {RecordingLogger} from '../../helpers/recording-logger.js';

class TaskRunningCommand extends BaseCommand {
  public run(...tasks: ListrTask<OrchestrationContext>[]): Promise<OrchestrationContext> {
    const argv: ArgvStruct = {_: ['test'], $0: 'near-deploy', network: 'mainnet'};
    return this.runTasks<OrchestrationContext>(argv, 'Error in test task', ...tasks);
  }
}

describe('BaseCommand', () => {
  let directory: string;
  let command: TaskRunningCommand;

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'near-deploy-base-'));
    const logger: RecordingLogger = new RecordingLogger();
    const environment: NodeJS.ProcessEnv = {NEAR_WALLET: 'alice.testnet', NEAR_WALLET_SEED: 'test-secret'};
    command = new TaskRunningCommand(logger, new ConfigResolver(logger, directory, environment), new FakeNearClient());
  });

  afterEach(() => {
    fs.rmSync(directory, {recursive: true, force: true});
  });

  async function rejection(promise: Promise<unknown>): Promise<unknown> {
    try {
      await promise;
    } catch (error) {
      return error;
    }
    throw new Error('expected the tasks to reject');
  }

  it('should initialize the context before the tasks run', async () => {
    const seen: string[] = [];

    const context_: OrchestrationContext = await command.run({
      title: 'Record',
      task: async (context_): Promise<void> => {
        seen.push(context_.orchestrator.accounts.main);
      },
    });

    expect(seen).to.deep.equal(['alice.testnet']);
    expect(context_.config.network).to.equal('mainnet');
  });

  it('should wrap an error that is not a deploy error', async () => {
    const cause: Error = new Error('boom');

    const error: unknown = await rejection(
      command.run({
        title: 'Fail',
        task: async (): Promise<void> => {
          throw cause;
        },
      }),
    );

    expect(error).to.be.instanceOf(DeployError);
    if (error instanceof DeployError) {
      expect(error.message).to.equal('Error in test task: boom');
      expect(error.cause).to.equal(cause);
    }
  });

  it('should rethrow a deploy error unchanged', async () => {
    const original: DeployError = new DeployError('already described');

    const error: unknown = await rejection(
      command.run({
        title: 'Fail',
        task: async (): Promise<void> => {
          throw original;
        },
      }),
    );

    expect(error).to.equal(original);
  });
});
