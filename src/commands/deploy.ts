// SPDX-License-Identifier: Apache-2.0

import {injectable} from 'tsyringe-neo';
import {type ListrTask} from 'listr2';
import {BaseCommand, type OrchestrationContext} from './base.js';
import {Flags as flags} from './flags.js';
import {type DeploymentOrchestrator} from '../core/deployment-orchestrator.js';
import {type ArgvStruct} from '../types/index.js';

/**
 * Builds the contract in the working directory and deploys it, calling its initializer.
 */
@injectable()
export class DeployCommand extends BaseCommand {
  public async main(argv: ArgvStruct): Promise<boolean> {
    await this.runTasks(argv, 'Error deploying main contract', this.deployTask('main'));
    return true;
  }

  public async token(argv: ArgvStruct): Promise<boolean> {
    await this.runTasks(argv, 'Error deploying token contract', this.deployTask('token'));
    return true;
  }

  public async htlc(argv: ArgvStruct): Promise<boolean> {
    await this.runTasks(argv, 'Error deploying htlc contract', this.deployTask('htlc'));
    return true;
  }

  public async account(argv: ArgvStruct): Promise<boolean> {
    const accountId: string | undefined = flags.stringValue(argv, flags.account);
    await this.runTasks<OrchestrationContext>(argv, 'Error deploying contract', {
      title: 'Deploy contract',
      task: async (context_, task): Promise<void> => {
        const target: string = accountId ?? context_.orchestrator.accounts.main;
        task.title = `Deploy contract to ${target}`;
        await context_.orchestrator.deployDefault(accountId);
      },
    });
    return true;
  }

  public async all(argv: ArgvStruct): Promise<boolean> {
    await this.runTasks(
      argv,
      'Error deploying contracts',
      this.deployTask('main'),
      this.deployTask('token'),
      this.deployTask('htlc'),
    );
    return true;
  }

  private deployTask(unit: 'main' | 'token' | 'htlc'): ListrTask<OrchestrationContext> {
    const operations: Record<typeof unit, (orchestrator: DeploymentOrchestrator) => Promise<void>> = {
      main: (orchestrator): Promise<void> => orchestrator.deployMain(),
      token: (orchestrator): Promise<void> => orchestrator.deployToken(),
      htlc: (orchestrator): Promise<void> => orchestrator.deployHtlc(),
    };

    return {
      title: `Deploy ${unit} contract`,
      task: async (context_, task): Promise<void> => {
        task.title = `Deploy ${unit} contract to ${context_.orchestrator.accounts[unit]}`;
        await operations[unit](context_.orchestrator);
      },
    };
  }
}
