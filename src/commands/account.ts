// SPDX-License-Identifier: Apache-2.0

import {injectable} from 'tsyringe-neo';
import chalk from 'chalk';
import {BaseCommand, type OrchestrationContext} from './base.js';
import {Flags as flags} from './flags.js';
import {DeployError} from '../core/errors/deploy-error.js';
import {type StateQueryReport, type StateQueryFailure} from '../core/deployment-orchestrator.js';
import {type AccountId, type ArgvStruct} from '../types/index.js';

interface StateContext extends OrchestrationContext {
  accountId: AccountId;
  output: string[];
}

interface StateReportContext extends OrchestrationContext {
  report: StateQueryReport;
}

@injectable()
export class AccountCommand extends BaseCommand {
  public async create(argv: ArgvStruct): Promise<boolean> {
    await this.runTasks<OrchestrationContext>(argv, 'Error in creating accounts', {
      title: 'Create token and htlc accounts',
      task: async (context_, task): Promise<void> => {
        const {token, htlc} = context_.orchestrator.accounts;
        task.title = `Create accounts ${token} and ${htlc}`;
        await context_.orchestrator.createSubaccounts();
      },
    });
    return true;
  }

  public async state(argv: ArgvStruct): Promise<boolean> {
    const accountId: string | undefined = flags.stringValue(argv, flags.account);
    const context_: StateContext = await this.runTasks<StateContext>(argv, 'Error in querying account state', {
      title: 'Query account state',
      task: async (context_, task): Promise<void> => {
        context_.accountId = accountId ?? context_.orchestrator.accounts.main;
        task.title = `Query state of ${context_.accountId}`;
        context_.output = await context_.orchestrator.queryState(accountId);
      },
    });

    this.logger.showList(`State of ${context_.accountId}`, context_.output);
    return true;
  }

  public async stateAll(argv: ArgvStruct): Promise<boolean> {
    const context_: StateReportContext = await this.runTasks<StateReportContext>(
      argv,
      'Error in querying account states',
      {
        title: 'Query state of all accounts',
        task: async (context_): Promise<void> => {
          context_.report = await context_.orchestrator.queryAllStates();
        },
      },
    );

    for (const result of context_.report) {
      if (result.succeeded) {
        this.logger.showList(`State of ${result.accountId}`, result.output);
      }
    }

    const failures: StateQueryFailure[] = context_.report.filter(
      (result): result is StateQueryFailure => !result.succeeded,
    );
    this.logger.showList(
      'Failed state queries',
      failures.map((failure): string => `${failure.accountId}: ${failure.error.message}`),
    );

    if (failures.length > 0) {
      throw new DeployError(`${failures.length} of ${context_.report.length} state queries failed`, undefined, {
        accounts: failures.map((failure): AccountId => failure.accountId),
      });
    }
    return true;
  }

  /**
   * Interactive, so it runs outside the task renderer.
   */
  public async login(argv: ArgvStruct): Promise<boolean> {
    const {config, orchestrator} = await this.initialize(argv);
    this.logger.showUser(chalk.cyan(`Opening ${config.walletUiEndpoint} to authorize on ${config.network}`));
    await orchestrator.login();
    return true;
  }
}
