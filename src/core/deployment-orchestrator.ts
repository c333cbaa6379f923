// SPDX-License-Identifier: Apache-2.0

import {AccountDeriver, type AccountSet} from '../business/accounts/account-deriver.js';
import {NearAccountId} from '../business/accounts/near-account-id.js';
import {ExternalCommandFailedError} from './errors/external-command-failed-error.js';
import {InvalidAccountReferenceError} from './errors/invalid-account-reference-error.js';
import {type DeployLogger} from './logging/deploy-logger.js';
import {type NearClient} from '../integration/near/near-client.js';
import {type ResolvedConfig} from '../data/configuration/model/deploy-config.js';
import {type AccountId, type NearOperation} from '../types/index.js';

export interface StateQuerySuccess {
  readonly accountId: AccountId;
  readonly succeeded: true;
  readonly output: string[];
}

export interface StateQueryFailure {
  readonly accountId: AccountId;
  readonly succeeded: false;
  /** The command failed, or the derived account id is not a valid account id */
  readonly error: ExternalCommandFailedError | InvalidAccountReferenceError;
}

export type StateQueryResult = StateQuerySuccess | StateQueryFailure;

/** One entry per queried account, in query order */
export type StateQueryReport = readonly StateQueryResult[];

/**
 * Sequences the external invocations of a single run against the accounts derived from the configured wallet.
 */
export class DeploymentOrchestrator {
  public readonly accounts: AccountSet;

  public constructor(
    private readonly config: ResolvedConfig,
    private readonly client: NearClient,
    private readonly logger: DeployLogger,
  ) {
    this.accounts = AccountDeriver.derive(config.walletIdentity);
  }

  public async login(): Promise<void> {
    await this.invoke('login', this.accounts.main, (): Promise<void> => this.client.login(this.config));
  }

  public async deployMain(): Promise<void> {
    await this.deploy(this.accounts.main);
  }

  public async deployToken(): Promise<void> {
    await this.deploy(this.accounts.token);
  }

  public async deployHtlc(): Promise<void> {
    await this.deploy(this.accounts.htlc);
  }

  /**
   * Deploys to the given account, or to the main account when none is given.
   */
  public async deployDefault(accountId?: string): Promise<void> {
    await this.deploy(this.targetAccount(accountId));
  }

  /**
   * Deploys main, token and htlc in that order, stopping at the first failure.
   */
  public async deployAll(): Promise<void> {
    await this.deployMain();
    await this.deployToken();
    await this.deployHtlc();
  }

  /**
   * Creates the token and htlc sub-accounts in that order, stopping at the first failure.
   */
  public async createSubaccounts(): Promise<void> {
    for (const subaccount of [this.accounts.token, this.accounts.htlc]) {
      const accountId: AccountId = NearAccountId.validate(subaccount);
      this.logger.info(`Creating account ${accountId}`);
      await this.invoke('create-account', accountId, (): Promise<void> =>
        this.client.createAccount(accountId, this.config),
      );
    }
  }

  public async queryState(accountId?: string): Promise<string[]> {
    const target: AccountId = this.targetAccount(accountId);
    return this.invoke('state', target, (): Promise<string[]> => this.client.viewState(target, this.config));
  }

  /**
   * Queries main, token and htlc once each. A failed query is recorded and the remaining ones still run.
   */
  public async queryAllStates(): Promise<StateQueryReport> {
    const report: StateQueryResult[] = [];
    for (const accountId of [this.accounts.main, this.accounts.token, this.accounts.htlc]) {
      try {
        const output: string[] = await this.queryState(accountId);
        report.push({accountId, succeeded: true, output});
      } catch (error) {
        if (!(error instanceof ExternalCommandFailedError || error instanceof InvalidAccountReferenceError)) {
          throw error;
        }
        this.logger.warn(error.message);
        report.push({accountId, succeeded: false, error});
      }
    }
    return report;
  }

  private async deploy(target: AccountId): Promise<void> {
    const accountId: AccountId = NearAccountId.validate(target);
    this.logger.info(`Deploying contract to ${accountId}`);
    await this.invoke('deploy', accountId, (): Promise<void> => this.client.deployWithInit(accountId, this.config));
  }

  private targetAccount(accountId?: string): AccountId {
    return NearAccountId.validate(accountId ?? this.accounts.main);
  }

  private async invoke<T>(operation: NearOperation, accountId: AccountId, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      throw new ExternalCommandFailedError(
        operation,
        accountId,
        error instanceof Error ? error : new Error(String(error)),
      );
    }
  }
}
