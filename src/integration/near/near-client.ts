// SPDX-License-Identifier: Apache-2.0

import {type ResolvedConfig} from '../../data/configuration/model/deploy-config.js';
import {type AccountId} from '../../types/index.js';

/**
 * The NearClient is a bridge between TypeScript and the chain CLIs (`near` and `cargo near`).
 *
 * Every operation takes the resolved configuration so that it never reads ambient state itself.
 */
export interface NearClient {
  /**
   * Runs the interactive wallet login attached to the current terminal.
   */
  login(config: ResolvedConfig): Promise<void>;

  /**
   * Creates a sub-account of the configured wallet.
   *
   * @param accountId - the fully qualified account to create
   */
  createAccount(accountId: AccountId, config: ResolvedConfig): Promise<void>;

  /**
   * Builds the contract in the working directory, deploys it to the account and calls its initializer.
   */
  deployWithInit(accountId: AccountId, config: ResolvedConfig): Promise<void>;

  /**
   * Queries the on-chain state of an account.
   *
   * @returns the lines printed by the CLI
   */
  viewState(accountId: AccountId, config: ResolvedConfig): Promise<string[]>;
}
