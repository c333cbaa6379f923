// SPDX-License-Identifier: Apache-2.0

import {type Options} from '../../request/options.js';
import {type NearExecutionBuilder} from '../../execution/near-execution-builder.js';
import {SUBACCOUNT_INITIAL_BALANCE} from '../../../../core/constants.js';
import {IllegalArgumentError} from '../../../../core/errors/illegal-argument-error.js';
import {type AccountId} from '../../../../types/index.js';

/**
 * Options for the `near create-account` command. The new account is funded with
 * {@link SUBACCOUNT_INITIAL_BALANCE} and signed with the locally stored key, never a hardware ledger.
 */
export class CreateAccountOptions implements Options {
  /**
   * @param masterAccount - the account paying for and owning the new account
   * @param network - the network to create the account on
   */
  public constructor(
    private readonly masterAccount: AccountId,
    private readonly network: string,
  ) {
    if (!masterAccount) {
      throw new IllegalArgumentError('masterAccount must not be null');
    }
    if (!network) {
      throw new IllegalArgumentError('network must not be null');
    }
  }

  /**
   * Apply the options to the NearExecutionBuilder.
   * @param builder The NearExecutionBuilder to apply options to.
   */
  public apply(builder: NearExecutionBuilder): void {
    builder
      .argument('masterAccount', this.masterAccount)
      .argument('initialBalance', SUBACCOUNT_INITIAL_BALANCE)
      .argument('signWithLedger', 'false')
      .argument('networkId', this.network);
  }
}
