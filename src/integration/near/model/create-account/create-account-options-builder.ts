// SPDX-License-Identifier: Apache-2.0

import {CreateAccountOptions} from './create-account-options.js';
import {type ResolvedConfig} from '../../../../data/configuration/model/deploy-config.js';
import {type AccountId} from '../../../../types/index.js';

export class CreateAccountOptionsBuilder {
  private constructor(
    private readonly _masterAccount: AccountId,
    private readonly _network: string,
  ) {}

  /**
   * Seeds the builder with the wallet and network of a resolved configuration.
   */
  public static fromConfig(config: ResolvedConfig): CreateAccountOptionsBuilder {
    return new CreateAccountOptionsBuilder(config.walletIdentity, config.network);
  }

  public build(): CreateAccountOptions {
    return new CreateAccountOptions(this._masterAccount, this._network);
  }
}
