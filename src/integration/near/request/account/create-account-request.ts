// SPDX-License-Identifier: Apache-2.0

import {type NearRequest} from '../near-request.js';
import {type NearExecutionBuilder} from '../../execution/near-execution-builder.js';
import {type CreateAccountOptions} from '../../model/create-account/create-account-options.js';
import {type AccountId} from '../../../../types/index.js';

/**
 * A request to create a named sub-account funded by its master account.
 */
export class CreateAccountRequest implements NearRequest {
  public constructor(
    private readonly accountId: AccountId,
    private readonly options: CreateAccountOptions,
  ) {}

  public apply(builder: NearExecutionBuilder): void {
    builder.subcommands('create-account').positional(this.accountId);
    this.options.apply(builder);
  }
}
