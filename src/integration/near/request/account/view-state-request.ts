// SPDX-License-Identifier: Apache-2.0

import {type NearRequest} from '../near-request.js';
import {type NearExecutionBuilder} from '../../execution/near-execution-builder.js';
import {type AccountId} from '../../../../types/index.js';

/**
 * A request for the on-chain state of an account.
 */
export class ViewStateRequest implements NearRequest {
  public constructor(
    private readonly accountId: AccountId,
    private readonly network: string,
  ) {}

  public apply(builder: NearExecutionBuilder): void {
    builder.subcommands('state').positional(this.accountId).argument('networkId', this.network);
  }
}
