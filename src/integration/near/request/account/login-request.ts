// SPDX-License-Identifier: Apache-2.0

import {type NearRequest} from '../near-request.js';
import {type NearExecutionBuilder} from '../../execution/near-execution-builder.js';

/**
 * A request to authorize the CLI through the wallet web UI. Runs attached to the terminal.
 */
export class LoginRequest implements NearRequest {
  public constructor(
    private readonly network: string,
    private readonly walletUrl: string,
  ) {}

  public apply(builder: NearExecutionBuilder): void {
    builder
      .subcommands('login')
      .argument('networkId', this.network)
      .argument('walletUrl', this.walletUrl)
      .interactive();
  }
}
