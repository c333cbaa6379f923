// SPDX-License-Identifier: Apache-2.0

import {type NearRequest} from '../near-request.js';
import {type NearExecutionBuilder} from '../../execution/near-execution-builder.js';
import {type DeployWithInitOptions} from '../../model/deploy-contract/deploy-with-init-options.js';
import {type AccountId} from '../../../../types/index.js';

/**
 * A request to build the contract in the working directory, deploy it to an account and call its initializer.
 */
export class DeployWithInitRequest implements NearRequest {
  public constructor(
    private readonly accountId: AccountId,
    private readonly options: DeployWithInitOptions,
  ) {}

  public apply(builder: NearExecutionBuilder): void {
    builder.subcommands('near', 'deploy', 'build-non-reproducible-wasm').positional(this.accountId);
    this.options.apply(builder);
  }
}
