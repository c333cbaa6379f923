// SPDX-License-Identifier: Apache-2.0

import {DeployError} from './deploy-error.js';

export class InvalidAccountReferenceError extends DeployError {
  public constructor(
    public readonly accountId: string,
    reason: string,
  ) {
    super(`invalid account reference '${accountId}': ${reason}`, undefined, {accountId});
  }
}
