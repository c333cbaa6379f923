// SPDX-License-Identifier: Apache-2.0

import {DeployError} from './deploy-error.js';

/**
 * A deliberate early exit, such as printing the version. Not reported as a failure.
 */
export class UserBreak extends DeployError {
  public constructor(message: string) {
    super(message);
  }
}
