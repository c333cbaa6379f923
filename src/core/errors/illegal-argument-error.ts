// SPDX-License-Identifier: Apache-2.0

import {DeployError} from './deploy-error.js';

export class IllegalArgumentError extends DeployError {
  /**
   * Create an error for an argument that must not be used
   *
   * @param message - error message
   * @param value - the offending value
   * @param cause - source error (if any)
   */
  public constructor(message: string, value: unknown = '', cause?: Error) {
    super(message, cause, {value});
  }
}
