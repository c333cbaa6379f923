// SPDX-License-Identifier: Apache-2.0

import {DeployError} from '../../../core/errors/deploy-error.js';

/**
 * Thrown when an external chain CLI exits with a non-zero status or cannot be started.
 */
export class NearExecutionError extends DeployError {
  /**
   * The default message to use when no message is provided
   */
  private static readonly DEFAULT_MESSAGE: string = 'Execution of the chain command failed with exit code: %d';

  /**
   * @param exitCode - the non-zero exit code, or -1 when the process could not be started
   * @param message - the error message, a default mentioning the exit code when omitted
   * @param stdOut - the standard output of the process
   * @param stdErr - the standard error of the process
   * @param cause - the underlying error, if any
   */
  public constructor(
    public readonly exitCode: number,
    message?: string,
    public readonly stdOut: string = '',
    public readonly stdErr: string = '',
    cause?: Error,
  ) {
    super(message ?? NearExecutionError.DEFAULT_MESSAGE.replace('%d', exitCode.toString()), cause, {exitCode});
  }

  public override toString(): string {
    return `NearExecutionError{message=${this.message}, exitCode=${this.exitCode}, stdOut='${this.stdOut}', stdErr='${this.stdErr}'}`;
  }
}
