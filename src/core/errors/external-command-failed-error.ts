// SPDX-License-Identifier: Apache-2.0

import {DeployError} from './deploy-error.js';
import {type NearOperation} from '../../types/index.js';

/**
 * An external chain command exited with a non-zero status or could not be started.
 */
export class ExternalCommandFailedError extends DeployError {
  public constructor(
    public readonly operation: NearOperation,
    public readonly accountId: string,
    cause?: Error,
  ) {
    super(
      `${operation} failed for account '${accountId}'${cause ? `: ${cause.message}` : ''}`,
      cause,
      {operation, accountId},
    );
  }
}
