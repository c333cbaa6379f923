// SPDX-License-Identifier: Apache-2.0

import {DeployError} from './deploy-error.js';

/**
 * A mandatory setting was not supplied by any configuration source.
 */
export class MissingRequiredConfigError extends DeployError {
  public constructor(
    public readonly configName: string,
    public readonly environmentVariable?: string,
  ) {
    super(
      environmentVariable
        ? `missing required configuration '${configName}': set ${environmentVariable} or add '${configName}' to the local override file`
        : `missing required configuration '${configName}'`,
      undefined,
      {configName, environmentVariable},
    );
  }
}
