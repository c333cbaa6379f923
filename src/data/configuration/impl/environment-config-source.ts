// SPDX-License-Identifier: Apache-2.0

import {type ConfigSource} from '../spi/config-source.js';
import {CONFIG_ENVIRONMENT_VARIABLES, CONFIG_KEYS, type PartialDeployConfig} from '../model/deploy-config.js';

/**
 * A {@link ConfigSource} that reads the settings from environment variables.
 *
 * <p>
 * Strings are read verbatim, so `NEAR_GAS="100.0 Tgas"` resolves to `100.0 Tgas`.
 * A `.env` file in the working directory is loaded into the process environment before this source is read.
 */
export class EnvironmentConfigSource implements ConfigSource {
  public constructor(private readonly environment: NodeJS.ProcessEnv = process.env) {}

  public get name(): string {
    return 'EnvironmentConfigSource';
  }

  public get ordinal(): number {
    return 200;
  }

  public async load(): Promise<PartialDeployConfig> {
    const data: PartialDeployConfig = {};
    for (const key of CONFIG_KEYS) {
      const value: string | undefined = this.environment[CONFIG_ENVIRONMENT_VARIABLES[key]];
      if (value !== undefined) {
        data[key] = value;
      }
    }
    return data;
  }
}
