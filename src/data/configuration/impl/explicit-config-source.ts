// SPDX-License-Identifier: Apache-2.0

import {type ConfigSource} from '../spi/config-source.js';
import {type PartialDeployConfig} from '../model/deploy-config.js';

/**
 * Settings given explicitly for this invocation, normally the command line flags.
 */
export class ExplicitConfigSource implements ConfigSource {
  public constructor(private readonly values: PartialDeployConfig = {}) {}

  public get name(): string {
    return 'ExplicitConfigSource';
  }

  public get ordinal(): number {
    return 300;
  }

  public async load(): Promise<PartialDeployConfig> {
    return {...this.values};
  }
}
