// SPDX-License-Identifier: Apache-2.0

import {type PartialDeployConfig} from '../model/deploy-config.js';

/**
 * A single layer of configuration. Sources with a higher ordinal take precedence when merged by
 * {@link ConfigResolver.resolveSources}.
 */
export interface ConfigSource {
  readonly name: string;

  readonly ordinal: number;

  /**
   * Reads the layer. Settings the source does not provide are left undefined.
   */
  load(): Promise<PartialDeployConfig>;
}
