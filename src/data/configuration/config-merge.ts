// SPDX-License-Identifier: Apache-2.0

import {MissingRequiredConfigError} from '../../core/errors/missing-required-config-error.js';
import {
  CONFIG_DEFAULTS,
  CONFIG_ENVIRONMENT_VARIABLES,
  CONFIG_KEYS,
  type ConfigKey,
  type PartialDeployConfig,
  REQUIRED_CONFIG_KEYS,
  type ResolvedConfig,
} from './model/deploy-config.js';

/**
 * Returns the trimmed value, or undefined when it is unset or blank.
 */
export function presentValue(value: string | undefined): string | undefined {
  const trimmed: string | undefined = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Layers partial configurations; for each key the first layer holding a non-blank value wins.
 */
export function overlay(...layers: PartialDeployConfig[]): PartialDeployConfig {
  const result: PartialDeployConfig = {};
  for (const key of CONFIG_KEYS) {
    for (const layer of layers) {
      const value: string | undefined = presentValue(layer[key]);
      if (value !== undefined) {
        result[key] = value;
        break;
      }
    }
  }
  return result;
}

/**
 * Merges the layers into a {@link ResolvedConfig} with precedence explicit > override > defaults.
 *
 * @throws MissingRequiredConfigError when the wallet or the seed is absent from every layer
 */
export function mergeConfig(
  explicit: PartialDeployConfig,
  override: PartialDeployConfig,
  defaults: PartialDeployConfig = CONFIG_DEFAULTS,
): ResolvedConfig {
  const merged: PartialDeployConfig = overlay(explicit, override, defaults);

  for (const key of REQUIRED_CONFIG_KEYS) {
    if (merged[key] === undefined) {
      throw new MissingRequiredConfigError(key, CONFIG_ENVIRONMENT_VARIABLES[key]);
    }
  }

  return {
    walletIdentity: requireValue(merged, 'walletIdentity'),
    seedCredential: requireValue(merged, 'seedCredential'),
    network: requireValue(merged, 'network'),
    gasBudget: requireValue(merged, 'gasBudget'),
    depositAmount: requireValue(merged, 'depositAmount'),
    walletUiEndpoint: requireValue(merged, 'walletUiEndpoint'),
  };
}

function requireValue(config: PartialDeployConfig, key: ConfigKey): string {
  const value: string | undefined = config[key];
  if (value === undefined) {
    throw new MissingRequiredConfigError(key);
  }
  return value;
}
