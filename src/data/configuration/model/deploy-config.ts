// SPDX-License-Identifier: Apache-2.0

import * as constants from '../../../core/constants.js';

/**
 * The fully resolved settings for one invocation. Built once at the entry boundary and passed down; nothing
 * downstream reads the environment.
 */
export interface ResolvedConfig {
  readonly walletIdentity: string;
  /** Never logged */
  readonly seedCredential: string;
  readonly network: string;
  readonly gasBudget: string;
  readonly depositAmount: string;
  readonly walletUiEndpoint: string;
}

export type ConfigKey = keyof ResolvedConfig;

/** One configuration layer; unset and empty values fall through to the next layer */
export type PartialDeployConfig = {
  -readonly [K in ConfigKey]?: string;
};

export type OptionalConfigKey = Exclude<ConfigKey, 'walletIdentity' | 'seedCredential'>;

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'walletIdentity',
  'seedCredential',
  'network',
  'gasBudget',
  'depositAmount',
  'walletUiEndpoint',
];

export const REQUIRED_CONFIG_KEYS: readonly ConfigKey[] = ['walletIdentity', 'seedCredential'];

export const CONFIG_DEFAULTS: Readonly<Record<OptionalConfigKey, string>> = {
  network: constants.DEFAULT_NETWORK,
  gasBudget: constants.DEFAULT_GAS_BUDGET,
  depositAmount: constants.DEFAULT_DEPOSIT_AMOUNT,
  walletUiEndpoint: constants.DEFAULT_WALLET_UI_ENDPOINT,
};

/** Environment variable read for each setting */
export const CONFIG_ENVIRONMENT_VARIABLES: Readonly<Record<ConfigKey, string>> = {
  walletIdentity: constants.ENV_WALLET,
  seedCredential: constants.ENV_WALLET_SEED,
  network: constants.ENV_NETWORK,
  gasBudget: constants.ENV_GAS,
  depositAmount: constants.ENV_DEPOSIT,
  walletUiEndpoint: constants.ENV_WALLET_URL,
};

/** Key used for each setting in the local override file */
export const CONFIG_FILE_KEYS: Readonly<Record<ConfigKey, string>> = {
  walletIdentity: 'wallet',
  seedCredential: 'seed',
  network: 'network',
  gasBudget: 'gas',
  depositAmount: 'deposit',
  walletUiEndpoint: 'walletUrl',
};
