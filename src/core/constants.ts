// SPDX-License-Identifier: Apache-2.0

import {PRESET_TIMER} from 'listr2';
import os from 'node:os';
import path from 'node:path';

// -------------------- near-deploy related constants ----------------------------------------------------------------
export const NEAR_DEPLOY_HOME_ENV: string = 'NEAR_DEPLOY_HOME';
export const NEAR_DEPLOY_LOG_LEVEL_ENV: string = 'NEAR_DEPLOY_LOG_LEVEL';
export const DEFAULT_NEAR_DEPLOY_HOME_DIR: string = path.join(os.homedir(), '.near-deploy');
export const DEFAULT_LOG_LEVEL: string = 'info';
export const NEAR_DEPLOY_LOG_FILE: string = 'near-deploy.log';
export const NEAR_DEPLOY_NDJSON_LOG_FILE: string = 'near-deploy.ndjson';

// -------------------- external executables -------------------------------------------------------------------------
export const NEAR_EXECUTABLE_ENV: string = 'NEAR_CLI';
export const CARGO_EXECUTABLE_ENV: string = 'CARGO';
export const DEFAULT_NEAR_EXECUTABLE: string = 'near';
export const DEFAULT_CARGO_EXECUTABLE: string = 'cargo';

// -------------------- configuration --------------------------------------------------------------------------------
export const DEFAULT_LOCAL_CONFIG_FILE: string = 'near-deploy.local.yaml';
export const LOCAL_CONFIG_FILE_ENV: string = 'NEAR_DEPLOY_CONFIG_FILE';

export const ENV_WALLET: string = 'NEAR_WALLET';
export const ENV_WALLET_SEED: string = 'NEAR_WALLET_SEED';
export const ENV_NETWORK: string = 'NEAR_NETWORK';
export const ENV_GAS: string = 'NEAR_GAS';
export const ENV_DEPOSIT: string = 'NEAR_DEPOSIT';
export const ENV_WALLET_URL: string = 'NEAR_WALLET_URL';

export const DEFAULT_NETWORK: string = 'testnet';
export const DEFAULT_GAS_BUDGET: string = '100.0 Tgas';
export const DEFAULT_DEPOSIT_AMOUNT: string = '1 NEAR';
export const DEFAULT_WALLET_UI_ENDPOINT: string = 'https://testnet.mynearwallet.com';

// -------------------- chain command constants ----------------------------------------------------------------------
export const CONTRACT_INIT_METHOD: string = 'new';
export const CONTRACT_INIT_ARGS: string = '{}';
export const SUBACCOUNT_INITIAL_BALANCE: string = '5';
export const SEED_PHRASE_HD_PATH: string = "m/44'/397'/0'";
export const MASKED_VALUE: string = '***';

// -------------------- listr2 renderer -------------------------------------------------------------------------------
export const LISTR_DEFAULT_RENDERER_TIMER_OPTION = {
  ...PRESET_TIMER,
  condition: (duration: number): boolean => duration > 100,
};

export const LISTR_DEFAULT_RENDERER_OPTION: {
  collapseSubtasks: boolean;
  timer: typeof LISTR_DEFAULT_RENDERER_TIMER_OPTION;
  persistentOutput: boolean;
  clearOutput: boolean;
  collapseErrors: boolean;
  showErrorMessage: boolean;
  formatOutput: 'wrap' | 'truncate';
} = {
  collapseSubtasks: false,
  timer: LISTR_DEFAULT_RENDERER_TIMER_OPTION,
  persistentOutput: true,
  clearOutput: false,
  collapseErrors: false,
  showErrorMessage: false,
  formatOutput: 'wrap',
};

export const LISTR_DEFAULT_OPTIONS = {
  concurrent: false,
  rendererOptions: LISTR_DEFAULT_RENDERER_OPTION,
  fallbackRendererOptions: {
    timer: LISTR_DEFAULT_RENDERER_TIMER_OPTION,
  },
};
