// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../core/errors/illegal-argument-error.js';
import {type AnyYargs, type ArgvStruct, type CommandFlag, type CommandFlags} from '../types/index.js';
import {type PartialDeployConfig} from '../data/configuration/model/deploy-config.js';

export class Flags {
  private static setCommandFlags(y: AnyYargs, demandOption: boolean, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      y.option(flag.name, {
        describe: flag.definition.describe,
        type: flag.definition.type,
        alias: flag.definition.alias,
        default: flag.definition.defaultValue,
        demandOption,
      });
    }
  }

  /**
   * Set flags for the command, marking them as mandatory
   * @param y instance of yargs
   * @param commandFlags a set of command flags
   */
  public static setRequiredCommandFlags(y: AnyYargs, ...commandFlags: CommandFlag[]): void {
    Flags.setCommandFlags(y, true, ...commandFlags);
  }

  /**
   * Set flags for the command
   * @param y instance of yargs
   * @param commandFlags a set of command flags
   */
  public static setOptionalCommandFlags(y: AnyYargs, ...commandFlags: CommandFlag[]): void {
    Flags.setCommandFlags(y, false, ...commandFlags);
  }

  /**
   * Reads a string flag, treating anything else (including an absent flag) as unset.
   */
  public static stringValue(argv: ArgvStruct, flag: CommandFlag): string | undefined {
    const value: unknown = argv[flag.name];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'string') {
      throw new IllegalArgumentError(`--${flag.name} expects a single value`, value);
    }
    return value;
  }

  /**
   * The configuration supplied on the command line for this invocation.
   */
  public static explicitConfig(argv: ArgvStruct): PartialDeployConfig {
    const explicit: PartialDeployConfig = {};
    const network: string | undefined = Flags.stringValue(argv, Flags.network);
    const gas: string | undefined = Flags.stringValue(argv, Flags.gas);
    const deposit: string | undefined = Flags.stringValue(argv, Flags.deposit);
    const walletUrl: string | undefined = Flags.stringValue(argv, Flags.walletUrl);
    if (network !== undefined) {
      explicit.network = network;
    }
    if (gas !== undefined) {
      explicit.gasBudget = gas;
    }
    if (deposit !== undefined) {
      explicit.depositAmount = deposit;
    }
    if (walletUrl !== undefined) {
      explicit.walletUiEndpoint = walletUrl;
    }
    return explicit;
  }

  public static readonly devMode: CommandFlag = {
    constName: 'devMode',
    name: 'dev',
    definition: {
      describe: 'Enable developer mode, showing full stack traces on errors',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly network: CommandFlag = {
    constName: 'network',
    name: 'network',
    definition: {
      describe: 'Network to deploy to (testnet, mainnet or a custom network)',
      type: 'string',
    },
  };

  public static readonly gas: CommandFlag = {
    constName: 'gas',
    name: 'gas',
    definition: {
      describe: 'Gas prepaid for the initialization call, e.g. "100.0 Tgas"',
      type: 'string',
    },
  };

  public static readonly deposit: CommandFlag = {
    constName: 'deposit',
    name: 'deposit',
    definition: {
      describe: 'Deposit attached to the initialization call, e.g. "1 NEAR"',
      type: 'string',
    },
  };

  public static readonly walletUrl: CommandFlag = {
    constName: 'walletUrl',
    name: 'wallet-url',
    definition: {
      describe: 'Wallet web UI used by the login flow',
      type: 'string',
    },
  };

  public static readonly configFile: CommandFlag = {
    constName: 'configFile',
    name: 'config-file',
    definition: {
      describe: 'Local override file, relative to the working directory',
      type: 'string',
    },
  };

  public static readonly account: CommandFlag = {
    constName: 'account',
    name: 'account',
    definition: {
      describe: 'Target account, the configured wallet when omitted',
      alias: 'a',
      type: 'string',
    },
  };

  public static readonly CONFIG_FLAGS: CommandFlags = {
    required: [],
    optional: [Flags.network, Flags.gas, Flags.deposit, Flags.walletUrl, Flags.configFile],
  };

  public static readonly ACCOUNT_TARGET_FLAGS: CommandFlags = {
    required: [],
    optional: [Flags.account, ...Flags.CONFIG_FLAGS.optional],
  };
}
