// SPDX-License-Identifier: Apache-2.0

import {type Argv} from 'yargs';

// NOTE: DO NOT add any near-deploy imports in this file to avoid circular dependencies

export type AccountId = string;
export type Version = string;

export type AnyYargs = Argv;

export type ArgvStruct = {
  _: (string | number)[];
  $0: string;
  [flag: string]: unknown;
};

/** Names of the external operations, as reported in errors and logs */
export type NearOperation = 'login' | 'create-account' | 'deploy' | 'state';

export interface CommandDefinition {
  command: string;
  desc: string;
  builder?: (yargs: AnyYargs) => AnyYargs;
  handler?: (argv: ArgvStruct) => Promise<void>;
}

export interface CommandFlag {
  constName: string;
  name: string;
  definition: {
    describe: string;
    type: 'string' | 'boolean';
    defaultValue?: string | boolean;
    alias?: string;
  };
}

export interface CommandFlags {
  required: CommandFlag[];
  optional: CommandFlag[];
}
