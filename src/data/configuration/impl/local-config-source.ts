// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs/promises';
import * as yaml from 'yaml';
import {type ConfigSource} from '../spi/config-source.js';
import {ConfigurationError} from '../api/configuration-error.js';
import {CONFIG_FILE_KEYS, CONFIG_KEYS, type PartialDeployConfig} from '../model/deploy-config.js';

/**
 * A {@link ConfigSource} backed by the optional local override file (YAML).
 *
 * A missing file is an empty layer. A file that exists must be a YAML mapping whose values are strings.
 */
export class LocalConfigSource implements ConfigSource {
  public constructor(public readonly filePath: string) {}

  public get name(): string {
    return this.constructor.name;
  }

  public get ordinal(): number {
    return 100;
  }

  public async load(): Promise<PartialDeployConfig> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return {};
      }
      throw new ConfigurationError(`failed to read local override file: ${this.filePath}`, toError(error));
    }

    let parsed: unknown;
    try {
      parsed = yaml.parse(text);
    } catch (error) {
      throw new ConfigurationError(`local override file is not valid YAML: ${this.filePath}`, toError(error));
    }

    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new ConfigurationError(`local override file must contain a mapping: ${this.filePath}`);
    }

    const entries: Map<string, unknown> = new Map(Object.entries(parsed));
    const data: PartialDeployConfig = {};
    for (const key of CONFIG_KEYS) {
      const fileKey: string = CONFIG_FILE_KEYS[key];
      const value: unknown = entries.get(fileKey);
      if (value === undefined || value === null) {
        continue;
      }
      if (typeof value !== 'string') {
        throw new ConfigurationError(`'${fileKey}' in ${this.filePath} must be a string`, undefined, {key: fileKey});
      }
      data[key] = value;
    }
    return data;
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
