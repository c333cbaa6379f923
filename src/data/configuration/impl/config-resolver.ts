// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import * as constants from '../../../core/constants.js';
import {type DeployLogger} from '../../../core/logging/deploy-logger.js';
import {type ConfigSource} from '../spi/config-source.js';
import {type PartialDeployConfig, type ResolvedConfig} from '../model/deploy-config.js';
import {mergeConfig, overlay, presentValue} from '../config-merge.js';
import {ExplicitConfigSource} from './explicit-config-source.js';
import {EnvironmentConfigSource} from './environment-config-source.js';
import {LocalConfigSource} from './local-config-source.js';

export interface ResolveOptions {
  /** Settings given on the command line */
  explicit?: PartialDeployConfig;
  /** Path of the local override file, relative to the working directory */
  configFile?: string;
}

/**
 * Builds the {@link ResolvedConfig} for an invocation. The only reader of deploy settings from the process environment.
 */
@injectable()
export class ConfigResolver {
  private readonly logger: DeployLogger;
  private readonly workingDirectory: string;
  private readonly environment: NodeJS.ProcessEnv;

  public constructor(
    @inject(InjectTokens.DeployLogger) logger?: DeployLogger,
    @inject(InjectTokens.WorkingDirectory) workingDirectory?: string,
    @inject(InjectTokens.ProcessEnvironment) environment?: NodeJS.ProcessEnv,
  ) {
    this.logger = patchInject(logger, InjectTokens.DeployLogger, this.constructor.name);
    this.workingDirectory = patchInject(workingDirectory, InjectTokens.WorkingDirectory, this.constructor.name);
    this.environment = patchInject(environment, InjectTokens.ProcessEnvironment, this.constructor.name);
  }

  public localConfigFile(configFile?: string): string {
    const file: string =
      presentValue(configFile) ??
      presentValue(this.environment[constants.LOCAL_CONFIG_FILE_ENV]) ??
      constants.DEFAULT_LOCAL_CONFIG_FILE;
    return path.resolve(this.workingDirectory, file);
  }

  /**
   * Command line flags and the environment form the explicit layer (flags first), the local override file the
   * override layer, then the documented defaults apply.
   *
   * @throws MissingRequiredConfigError when the wallet or the seed cannot be found
   * @throws ConfigurationError when the local override file cannot be read
   */
  public async resolve(options: ResolveOptions = {}): Promise<ResolvedConfig> {
    return this.resolveSources([
      new LocalConfigSource(this.localConfigFile(options.configFile)),
      new EnvironmentConfigSource(this.environment),
      new ExplicitConfigSource(options.explicit),
    ]);
  }

  /**
   * Loads the sources highest ordinal first and merges them over the defaults.
   */
  public async resolveSources(sources: readonly ConfigSource[]): Promise<ResolvedConfig> {
    const ordered: ConfigSource[] = [...sources].sort((a, b): number => b.ordinal - a.ordinal);
    const layers: PartialDeployConfig[] = [];
    for (const source of ordered) {
      layers.push(await this.load(source));
    }

    const config: ResolvedConfig = mergeConfig(overlay(...layers), {});
    this.logger.debug('resolved configuration', {
      walletIdentity: config.walletIdentity,
      network: config.network,
      gasBudget: config.gasBudget,
      depositAmount: config.depositAmount,
      walletUiEndpoint: config.walletUiEndpoint,
    });
    return config;
  }

  private async load(source: ConfigSource): Promise<PartialDeployConfig> {
    const data: PartialDeployConfig = await source.load();
    this.logger.debug(`loaded configuration source ${source.name} (${source.ordinal}): ${Object.keys(data).join(', ')}`);
    return data;
  }
}
