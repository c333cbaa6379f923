// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import chalk from 'chalk';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {type DeployLogger} from './logging/deploy-logger.js';
import {Flags as flags} from '../commands/flags.js';
import {type ArgvStruct} from '../types/index.js';
import {getDeployerVersion} from '../../version.js';

@injectable()
export class Middlewares {
  private readonly logger: DeployLogger;

  public constructor(@inject(InjectTokens.DeployLogger) logger?: DeployLogger) {
    this.logger = patchInject(logger, InjectTokens.DeployLogger, this.constructor.name);
  }

  public setLoggerDevFlag(): (argv: ArgvStruct) => void {
    const logger: DeployLogger = this.logger;

    return (argv: ArgvStruct): void => {
      if (argv[flags.devMode.name] === true) {
        logger.debug('Setting logger dev flag');
        logger.setDevMode(true);
      }
    };
  }

  /**
   * Starts a new trace id for the command and prints which command runs against which version.
   */
  public displayHeader(): (argv: ArgvStruct) => void {
    const logger: DeployLogger = this.logger;

    return (argv: ArgvStruct): void => {
      logger.nextTraceId();
      const commandPath: string = argv._.map(String).join(' ');
      logger.showUser(chalk.cyan(`near-deploy ${getDeployerVersion()} :: ${commandPath}`));
    };
  }
}
