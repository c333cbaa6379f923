// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import 'dotenv/config';
import 'reflect-metadata';
import {container} from 'tsyringe-neo';

import {type DeployLogger} from './core/logging/deploy-logger.js';
import {Container} from './core/dependency-injection/container-init.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {DeployError} from './core/errors/deploy-error.js';
import {UserBreak} from './core/errors/user-break.js';
import {getDeployerVersion} from '../version.js';
import {ArgumentProcessor} from './argument-processor.js';

export async function main(argv: string[], context?: {logger?: DeployLogger}): Promise<void> {
  try {
    Container.getInstance().init();
  } catch (error) {
    throw new DeployError('Error initializing container', error);
  }

  const logger: DeployLogger = container.resolve<DeployLogger>(InjectTokens.DeployLogger);

  if (context) {
    // save the logger so that near-deploy.ts can use it after the command completes
    context.logger = logger;
  }
  process.on('unhandledRejection', (reason: unknown): void => {
    logger.showUserError(new DeployError('Unhandled Rejection', reason));
  });
  process.on('uncaughtException', (error: Error, origin: string): void => {
    logger.showUserError(new DeployError(`Uncaught Exception: ${error.message}, origin: ${origin}`, error));
  });

  logger.debug('Initializing near-deploy CLI');
  if (argv.length >= 3 && ['-version', '--version', '-v', '--v'].includes(argv[2] ?? '')) {
    logger.showUser(chalk.cyan('\n******************************* near-deploy *****************************************'));
    logger.showUser(chalk.cyan('Version\t\t\t:'), chalk.yellow(getDeployerVersion()));
    logger.showUser(chalk.cyan('**********************************************************************************'));
    throw new UserBreak('displayed version information, exiting');
  }

  await ArgumentProcessor.process(argv);
}
