// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';
import {container} from 'tsyringe-neo';
import * as constants from '../constants.js';
import {InjectTokens} from './inject-tokens.js';
import {SingletonContainer} from './singleton-container.js';
import {ValueContainer} from './value-container.js';
import {type DeployLogger} from '../logging/deploy-logger.js';
import {DeployPinoLogger} from '../logging/deploy-pino-logger.js';
import {ErrorHandler} from '../error-handler.js';
import {Middlewares} from '../middlewares.js';
import {ConfigResolver} from '../../data/configuration/impl/config-resolver.js';
import {DefaultNearClient} from '../../integration/near/impl/default-near-client.js';
import {DeployCommand} from '../../commands/deploy.js';
import {AccountCommand} from '../../commands/account.js';
import {DeployCommandDefinition} from '../../commands/command-definitions/deploy-command-definition.js';
import {AccountCommandDefinition} from '../../commands/command-definitions/account-command-definition.js';
import {Commands} from '../../commands/commands.js';
import {presentValue} from '../../data/configuration/config-merge.js';

export type InstanceOverrides = Map<symbol, SingletonContainer | ValueContainer>;

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance: Container | undefined;
  private static isInitialized: boolean = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   * @param overrides - instances to use instead of the default implementations
   * @param environment - the process environment, registered for the configuration resolver and read here for
   *   the home directory, the log level and the executables
   */
  public init(
    logLevel?: string,
    developmentMode: boolean = false,
    overrides: InstanceOverrides = new Map<symbol, SingletonContainer | ValueContainer>(),
    environment: NodeJS.ProcessEnv = process.env,
  ): void {
    if (Container.isInitialized) {
      container.resolve<DeployLogger>(InjectTokens.DeployLogger).debug('Container already initialized');
      return;
    }

    const singletonContainers: SingletonContainer[] = [
      new SingletonContainer(InjectTokens.DeployLogger, DeployPinoLogger),
      new SingletonContainer(InjectTokens.ErrorHandler, ErrorHandler),
      new SingletonContainer(InjectTokens.Middlewares, Middlewares),
      new SingletonContainer(InjectTokens.ConfigResolver, ConfigResolver),
      new SingletonContainer(InjectTokens.NearClient, DefaultNearClient),
      new SingletonContainer(InjectTokens.DeployCommand, DeployCommand),
      new SingletonContainer(InjectTokens.AccountCommand, AccountCommand),
      new SingletonContainer(InjectTokens.DeployCommandDefinition, DeployCommandDefinition),
      new SingletonContainer(InjectTokens.AccountCommandDefinition, AccountCommandDefinition),
      new SingletonContainer(InjectTokens.Commands, Commands),
    ];

    const homeDirectory: string =
      presentValue(environment[constants.NEAR_DEPLOY_HOME_ENV]) ?? constants.DEFAULT_NEAR_DEPLOY_HOME_DIR;

    const valueContainers: ValueContainer[] = [
      new ValueContainer(
        InjectTokens.LogLevel,
        logLevel ?? presentValue(environment[constants.NEAR_DEPLOY_LOG_LEVEL_ENV]) ?? constants.DEFAULT_LOG_LEVEL,
      ),
      new ValueContainer(InjectTokens.DevelopmentMode, developmentMode),
      new ValueContainer(InjectTokens.LogsDirectory, path.join(homeDirectory, 'logs')),
      new ValueContainer(InjectTokens.WorkingDirectory, process.cwd()),
      new ValueContainer(InjectTokens.ProcessEnvironment, environment),
      new ValueContainer(
        InjectTokens.NearExecutable,
        presentValue(environment[constants.NEAR_EXECUTABLE_ENV]) ?? constants.DEFAULT_NEAR_EXECUTABLE,
      ),
      new ValueContainer(
        InjectTokens.CargoExecutable,
        presentValue(environment[constants.CARGO_EXECUTABLE_ENV]) ?? constants.DEFAULT_CARGO_EXECUTABLE,
      ),
    ];

    for (const [token, override] of overrides) {
      if (override instanceof SingletonContainer) {
        container.register(token, {useClass: override.useClass}, {lifecycle: override.lifecycle});
      } else {
        container.register(token, {useValue: override.useValue});
      }
    }

    for (const value of valueContainers) {
      if (!overrides.has(value.token)) {
        container.register(value.token, {useValue: value.useValue});
      }
    }

    for (const singleton of singletonContainers) {
      if (!overrides.has(singleton.token)) {
        container.register(singleton.token, {useClass: singleton.useClass}, {lifecycle: singleton.lifecycle});
      }
    }

    container.resolve<DeployLogger>(InjectTokens.DeployLogger).debug('Container initialized');
    Container.isInitialized = true;
  }

  /**
   * clears the container registries and re-initializes the container
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   * @param overrides - instances to use instead of the default implementations
   * @param environment - the process environment to register
   */
  public reset(
    logLevel?: string,
    developmentMode?: boolean,
    overrides?: InstanceOverrides,
    environment?: NodeJS.ProcessEnv,
  ): void {
    if (Container.isInitialized) {
      container.resolve<DeployLogger>(InjectTokens.DeployLogger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(logLevel, developmentMode, overrides, environment);
  }
}
