// SPDX-License-Identifier: Apache-2.0

import {Listr, type ListrTask} from 'listr2';
import {inject} from 'tsyringe-neo';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import * as constants from '../core/constants.js';
import {DeployError} from '../core/errors/deploy-error.js';
import {DeploymentOrchestrator} from '../core/deployment-orchestrator.js';
import {type DeployLogger} from '../core/logging/deploy-logger.js';
import {type ConfigResolver} from '../data/configuration/impl/config-resolver.js';
import {type ResolvedConfig} from '../data/configuration/model/deploy-config.js';
import {type NearClient} from '../integration/near/near-client.js';
import {type ArgvStruct} from '../types/index.js';
import {Flags as flags} from './flags.js';

export interface OrchestrationContext {
  config: ResolvedConfig;
  orchestrator: DeploymentOrchestrator;
}

export abstract class BaseCommand {
  protected readonly logger: DeployLogger;
  protected readonly configResolver: ConfigResolver;
  protected readonly nearClient: NearClient;

  public constructor(
    @inject(InjectTokens.DeployLogger) logger?: DeployLogger,
    @inject(InjectTokens.ConfigResolver) configResolver?: ConfigResolver,
    @inject(InjectTokens.NearClient) nearClient?: NearClient,
  ) {
    this.logger = patchInject(logger, InjectTokens.DeployLogger, this.constructor.name);
    this.configResolver = patchInject(configResolver, InjectTokens.ConfigResolver, this.constructor.name);
    this.nearClient = patchInject(nearClient, InjectTokens.NearClient, this.constructor.name);
  }

  /**
   * Resolves the configuration for this invocation and builds the orchestrator over it.
   */
  protected async initialize(argv: ArgvStruct): Promise<OrchestrationContext> {
    const config: ResolvedConfig = await this.configResolver.resolve({
      explicit: flags.explicitConfig(argv),
      configFile: flags.stringValue(argv, flags.configFile),
    });
    return {config, orchestrator: new DeploymentOrchestrator(config, this.nearClient, this.logger)};
  }

  /**
   * Runs the tasks after an "Initialize" task that fills the context.
   */
  protected async runTasks<C extends OrchestrationContext>(
    argv: ArgvStruct,
    errorPrefix: string,
    ...tasks: ListrTask<C>[]
  ): Promise<C> {
    const list: Listr<C> = new Listr<C>(
      [
        {
          title: 'Initialize',
          task: async (context_: C): Promise<void> => {
            const {config, orchestrator} = await this.initialize(argv);
            context_.config = config;
            context_.orchestrator = orchestrator;
          },
        },
        ...tasks,
      ],
      constants.LISTR_DEFAULT_OPTIONS,
    );

    try {
      return await list.run();
    } catch (error) {
      if (error instanceof DeployError) {
        throw error;
      }
      throw new DeployError(`${errorPrefix}: ${error instanceof Error ? error.message : String(error)}`, error);
    }
  }
}
