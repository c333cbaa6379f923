// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type NearClient} from '../near-client.js';
import {type NearRequest} from '../request/near-request.js';
import {NearExecutionBuilder} from '../execution/near-execution-builder.js';
import {type NearExecution} from '../execution/near-execution.js';
import {LoginRequest} from '../request/account/login-request.js';
import {CreateAccountRequest} from '../request/account/create-account-request.js';
import {ViewStateRequest} from '../request/account/view-state-request.js';
import {DeployWithInitRequest} from '../request/contract/deploy-with-init-request.js';
import {CreateAccountOptionsBuilder} from '../model/create-account/create-account-options-builder.js';
import {DeployWithInitOptionsBuilder} from '../model/deploy-contract/deploy-with-init-options-builder.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {type DeployLogger} from '../../../core/logging/deploy-logger.js';
import {type ResolvedConfig} from '../../../data/configuration/model/deploy-config.js';
import {type AccountId} from '../../../types/index.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';

@injectable()
export class DefaultNearClient implements NearClient {
  private readonly nearExecutable: string;
  private readonly cargoExecutable: string;
  private readonly logger: DeployLogger;

  public constructor(
    @inject(InjectTokens.NearExecutable) nearExecutable?: string,
    @inject(InjectTokens.CargoExecutable) cargoExecutable?: string,
    @inject(InjectTokens.DeployLogger) logger?: DeployLogger,
  ) {
    this.nearExecutable = patchInject(nearExecutable, InjectTokens.NearExecutable, DefaultNearClient.name);
    this.cargoExecutable = patchInject(cargoExecutable, InjectTokens.CargoExecutable, DefaultNearClient.name);
    this.logger = patchInject(logger, InjectTokens.DeployLogger, DefaultNearClient.name);

    if (!this.nearExecutable.trim() || !this.cargoExecutable.trim()) {
      throw new IllegalArgumentError('executable must not be blank');
    }
  }

  public async login(config: ResolvedConfig): Promise<void> {
    await this.executeAsync(this.nearExecutable, new LoginRequest(config.network, config.walletUiEndpoint));
  }

  public async createAccount(accountId: AccountId, config: ResolvedConfig): Promise<void> {
    const options = CreateAccountOptionsBuilder.fromConfig(config).build();
    await this.executeAsync(this.nearExecutable, new CreateAccountRequest(accountId, options));
  }

  public async deployWithInit(accountId: AccountId, config: ResolvedConfig): Promise<void> {
    const options = DeployWithInitOptionsBuilder.fromConfig(config).build();
    await this.executeAsync(this.cargoExecutable, new DeployWithInitRequest(accountId, options));
  }

  public async viewState(accountId: AccountId, config: ResolvedConfig): Promise<string[]> {
    return this.executeAsync(this.nearExecutable, new ViewStateRequest(accountId, config.network));
  }

  /**
   * Executes the request and returns the captured output lines.
   * The rendered command is logged with sensitive values masked.
   */
  private async executeAsync<T extends NearRequest>(executable: string, request: T): Promise<string[]> {
    const builder: NearExecutionBuilder = new NearExecutionBuilder().executable(executable);
    request.apply(builder);
    const execution: NearExecution = builder.build();

    this.logger.debug(`Executing: ${execution.command.toString()}`);
    try {
      const output: string[] = await execution.call();
      for (const line of output) {
        this.logger.debug(line);
      }
      return output;
    } finally {
      for (const line of execution.standardError().split('\n').filter(Boolean)) {
        this.logger.debug(line);
      }
    }
  }
}
