// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {type DeployLogger} from './logging/deploy-logger.js';
import {UserBreak} from './errors/user-break.js';

/**
 * The single top-level handler for errors escaping a command.
 */
@injectable()
export class ErrorHandler {
  private readonly logger: DeployLogger;

  public constructor(@inject(InjectTokens.DeployLogger) logger?: DeployLogger) {
    this.logger = patchInject(logger, InjectTokens.DeployLogger, this.constructor.name);
  }

  public handle(error: unknown): void {
    const userBreak: UserBreak | undefined = this.extractUserBreak(error);
    if (userBreak) {
      this.logger.showUser(userBreak.message);
      process.exitCode = 0;
      return;
    }

    this.logger.showUserError(error);
    process.exitCode = 1;
  }

  /**
   * A UserBreak may arrive wrapped by yargs or a task list.
   */
  private extractUserBreak(error: unknown): UserBreak | undefined {
    let current: unknown = error;
    while (current instanceof Error) {
      if (current instanceof UserBreak) {
        return current;
      }
      current = current.cause;
    }
    return undefined;
  }
}
