// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {type CommandDefinition} from '../types/index.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {type DeployCommandDefinition} from './command-definitions/deploy-command-definition.js';
import {type AccountCommandDefinition} from './command-definitions/account-command-definition.js';

/**
 * Return a list of Yargs command builder to be exposed through CLI
 * @returns an array of Yargs command builder
 */
@injectable()
export class Commands {
  private readonly deploy: DeployCommandDefinition;
  private readonly account: AccountCommandDefinition;

  public constructor(
    @inject(InjectTokens.DeployCommandDefinition) deploy?: DeployCommandDefinition,
    @inject(InjectTokens.AccountCommandDefinition) account?: AccountCommandDefinition,
  ) {
    this.deploy = patchInject(deploy, InjectTokens.DeployCommandDefinition, this.constructor.name);
    this.account = patchInject(account, InjectTokens.AccountCommandDefinition, this.constructor.name);
  }

  public getCommandDefinitions(): CommandDefinition[] {
    return [this.deploy.getCommandDefinition(), this.account.getCommandDefinition()];
  }
}
