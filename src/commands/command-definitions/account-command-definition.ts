// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {BaseCommandDefinition} from './base-command-definition.js';
import {CommandBuilder, Subcommand} from '../../core/command-path-builders/command-builder.js';
import {type AccountCommand} from '../account.js';
import {Flags as flags} from '../flags.js';
import {type CommandDefinition} from '../../types/index.js';
import {type DeployLogger} from '../../core/logging/deploy-logger.js';

@injectable()
export class AccountCommandDefinition extends BaseCommandDefinition {
  private readonly logger: DeployLogger;
  private readonly accountCommand: AccountCommand;

  public constructor(
    @inject(InjectTokens.DeployLogger) logger?: DeployLogger,
    @inject(InjectTokens.AccountCommand) accountCommand?: AccountCommand,
  ) {
    super();
    this.logger = patchInject(logger, InjectTokens.DeployLogger, this.constructor.name);
    this.accountCommand = patchInject(accountCommand, InjectTokens.AccountCommand, this.constructor.name);
  }

  public static override readonly COMMAND_NAME = 'account';
  protected static override readonly DESCRIPTION = 'Wallet login, sub-account creation and state queries';

  public static readonly CREATE = 'create';
  public static readonly STATE = 'state';
  public static readonly STATE_ALL = 'state-all';
  public static readonly LOGIN = 'login';

  public getCommandDefinition(): CommandDefinition {
    const command: AccountCommand = this.accountCommand;

    return new CommandBuilder(AccountCommandDefinition.COMMAND_NAME, AccountCommandDefinition.DESCRIPTION, this.logger)
      .addSubcommand(
        new Subcommand(
          AccountCommandDefinition.CREATE,
          'Create the token and htlc sub-accounts, stopping at the first failure',
          (argv) => command.create(argv),
          flags.CONFIG_FLAGS,
        ),
      )
      .addSubcommand(
        new Subcommand(
          AccountCommandDefinition.STATE,
          'Show the state of the given account, or of the wallet account',
          (argv) => command.state(argv),
          flags.ACCOUNT_TARGET_FLAGS,
        ),
      )
      .addSubcommand(
        new Subcommand(
          AccountCommandDefinition.STATE_ALL,
          'Show the state of the wallet, token and htlc accounts',
          (argv) => command.stateAll(argv),
          flags.CONFIG_FLAGS,
        ),
      )
      .addSubcommand(
        new Subcommand(
          AccountCommandDefinition.LOGIN,
          'Authorize the CLI with the wallet web UI',
          (argv) => command.login(argv),
          flags.CONFIG_FLAGS,
        ),
      )
      .build();
  }
}
