// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {BaseCommandDefinition} from './base-command-definition.js';
import {CommandBuilder, Subcommand} from '../../core/command-path-builders/command-builder.js';
import {type DeployCommand} from '../deploy.js';
import {Flags as flags} from '../flags.js';
import {type CommandDefinition} from '../../types/index.js';
import {type DeployLogger} from '../../core/logging/deploy-logger.js';

@injectable()
export class DeployCommandDefinition extends BaseCommandDefinition {
  private readonly logger: DeployLogger;
  private readonly deployCommand: DeployCommand;

  public constructor(
    @inject(InjectTokens.DeployLogger) logger?: DeployLogger,
    @inject(InjectTokens.DeployCommand) deployCommand?: DeployCommand,
  ) {
    super();
    this.logger = patchInject(logger, InjectTokens.DeployLogger, this.constructor.name);
    this.deployCommand = patchInject(deployCommand, InjectTokens.DeployCommand, this.constructor.name);
  }

  public static override readonly COMMAND_NAME = 'deploy';
  protected static override readonly DESCRIPTION =
    'Build the contract in the current directory and deploy it with its initialization call';

  public static readonly MAIN = 'main';
  public static readonly TOKEN = 'token';
  public static readonly HTLC = 'htlc';
  public static readonly ACCOUNT = 'account';
  public static readonly ALL = 'all';

  public getCommandDefinition(): CommandDefinition {
    const command: DeployCommand = this.deployCommand;

    return new CommandBuilder(DeployCommandDefinition.COMMAND_NAME, DeployCommandDefinition.DESCRIPTION, this.logger)
      .addSubcommand(
        new Subcommand(
          DeployCommandDefinition.MAIN,
          'Deploy to the wallet account',
          (argv) => command.main(argv),
          flags.CONFIG_FLAGS,
        ),
      )
      .addSubcommand(
        new Subcommand(
          DeployCommandDefinition.TOKEN,
          'Deploy to the token sub-account of the wallet',
          (argv) => command.token(argv),
          flags.CONFIG_FLAGS,
        ),
      )
      .addSubcommand(
        new Subcommand(
          DeployCommandDefinition.HTLC,
          'Deploy to the htlc sub-account of the wallet',
          (argv) => command.htlc(argv),
          flags.CONFIG_FLAGS,
        ),
      )
      .addSubcommand(
        new Subcommand(
          DeployCommandDefinition.ACCOUNT,
          'Deploy to the given account, or to the wallet account',
          (argv) => command.account(argv),
          flags.ACCOUNT_TARGET_FLAGS,
        ),
      )
      .addSubcommand(
        new Subcommand(
          DeployCommandDefinition.ALL,
          'Deploy main, token and htlc in order, stopping at the first failure',
          (argv) => command.all(argv),
          flags.CONFIG_FLAGS,
        ),
      )
      .build();
  }
}
