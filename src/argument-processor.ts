// SPDX-License-Identifier: Apache-2.0

import {DeployError} from './core/errors/deploy-error.js';
import {Flags as flags} from './commands/flags.js';
import {type Middlewares} from './core/middlewares.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {container} from 'tsyringe-neo';
import {type DeployLogger} from './core/logging/deploy-logger.js';
import {type Commands} from './commands/commands.js';
import yargs from 'yargs';
import {hideBin} from 'yargs/helpers';

export class ArgumentProcessor {
  public static async process(argv: string[]): Promise<void> {
    const logger: DeployLogger = container.resolve<DeployLogger>(InjectTokens.DeployLogger);
    const middlewares: Middlewares = container.resolve<Middlewares>(InjectTokens.Middlewares);
    const commands: Commands = container.resolve<Commands>(InjectTokens.Commands);

    logger.debug('Initializing commands');
    const rootCmd = yargs(hideBin(argv))
      .scriptName('near-deploy')
      .usage('Usage:\n  near-deploy <command> <subcommand> [options]')
      .alias('h', 'help')
      .version(false)
      .strict()
      .demandCommand(1, 'Select a command');

    for (const definition of commands.getCommandDefinitions()) {
      rootCmd.command(definition.command, definition.desc, definition.builder, definition.handler);
    }

    rootCmd.middleware(
      [middlewares.setLoggerDevFlag(), middlewares.displayHeader()],
      false, // applyBeforeValidate is false as otherwise middleware is called twice
    );

    // Expand the terminal width to the maximum available
    rootCmd.wrap(null);

    rootCmd.fail((message: string | null, error: Error | undefined): void => {
      // handler errors arrive without a message and propagate through parseAsync
      if (!message) {
        return;
      }
      logger.showUser(message);
      rootCmd.showHelp();
      process.exitCode = 1;
      throw new DeployError(message, error);
    });

    logger.debug('Setting up flags');
    flags.setOptionalCommandFlags(rootCmd, flags.devMode);
    logger.debug('Parsing root command (executing the commands)');
    await rootCmd.parseAsync();
  }
}
