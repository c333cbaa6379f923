// SPDX-License-Identifier: Apache-2.0

import {DeployError} from '../errors/deploy-error.js';
import {type DeployLogger} from '../logging/deploy-logger.js';
import {type AnyYargs, type ArgvStruct, type CommandDefinition, type CommandFlags} from '../../types/index.js';
import {Flags as flags} from '../../commands/flags.js';

export class Subcommand {
  public constructor(
    public readonly name: string,
    public readonly description: string,
    public readonly commandHandler: (argv: ArgvStruct) => Promise<boolean>,
    public readonly flags: CommandFlags,
  ) {}
}

// TODO: Subcommand should have its own class file
export class CommandBuilder {
  private readonly subcommands: Subcommand[] = [];

  public constructor(
    private readonly name: string,
    private readonly description: string,
    private readonly logger: DeployLogger,
  ) {}

  public addSubcommand(subcommand: Subcommand): CommandBuilder {
    this.subcommands.push(subcommand);
    return this;
  }

  public build(): CommandDefinition {
    const subcommands: Subcommand[] = this.subcommands;
    const logger: DeployLogger = this.logger;

    const commandName: string = this.name;
    const demandCommand: string = `select a ${commandName} command`;

    return {
      command: commandName,
      desc: this.description,
      builder: (yargs: AnyYargs): AnyYargs => {
        for (const subcommand of subcommands) {
          const commandPath: string = `${commandName} ${subcommand.name}`;

          yargs.command(
            subcommand.name,
            subcommand.description,
            (y: AnyYargs): AnyYargs => {
              flags.setRequiredCommandFlags(y, ...subcommand.flags.required);
              flags.setOptionalCommandFlags(y, ...subcommand.flags.optional);
              return y;
            },
            async (argv: ArgvStruct): Promise<void> => {
              logger.info(`==== Running '${commandPath}' ===`);

              const response: boolean = await subcommand.commandHandler(argv);

              logger.info(`==== Finished running '${commandPath}'====`);

              if (!response) {
                throw new DeployError(`Error running ${commandPath}, expected return value to be true`);
              }
            },
          );
        }

        yargs.demandCommand(1, demandCommand);

        return yargs.help();
      },
    };
  }
}
