// SPDX-License-Identifier: Apache-2.0

import {NearExecution, type SpawnFunction} from './near-execution.js';
import {NearCommand} from '../model/near-command.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';

interface CommandToken {
  readonly values: readonly string[];
  readonly sensitive: boolean;
}

/**
 * A builder for creating a chain CLI command execution.
 *
 * Subcommands are always rendered first; positionals, arguments and flags follow in the order they were added.
 */
export class NearExecutionBuilder {
  private static readonly NAME_MUST_NOT_BE_NULL: string = 'name must not be null';
  private static readonly VALUE_MUST_NOT_BE_NULL: string = 'value must not be null';

  /**
   * The path to the executable.
   */
  private _executable: string = '';

  /**
   * The list of subcommands to be used when executing the command.
   */
  private readonly _subcommands: string[] = [];

  /**
   * Positionals, arguments and flags in insertion order.
   */
  private readonly _tokens: CommandToken[] = [];

  /**
   * The environment variables to be set when executing the command.
   */
  private readonly _environmentVariables: Map<string, string> = new Map();

  private _interactive: boolean = false;

  private _spawn?: SpawnFunction;

  public executable(executable: string): NearExecutionBuilder {
    if (!executable) {
      throw new IllegalArgumentError('executable must not be null');
    }
    this._executable = executable;
    return this;
  }

  /**
   * Adds the list of subcommands to the execution.
   * @param commands the list of subcommands to be added
   * @returns this builder
   */
  public subcommands(...commands: string[]): NearExecutionBuilder {
    if (commands.length === 0) {
      throw new IllegalArgumentError('commands must not be null');
    }
    this._subcommands.push(...commands);
    return this;
  }

  /**
   * Adds an argument rendered as `--name value`.
   * @param name the name of the argument
   * @param value the value of the argument
   * @returns this builder
   */
  public argument(name: string, value: string): NearExecutionBuilder {
    if (!name) {
      throw new IllegalArgumentError(NearExecutionBuilder.NAME_MUST_NOT_BE_NULL);
    }
    if (!value) {
      throw new IllegalArgumentError(NearExecutionBuilder.VALUE_MUST_NOT_BE_NULL, name);
    }
    this._tokens.push({values: [`--${name}`, value], sensitive: false});
    return this;
  }

  /**
   * Adds a positional argument to the execution.
   * @param value the value of the positional argument
   * @param sensitive whether the value must be masked when the command is logged
   * @returns this builder
   */
  public positional(value: string, sensitive: boolean = false): NearExecutionBuilder {
    if (!value) {
      throw new IllegalArgumentError(NearExecutionBuilder.VALUE_MUST_NOT_BE_NULL);
    }
    this._tokens.push({values: [value], sensitive});
    return this;
  }

  /**
   * Adds a flag to the execution.
   * @param flag the flag to be added, including its leading dashes
   * @returns this builder
   */
  public flag(flag: string): NearExecutionBuilder {
    if (!flag) {
      throw new IllegalArgumentError('flag must not be null');
    }
    this._tokens.push({values: [flag], sensitive: false});
    return this;
  }

  /**
   * Adds an environment variable to the execution.
   * @param name the name of the environment variable
   * @param value the value of the environment variable
   * @returns this builder
   */
  public environmentVariable(name: string, value: string): NearExecutionBuilder {
    if (!name) {
      throw new IllegalArgumentError(NearExecutionBuilder.NAME_MUST_NOT_BE_NULL);
    }
    if (!value) {
      throw new IllegalArgumentError(NearExecutionBuilder.VALUE_MUST_NOT_BE_NULL, name);
    }
    this._environmentVariables.set(name, value);
    return this;
  }

  /**
   * Attaches the child process to the current terminal instead of capturing its output.
   */
  public interactive(interactive: boolean = true): NearExecutionBuilder {
    this._interactive = interactive;
    return this;
  }

  public spawnWith(spawnFunction: SpawnFunction): NearExecutionBuilder {
    this._spawn = spawnFunction;
    return this;
  }

  /**
   * Renders the command without executing anything.
   */
  public command(): NearCommand {
    if (!this._executable) {
      throw new IllegalArgumentError('executable must be set before building the command');
    }

    const arguments_: string[] = [...this._subcommands];
    const sensitiveIndexes: number[] = [];
    for (const token of this._tokens) {
      for (const value of token.values) {
        if (token.sensitive) {
          sensitiveIndexes.push(arguments_.length);
        }
        arguments_.push(value);
      }
    }

    return new NearCommand(this._executable, arguments_, sensitiveIndexes);
  }

  /**
   * Builds the NearExecution instance.
   * @returns the NearExecution instance
   */
  public build(): NearExecution {
    return new NearExecution(
      this.command(),
      Object.fromEntries(this._environmentVariables),
      this._interactive,
      this._spawn,
    );
  }
}
