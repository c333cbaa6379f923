// SPDX-License-Identifier: Apache-2.0

import {spawn, type ChildProcess, type SpawnOptions} from 'node:child_process';
import {NearExecutionError} from '../errors/near-execution-error.js';
import {type NearCommand} from '../model/near-command.js';

export type SpawnFunction = (command: string, arguments_: readonly string[], options: SpawnOptions) => ChildProcess;

/**
 * Represents the execution of a chain CLI command.
 *
 * The process is started with an argument vector and no shell, so values are never re-interpreted.
 */
export class NearExecution {
  private readonly output: string[] = [];
  private readonly errOutput: string[] = [];
  private exitCodeValue: number | null = null;
  private readonly spawnFunction: SpawnFunction;

  /**
   * @param command - the rendered command to execute
   * @param environmentVariables - variables added to the inherited environment
   * @param interactive - inherit the terminal instead of capturing output
   * @param spawnFunction - starts the child process
   */
  public constructor(
    public readonly command: NearCommand,
    private readonly environmentVariables: Record<string, string> = {},
    private readonly interactive: boolean = false,
    spawnFunction?: SpawnFunction,
  ) {
    this.spawnFunction = spawnFunction ?? spawn;
  }

  /**
   * Executes the command and waits for completion.
   * @returns the non-empty lines written to standard output
   */
  public async call(): Promise<string[]> {
    return new Promise<string[]>((resolve, reject): void => {
      let settled: boolean = false;
      let child: ChildProcess;

      try {
        child = this.spawnFunction(this.command.executable, this.command.arguments, {
          shell: false,
          env: {...process.env, ...this.environmentVariables},
          stdio: this.interactive ? 'inherit' : 'pipe',
        });
      } catch (error) {
        reject(this.startFailure(error));
        return;
      }

      child.stdout?.on('data', (data: Buffer | string): void => NearExecution.collect(data, this.output));
      child.stderr?.on('data', (data: Buffer | string): void => NearExecution.collect(data, this.errOutput));

      child.on('error', (error: Error): void => {
        if (settled) {
          return;
        }
        settled = true;
        reject(this.startFailure(error));
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null): void => {
        if (settled) {
          return;
        }
        settled = true;
        this.exitCodeValue = code;
        if (code === 0) {
          resolve([...this.output]);
          return;
        }

        const reason: string = signal ? `terminated by signal ${signal}` : `exited with code ${code}`;
        const detail: string = this.standardError();
        reject(
          new NearExecutionError(
            code ?? 1,
            `${this.command.executable} ${reason}${detail ? `: ${detail}` : ''}`,
            this.standardOutput(),
            detail,
          ),
        );
      });
    });
  }

  /**
   * Gets the exit code of the process.
   * @returns The exit code or null if the process hasn't completed
   */
  public exitCode(): number | null {
    return this.exitCodeValue;
  }

  public standardOutput(): string {
    return this.output.join('\n');
  }

  public standardError(): string {
    return this.errOutput.join('\n');
  }

  private startFailure(error: unknown): NearExecutionError {
    const cause: Error = error instanceof Error ? error : new Error(String(error));
    return new NearExecutionError(
      -1,
      `failed to start ${this.command.executable}: ${cause.message}`,
      this.standardOutput(),
      this.standardError(),
      cause,
    );
  }

  private static collect(data: Buffer | string, lines: string[]): void {
    for (const item of data.toString().split(/\r?\n/)) {
      const line: string = item.trimEnd();
      if (line) {
        lines.push(line);
      }
    }
  }
}
