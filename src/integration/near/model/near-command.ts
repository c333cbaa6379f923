// SPDX-License-Identifier: Apache-2.0

import {MASKED_VALUE} from '../../../core/constants.js';

/**
 * An immutable, fully rendered invocation of an external chain CLI.
 */
export class NearCommand {
  public readonly arguments: readonly string[];
  public readonly sensitiveIndexes: ReadonlySet<number>;

  public constructor(
    public readonly executable: string,
    arguments_: readonly string[],
    sensitiveIndexes: Iterable<number> = [],
  ) {
    this.arguments = Object.freeze([...arguments_]);
    this.sensitiveIndexes = new Set(sensitiveIndexes);
  }

  /**
   * The arguments with every sensitive value replaced, safe to log or display.
   */
  public maskedArguments(): string[] {
    return this.arguments.map((value, index): string => (this.sensitiveIndexes.has(index) ? MASKED_VALUE : value));
  }

  public toString(): string {
    return [this.executable, ...this.maskedArguments()].map(NearCommand.quote).join(' ');
  }

  private static quote(value: string): string {
    if (/^[\w%+,./:=@-]+$/.test(value)) {
      return value;
    }
    return `"${value.replaceAll('\\', '\\\\').replaceAll('"', String.raw`\"`)}"`;
  }
}
