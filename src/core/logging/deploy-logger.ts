// SPDX-License-Identifier: Apache-2.0

export interface DeployLogger {
  setDevMode(developmentMode: boolean): void;

  nextTraceId(): void;

  showUser(message: unknown, ...arguments_: unknown[]): void;

  showUserError(error: unknown): void;

  /** Prints a titled list to the user, `[ None ]` when it is empty */
  showList(title: string, items: string[]): void;

  error(message: unknown, ...arguments_: unknown[]): void;

  warn(message: unknown, ...arguments_: unknown[]): void;

  info(message: unknown, ...arguments_: unknown[]): void;

  debug(message: unknown, ...arguments_: unknown[]): void;
}
