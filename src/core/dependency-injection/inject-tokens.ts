// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  LogsDirectory: Symbol.for('LogsDirectory'),
  WorkingDirectory: Symbol.for('WorkingDirectory'),
  ProcessEnvironment: Symbol.for('ProcessEnvironment'),
  NearExecutable: Symbol.for('NearExecutable'),
  CargoExecutable: Symbol.for('CargoExecutable'),
  DeployLogger: Symbol.for('DeployLogger'),
  ErrorHandler: Symbol.for('ErrorHandler'),
  ConfigResolver: Symbol.for('ConfigResolver'),
  NearClient: Symbol.for('NearClient'),
  DeployCommand: Symbol.for('DeployCommand'),
  AccountCommand: Symbol.for('AccountCommand'),
  DeployCommandDefinition: Symbol.for('DeployCommandDefinition'),
  AccountCommandDefinition: Symbol.for('AccountCommandDefinition'),
  Middlewares: Symbol.for('Middlewares'),
  Commands: Symbol.for('Commands'),
};
