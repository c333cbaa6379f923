// SPDX-License-Identifier: Apache-2.0

import pino, {type DestinationStream, type Logger as PinoLogger, type TransportTargetOptions} from 'pino';
import {mkdirSync} from 'node:fs';
import path from 'node:path';
import {v4 as uuidv4} from 'uuid';
import * as util from 'node:util';
import chalk from 'chalk';
import * as constants from '../constants.js';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type DeployLogger} from './deploy-logger.js';

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

/**
 * Pino-based implementation of the DeployLogger interface.
 *
 * Emits two files under the logs directory:
 *  - near-deploy.ndjson : newline-delimited JSON (authoritative)
 *  - near-deploy.log    : pretty human-readable
 */
@injectable()
export class DeployPinoLogger implements DeployLogger {
  private readonly pinoLogger: PinoLogger;
  private traceId?: string;
  private developmentMode: boolean;
  private readonly MINOR_LINE_SEPARATOR: string =
    '-------------------------------------------------------------------------------';

  /**
   * @param logLevel - the log level to use (fatal|error|warn|info|debug|trace)
   * @param developmentMode - if true, show full stack traces in error messages
   * @param logsDirectory - where the log files are written
   */
  public constructor(
    @inject(InjectTokens.LogLevel) logLevel?: string,
    @inject(InjectTokens.DevelopmentMode) developmentMode?: boolean,
    @inject(InjectTokens.LogsDirectory) logsDirectory?: string,
  ) {
    const level: string = patchInject(logLevel, InjectTokens.LogLevel, this.constructor.name);
    this.developmentMode = patchInject(developmentMode, InjectTokens.DevelopmentMode, this.constructor.name);
    const directory: string = patchInject(logsDirectory, InjectTokens.LogsDirectory, this.constructor.name);

    this.nextTraceId();

    this.pinoLogger = pino(
      {
        level,
        mixin: (): {traceId?: string} => (this.traceId ? {traceId: this.traceId} : {}),
        redact: {
          paths: ['*.seedCredential', '*.seed', '*.seedPhrase', '*.privateKey', '*.authorization'],
          remove: true,
        },
      },
      this.createDestination(directory, level),
    );
  }

  /**
   * The ndjson and pretty file transports under the logs directory.
   */
  protected createDestination(directory: string, level: string): DestinationStream {
    // pino reports the failure on first write if the directory is still missing
    mkdirSync(directory, {recursive: true});

    const ndjsonTarget: TransportTargetOptions = {
      target: 'pino/file',
      level,
      options: {destination: path.join(directory, constants.NEAR_DEPLOY_NDJSON_LOG_FILE)},
    };

    const prettyTarget: TransportTargetOptions = {
      target: 'pino-pretty',
      level,
      options: {
        destination: path.join(directory, constants.NEAR_DEPLOY_LOG_FILE),
        translateTime: 'HH:MM:ss.l',
        colorize: false,
        messageKey: 'msg',
        messageFormat: '{msg} [traceId="{traceId}"]',
        ignore: 'pid,hostname,traceId',
        crlf: false,
        hideObject: false,
      },
    };

    return pino.transport({targets: [ndjsonTarget, prettyTarget]});
  }

  public setDevMode(developmentMode: boolean): void {
    this.debug(`dev mode logging: ${developmentMode}`);
    this.developmentMode = developmentMode;
  }

  public nextTraceId(): void {
    this.traceId = uuidv4();
  }

  public showUser(message: unknown, ...arguments_: unknown[]): void {
    const formatted: string = util.format(message, ...arguments_);
    console.log(formatted);
    this.info(formatted);
  }

  public showUserError(error: unknown): void {
    const stack: {message: string; stacktrace?: string}[] = [];
    let current: unknown = error;
    let depth: number = 0;
    while (current !== undefined && current !== null && depth < 10) {
      if (current instanceof Error) {
        stack.push({message: current.message, stacktrace: current.stack});
        current = current.cause;
      } else {
        stack.push({message: String(current)});
        current = undefined;
      }
      depth += 1;
    }

    console.log(chalk.red('*********************************** ERROR *****************************************'));
    if (this.developmentMode) {
      let prefix: string = '';
      let indent: string = '';
      for (const s of stack) {
        console.log(indent + prefix + chalk.yellow(s.message));
        if (s.stacktrace) {
          const formatted: string = s.stacktrace
            .split('\n')
            .filter((l): boolean => !l.includes('node:internal'))
            .join('\n')
            .trim();
          console.log(indent + chalk.gray(formatted) + '\n');
        }
        indent += '  ';
        prefix = 'Caused by: ';
      }
    } else {
      for (const line of (stack[0]?.message ?? '').split('\n')) {
        console.log(chalk.yellow(line));
      }
    }
    console.log(chalk.red('***********************************************************************************'));

    this.toPino('error', error, []);
  }

  public showList(title: string, items: string[]): void {
    this.showUser(chalk.green(`\n *** ${title} ***`));
    this.showUser(chalk.green(this.MINOR_LINE_SEPARATOR));
    if (items.length > 0) {
      for (const name of items) {
        this.showUser(chalk.cyan(` - ${name}`));
      }
    } else {
      this.showUser(chalk.blue('[ None ]'));
    }
    this.showUser('');
  }

  public error(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('error', message, arguments_);
  }

  public warn(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('warn', message, arguments_);
  }

  public info(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('info', message, arguments_);
  }

  public debug(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('debug', message, arguments_);
  }

  private toPino(level: LogLevel, message: unknown, arguments_: unknown[]): void {
    if (message instanceof Error) {
      this.pinoLogger[level]({err: message}, message.message);
      return;
    }

    if (message && typeof message === 'object') {
      if (arguments_.length > 0) {
        this.pinoLogger[level](message, util.format('%s', ...arguments_));
      } else {
        this.pinoLogger[level](message);
      }
      return;
    }

    const text: string = arguments_.length > 0 ? util.format(message, ...arguments_) : String(message);
    this.pinoLogger[level](text);
  }
}
