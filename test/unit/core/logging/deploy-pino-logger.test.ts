// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it, beforeEach} from 'mocha';
import {type DestinationStream} from 'pino';
import {DeployPinoLogger} from '../../../../src/core/logging/deploy-pino-logger.js';

const written: string[] = [];

/**
 * Writes the records to memory instead of the log files.
 */
class InMemoryPinoLogger extends DeployPinoLogger {
  protected override createDestination(): DestinationStream {
    return {
      write: (line: string): void => {
        written.push(line);
      },
    };
  }
}

interface LogRecord {
  level: number;
  msg?: string;
  traceId?: string;
  config?: Record<string, unknown>;
  err?: {message: string};
}

function records(): LogRecord[] {
  return written.map((line): LogRecord => JSON.parse(line));
}

describe('DeployPinoLogger', () => {
  beforeEach(() => {
    written.length = 0;
  });

  it('should remove seed fields from logged objects', () => {
    const logger: DeployPinoLogger = new InMemoryPinoLogger('debug', false, 'unused-logs-directory');

    logger.info({config: {walletIdentity: 'alice.testnet', seedCredential: 'test-secret'}});
    logger.warn({config: {network: 'testnet', seed: 'test-secret'}}, 'resolved');

    const [first, second] = records();
    expect(first?.config).to.deep.equal({walletIdentity: 'alice.testnet'});
    expect(second?.config).to.deep.equal({network: 'testnet'});
    expect(second?.msg).to.equal('resolved');
    expect(written.join('')).to.not.include('test-secret');
  });

  it('should tag records with the current trace id', () => {
    const logger: DeployPinoLogger = new InMemoryPinoLogger('debug', false, 'unused-logs-directory');

    logger.info('first');
    logger.nextTraceId();
    logger.info('second');

    const [first, second] = records();
    expect(first?.msg).to.equal('first');
    expect(first?.traceId).to.be.a('string');
    expect(second?.traceId).to.be.a('string');
    expect(second?.traceId).to.not.equal(first?.traceId);
  });

  it('should format message arguments and skip records below the level', () => {
    const logger: DeployPinoLogger = new InMemoryPinoLogger('info', false, 'unused-logs-directory');

    logger.debug('hidden');
    logger.error('Creating account %s', 'token.alice.testnet');

    expect(records().map((record): string | undefined => record.msg)).to.deep.equal([
      'Creating account token.alice.testnet',
    ]);
  });

  it('should log an error with its message', () => {
    const logger: DeployPinoLogger = new InMemoryPinoLogger('info', false, 'unused-logs-directory');

    logger.error(new Error('deploy failed'));

    const [record] = records();
    expect(record?.level).to.equal(50);
    expect(record?.msg).to.equal('deploy failed');
    expect(record?.err?.message).to.equal('deploy failed');
  });
});
