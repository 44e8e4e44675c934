import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { ConsoleLogger, resolveLogLevel } from '../../src/utils/logger.js';
import { LogLevel } from '../../src/types/index.js';

const FIXED = new Date('2024-05-01T12:00:00.000Z');

function recordingLogger(level: LogLevel): { logger: ConsoleLogger; lines: string[] } {
  const lines: string[] = [];
  return { logger: new ConsoleLogger(level, line => lines.push(line), () => FIXED), lines };
}

describe('ConsoleLogger', () => {
  it('drops entries below its level', () => {
    const { logger, lines } = recordingLogger(LogLevel.WARN);

    logger.debug('fine detail');
    logger.info('progress');
    logger.warn('cache conflict');
    logger.error('build failed');

    assert.deepEqual(lines, [
      '2024-05-01T12:00:00.000Z [WARN]  cache conflict',
      '2024-05-01T12:00:00.000Z [ERROR] build failed'
    ]);
  });

  it('follows setLevel', () => {
    const { logger, lines } = recordingLogger(LogLevel.ERROR);

    logger.debug('hidden');
    logger.setLevel(LogLevel.DEBUG);
    logger.debug('shown');

    assert.deepEqual(lines, ['2024-05-01T12:00:00.000Z [DEBUG] shown']);
  });

  it('renders meta as JSON and expands nested errors', () => {
    const { logger, lines } = recordingLogger(LogLevel.DEBUG);
    const error = new Error('disk full');

    logger.debug('copy failed', { path: 'target', error });
    logger.info('restored', 3);

    const parsed: unknown = JSON.parse(lines[0].split('\n').slice(1).join('\n'));
    assert.deepEqual(parsed, {
      path: 'target',
      error: { name: 'Error', message: 'disk full', stack: error.stack }
    });
    assert.equal(lines[1], '2024-05-01T12:00:00.000Z [INFO]  restored 3');
  });
});

describe('resolveLogLevel', () => {
  it('prefers the verbose switch', () => {
    assert.equal(resolveLogLevel({ DEPCACHE_VERBOSE: '1', DEPCACHE_LOG_LEVEL: 'warn' }), LogLevel.DEBUG);
  });

  it('accepts a named level in any case', () => {
    assert.equal(resolveLogLevel({ DEPCACHE_LOG_LEVEL: ' Warn ' }), LogLevel.WARN);
  });

  it('falls back to errors only, or info in development', () => {
    assert.equal(resolveLogLevel({ DEPCACHE_LOG_LEVEL: 'loud' }), LogLevel.ERROR);
    assert.equal(resolveLogLevel({}), LogLevel.ERROR);
    assert.equal(resolveLogLevel({ NODE_ENV: 'development' }), LogLevel.INFO);
  });
});
