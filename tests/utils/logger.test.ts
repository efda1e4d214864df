import { afterEach, describe, expect, test } from 'vitest';
import { IngestionErrors } from '../../core/errors';
import { createModuleLogger, LOG_LEVELS, logger, normalizeErrorMeta, setLogLevel } from '../../utils/logger';

describe('logger', () => {
  const initialLevel = logger.level;

  afterEach(() => {
    logger.level = initialLevel;
  });

  test('normalizeErrorMeta expands ingestion errors', () => {
    const cause = new Error('socket hang up');
    const error = IngestionErrors.networkUnavailable('gone', { attempts: 5 }, cause);
    expect(normalizeErrorMeta(error, { module: 'Test' })).toEqual({
      module: 'Test',
      errorCode: 'NETWORK_UNAVAILABLE',
      retryable: true,
      errorContext: { attempts: 5 },
      originalError: { name: 'Error', message: 'socket hang up' },
    });
  });

  test('normalizeErrorMeta records plain errors by name and message', () => {
    expect(normalizeErrorMeta(new TypeError('bad'), {})).toEqual({ errorName: 'TypeError', errorMessage: 'bad' });
    expect(normalizeErrorMeta(undefined, { a: 1 })).toEqual({ a: 1 });
  });

  test('module loggers tag entries with their module', () => {
    const moduleLogger = createModuleLogger('Engine');
    expect(() => {
      moduleLogger.debug('debug line');
      moduleLogger.info('info line', { count: 1 });
      moduleLogger.warn('warn line');
    }).not.toThrow();
  });

  test('setLogLevel changes the shared level', () => {
    setLogLevel(LOG_LEVELS.DEBUG);
    expect(logger.level).toBe('debug');
  });

  test('entries carry the service name', () => {
    expect(logger.defaultMeta).toEqual({ service: 'tweet-ingest' });
  });
});
