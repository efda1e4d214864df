/**
 * Winston-based logger with structured output.
 */

import { createLogger as createWinstonLogger, format, transports, Logger } from 'winston';
import * as path from 'path';
import * as fs from 'fs';
import { env } from '../core/env';
import { IngestionError } from '../core/errors';

const logDir = path.resolve(process.cwd(), env.LOG_DIR);
const fileLoggingEnabled = env.LOG_FILE_ENABLED;

if (fileLoggingEnabled && !fs.existsSync(logDir)) {
  fs.mkdirSync(logDir, { recursive: true });
}

const logFormat = format.combine(
  format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  format.errors({ stack: true }),
  format.splat(),
  format.json()
);

const consoleFormat = format.combine(
  format.colorize(),
  format.timestamp({ format: 'HH:mm:ss' }),
  format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `${String(timestamp)} [${level}]: ${String(message)}`;
    if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta)}`;
    }
    return msg;
  })
);

const fileTransports = fileLoggingEnabled
  ? [
      new transports.File({
        filename: path.join(logDir, 'error.log'),
        level: 'error',
        maxsize: 5 * 1024 * 1024,
        maxFiles: 5,
      }),
      new transports.File({
        filename: path.join(logDir, 'combined.log'),
        maxsize: 5 * 1024 * 1024,
        maxFiles: 5,
      }),
    ]
  : [];

export const logger: Logger = createWinstonLogger({
  level: env.LOG_LEVEL,
  format: logFormat,
  defaultMeta: { service: 'tweet-ingest' },
  transports: [...fileTransports],
});

if (env.NODE_ENV !== 'production') {
  logger.add(
    new transports.Console({
      format: consoleFormat,
    })
  );
}

export interface ModuleLogger {
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
}

export function normalizeErrorMeta(
  error: Error | undefined,
  extraMeta: Record<string, unknown>
): Record<string, unknown> {
  if (!error) {
    return extraMeta;
  }

  const meta: Record<string, unknown> = { ...extraMeta };

  if (error instanceof IngestionError) {
    meta.errorCode = error.code;
    meta.retryable = error.retryable;
    meta.errorContext = error.context;
    if (error.originalError) {
      meta.originalError = {
        name: error.originalError.name,
        message: error.originalError.message,
      };
    }
  } else {
    meta.errorName = error.name;
    meta.errorMessage = error.message;
  }

  return meta;
}

export function createModuleLogger(module: string): ModuleLogger {
  return {
    info: (message: string, meta: Record<string, unknown> = {}) =>
      logger.info(message, { module, ...meta }),
    warn: (message: string, meta: Record<string, unknown> = {}) =>
      logger.warn(message, { module, ...meta }),
    error: (message: string, error?: Error, meta: Record<string, unknown> = {}) =>
      logger.error(message, normalizeErrorMeta(error, { module, ...meta })),
    debug: (message: string, meta: Record<string, unknown> = {}) =>
      logger.debug(message, { module, ...meta }),
  };
}

export const LOG_LEVELS = {
  ERROR: 'error',
  WARN: 'warn',
  INFO: 'info',
  DEBUG: 'debug',
} as const;

export function setLogLevel(level: (typeof LOG_LEVELS)[keyof typeof LOG_LEVELS]): void {
  logger.level = level;
}
