/**
 * Winston-based logger with structured output.
 */

import { createLogger as createWinstonLogger, format, transports, Logger } from 'winston';
import * as path from 'path';
import * as fs from 'fs';

const logDir = path.join(process.cwd(), 'logs');
const fileLogging = process.env.NODE_ENV !== 'test';

if (fileLogging && !fs.existsSync(logDir)) {
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

const fileTransports = fileLogging
  ? [
    new transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: 5 * 1024 * 1024,
      maxFiles: 5
    }),
    new transports.File({
      filename: path.join(logDir, 'combined.log'),
      maxsize: 5 * 1024 * 1024,
      maxFiles: 5
    })
  ]
  : [];

export const logger: Logger = createWinstonLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  defaultMeta: { service: 'jobwarden' },
  transports: [...fileTransports],
  silent: process.env.NODE_ENV === 'test' && !process.env.LOG_LEVEL
});

if (process.env.NODE_ENV !== 'production') {
  logger.add(
    new transports.Console({
      format: consoleFormat
    })
  );
}

export type LogContext = Record<string, unknown>;

export interface ModuleLogger {
  info: (message: string, meta?: LogContext) => void;
  warn: (message: string, meta?: LogContext) => void;
  error: (message: string, error?: Error, meta?: LogContext) => void;
  debug: (message: string, meta?: LogContext) => void;
  verbose: (message: string, meta?: LogContext) => void;
}

interface CodedErrorShape {
  code: string;
  retryable: boolean;
  context?: unknown;
  originalError?: Error;
}

function isCodedError(error: Error): error is Error & CodedErrorShape {
  return typeof Reflect.get(error, 'code') === 'string' && typeof Reflect.get(error, 'retryable') === 'boolean';
}

function normalizeErrorMeta(error: Error | undefined, extraMeta: LogContext): LogContext {
  if (!error) {
    return extraMeta;
  }

  const meta: LogContext = { ...extraMeta };

  if (isCodedError(error)) {
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
    info: (message, meta = {}) => logger.info(message, { module, ...meta }),
    warn: (message, meta = {}) => logger.warn(message, { module, ...meta }),
    error: (message, error, meta = {}) =>
      logger.error(message, normalizeErrorMeta(error, { module, ...meta })),
    debug: (message, meta = {}) => logger.debug(message, { module, ...meta }),
    verbose: (message, meta = {}) => logger.verbose(message, { module, ...meta }),
  };
}

/**
 * 增强的模块日志器（集成性能追踪和上下文管理）
 */
export class EnhancedLogger {
  private baseLogger: ModuleLogger;
  private context: LogContext = {};

  constructor(module: string) {
    this.baseLogger = createModuleLogger(module);
  }

  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  info(message: string, meta?: LogContext): void {
    this.baseLogger.info(message, { ...this.context, ...meta });
  }

  warn(message: string, meta?: LogContext): void {
    this.baseLogger.warn(message, { ...this.context, ...meta });
  }

  error(message: string, error?: Error, meta?: LogContext): void {
    this.baseLogger.error(message, error, { ...this.context, ...meta });
  }

  debug(message: string, meta?: LogContext): void {
    this.baseLogger.debug(message, { ...this.context, ...meta });
  }

  performance(operation: string, duration: number, metadata?: LogContext): void {
    this.baseLogger.info(`[PERF] ${operation}`, {
      ...this.context,
      ...metadata,
      duration,
      operation,
      type: 'performance'
    });
  }

  startOperation(operation: string, metadata?: LogContext): () => void {
    const startTime = Date.now();
    this.debug(`[START] ${operation}`, metadata);
    return () => {
      this.performance(operation, Date.now() - startTime, metadata);
    };
  }

  async trackAsync<T>(operation: string, fn: () => Promise<T>, metadata?: LogContext): Promise<T> {
    const endOperation = this.startOperation(operation, metadata);
    try {
      const result = await fn();
      endOperation();
      return result;
    } catch (error) {
      endOperation();
      this.error(`[FAILED] ${operation}`, error instanceof Error ? error : new Error(String(error)), metadata);
      throw error;
    }
  }
}

export function createEnhancedLogger(module: string): EnhancedLogger {
  return new EnhancedLogger(module);
}

export const LOG_LEVELS = {
  ERROR: 'error',
  WARN: 'warn',
  INFO: 'info',
  DEBUG: 'debug',
  VERBOSE: 'verbose'
} as const;

export function setLogLevel(level: string): void {
  logger.level = level;
}

export async function closeLogger(): Promise<void> {
  await new Promise<void>((resolve) => {
    logger.on('finish', resolve);
    logger.end();
  });
}
