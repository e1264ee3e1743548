/**
 * Centralized logging system for Cadence
 *
 * Provides structured JSON logging with:
 * - Log levels (debug, info, warn, error)
 * - Child loggers for subsystems
 * - Job run context tracking via AsyncLocalStorage
 * - Performance logging utilities
 */

import { AsyncLocalStorage } from 'async_hooks';
import { nanoid } from 'nanoid';

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  logger: string;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  child(name: string): Logger;
}

/** Where formatted entries go; stdout/stderr unless overridden */
export type LogSink = (entry: LogEntry) => void;

// ============================================================================
// Job Context (AsyncLocalStorage)
// ============================================================================

export interface JobContext {
  job: string;
  runId: string;
  startTime: number;
}

export const jobContext = new AsyncLocalStorage<JobContext>();

/**
 * Run an async function within a job run context. Every log line written
 * while it runs carries the job name and run id.
 */
export function withJobContext<T>(job: string, fn: (ctx: JobContext) => Promise<T>): Promise<T> {
  const ctx: JobContext = {
    job,
    runId: nanoid(8),
    startTime: Date.now(),
  };
  return jobContext.run(ctx, () => fn(ctx));
}

/**
 * The context of the job run currently executing, if any
 */
export function getJobContext(): JobContext | undefined {
  return jobContext.getStore();
}

function enrichContext(context?: Record<string, unknown>): Record<string, unknown> {
  const ctx = jobContext.getStore();
  if (ctx) {
    return {
      ...context,
      job: ctx.job,
      runId: ctx.runId,
      elapsed: Date.now() - ctx.startTime,
    };
  }
  return context || {};
}

// ============================================================================
// Logger Implementation
// ============================================================================

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

const consoleSink: LogSink = (entry) => {
  const output = JSON.stringify(entry);

  if (entry.level === 'error') {
    console.error(output);
  } else {
    console.log(output);
  }
};

/**
 * Create a structured JSON logger
 *
 * @param name - Logger name (used as prefix for child loggers)
 * @param minLevel - Minimum log level to output (default: 'info')
 * @param sink - Destination for entries (default: console)
 */
export function createLogger(
  name: string,
  minLevel: LogLevel = 'info',
  sink: LogSink = consoleSink
): Logger {
  const minLevelValue = LOG_LEVELS[minLevel];

  function log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (LOG_LEVELS[level] < minLevelValue) return;

    const enrichedContext = enrichContext(context);

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      logger: name,
      message,
    };

    // Only include context if it has properties
    if (Object.keys(enrichedContext).length > 0) {
      entry.context = enrichedContext;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        ...(error.stack !== undefined && { stack: error.stack }),
      };
    }

    sink(entry);
  }

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, error, context) => log('error', message, context, error),
    child: (childName) => createLogger(`${name}:${childName}`, minLevel, sink),
  };
}

// ============================================================================
// Global Logger Instances
// ============================================================================

function getLogLevelFromEnv(): LogLevel {
  const envLevel = process.env['CADENCE_LOG_LEVEL']?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'info';
}

const LOG_LEVEL = getLogLevelFromEnv();

// Root logger
export const logger = createLogger('cadence', LOG_LEVEL);

export const tokenLogger = logger.child('token');

// ============================================================================
// Performance Logging
// ============================================================================

/**
 * Log performance of a single async operation
 *
 * @example
 * const result = await timedOperation(logger, 'drain', async () => {
 *   await tracker.wait();
 * });
 */
export async function timedOperation<T>(
  logger: Logger,
  operationName: string,
  fn: () => Promise<T>
): Promise<T> {
  const start = Date.now();
  try {
    const result = await fn();
    logger.info(`${operationName} completed`, {
      duration: Date.now() - start,
    });
    return result;
  } catch (error) {
    logger.error(`${operationName} failed`, toError(error), {
      duration: Date.now() - start,
    });
    throw error;
  }
}

/**
 * Normalize a thrown value into an Error for logging
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
