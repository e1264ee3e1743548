/**
 * Cadence Error Types
 *
 * Errors raised by the scheduler core, with type guards and a
 * conversion helper for unknown thrown values.
 */

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all Cadence errors
 */
export class CadenceError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CadenceError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): {
    name: string;
    code: string;
    message: string;
    details?: Record<string, unknown>;
  } {
    const result: {
      name: string;
      code: string;
      message: string;
      details?: Record<string, unknown>;
    } = {
      name: this.name,
      code: this.code,
      message: this.message,
    };
    if (this.details !== undefined) {
      result.details = this.details;
    }
    return result;
  }
}

// =============================================================================
// Specific Error Types
// =============================================================================

/**
 * Invalid job or scheduler configuration (e.g. a non-positive period)
 */
export class ConfigurationError extends CadenceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * A terminal operation was invoked on a scheduler that already ran one
 */
export class SchedulerConsumedError extends CadenceError {
  constructor(operation: string) {
    super(`Scheduler already consumed; cannot call ${operation}()`, 'SCHEDULER_CONSUMED', {
      operation,
    });
    this.name = 'SchedulerConsumedError';
  }
}

/**
 * A job's run step threw or rejected
 */
export class JobExecutionError extends CadenceError {
  constructor(
    public readonly jobName: string,
    public override readonly cause: unknown
  ) {
    super(`Job ${jobName} failed: ${describeCause(cause)}`, 'JOB_EXECUTION_ERROR', {
      jobName,
    });
    this.name = 'JobExecutionError';
  }
}

/**
 * The process signal source could not be observed
 */
export class SignalError extends CadenceError {
  constructor(signal: string, cause?: unknown) {
    super(`Failed to listen for ${signal}: ${describeCause(cause)}`, 'SIGNAL_ERROR', {
      signal,
    });
    this.name = 'SignalError';
  }
}

/**
 * Raised by CancellationToken.throwIfCancelled()
 */
export class CancelledError extends CadenceError {
  constructor(message: string = 'Operation was cancelled') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

// =============================================================================
// Error Handling Utilities
// =============================================================================

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === 'string') return cause;
  return String(cause);
}

/**
 * Type guard for CadenceError
 */
export function isCadenceError(error: unknown): error is CadenceError {
  return error instanceof CadenceError;
}

/**
 * Convert unknown error to CadenceError
 */
export function toCadenceError(error: unknown): CadenceError {
  if (isCadenceError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new CadenceError(error.message, 'UNKNOWN_ERROR', { originalName: error.name });
  }

  if (typeof error === 'string') {
    return new CadenceError(error, 'UNKNOWN_ERROR');
  }

  return new CadenceError('An unknown error occurred', 'UNKNOWN_ERROR', {
    errorType: typeof error,
  });
}

/**
 * Assert a condition, throwing ConfigurationError if false
 */
export function assertValid(
  condition: boolean,
  message: string,
  details?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    throw new ConfigurationError(message, details);
  }
}
