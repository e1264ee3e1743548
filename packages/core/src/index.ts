/**
 * Cadence - periodic job scheduler with hierarchical cooperative cancellation
 */

export * from './jobs/index.js';

export {
  CancellationToken,
  type CancellationListener,
} from './core/cancellation.js';

export {
  CadenceError,
  ConfigurationError,
  SchedulerConsumedError,
  JobExecutionError,
  SignalError,
  CancelledError,
  isCadenceError,
  toCadenceError,
  assertValid,
} from './core/errors.js';

export {
  loadConfig,
  getConfig,
  resetConfig,
  validateConfig,
  getSchedulerConfig,
  getLoggingConfig,
  type CadenceConfig,
} from './core/config.js';

export {
  createLogger,
  logger,
  withJobContext,
  getJobContext,
  timedOperation,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogSink,
  type JobContext,
} from './utils/logger.js';

export { sleep, cancellableSleep } from './utils/async.js';
