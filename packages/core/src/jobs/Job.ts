/**
 * Job - the pluggable unit of periodic work
 *
 * A job may implement any subset of the members below; the scheduler fills
 * in the rest. Class-style jobs can extend PeriodicJob, object-style jobs
 * can use defineJob().
 *
 * @module jobs/Job
 *
 * @example
 * ```typescript
 * class Heartbeat extends PeriodicJob {
 *   override period(): number {
 *     return 2000;
 *   }
 *
 *   override async run(): Promise<void> {
 *     logger.info('beat');
 *   }
 * }
 *
 * const poller = defineJob({
 *   name: 'poller',
 *   period: 5000,
 *   withCancel: true,
 *   async runWithCancel(token) {
 *     await fetch(url, { signal: token.signal });
 *   },
 * });
 * ```
 */

import type { CancellationToken } from '../core/cancellation.js';
import { assertValid } from '../core/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export interface Job {
  /** Label used in logs and events */
  readonly name?: string;
  /** Interval between successive runs, in milliseconds */
  period?(): number;
  /** Align runs to absolute multiples of period() since the epoch */
  withTruncateTime?(): boolean;
  /** Invoke runWithCancel() instead of run() */
  withCancel?(): boolean;
  /** Invoked each cycle when withCancel() is false */
  run?(): void | Promise<void>;
  /**
   * Invoked each cycle when withCancel() is true, with a token scoped to this
   * one invocation. Implementations should return promptly once it is
   * cancelled.
   */
  runWithCancel?(token: CancellationToken): void | Promise<void>;
}

export interface JobDefaults {
  period: number;
  truncateTime: boolean;
}

/**
 * Job settings captured once at spawn time
 */
export interface ResolvedJobOptions {
  name: string;
  period: number;
  truncateTime: boolean;
  withCancel: boolean;
}

export const DEFAULT_PERIOD_MS = 1000;

// ============================================================================
// BASE CLASS
// ============================================================================

/**
 * Base class with the default behaviour for every member
 */
export abstract class PeriodicJob implements Job {
  get name(): string {
    return this.constructor.name;
  }

  period(): number {
    return DEFAULT_PERIOD_MS;
  }

  withTruncateTime(): boolean {
    return true;
  }

  withCancel(): boolean {
    return false;
  }

  run(): void | Promise<void> {}

  runWithCancel(_token: CancellationToken): void | Promise<void> {}
}

// ============================================================================
// OBJECT-STYLE JOBS
// ============================================================================

export interface JobSpec {
  name?: string;
  period?: number;
  truncateTime?: boolean;
  withCancel?: boolean;
  run?: () => void | Promise<void>;
  runWithCancel?: (token: CancellationToken) => void | Promise<void>;
}

/**
 * Build a Job from plain options and callbacks
 */
export function defineJob(spec: JobSpec): Job {
  const job: Job = {
    name: spec.name ?? 'job',
    withCancel: () => spec.withCancel ?? false,
    run: spec.run,
    runWithCancel: spec.runWithCancel,
  };

  const { period, truncateTime } = spec;
  if (period !== undefined) {
    job.period = () => period;
  }
  if (truncateTime !== undefined) {
    job.withTruncateTime = () => truncateTime;
  }

  return job;
}

// ============================================================================
// RESOLUTION
// ============================================================================

/**
 * Name a job for logging: explicit name, else its class name
 */
export function jobName(job: Job): string {
  if (job.name) return job.name;
  // Prototype-less objects have no constructor at all
  const ctor: unknown = job.constructor;
  if (typeof ctor === 'function' && ctor !== Object && ctor.name) {
    return ctor.name;
  }
  return 'job';
}

/**
 * Validate a period in milliseconds
 *
 * @throws ConfigurationError unless the period is finite and > 0
 */
export function assertValidPeriod(period: number, name: string = 'job'): void {
  assertValid(
    typeof period === 'number' && Number.isFinite(period) && period > 0,
    `Job ${name} has invalid period ${String(period)}; period must be a positive number of milliseconds`,
    { job: name, period }
  );
}

/**
 * Read a job's timing options once, applying defaults
 *
 * @throws ConfigurationError if the period is not positive
 */
export function resolveJobOptions(job: Job, defaults: JobDefaults): ResolvedJobOptions {
  const name = jobName(job);
  const period = job.period ? job.period() : defaults.period;
  assertValidPeriod(period, name);

  return {
    name,
    period,
    truncateTime: job.withTruncateTime ? job.withTruncateTime() : defaults.truncateTime,
    withCancel: job.withCancel ? job.withCancel() : false,
  };
}
