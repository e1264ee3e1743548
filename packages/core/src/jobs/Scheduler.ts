/**
 * Scheduler - runs periodic jobs until shut down
 *
 * Every spawned job gets its own loop: sleep until the next boundary, run,
 * repeat, until the scheduler's root token is cancelled. Loops are tracked
 * by a TaskTracker so shutdown can wait for all of them to exit.
 *
 * @module jobs/Scheduler
 *
 * @example
 * ```typescript
 * const scheduler = new Scheduler()
 *   .spawn(new Heartbeat())
 *   .spawn(defineJob({ name: 'sync', period: 60_000, run: syncAccounts }));
 *
 * // Resolves after Ctrl+C, once every job loop has exited
 * await scheduler.wait();
 * ```
 */

import { EventEmitter } from 'events';
import { CancellationToken } from '../core/cancellation.js';
import { getLoggingConfig, getSchedulerConfig } from '../core/config.js';
import { JobExecutionError, SchedulerConsumedError, SignalError } from '../core/errors.js';
import { cancellableSleep } from '../utils/async.js';
import { createLogger, timedOperation, withJobContext, type Logger } from '../utils/logger.js';
import {
  assertValidPeriod,
  resolveJobOptions,
  type Job,
  type JobDefaults,
  type ResolvedJobOptions,
} from './Job.js';
import { TaskTracker } from './TaskTracker.js';

// ============================================================================
// TYPES
// ============================================================================

export type Clock = () => number;

export type LoopExitReason = 'cancelled' | 'failed';

export interface SchedulerOptions {
  /** Logger for scheduler events (default: cadence:scheduler at the configured level) */
  logger?: Logger;
  /** Milliseconds since the epoch (default: Date.now) */
  clock?: Clock;
  /** Timing applied to jobs that do not define period() / withTruncateTime() */
  defaults?: Partial<JobDefaults>;
  /** Process signals wait() shuts down on (default: from config, SIGINT) */
  signals?: string[];
}

export interface SchedulerStats {
  /** Job loops still running */
  active: number;
  /** Jobs admitted by spawn() */
  spawned: number;
  /** Jobs refused because the scheduler was already shutting down */
  rejected: number;
  /** Job loops that ended because a run failed */
  failed: number;
  /** Completed run invocations across all jobs */
  runs: number;
  closed: boolean;
  cancelled: boolean;
}

export interface SchedulerEvents {
  'job:spawned': (name: string, options: ResolvedJobOptions) => void;
  'job:rejected': (name: string) => void;
  'job:started': (name: string, runId: string) => void;
  'job:completed': (name: string, runId: string, duration: number) => void;
  'job:failed': (name: string, error: JobExecutionError) => void;
  'job:exited': (name: string, reason: LoopExitReason) => void;
  'scheduler:stopping': () => void;
  'scheduler:stopped': () => void;
}

// ============================================================================
// TRUNCATION
// ============================================================================

/**
 * Milliseconds until the next absolute multiple of `periodMs` since the epoch.
 * Lands exactly on a boundary: a remainder of zero waits a full period.
 *
 * @example truncatedDelay(4, 11) === 1 // wakes at 12, then 16, 20, ...
 * @throws ConfigurationError if periodMs is not positive
 */
export function truncatedDelay(periodMs: number, nowMs: number): number {
  assertValidPeriod(periodMs);
  const remainder = ((nowMs % periodMs) + periodMs) % periodMs;
  return periodMs - remainder;
}

// ============================================================================
// SCHEDULER
// ============================================================================

export class Scheduler {
  private readonly tracker = new TaskTracker();
  private readonly token = new CancellationToken();
  private readonly emitter = new EventEmitter();
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly defaults: JobDefaults;
  private readonly signals: string[];
  private consumed = false;

  private active = 0;
  private spawned = 0;
  private rejected = 0;
  private failed = 0;
  private runs = 0;

  constructor(options: SchedulerOptions = {}) {
    this.logger =
      options.logger ?? createLogger('cadence:scheduler', getLoggingConfig().level);
    this.clock = options.clock ?? (() => Date.now());
    this.defaults = {
      period: options.defaults?.period ?? getSchedulerConfig().defaultPeriodMs,
      truncateTime: options.defaults?.truncateTime ?? getSchedulerConfig().truncateTime,
    };
    this.signals = options.signals ?? getSchedulerConfig().signals;
    this.emitter.setMaxListeners(100);

    assertValidPeriod(this.defaults.period, 'default');
  }

  static create(options?: SchedulerOptions): Scheduler {
    return new Scheduler(options);
  }

  // ============================================================================
  // EVENTS
  // ============================================================================

  on<E extends keyof SchedulerEvents>(event: E, listener: SchedulerEvents[E]): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<E extends keyof SchedulerEvents>(event: E, listener: SchedulerEvents[E]): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<E extends keyof SchedulerEvents>(event: E, listener: SchedulerEvents[E]): this {
    this.emitter.off(event, listener);
    return this;
  }

  private emit<E extends keyof SchedulerEvents>(
    event: E,
    ...args: Parameters<SchedulerEvents[E]>
  ): void {
    this.emitter.emit(event, ...args);
  }

  // ============================================================================
  // REGISTRATION
  // ============================================================================

  /**
   * Start a loop for `job`. Timing options are read once, here.
   * Once shutdown has begun the job is dropped without error.
   *
   * @throws ConfigurationError if the job's period is not positive
   */
  spawn(job: Job): this {
    const options = resolveJobOptions(job, this.defaults);
    const token = this.token.clone();

    const admitted = this.tracker.track(() => this.runLoop(job, options, token));
    if (!admitted) {
      this.rejected++;
      this.logger.warn('Scheduler is shut down; job not started', { job: options.name });
      this.emit('job:rejected', options.name);
      return this;
    }

    this.spawned++;
    this.active++;
    this.logger.debug('Job spawned', {
      job: options.name,
      period: options.period,
      truncateTime: options.truncateTime,
      withCancel: options.withCancel,
    });
    this.emit('job:spawned', options.name, options);
    return this;
  }

  private async runLoop(
    job: Job,
    options: ResolvedJobOptions,
    token: CancellationToken
  ): Promise<void> {
    let reason: LoopExitReason = 'cancelled';
    try {
      for (;;) {
        const delay = options.truncateTime
          ? truncatedDelay(options.period, this.clock())
          : options.period;

        const elapsed = await cancellableSleep(delay, token);
        if (!elapsed) break;

        await this.invoke(job, options, token);
      }
    } catch (error) {
      reason = 'failed';
      this.failed++;
      const failure =
        error instanceof JobExecutionError ? error : new JobExecutionError(options.name, error);
      this.logger.error('Job failed; its loop will not run again', failure, {
        job: options.name,
      });
      this.emit('job:failed', options.name, failure);
    } finally {
      this.active--;
      this.logger.debug('Job loop exited', { job: options.name, reason });
      this.emit('job:exited', options.name, reason);
    }
  }

  private invoke(job: Job, options: ResolvedJobOptions, token: CancellationToken): Promise<void> {
    return withJobContext(options.name, async (ctx) => {
      this.emit('job:started', options.name, ctx.runId);

      try {
        if (options.withCancel) {
          const child = token.childToken();
          try {
            await job.runWithCancel?.(child);
          } finally {
            child.dispose();
          }
        } else {
          await job.run?.();
        }
      } catch (error) {
        throw new JobExecutionError(options.name, error);
      }

      this.runs++;
      this.emit('job:completed', options.name, ctx.runId, Date.now() - ctx.startTime);
    });
  }

  // ============================================================================
  // SHUTDOWN
  // ============================================================================

  /**
   * Refuse new jobs, cancel every loop and wait for all of them to exit.
   * Consumes the scheduler.
   */
  async stop(): Promise<void> {
    this.consume('stop');
    await this.shutdown();
  }

  /**
   * Wait for one of the configured process signals, then stop().
   * Consumes the scheduler.
   *
   * @throws SignalError if a signal cannot be listened for; the scheduler
   * is still drained before it rejects
   */
  async wait(): Promise<void> {
    this.consume('wait');
    try {
      await this.waitForSignal();
    } catch (error) {
      await this.shutdown();
      throw error;
    }
    await this.shutdown();
  }

  /**
   * Wait for `token` to be cancelled, then stop(). Consumes the scheduler.
   */
  async waitCancel(token: CancellationToken): Promise<void> {
    this.consume('waitCancel');
    await token.cancelled();
    await this.shutdown();
  }

  getStats(): SchedulerStats {
    return {
      active: this.active,
      spawned: this.spawned,
      rejected: this.rejected,
      failed: this.failed,
      runs: this.runs,
      closed: this.tracker.isClosed,
      cancelled: this.token.isCancelled,
    };
  }

  private consume(operation: string): void {
    if (this.consumed) {
      throw new SchedulerConsumedError(operation);
    }
    this.consumed = true;
  }

  private async shutdown(): Promise<void> {
    this.logger.info('Scheduler stopping', { active: this.active });
    this.emit('scheduler:stopping');

    this.tracker.close();
    this.token.cancel();
    await timedOperation(this.logger, 'Scheduler drain', () => this.tracker.wait());

    this.logger.info('Scheduler stopped', {
      spawned: this.spawned,
      failed: this.failed,
      runs: this.runs,
    });
    this.emit('scheduler:stopped');
  }

  private waitForSignal(): Promise<void> {
    return new Promise((resolve, reject) => {
      const subscribed: string[] = [];

      const onSignal = (signal: string) => {
        unsubscribe();
        this.logger.info('Received shutdown signal', { signal });
        resolve();
      };

      const unsubscribe = () => {
        for (const signal of subscribed) {
          process.off(signal, onSignal);
        }
      };

      for (const signal of this.signals) {
        try {
          process.once(signal, onSignal);
          subscribed.push(signal);
        } catch (error) {
          unsubscribe();
          const failure = new SignalError(signal, error);
          this.logger.error('Cannot listen for shutdown signal', failure, { signal });
          reject(failure);
          return;
        }
      }

      this.logger.info('Waiting for shutdown signal', { signals: this.signals });
    });
  }
}
