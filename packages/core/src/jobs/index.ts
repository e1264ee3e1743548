/**
 * Jobs Module - periodic job scheduling for Cadence
 *
 * - Job capability with per-member defaults (PeriodicJob, defineJob)
 * - One independent loop per job, optionally aligned to wall-clock boundaries
 * - Cooperative cancellation and graceful drain on shutdown
 *
 * @module jobs
 *
 * @example
 * ```typescript
 * import { Scheduler, defineJob, CancellationToken } from '@cadence/core';
 *
 * const scheduler = new Scheduler()
 *   .spawn(defineJob({ name: 'a', run: () => console.log('JobA run') }))
 *   .spawn(defineJob({ name: 'b', period: 2000, run: () => console.log('JobB run') }));
 *
 * // Stop after 5 seconds instead of on Ctrl+C
 * const token = new CancellationToken();
 * setTimeout(() => token.cancel(), 5000);
 * await scheduler.waitCancel(token);
 * ```
 */

export {
  PeriodicJob,
  defineJob,
  jobName,
  assertValidPeriod,
  resolveJobOptions,
  DEFAULT_PERIOD_MS,
  type Job,
  type JobSpec,
  type JobDefaults,
  type ResolvedJobOptions,
} from './Job.js';

export { TaskTracker } from './TaskTracker.js';

export {
  Scheduler,
  truncatedDelay,
  type Clock,
  type LoopExitReason,
  type SchedulerOptions,
  type SchedulerStats,
  type SchedulerEvents,
} from './Scheduler.js';

export { HeartbeatJob, type HeartbeatJobOptions } from './HeartbeatJob.js';
