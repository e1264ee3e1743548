/**
 * HeartbeatJob - logs a liveness line every period
 *
 * Backs the `cadence heartbeat` command and doubles as the smallest
 * example of a class-style job.
 *
 * @module jobs/HeartbeatJob
 */

import type { Logger } from '../utils/logger.js';
import type { Job } from './Job.js';

export interface HeartbeatJobOptions {
  /** Interval between beats in milliseconds. Default: the scheduler's */
  period?: number;
  /** Beat on wall-clock multiples of the period. Default: the scheduler's */
  truncateTime?: boolean;
}

/**
 * Timing members exist only for the options given, so the scheduler's
 * configured defaults cover the rest.
 */
export class HeartbeatJob implements Job {
  readonly name = 'heartbeat';
  readonly period?: () => number;
  readonly withTruncateTime?: () => boolean;
  private beats = 0;

  constructor(
    private readonly logger: Logger,
    options: HeartbeatJobOptions = {}
  ) {
    const { period, truncateTime } = options;
    if (period !== undefined) {
      this.period = () => period;
    }
    if (truncateTime !== undefined) {
      this.withTruncateTime = () => truncateTime;
    }
  }

  run(): void {
    this.beats++;
    this.logger.info('Heartbeat', { beat: this.beats, at: new Date().toISOString() });
  }

  get count(): number {
    return this.beats;
  }
}
