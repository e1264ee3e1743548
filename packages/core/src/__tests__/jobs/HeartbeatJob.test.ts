import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HeartbeatJob } from '../../jobs/HeartbeatJob.js';
import { Scheduler } from '../../jobs/Scheduler.js';
import { createLogger, type LogEntry } from '../../utils/logger.js';

describe('HeartbeatJob', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should expose its configured timing', () => {
    const job = new HeartbeatJob(createLogger('hb', 'info', e => entries.push(e)), {
      period: 250,
      truncateTime: false,
    });
    expect(job.name).toBe('heartbeat');
    expect(job.period?.()).toBe(250);
    expect(job.withTruncateTime?.()).toBe(false);
  });

  it('should leave timing to the scheduler when no options are given', () => {
    const job = new HeartbeatJob(createLogger('hb', 'info', e => entries.push(e)));
    expect(job.period).toBeUndefined();
    expect(job.withTruncateTime).toBeUndefined();
  });

  it('should beat on the scheduler defaults when no options are given', async () => {
    const job = new HeartbeatJob(createLogger('hb', 'info', e => entries.push(e)));
    const scheduler = new Scheduler({
      logger: createLogger('scheduler', 'error', () => {}),
      defaults: { period: 300, truncateTime: false },
      signals: ['SIGUSR2'],
    }).spawn(job);

    await vi.advanceTimersByTimeAsync(100);
    expect(job.count).toBe(0);
    await vi.advanceTimersByTimeAsync(800);
    await scheduler.stop();

    expect(entries.map(e => e.context?.['at'])).toEqual([
      '1970-01-01T00:00:00.300Z',
      '1970-01-01T00:00:00.600Z',
      '1970-01-01T00:00:00.900Z',
    ]);
  });

  it('should log a numbered beat on every cycle', async () => {
    const log = createLogger('hb', 'info', e => entries.push(e));
    const job = new HeartbeatJob(log, { period: 500 });
    const scheduler = new Scheduler({
      logger: createLogger('scheduler', 'error', () => {}),
      defaults: { period: 1000, truncateTime: true },
      signals: ['SIGUSR2'],
    }).spawn(job);

    await vi.advanceTimersByTimeAsync(1500);
    await scheduler.stop();

    expect(job.count).toBe(3);
    expect(entries.map(e => e.context?.['beat'])).toEqual([1, 2, 3]);
    expect(entries[0]?.context?.['at']).toBe('1970-01-01T00:00:00.500Z');
    expect(entries[0]?.context?.['job']).toBe('heartbeat');
  });
});
