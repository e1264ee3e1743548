import { describe, it, expect } from 'vitest';
import {
  CadenceError,
  ConfigurationError,
  JobExecutionError,
  SchedulerConsumedError,
  SignalError,
  assertValid,
  isCadenceError,
  toCadenceError,
} from '../../core/errors.js';

describe('errors', () => {
  it('should serialise code and details', () => {
    const error = new ConfigurationError('bad period', { period: 0 });
    expect(error.toJSON()).toEqual({
      name: 'ConfigurationError',
      code: 'CONFIGURATION_ERROR',
      message: 'bad period',
      details: { period: 0 },
    });
  });

  it('should wrap job failures with the job name and cause', () => {
    const cause = new Error('timeout');
    const error = new JobExecutionError('sync', cause);

    expect(error.message).toBe('Job sync failed: timeout');
    expect(error.jobName).toBe('sync');
    expect(error.cause).toBe(cause);
    expect(error.code).toBe('JOB_EXECUTION_ERROR');
  });

  it('should describe non-Error causes', () => {
    expect(new JobExecutionError('a', 'plain').message).toBe('Job a failed: plain');
    expect(new SignalError('SIGKILL', 42).message).toBe('Failed to listen for SIGKILL: 42');
  });

  it('should name the consumed operation', () => {
    const error = new SchedulerConsumedError('wait');
    expect(error.message).toBe('Scheduler already consumed; cannot call wait()');
    expect(error.details).toEqual({ operation: 'wait' });
  });

  describe('toCadenceError', () => {
    it('should pass Cadence errors through', () => {
      const error = new SignalError('SIGINT');
      expect(toCadenceError(error)).toBe(error);
    });

    it('should convert errors, strings and other values', () => {
      const fromError = toCadenceError(new RangeError('out of range'));
      expect(fromError.message).toBe('out of range');
      expect(fromError.details).toEqual({ originalName: 'RangeError' });

      expect(toCadenceError('oops').message).toBe('oops');
      expect(toCadenceError(7).details).toEqual({ errorType: 'number' });
      expect(isCadenceError(toCadenceError(null))).toBe(true);
    });
  });

  it('should throw ConfigurationError from a failed assertion', () => {
    expect(() => assertValid(false, 'nope')).toThrow(ConfigurationError);
    expect(() => assertValid(true, 'fine')).not.toThrow();
    expect(new ConfigurationError('x')).toBeInstanceOf(CadenceError);
  });
});
