import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  getConfig,
  getSchedulerConfig,
  loadConfig,
  resetConfig,
  validateConfig,
} from '../../core/config.js';
import { ConfigurationError } from '../../core/errors.js';

// ============================================================================
// TEST UTILITIES
// ============================================================================

const ENV_KEYS = [
  'CADENCE_LOG_LEVEL',
  'CADENCE_DEFAULT_PERIOD_MS',
  'CADENCE_TRUNCATE_TIME',
  'CADENCE_SIGNALS',
];

let tempDir: string;
let savedEnv: Record<string, string | undefined>;

function writeConfigFile(contents: string): string {
  const file = path.join(tempDir, 'config.json');
  fs.writeFileSync(file, contents);
  return file;
}

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cadence-test-'));
  savedEnv = {};
  for (const key of ENV_KEYS) {
    savedEnv[key] = process.env[key];
    delete process.env[key];
  }
  resetConfig();
});

afterEach(() => {
  for (const key of ENV_KEYS) {
    const value = savedEnv[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
  resetConfig();
  fs.rmSync(tempDir, { recursive: true, force: true });
});

// ============================================================================
// TESTS
// ============================================================================

describe('config', () => {
  describe('validateConfig', () => {
    it('should fill in every default from an empty object', () => {
      expect(validateConfig({})).toEqual({
        scheduler: { defaultPeriodMs: 1000, truncateTime: true, signals: ['SIGINT'] },
        logging: { level: 'info' },
      });
    });

    it('should reject a non-positive default period', () => {
      expect(() => validateConfig({ scheduler: { defaultPeriodMs: 0 } })).toThrow(
        ConfigurationError
      );
    });

    it('should report the failing path in the error details', () => {
      try {
        validateConfig({ logging: { level: 'verbose' } });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        if (error instanceof ConfigurationError) {
          const issues = error.details?.['issues'];
          expect(Array.isArray(issues)).toBe(true);
          expect(JSON.stringify(issues)).toContain('"path":"logging.level"');
        }
      }
    });
  });

  describe('loadConfig', () => {
    it('should use defaults when the file does not exist', () => {
      const config = loadConfig(path.join(tempDir, 'missing.json'));
      expect(config.scheduler.defaultPeriodMs).toBe(1000);
      expect(config.logging.level).toBe('info');
    });

    it('should read values from the config file', () => {
      const file = writeConfigFile(
        JSON.stringify({ scheduler: { defaultPeriodMs: 5000, signals: ['SIGTERM'] } })
      );

      const config = loadConfig(file);
      expect(config.scheduler).toEqual({
        defaultPeriodMs: 5000,
        truncateTime: true,
        signals: ['SIGTERM'],
      });
    });

    it('should let environment variables override the file', () => {
      const file = writeConfigFile(
        JSON.stringify({ scheduler: { defaultPeriodMs: 5000, truncateTime: true } })
      );
      process.env['CADENCE_DEFAULT_PERIOD_MS'] = '250';
      process.env['CADENCE_TRUNCATE_TIME'] = 'false';
      process.env['CADENCE_SIGNALS'] = 'SIGINT, SIGTERM';
      process.env['CADENCE_LOG_LEVEL'] = 'DEBUG';

      const config = loadConfig(file);
      expect(config.scheduler).toEqual({
        defaultPeriodMs: 250,
        truncateTime: false,
        signals: ['SIGINT', 'SIGTERM'],
      });
      expect(config.logging.level).toBe('debug');
    });

    it('should ignore a malformed config file', () => {
      const file = writeConfigFile('{ not json');
      expect(loadConfig(file).scheduler.defaultPeriodMs).toBe(1000);
    });

    it('should throw when the file holds invalid values', () => {
      const file = writeConfigFile(JSON.stringify({ scheduler: { defaultPeriodMs: -1 } }));
      expect(() => loadConfig(file)).toThrow(ConfigurationError);
    });

    it('should cache the loaded configuration until reset', () => {
      const file = writeConfigFile(JSON.stringify({ scheduler: { defaultPeriodMs: 750 } }));
      loadConfig(file);

      expect(getConfig().scheduler.defaultPeriodMs).toBe(750);
      expect(getSchedulerConfig().defaultPeriodMs).toBe(750);

      resetConfig();
      expect(loadConfig(path.join(tempDir, 'missing.json')).scheduler.defaultPeriodMs).toBe(1000);
    });
  });
});
