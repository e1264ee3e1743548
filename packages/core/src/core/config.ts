/**
 * Configuration Management for Cadence
 *
 * Provides centralized configuration with:
 * - Zod schema validation
 * - File-based configuration (~/.cadence/config.json)
 * - Environment variable overrides
 *
 * Configuration priority (highest to lowest):
 * 1. Environment variables
 * 2. Config file
 * 3. Default values
 */

import { z } from 'zod';
import path from 'path';
import os from 'os';
import fs from 'fs';
import { ConfigurationError } from './errors.js';
import { logger } from '../utils/logger.js';

// ============================================================================
// CONFIGURATION SCHEMA
// ============================================================================

/**
 * Scheduler defaults applied to jobs that do not override them
 */
const SchedulerConfigSchema = z.object({
  /** Period used when a job does not define period(), in milliseconds */
  defaultPeriodMs: z.number().positive().finite().default(1000),
  /** Whether jobs align runs to wall-clock multiples of their period by default */
  truncateTime: z.boolean().default(true),
  /** Process signals that make Scheduler.wait() shut down */
  signals: z.array(z.string().min(1)).min(1).default(['SIGINT']),
}).default({});

/**
 * Logging configuration
 */
const LoggingConfigSchema = z.object({
  /** Minimum log level */
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
}).default({});

/**
 * Main configuration schema combining all sections
 */
const ConfigSchema = z.object({
  scheduler: SchedulerConfigSchema,
  logging: LoggingConfigSchema,
});

export type CadenceConfig = z.infer<typeof ConfigSchema>;

// ============================================================================
// CONFIGURATION LOADING
// ============================================================================

let config: CadenceConfig | null = null;

type PartialCadenceConfig = {
  scheduler?: {
    defaultPeriodMs?: number;
    truncateTime?: boolean;
    signals?: string[];
  };
  logging?: {
    level?: string;
  };
};

/**
 * Load environment variable overrides
 */
function loadEnvConfig(): PartialCadenceConfig {
  const env: PartialCadenceConfig = {};

  const logLevel = process.env['CADENCE_LOG_LEVEL'];
  if (logLevel) {
    env.logging = { level: logLevel.toLowerCase() };
  }

  const scheduler: NonNullable<PartialCadenceConfig['scheduler']> = {};

  const periodMs = process.env['CADENCE_DEFAULT_PERIOD_MS'];
  if (periodMs) {
    const parsed = parseFloat(periodMs);
    if (!isNaN(parsed)) {
      scheduler.defaultPeriodMs = parsed;
    }
  }

  const truncate = process.env['CADENCE_TRUNCATE_TIME'];
  if (truncate) {
    scheduler.truncateTime = truncate.toLowerCase() === 'true';
  }

  const signals = process.env['CADENCE_SIGNALS'];
  if (signals) {
    scheduler.signals = signals
      .split(',')
      .map(s => s.trim())
      .filter(s => s.length > 0);
  }

  if (Object.keys(scheduler).length > 0) {
    env.scheduler = scheduler;
  }

  return env;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source taking precedence
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function parseConfig(raw: unknown): CadenceConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid Cadence configuration', {
      issues: parsed.error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return parsed.data;
}

/**
 * Load configuration from file and environment variables
 *
 * @param customPath - Optional custom path to config file
 * @returns Validated configuration object
 * @throws ConfigurationError if the merged configuration is invalid
 */
export function loadConfig(customPath?: string): CadenceConfig {
  if (config) return config;

  const configPath = customPath || path.join(os.homedir(), '.cadence', 'config.json');
  let fileConfig: Record<string, unknown> = {};

  if (fs.existsSync(configPath)) {
    try {
      const content: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
      if (isPlainObject(content)) {
        fileConfig = content;
      } else {
        logger.warn('Ignoring config file that is not a JSON object', { path: configPath });
      }
    } catch (error) {
      logger.warn('Failed to load config file', {
        path: configPath,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  const envConfig = loadEnvConfig();
  const mergedConfig = deepMerge(fileConfig, envConfig);

  config = parseConfig(mergedConfig);

  return config;
}

/**
 * Get the current configuration, loading it if necessary
 */
export function getConfig(): CadenceConfig {
  if (!config) {
    return loadConfig();
  }
  return config;
}

/**
 * Reset the configuration singleton (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

// ============================================================================
// CONFIGURATION ACCESSORS
// ============================================================================

export const getSchedulerConfig = () => getConfig().scheduler;

export const getLoggingConfig = () => getConfig().logging;

// ============================================================================
// CONFIGURATION VALIDATION
// ============================================================================

/**
 * Validate an unknown config object against the schema, applying defaults
 *
 * @throws ConfigurationError if validation fails
 */
export function validateConfig(configObj: unknown): CadenceConfig {
  return parseConfig(configObj);
}

export { ConfigSchema, SchedulerConfigSchema, LoggingConfigSchema };
