#!/usr/bin/env node

/**
 * Cadence CLI
 *
 * Usage:
 *   cadence heartbeat [--period <ms>] [--no-truncate]  - Beat until Ctrl+C
 *   cadence config show                                - Print effective configuration
 *   cadence help                                       - Show usage
 */

import path from 'path';
import os from 'os';
import { getConfig, getLoggingConfig } from './core/config.js';
import { HeartbeatJob } from './jobs/HeartbeatJob.js';
import { Scheduler } from './jobs/Scheduler.js';
import { createLogger } from './utils/logger.js';

const command = process.argv[2];
const args = process.argv.slice(3);

interface HeartbeatArgs {
  period?: number;
  truncateTime?: boolean;
}

function parseHeartbeatArgs(argv: string[]): HeartbeatArgs {
  const parsed: HeartbeatArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--no-truncate') {
      parsed.truncateTime = false;
    } else if (arg === '--period') {
      const value = Number(argv[++i]);
      if (!Number.isFinite(value) || value <= 0) {
        throw new Error('--period expects a positive number of milliseconds');
      }
      parsed.period = value;
    } else {
      throw new Error(`Unknown option: ${arg}`);
    }
  }

  return parsed;
}

async function main() {
  switch (command) {
    case 'heartbeat': {
      const options = parseHeartbeatArgs(args);
      const log = createLogger('cadence:heartbeat', getLoggingConfig().level);
      const job = new HeartbeatJob(log, options);

      const scheduler = new Scheduler().spawn(job);
      await scheduler.wait();
      console.log(`\n  Stopped after ${job.count} beats.\n`);
      break;
    }

    case 'config': {
      if (args[0] !== 'show') {
        console.log('\n  Usage: cadence config show\n');
        break;
      }
      console.log('\n  Cadence Configuration\n');
      console.log(JSON.stringify(getConfig(), null, 2));
      console.log(`\n  Config file: ${path.join(os.homedir(), '.cadence', 'config.json')}\n`);
      break;
    }

    case 'help':
    default:
      console.log(`
  Cadence CLI - periodic jobs with graceful shutdown

  Usage: cadence <command> [options]

  Commands:
    heartbeat            Log a heartbeat every period until Ctrl+C
      --period <ms>      Interval between beats (default: 1000)
      --no-truncate      Count periods from start instead of wall-clock boundaries
    config show          Display current configuration
    help                 Show this message

  Environment:
    CADENCE_LOG_LEVEL            debug | info | warn | error
    CADENCE_DEFAULT_PERIOD_MS    Period for jobs without period()
    CADENCE_TRUNCATE_TIME        true | false
    CADENCE_SIGNALS              Comma-separated shutdown signals (default: SIGINT)
`);
  }
}

main().catch((error) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
