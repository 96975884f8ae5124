/**
 * Scheduler: a node-cron job that runs discovery cycles.
 * Started by `feedscout watch`.
 */

import cron from 'node-cron';
import type { Config } from '../shared/config.js';
import { logger } from '../shared/logger.js';
import { ConfigError, toErrorInfo } from '../shared/errors.js';

let discoveryTask: cron.ScheduledTask | null = null;
let running = false;

/**
 * Run the job once unless a previous run is still going.
 * Returns false when the tick was skipped.
 */
export async function runExclusive(job: () => Promise<void>): Promise<boolean> {
  if (running) {
    logger.warn('Previous discovery cycle still running, skipping this tick');
    return false;
  }
  running = true;
  try {
    await job();
  } catch (e) {
    logger.error({ error: toErrorInfo(e).message }, 'Scheduled discovery failed');
  } finally {
    running = false;
  }
  return true;
}

export function startScheduler(config: Config, job: () => Promise<void>): void {
  const expression = config.schedule.cron;
  if (!cron.validate(expression)) {
    throw new ConfigError(`Invalid schedule.cron expression: ${expression}`, { cron: expression });
  }

  stopScheduler();
  discoveryTask = cron.schedule(expression, () => {
    void runExclusive(job);
  });

  logger.info({ cron: expression }, 'Scheduler started');
}

export function stopScheduler(): void {
  if (!discoveryTask) return;
  discoveryTask.stop();
  discoveryTask = null;
  logger.info('Scheduler stopped');
}
