/**
 * Hourly run loop used when IMMEDIATE is off.
 */

import { setTimeout as sleep } from 'timers/promises';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('power-control:scheduler');

/**
 * Milliseconds from `now` until the next UTC hh:`minute`:00.000 strictly after it.
 */
export function msUntilNextRun(now: Date, minute: number = 1): number {
  const next = new Date(now.getTime());
  next.setUTCMinutes(minute, 0, 0);
  if (next.getTime() <= now.getTime()) {
    next.setUTCHours(next.getUTCHours() + 1);
  }
  return next.getTime() - now.getTime();
}

/**
 * Run `job` at minute 1 of every hour until `signal` aborts.
 *
 * A failing job is logged and the loop keeps going.
 *
 * @param job - Work to run each hour
 * @param signal - Stops the loop, including while waiting
 * @param clock - Source of the current time
 */
export async function runHourly(
  job: () => Promise<unknown>,
  signal: AbortSignal,
  clock: () => Date = () => new Date()
): Promise<void> {
  while (!signal.aborted) {
    const delay = msUntilNextRun(clock());
    logger.info({ delayMs: delay }, 'Waiting for next scheduled run');

    try {
      await sleep(delay, undefined, { signal });
    } catch (error) {
      if (signal.aborted) {
        break;
      }
      throw error;
    }

    try {
      await job();
    } catch (error) {
      logger.error({ error: String(error) }, 'Scheduled run failed');
    }
  }

  logger.info('Scheduler stopped');
}
