/**
 * Decides what should happen to a single instance.
 */

import type { Config, DiscoveredInstance, PowerControlReason } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import {
  checkSchedule,
  formatClockTime,
  getZonedClock,
  InvalidTimeZoneError,
  parseSchedule,
  type ZonedClock,
} from './schedule';

const logger = setupLogger('power-control:evaluator');

/**
 * Classify an instance.
 *
 * Checks run in order: running state, owner, protected owner, schedule syntax,
 * schedule time zone, then the schedule itself against the current time.
 *
 * @param instance - Discovered instance
 * @param config - Tool configuration (protected owners and default time zone)
 * @param now - Instant to evaluate the schedule at
 */
export function evaluateInstance(
  instance: DiscoveredInstance,
  config: Pick<Config, 'protectedOwners' | 'tz'>,
  now: Date
): PowerControlReason {
  const id = instance.instanceId;

  if (instance.state !== 'running') {
    logger.info({ instanceId: id, state: instance.state }, 'skip: not running');
    return 'NOT_RUNNING';
  }

  const owner = instance.owner;
  if (!owner) {
    logger.info({ instanceId: id }, 'skip: no owner to notify');
    return 'NO_OWNER';
  }

  if (config.protectedOwners.includes(owner)) {
    logger.info({ instanceId: id, owner }, 'skip: owner is protected');
    return 'PROTECTED_OWNER';
  }

  const schedule = parseSchedule(instance.runningSchedule);
  if (!schedule) {
    logger.info(
      { instanceId: id, runningSchedule: instance.runningSchedule },
      'skip: malformed RUNNINGSCHEDULE'
    );
    return 'MALFORMED';
  }

  const timeZone = instance.runningScheduleTz || config.tz;
  let clock: ZonedClock;
  try {
    clock = getZonedClock(now, timeZone);
  } catch (error) {
    if (error instanceof InvalidTimeZoneError) {
      logger.warn({ instanceId: id, timeZone }, 'skip: invalid RUNNINGSCHEDULE_TZ');
      return 'INVALID_ZONE';
    }
    throw error;
  }

  const fullSchedule = `${instance.runningSchedule} ${timeZone}`;
  const result = checkSchedule(schedule, clock);

  switch (result) {
    case 'DAY_MISMATCH':
      logger.warn(
        { instanceId: id, currentDay: clock.isoWeekday, schedule: fullSchedule },
        'stop: current day is outside RUNNINGSCHEDULE'
      );
      break;
    case 'TIME_MISMATCH':
      logger.warn(
        { instanceId: id, currentTime: formatClockTime(clock.secondsOfDay), schedule: fullSchedule },
        'stop: current time is outside RUNNINGSCHEDULE'
      );
      break;
    case 'ALLOWED':
      logger.info({ instanceId: id, schedule: fullSchedule }, 'skip: allowed at this day/time');
      break;
  }

  return result;
}
