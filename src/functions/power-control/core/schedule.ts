/**
 * RUNNINGSCHEDULE tag parsing and evaluation.
 *
 * A valid tag value has five colon-separated fields: `HH:MM:HH:MM:D-D`,
 * i.e. start time, stop time and an ISO weekday range (Monday = 1, Sunday = 7).
 * Example: `08:00:18:00:1-5` allows the instance to run 08:00-18:00 Monday to Friday.
 */

import type { RunningSchedule, TimeOfDay } from '@shared/types';

/**
 * Raised when a schedule names an IANA time zone the runtime does not know.
 */
export class InvalidTimeZoneError extends Error {
  constructor(
    readonly timeZone: string,
    options?: ErrorOptions
  ) {
    super(`Invalid time zone: ${timeZone}`, options);
    this.name = 'InvalidTimeZoneError';
  }
}

/**
 * Current day and time in a given zone.
 */
export interface ZonedClock {
  isoWeekday: number;
  secondsOfDay: number;
}

export type ScheduleCheck = 'ALLOWED' | 'DAY_MISMATCH' | 'TIME_MISMATCH';

const TWO_DIGITS = /^\d{2}$/;
const DAY_NUMBER = /^\d+$/;

const WEEKDAYS: Record<string, number> = {
  Mon: 1,
  Tue: 2,
  Wed: 3,
  Thu: 4,
  Fri: 5,
  Sat: 6,
  Sun: 7,
};

function parseTimeOfDay(hour: string, minute: string): TimeOfDay | null {
  if (!TWO_DIGITS.test(hour) || !TWO_DIGITS.test(minute)) {
    return null;
  }
  const h = Number(hour);
  const m = Number(minute);
  if (h > 23 || m > 59) {
    return null;
  }
  return { hour: h, minute: m };
}

function toMinutes(time: TimeOfDay): number {
  return time.hour * 60 + time.minute;
}

/**
 * Parse a RUNNINGSCHEDULE tag value.
 *
 * @returns The parsed schedule, or null when the value is malformed
 */
export function parseSchedule(value: string): RunningSchedule | null {
  const tokens = value.split(':');
  if (tokens.length !== 5) {
    return null;
  }

  const startTime = parseTimeOfDay(tokens[0], tokens[1]);
  const stopTime = parseTimeOfDay(tokens[2], tokens[3]);
  if (!startTime || !stopTime) {
    return null;
  }

  if (toMinutes(startTime) >= toMinutes(stopTime)) {
    return null;
  }

  const dayTokens = tokens[4].split('-');
  if (dayTokens.length !== 2) {
    return null;
  }

  const [first, last] = dayTokens.map((d) => d.trim());
  if (!DAY_NUMBER.test(first) || !DAY_NUMBER.test(last)) {
    return null;
  }

  const firstDay = Number(first);
  const lastDay = Number(last);
  if (lastDay < firstDay || firstDay < 1 || lastDay > 7) {
    return null;
  }

  return { startTime, stopTime, firstDay, lastDay };
}

/**
 * Check whether a time zone name is known to the runtime.
 */
export function isValidTimeZone(timeZone: string): boolean {
  if (!timeZone) {
    return false;
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve weekday and time of day for an instant in the given zone.
 *
 * @throws {InvalidTimeZoneError} If the zone is unknown
 */
export function getZonedClock(now: Date, timeZone: string): ZonedClock {
  let formatter: Intl.DateTimeFormat;
  try {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      weekday: 'short',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    });
  } catch (error) {
    throw new InvalidTimeZoneError(timeZone, { cause: error });
  }

  const parts: Record<string, string> = {};
  for (const part of formatter.formatToParts(now)) {
    parts[part.type] = part.value;
  }

  return {
    isoWeekday: WEEKDAYS[parts.weekday] ?? 0,
    secondsOfDay: Number(parts.hour) * 3600 + Number(parts.minute) * 60 + Number(parts.second),
  };
}

/**
 * Compare a clock reading against a schedule.
 *
 * The stop time is inclusive to the minute boundary: with a stop time of 18:00,
 * 18:00:00 is allowed and 18:00:01 is not.
 */
export function checkSchedule(schedule: RunningSchedule, clock: ZonedClock): ScheduleCheck {
  if (clock.isoWeekday < schedule.firstDay || clock.isoWeekday > schedule.lastDay) {
    return 'DAY_MISMATCH';
  }

  const start = toMinutes(schedule.startTime) * 60;
  const stop = toMinutes(schedule.stopTime) * 60;
  if (clock.secondsOfDay < start || clock.secondsOfDay > stop) {
    return 'TIME_MISMATCH';
  }

  return 'ALLOWED';
}

/**
 * Format seconds since midnight as `HH:MM`.
 */
export function formatClockTime(secondsOfDay: number): string {
  const hours = Math.floor(secondsOfDay / 3600);
  const minutes = Math.floor((secondsOfDay % 3600) / 60);
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}
