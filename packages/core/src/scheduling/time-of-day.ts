/**
 * Local time-of-day arithmetic for daily triggers
 *
 * All dates are interpreted in the process time zone (TZ).
 */

import { ConfigurationError } from '../errors.js';

export interface TimeOfDay {
  hours: number;
  minutes: number;
}

const TIME_OF_DAY = /^([01]\d|2[0-3]):([0-5]\d)$/;

export function parseTimeOfDay(value: string): TimeOfDay {
  const match = TIME_OF_DAY.exec(value.trim());
  if (!match) {
    throw new ConfigurationError(`Invalid time of day "${value}"`, ['expected HH:MM']);
  }
  return { hours: Number(match[1]), minutes: Number(match[2]) };
}

export function isWeekday(date: Date): boolean {
  const day = date.getDay();
  return day !== 0 && day !== 6;
}

/**
 * First instant strictly after `from` that falls on `timeOfDay`, skipping
 * Saturdays and Sundays when weekdaysOnly is set.
 */
export function nextDailyRun(from: Date, timeOfDay: string, weekdaysOnly: boolean): Date {
  const { hours, minutes } = parseTimeOfDay(timeOfDay);
  const candidate = new Date(
    from.getFullYear(),
    from.getMonth(),
    from.getDate(),
    hours,
    minutes,
    0,
    0
  );

  if (candidate.getTime() <= from.getTime()) {
    candidate.setDate(candidate.getDate() + 1);
  }
  while (weekdaysOnly && !isWeekday(candidate)) {
    candidate.setDate(candidate.getDate() + 1);
  }
  return candidate;
}
