import { describe, it, expect } from 'vitest';

import { ConfigurationError } from '../../errors.js';
import { isWeekday, nextDailyRun, parseTimeOfDay } from '../time-of-day.js';

// 2 March 2026 is a Monday; all dates below are local time
const monday = (hours: number, minutes = 0) => new Date(2026, 2, 2, hours, minutes);

describe('parseTimeOfDay', () => {
  it('parses 24-hour times', () => {
    expect(parseTimeOfDay('08:30')).toEqual({ hours: 8, minutes: 30 });
    expect(parseTimeOfDay('23:59')).toEqual({ hours: 23, minutes: 59 });
  });

  it('rejects anything else', () => {
    expect(() => parseTimeOfDay('8:30')).toThrow(ConfigurationError);
    expect(() => parseTimeOfDay('24:00')).toThrow('Invalid time of day "24:00": expected HH:MM');
  });
});

describe('isWeekday', () => {
  it('excludes Saturday and Sunday', () => {
    expect(isWeekday(new Date(2026, 2, 6))).toBe(true);
    expect(isWeekday(new Date(2026, 2, 7))).toBe(false);
    expect(isWeekday(new Date(2026, 2, 8))).toBe(false);
  });
});

describe('nextDailyRun', () => {
  it('returns later the same day', () => {
    expect(nextDailyRun(monday(8), '08:30', false)).toEqual(monday(8, 30));
  });

  it('moves to the next day once the time has passed', () => {
    expect(nextDailyRun(monday(9), '08:30', false)).toEqual(new Date(2026, 2, 3, 8, 30));
  });

  it('is strictly after the reference instant', () => {
    expect(nextDailyRun(monday(8, 30), '08:30', false)).toEqual(new Date(2026, 2, 3, 8, 30));
  });

  it('skips the weekend when weekdaysOnly is set', () => {
    const fridayEvening = new Date(2026, 2, 6, 18, 30);

    expect(nextDailyRun(fridayEvening, '08:30', true)).toEqual(new Date(2026, 2, 9, 8, 30));
    expect(nextDailyRun(fridayEvening, '08:30', false)).toEqual(new Date(2026, 2, 7, 8, 30));
  });
});
