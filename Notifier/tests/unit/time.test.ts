import { describe, it, expect } from 'vitest';
import {
  formatDuration,
  formatLocal,
  isAtOrAfter,
  isValidTimeZone,
  isWeekday,
  localDateKey,
  localDayBounds,
  minutesUntil,
  parseClockTime,
  zonedTimeToUtc,
} from '../../src/utils/time.js';

describe('localDayBounds', () => {
  it('should return the local day in UTC', () => {
    const { start, end } = localDayBounds(new Date('2026-01-15T12:00:00Z'), 'Europe/Berlin');

    expect(start.toISOString()).toBe('2026-01-14T23:00:00.000Z');
    expect(end.toISOString()).toBe('2026-01-15T23:00:00.000Z');
  });

  it('should handle the day clocks move forward', () => {
    const { start, end } = localDayBounds(new Date('2026-03-29T12:00:00Z'), 'Europe/Berlin');

    expect(start.toISOString()).toBe('2026-03-28T23:00:00.000Z');
    expect(end.toISOString()).toBe('2026-03-29T22:00:00.000Z');
  });
});

describe('zonedTimeToUtc', () => {
  it('should convert summer wall-clock time', () => {
    const date = zonedTimeToUtc({ year: 2026, month: 7, day: 15, hour: 9, minute: 0 }, 'Europe/Berlin');

    expect(date.toISOString()).toBe('2026-07-15T07:00:00.000Z');
  });
});

describe('local calendar helpers', () => {
  it('should use the local date, not the UTC date', () => {
    const lateEvening = new Date('2026-10-19T22:30:00Z');

    expect(localDateKey(lateEvening, 'UTC')).toBe('2026-10-19');
    expect(localDateKey(lateEvening, 'Europe/Berlin')).toBe('2026-10-20');
    expect(formatLocal(lateEvening, 'Europe/Berlin')).toBe('2026-10-20 00:30');
  });

  it('should treat Monday to Friday as weekdays in the local zone', () => {
    const fridayNightUtc = new Date('2026-10-23T23:30:00Z');

    expect(isWeekday(fridayNightUtc, 'UTC')).toBe(true);
    expect(isWeekday(fridayNightUtc, 'Europe/Berlin')).toBe(false);
    expect(isWeekday(new Date('2026-10-25T12:00:00Z'), 'UTC')).toBe(false);
    expect(isWeekday(new Date('2026-10-19T12:00:00Z'), 'UTC')).toBe(true);
  });

  it('should compare wall-clock times', () => {
    const time = { hour: 9, minute: 30 };

    expect(isAtOrAfter(new Date('2026-10-19T09:29:59Z'), 'UTC', time)).toBe(false);
    expect(isAtOrAfter(new Date('2026-10-19T09:30:00Z'), 'UTC', time)).toBe(true);
    expect(isAtOrAfter(new Date('2026-10-19T07:30:00Z'), 'Europe/Berlin', time)).toBe(true);
  });
});

describe('parseClockTime', () => {
  it('should parse HH:MM', () => {
    expect(parseClockTime('9:05')).toEqual({ hour: 9, minute: 5 });
    expect(parseClockTime('23:59')).toEqual({ hour: 23, minute: 59 });
  });

  it('should reject malformed or out of range values', () => {
    expect(parseClockTime('24:00')).toBeNull();
    expect(parseClockTime('09:60')).toBeNull();
    expect(parseClockTime('nine')).toBeNull();
  });
});

describe('durations', () => {
  it('should format H:MM and floor minutes', () => {
    const start = new Date('2026-10-19T10:00:00Z');

    expect(formatDuration(start, new Date('2026-10-19T11:30:59Z'))).toBe('1:30');
    expect(formatDuration(start, new Date('2026-10-19T09:00:00Z'))).toBe('0:00');
    expect(minutesUntil(start, new Date('2026-10-19T10:09:59Z'))).toBe(9);
    expect(minutesUntil(start, new Date('2026-10-19T09:00:00Z'))).toBe(0);
  });
});

describe('isValidTimeZone', () => {
  it('should accept IANA zones only', () => {
    expect(isValidTimeZone('Europe/Berlin')).toBe(true);
    expect(isValidTimeZone('Mars/Base')).toBe(false);
  });
});
