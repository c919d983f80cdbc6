/**
 * Time zone helpers built on Intl (no Temporal on Node 20).
 */

export interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  /** 0 = Sunday … 6 = Saturday */
  weekday: number;
}

export interface ClockTime {
  hour: number;
  minute: number;
}

const WEEKDAYS: Record<string, number> = {
  Sun: 0,
  Mon: 1,
  Tue: 2,
  Wed: 3,
  Thu: 4,
  Fri: 5,
  Sat: 6,
};

const formatters = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      weekday: 'short',
      hourCycle: 'h23',
    });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone }).format();
    return true;
  } catch {
    return false;
  }
}

export function getZonedParts(date: Date, timeZone: string): ZonedParts {
  const lookup: Record<string, string> = {};
  for (const part of getFormatter(timeZone).formatToParts(date)) {
    if (part.type !== 'literal') lookup[part.type] = part.value;
  }
  return {
    year: Number(lookup.year),
    month: Number(lookup.month),
    day: Number(lookup.day),
    hour: Number(lookup.hour),
    minute: Number(lookup.minute),
    weekday: WEEKDAYS[lookup.weekday ?? ''] ?? 0,
  };
}

/** Local calendar date as YYYY-MM-DD */
export function localDateKey(date: Date, timeZone: string): string {
  const p = getZonedParts(date, timeZone);
  return `${p.year}-${pad2(p.month)}-${pad2(p.day)}`;
}

export function isWeekday(date: Date, timeZone: string): boolean {
  const { weekday } = getZonedParts(date, timeZone);
  return weekday >= 1 && weekday <= 5;
}

/**
 * Convert a wall-clock time in `timeZone` to a UTC instant.
 * Corrects the guess against the zone's offset until it matches.
 */
export function zonedTimeToUtc(
  local: { year: number; month: number; day: number; hour: number; minute: number },
  timeZone: string,
): Date {
  const desired = Date.UTC(local.year, local.month - 1, local.day, local.hour, local.minute);
  let guess = desired;
  for (let i = 0; i < 4; i++) {
    const got = getZonedParts(new Date(guess), timeZone);
    const gotMs = Date.UTC(got.year, got.month - 1, got.day, got.hour, got.minute);
    const diff = desired - gotMs;
    if (diff === 0) break;
    guess += diff;
  }
  return new Date(guess);
}

/**
 * UTC bounds [start, end) of the local calendar day containing `date`.
 */
export function localDayBounds(date: Date, timeZone: string): { start: Date; end: Date } {
  const p = getZonedParts(date, timeZone);
  // Noon avoids DST edges when stepping to the next calendar day
  const next = new Date(Date.UTC(p.year, p.month - 1, p.day, 12));
  next.setUTCDate(next.getUTCDate() + 1);
  return {
    start: zonedTimeToUtc({ year: p.year, month: p.month, day: p.day, hour: 0, minute: 0 }, timeZone),
    end: zonedTimeToUtc(
      {
        year: next.getUTCFullYear(),
        month: next.getUTCMonth() + 1,
        day: next.getUTCDate(),
        hour: 0,
        minute: 0,
      },
      timeZone,
    ),
  };
}

/** `YYYY-MM-DD HH:MM` or `HH:MM` in the given zone */
export function formatLocal(date: Date, timeZone: string, withDate = true): string {
  const p = getZonedParts(date, timeZone);
  const time = `${pad2(p.hour)}:${pad2(p.minute)}`;
  if (!withDate) return time;
  return `${p.year}-${pad2(p.month)}-${pad2(p.day)} ${time}`;
}

/** `DD.MM.YYYY` in the given zone */
export function formatLocalDay(date: Date, timeZone: string): string {
  const p = getZonedParts(date, timeZone);
  return `${pad2(p.day)}.${pad2(p.month)}.${p.year}`;
}

/** Duration as `H:MM`, negative spans count as zero */
export function formatDuration(start: Date, end: Date): string {
  const totalMinutes = Math.max(0, Math.floor((end.getTime() - start.getTime()) / 60_000));
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${hours}:${pad2(minutes)}`;
}

/** Whole minutes from `from` to `to`, never negative */
export function minutesUntil(from: Date, to: Date): number {
  return Math.max(0, Math.floor((to.getTime() - from.getTime()) / 60_000));
}

/** Parse `HH:MM` (24h). Returns null when malformed or out of range. */
export function parseClockTime(value: string): ClockTime | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) return null;
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return null;
  return { hour, minute };
}

/** Whether the local wall-clock time of `date` is at or after `time` */
export function isAtOrAfter(date: Date, timeZone: string, time: ClockTime): boolean {
  const p = getZonedParts(date, timeZone);
  return p.hour * 60 + p.minute >= time.hour * 60 + time.minute;
}
