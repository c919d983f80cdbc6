/**
 * Telegram message builders (HTML parse mode). Pure functions over cached items.
 */

import type { Appointment, AppointmentData, MailData } from '../types/notifier.js';
import { containsKeyword } from './preview.js';
import {
  formatDuration,
  formatLocal,
  formatLocalDay,
  getZonedParts,
  minutesUntil,
  zonedTimeToUtc,
} from '../utils/time.js';

const NO_SUBJECT = '(no subject)';
const WORKDAY_START_HOUR = 9;

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

function oneLine(text: string): string {
  return text.replace(/\s*\n\s*/g, ' ').trim();
}

export interface MailFormatOptions {
  timeZone: string;
  keywords: readonly string[];
  mentionText: string;
}

export interface FormattedMail {
  text: string;
  mentioned: boolean;
}

export function buildAppointmentMessage(appointment: AppointmentData, timeZone: string, now: Date): string {
  const subject = escapeHtml(oneLine(appointment.subject) || NO_SUBJECT);
  const header =
    appointment.startTime.getTime() <= now.getTime()
      ? `🔔 Now: ${subject}`
      : `🔔 In ${minutesUntil(now, appointment.startTime)} min: ${subject}`;

  const durationMinutes = minutesUntil(appointment.startTime, appointment.endTime);
  const lines = [
    `<b>${header}</b>`,
    `Organizer: <b>${escapeHtml(appointment.organizer || '-')}</b>`,
    `Start: ${formatLocalDay(appointment.startTime, timeZone)} ${formatLocal(appointment.startTime, timeZone, false)}`,
    `Duration: ${durationMinutes} min`,
  ];

  const location = appointment.location.trim();
  if (appointment.joinUrl) {
    lines.push(`Link: ${escapeHtml(appointment.joinUrl)}`);
  } else if (location) {
    lines.push(`Location: ${escapeHtml(location)}`);
  }
  return lines.join('\n');
}

export function buildMailMessage(mail: MailData, options: MailFormatOptions): FormattedMail {
  const subject = mail.subject || NO_SUBJECT;
  const mentioned = containsKeyword(`${subject}\n${mail.preview}`, options.keywords);

  const lines = [
    `<b>${escapeHtml(subject)}</b>`,
    `From: ${escapeHtml(mail.sender || '-')}`,
    `Sent: ${formatLocal(mail.receivedTime, options.timeZone)}`,
  ];
  if (mail.preview) {
    lines.push('', `<i>${escapeHtml(mail.preview)}</i>`);
  }

  let text = lines.join('\n');
  if (mentioned) {
    text = `‼️${text}`;
    const mention = options.mentionText.trim();
    if (mention) {
      text = `${text}\n${escapeHtml(mention)}`;
    }
  }
  return { text, mentioned };
}

function freeWindowLine(start: Date, end: Date, timeZone: string): string {
  return `› <b>Free</b>: from ${formatLocal(start, timeZone, false)}, ${formatDuration(start, end)}`;
}

/**
 * Today's appointments in start order, with the free windows between them.
 */
export function buildTodayList(appointments: readonly AppointmentData[], timeZone: string, now: Date): string {
  const header = `<b>Today ${formatLocalDay(now, timeZone)}</b>`;
  const sorted = [...appointments].sort((a, b) => a.startTime.getTime() - b.startTime.getTime());
  if (sorted.length === 0) {
    return `${header}\nNo appointments today`;
  }

  const lines = [header];
  const first = sorted[0];
  const firstDay = getZonedParts(first.startTime, timeZone);
  const workdayStart = zonedTimeToUtc(
    { year: firstDay.year, month: firstDay.month, day: firstDay.day, hour: WORKDAY_START_HOUR, minute: 0 },
    timeZone,
  );
  if (workdayStart.getTime() < first.startTime.getTime()) {
    lines.push(freeWindowLine(workdayStart, first.startTime, timeZone));
  }

  // Latest end so far, so a short meeting inside a long one opens no window
  let busyUntil = first.endTime;
  sorted.forEach((item, index) => {
    const subject = escapeHtml(oneLine(item.subject) || NO_SUBJECT);
    lines.push(
      `‣ ${subject}, ${formatLocal(item.startTime, timeZone, false)}, ${formatDuration(item.startTime, item.endTime)}`,
    );
    if (item.endTime.getTime() > busyUntil.getTime()) busyUntil = item.endTime;
    const next = sorted[index + 1];
    if (next && busyUntil.getTime() < next.startTime.getTime()) {
      lines.push(freeWindowLine(busyUntil, next.startTime, timeZone));
    }
  });
  return lines.join('\n');
}

/**
 * Cached unread mail, newest first.
 */
export function buildCheckList(mails: readonly MailData[], timeZone: string): string {
  if (mails.length === 0) {
    return '<b>Unread mail: 0</b>\nNo unread mail';
  }
  const sorted = [...mails].sort((a, b) => b.receivedTime.getTime() - a.receivedTime.getTime());
  const lines = [`<b>Unread mail: ${sorted.length}</b>`];
  for (const mail of sorted) {
    const subject = escapeHtml(oneLine(mail.subject) || NO_SUBJECT);
    const sender = escapeHtml(mail.sender || '-');
    lines.push(`• ${formatLocal(mail.receivedTime, timeZone)} ${sender}: ${subject}`);
  }
  return lines.join('\n');
}

/**
 * Group appointments whose time ranges intersect (transitively).
 */
export function findOverlaps<T extends AppointmentData>(appointments: readonly T[]): T[][] {
  const sorted = [...appointments].sort((a, b) => a.startTime.getTime() - b.startTime.getTime());
  const groups: T[][] = [];
  let current: T[] = [];
  let currentEnd = 0;

  for (const item of sorted) {
    if (current.length > 0 && item.startTime.getTime() < currentEnd) {
      current.push(item);
      currentEnd = Math.max(currentEnd, item.endTime.getTime());
      continue;
    }
    if (current.length > 1) groups.push(current);
    current = [item];
    currentEnd = item.endTime.getTime();
  }
  if (current.length > 1) groups.push(current);
  return groups;
}

/**
 * Minutes during which at least two appointments of the group run at once.
 */
export function overlapMinutes(group: readonly AppointmentData[]): number {
  const events: Array<[number, number]> = [];
  for (const item of group) {
    if (item.endTime.getTime() <= item.startTime.getTime()) continue;
    events.push([item.startTime.getTime(), 1], [item.endTime.getTime(), -1]);
  }
  // Ends sort before starts at the same instant, so back-to-back meetings don't overlap
  events.sort((a, b) => a[0] - b[0] || a[1] - b[1]);

  let active = 0;
  let last: number | null = null;
  let overlapMs = 0;
  for (const [moment, delta] of events) {
    if (last !== null && active >= 2) overlapMs += moment - last;
    active += delta;
    last = moment;
  }
  return Math.floor(overlapMs / 60_000);
}

export function buildOverlapList(appointments: readonly Appointment[], timeZone: string): string {
  const groups = findOverlaps(appointments);
  const lines = [`<b>Overlaps: ${groups.length}</b>`];
  groups.forEach((group, index) => {
    lines.push('', `<b>Overlap ${index + 1}:</b> ${overlapMinutes(group)} min`);
    for (const item of group) {
      const subject = escapeHtml(oneLine(item.subject) || NO_SUBJECT);
      lines.push(`${subject}, ${formatLocal(item.startTime, timeZone, false)}, ${formatDuration(item.startTime, item.endTime)}`);
    }
  });
  return lines.join('\n');
}
