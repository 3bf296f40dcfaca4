import { DateTime } from 'luxon';

import { config } from '@config/env.config';

export const DAY_KEY_FORMAT = 'yyyy-LL-dd';
export const DISPLAY_DATE_FORMAT = 'dd.LL.yyyy';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function serviceZone(): string {
  return config.TIMEZONE;
}

export function nowIn(tz: string, clock: Clock = systemClock): DateTime {
  return DateTime.fromJSDate(clock(), { zone: tz });
}

export function todayKey(tz: string, clock: Clock = systemClock): string {
  return nowIn(tz, clock).toFormat(DAY_KEY_FORMAT);
}

export function dayStart(dayKey: string, tz: string): DateTime {
  const dt = DateTime.fromFormat(dayKey, DAY_KEY_FORMAT, { zone: tz });
  if (!dt.isValid) throw new Error(`Invalid day key: ${dayKey}`);
  return dt.startOf('day');
}

export function addDays(dayKey: string, days: number, tz: string): string {
  return dayStart(dayKey, tz).plus({ days }).toFormat(DAY_KEY_FORMAT);
}

/** Inclusive list of day keys from start to end; empty when end precedes start. */
export function dayKeysBetween(startKey: string, endKey: string, tz: string): string[] {
  const out: string[] = [];
  let cursor = dayStart(startKey, tz);
  const end = dayStart(endKey, tz);
  while (cursor <= end) {
    out.push(cursor.toFormat(DAY_KEY_FORMAT));
    cursor = cursor.plus({ days: 1 });
  }
  return out;
}

export function diffInDays(startKey: string, endKey: string, tz: string): number {
  return Math.round(dayStart(endKey, tz).diff(dayStart(startKey, tz), 'days').days);
}

/** Parses user input in dd.MM.yyyy form into a day key. */
export function parseDisplayDate(input: string, tz: string): string | null {
  const dt = DateTime.fromFormat(input.trim(), DISPLAY_DATE_FORMAT, { zone: tz });
  return dt.isValid ? dt.toFormat(DAY_KEY_FORMAT) : null;
}

export function parseDayKey(input: string, tz: string): string | null {
  const dt = DateTime.fromFormat(input.trim(), DAY_KEY_FORMAT, { zone: tz });
  return dt.isValid ? dt.toFormat(DAY_KEY_FORMAT) : null;
}

export function formatDayKey(dayKey: string, format = DISPLAY_DATE_FORMAT): string {
  const dt = DateTime.fromFormat(dayKey, DAY_KEY_FORMAT);
  return dt.isValid ? dt.toFormat(format) : dayKey;
}

export function formatTimestamp(date: Date, tz: string): string {
  return DateTime.fromJSDate(date, { zone: tz }).toFormat('dd.LL.yyyy HH:mm');
}

/** Parses "HH:MM"; returns null on anything else. */
export function parseClockTime(value: string): { hour: number; minute: number } | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) return null;
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return null;
  return { hour, minute };
}

/** Milliseconds until the next wall-clock occurrence of hour:minute in tz (strictly in the future). */
export function msUntilNext(
  time: { hour: number; minute: number },
  tz: string,
  clock: Clock = systemClock,
): number {
  const now = nowIn(tz, clock);
  let next = now.set({ hour: time.hour, minute: time.minute, second: 0, millisecond: 0 });
  if (next <= now) {
    next = next.plus({ days: 1 });
  }
  return next.toMillis() - now.toMillis();
}
