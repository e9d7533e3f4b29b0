/**
 * Time utilities
 */

import { addDays, format, parseISO, subDays } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import { WEEKDAYS, type Weekday } from './config.js';
import type { DigestKind, TimeWindow } from '../types.js';

export interface Clock {
  now(): Date;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => new Date(),
  sleep: (ms: number) => new Promise(resolve => setTimeout(resolve, ms)),
};

export interface Recurrence {
  /** HH:MM in the schedule timezone */
  time: string;
  /** Absent for daily recurrences */
  weekday?: Weekday;
}

/**
 * First instant strictly after `after` matching the recurrence, in the
 * given IANA timezone.
 */
export function nextOccurrence(after: Date, recurrence: Recurrence, timezone: string): Date {
  let day = formatInTimeZone(after, timezone, 'yyyy-MM-dd');

  // A week and a day covers every weekday plus today's slot having passed.
  for (let i = 0; i < 8; i++) {
    const candidate = fromZonedTime(`${day}T${recurrence.time}:00`, timezone);
    const matchesDay = !recurrence.weekday || weekdayOf(candidate, timezone) === recurrence.weekday;
    if (matchesDay && candidate.getTime() > after.getTime()) {
      return candidate;
    }
    day = format(addDays(parseISO(day), 1), 'yyyy-MM-dd');
  }

  throw new Error(`No occurrence of ${recurrence.weekday ?? 'daily'} ${recurrence.time} found after ${after.toISOString()}`);
}

export function weekdayOf(date: Date, timezone: string): Weekday {
  // ISO day of week: 1 = Monday ... 7 = Sunday
  const iso = Number(formatInTimeZone(date, timezone, 'i'));
  return WEEKDAYS[iso % 7];
}

/**
 * Catalog window a digest of the given kind covers, ending at `end`.
 */
export function windowFor(kind: DigestKind, end: Date, lookbackDays: number): TimeWindow {
  const days = kind === 'weekly' ? 7 : lookbackDays;
  return { start: subDays(end, days), end };
}

export function isValidTimeZone(timezone: string): boolean {
  try {
    formatInTimeZone(new Date(0), timezone, 'yyyy');
    return true;
  } catch {
    return false;
  }
}

/**
 * Second-precision stamp used in artifact filenames.
 */
export function fileStamp(date: Date, timezone: string): string {
  return formatInTimeZone(date, timezone, 'yyyyMMdd_HHmmss');
}

export function formatDisplayDate(date: Date, timezone: string): string {
  return formatInTimeZone(date, timezone, 'EEEE, d MMMM yyyy');
}

export function formatDisplayDateTime(date: Date, timezone: string): string {
  return formatInTimeZone(date, timezone, 'd MMM yyyy, HH:mm zzz');
}
