import { TZDate } from '@date-fns/tz';
import { addDays, startOfDay, subDays } from 'date-fns';

export const DEFAULT_TIME_ZONE = 'Asia/Ho_Chi_Minh';

export const DAY_MS = 24 * 60 * 60 * 1000;

const NAIVE_DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

export interface DayBounds {
  start: Date;
  end: Date;
}

function isKnownTimeZone(name: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: name });
    return true;
  } catch (err) {
    if (err instanceof RangeError) return false;
    throw err;
  }
}

/**
 * Resolve a configured IANA zone name, falling back to the default zone
 * when it is unset or not recognized by the runtime.
 */
export function resolveTimeZone(name: string | undefined | null): string {
  const candidate = (name ?? '').trim();
  if (!candidate) return DEFAULT_TIME_ZONE;
  if (!isKnownTimeZone(candidate)) {
    console.warn(`[Config] Unknown time zone "${candidate}", using ${DEFAULT_TIME_ZONE}`);
    return DEFAULT_TIME_ZONE;
  }
  return candidate;
}

/**
 * Half-open [start, end) bounds of the local calendar day containing `target`.
 */
export function dayBounds(target: Date, timeZone: string): DayBounds {
  const start = startOfDay(new TZDate(target.getTime(), timeZone));
  const end = addDays(start, 1);
  return { start: new Date(start.getTime()), end: new Date(end.getTime()) };
}

export function todayBounds(now: Date, timeZone: string): DayBounds {
  return dayBounds(now, timeZone);
}

export function yesterdayBounds(now: Date, timeZone: string): DayBounds {
  const todayStart = startOfDay(new TZDate(now.getTime(), timeZone));
  const start = subDays(todayStart, 1);
  return { start: new Date(start.getTime()), end: new Date(todayStart.getTime()) };
}

/**
 * Parse a stored or imported timestamp. Returns null when the value is not
 * a usable date.
 */
export function parseTimestamp(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === 'string' && value.trim()) {
    const text = value.trim();
    // Zone-less date-times are UTC, not host-local
    const parsed = new Date(NAIVE_DATE_TIME.test(text) ? `${text}Z` : text);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    // Epochs past +-8.64e15 ms give an Invalid Date
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  return null;
}

export function toIso(date: Date): string {
  return date.toISOString();
}

export function addDaysExact(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}
