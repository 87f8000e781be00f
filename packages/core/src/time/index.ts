/**
 * @schoolbell/core - Local calendar day helpers
 *
 * Every "same day" / "start of today" decision goes through `localDay` so the
 * task buckets and class views agree on day boundaries. Ordering and
 * containment checks compare absolute instants.
 */

import { DateTime } from 'luxon';

export const MS_PER_MINUTE = 60_000;
export const MS_PER_DAY = 86_400_000;

/** A calendar day in a specific zone. `end` is the start of the next day. */
export interface LocalDay {
  /** yyyy-MM-dd */
  date: string;
  start: Date;
  end: Date;
  zone: string;
}

/**
 * The local calendar day containing `instant` in `zone`.
 */
export function localDay(instant: Date, zone: string): LocalDay {
  const local = DateTime.fromJSDate(instant, { zone });
  const start = local.startOf('day');
  return {
    date: start.toISODate() ?? '',
    start: start.toJSDate(),
    end: start.plus({ days: 1 }).toJSDate(),
    zone,
  };
}

export function isSameLocalDay(a: Date, b: Date, zone: string): boolean {
  return localDay(a, zone).date === localDay(b, zone).date;
}

/**
 * Move `instant` by whole local days, keeping wall-clock time across DST changes.
 */
export function addLocalDays(instant: Date, days: number, zone: string): Date {
  return DateTime.fromJSDate(instant, { zone }).plus({ days }).toJSDate();
}

/**
 * ISO-8601 rendering of `instant` with the zone's offset.
 */
export function toLocalIso(instant: Date, zone: string): string {
  return DateTime.fromJSDate(instant, { zone }).toISO() ?? instant.toISOString();
}

/**
 * Format an instant's wall-clock time in `zone` with a luxon pattern.
 */
export function formatLocal(instant: Date, zone: string, pattern: string): string {
  return DateTime.fromJSDate(instant, { zone }).toFormat(pattern);
}

/** Whole minutes from `from` to `to`, rounded up. */
export function ceilMinutes(from: Date, to: Date): number {
  return Math.ceil((to.getTime() - from.getTime()) / MS_PER_MINUTE);
}

/** Whole days from `from` to `to`, rounded up. */
export function ceilDays(from: Date, to: Date): number {
  return Math.ceil((to.getTime() - from.getTime()) / MS_PER_DAY);
}

/** Whole days from `from` to `to`, rounded down. */
export function floorDays(from: Date, to: Date): number {
  return Math.floor((to.getTime() - from.getTime()) / MS_PER_DAY);
}

/**
 * Parse an ISO-8601 timestamp. Strings without an offset are read as UTC.
 * Returns null for anything luxon cannot parse.
 */
export function parseInstant(value: string): Date | null {
  const parsed = DateTime.fromISO(value, { zone: 'utc', setZone: true });
  return parsed.isValid ? parsed.toJSDate() : null;
}
