/**
 * Season and as-of date helpers (Luxon, timezone-aware).
 */

import { DateTime, IANAZone } from 'luxon';

/** Regular seasons tip off in October */
const SEASON_START_MONTH = 10;

export const SEASON_LABEL_PATTERN = /^\d{4}-\d{2}$/;

export function isValidTimezone(timezone: string): boolean {
  return IANAZone.isValidZone(timezone);
}

/**
 * Season label for a date: October 2023 through September 2024 is "2023-24".
 */
export function seasonForDate(date: DateTime): string {
  const startYear = date.month >= SEASON_START_MONTH ? date.year : date.year - 1;
  const endYear = String((startYear + 1) % 100).padStart(2, '0');
  return `${startYear}-${endYear}`;
}

export function currentSeason(timezone: string, now: Date = new Date()): string {
  return seasonForDate(DateTime.fromJSDate(now, { zone: timezone }));
}

/**
 * The card footer date, e.g. "2024-02-14", in the card's timezone.
 */
export function formatAsOfDate(now: Date, timezone: string): string {
  return DateTime.fromJSDate(now, { zone: timezone }).toFormat('yyyy-LL-dd');
}
