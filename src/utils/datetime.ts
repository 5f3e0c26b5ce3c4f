/**
 * Date/Time utilities using Luxon
 */

import { DateTime, Duration } from 'luxon';
import type { TimeOfDayWindow } from '../types/index.js';
import { invalidInputError } from './error.js';

/**
 * Formats accepted for availability timestamps besides ISO 8601 and SQL
 */
const EXTRA_TIMESTAMP_FORMATS = [
  'M/d/yyyy H:mm',
  'M/d/yyyy H:mm:ss',
  'M/d/yyyy h:mm a',
  'M/d/yyyy h:mm:ss a',
  'M/d/yy H:mm',
  'M/d/yy h:mm a',
];

const TIME_OF_DAY_PATTERN = /^(\d{2}):(\d{2})$/;

/**
 * Parse an ISO datetime string to Luxon DateTime
 *
 * If timezone is provided, naive datetime strings (without offset or Z suffix)
 * are interpreted as being in that timezone. Strings with explicit offsets
 * keep their instant and are converted to the requested timezone.
 */
export function parseDateTime(isoString: string, timezone?: string): DateTime {
  const dt = timezone
    ? DateTime.fromISO(isoString, { zone: timezone })
    : DateTime.fromISO(isoString);
  if (!dt.isValid) {
    throw invalidInputError(`Invalid datetime: ${isoString}`, { reason: dt.invalidReason });
  }
  return dt;
}

/**
 * Parse a spreadsheet-style timestamp, or null when no known shape matches
 */
export function parseTimestamp(raw: string, timezone: string): DateTime | null {
  const value = raw.trim();
  if (value.length === 0) return null;

  const iso = DateTime.fromISO(value, { zone: timezone });
  if (iso.isValid) return iso;

  const sql = DateTime.fromSQL(value, { zone: timezone });
  if (sql.isValid) return sql;

  for (const format of EXTRA_TIMESTAMP_FORMATS) {
    const dt = DateTime.fromFormat(value, format, { zone: timezone, locale: 'en-US' });
    if (dt.isValid) return dt;
  }

  return null;
}

/**
 * Convert a Luxon DateTime to ISO string
 */
export function toISOString(dt: DateTime): string {
  const iso = dt.toISO();
  if (!iso) {
    throw invalidInputError(`Invalid datetime: ${dt.invalidReason ?? 'unknown reason'}`);
  }
  return iso;
}

/**
 * Calendar day (yyyy-MM-dd) of an instant in the given timezone
 */
export function toDayKey(dt: DateTime, timezone: string): string {
  const day = dt.setZone(timezone).toISODate();
  if (!day) {
    throw invalidInputError(`Invalid datetime: ${dt.invalidReason ?? 'unknown reason'}`);
  }
  return day;
}

/**
 * Minutes since local midnight
 */
export function minuteOfDay(dt: DateTime, timezone: string): number {
  const local = dt.setZone(timezone);
  return local.hour * 60 + local.minute;
}

/**
 * Floor an instant to the grid, counting quanta from local midnight
 */
export function floorToGrid(dt: DateTime, quantumMinutes: number, timezone: string): DateTime {
  const local = dt.setZone(timezone);
  const minutes = local.hour * 60 + local.minute;
  const floored = minutes - (minutes % quantumMinutes);
  return local.set({
    hour: Math.floor(floored / 60),
    minute: floored % 60,
    second: 0,
    millisecond: 0,
  });
}

/**
 * Check whether an instant sits exactly on the grid
 */
export function isGridAligned(dt: DateTime, quantumMinutes: number, timezone: string): boolean {
  const local = dt.setZone(timezone);
  return (
    local.second === 0 &&
    local.millisecond === 0 &&
    minuteOfDay(local, timezone) % quantumMinutes === 0
  );
}

/**
 * Parse an HH:mm string into hour and minute, or null when malformed
 */
export function parseTimeOfDay(value: string): { hour: number; minute: number } | null {
  const match = TIME_OF_DAY_PATTERN.exec(value.trim());
  if (!match) return null;
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return null;
  return { hour, minute };
}

/**
 * The instant at a local HH:mm on the same calendar day as `day`
 */
export function atTimeOfDay(day: DateTime, time: string, timezone: string): DateTime {
  const parsed = parseTimeOfDay(time);
  if (!parsed) {
    throw invalidInputError(`Time of day must be in HH:mm format. Got: "${time}"`);
  }
  return day.setZone(timezone).set({
    hour: parsed.hour,
    minute: parsed.minute,
    second: 0,
    millisecond: 0,
  });
}

/**
 * Resolve a time-of-day window onto the calendar day of `day`
 */
export function windowOnDay(
  day: DateTime,
  window: TimeOfDayWindow,
  timezone: string
): { start: DateTime; end: DateTime } {
  return {
    start: atTimeOfDay(day, window.start, timezone),
    end: atTimeOfDay(day, window.end, timezone),
  };
}

/**
 * Start of the next calendar day in the given timezone
 */
export function startOfNextDay(dt: DateTime, timezone: string): DateTime {
  return dt.setZone(timezone).startOf('day').plus({ days: 1 });
}

/**
 * Calculate duration in minutes between two datetimes
 */
export function durationMinutes(start: DateTime, end: DateTime): number {
  return end.diff(start, 'minutes').minutes;
}

/**
 * Format duration for display (e.g., "1 hr, 30 min")
 */
export function formatDuration(minutes: number): string {
  const duration = Duration.fromObject({ minutes }, { locale: 'en-US' });
  return duration.rescale().toHuman({ unitDisplay: 'short' });
}

/**
 * Format a local time range (e.g., "9:00 AM - 9:30 AM")
 */
export function formatTimeRange(start: DateTime, end: DateTime, timezone: string): string {
  const startLocal = start.setZone(timezone).setLocale('en-US');
  const endLocal = end.setZone(timezone).setLocale('en-US');
  return `${startLocal.toFormat('h:mm a')} - ${endLocal.toFormat('h:mm a')}`;
}

/**
 * Format a calendar day heading (e.g., "Tuesday, March 4, 2025")
 */
export function formatDayHeading(day: string, timezone: string): string {
  return DateTime.fromISO(day, { zone: timezone, locale: 'en-US' }).toFormat('cccc, LLLL d, yyyy');
}
