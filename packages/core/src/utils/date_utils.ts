/**
 * Calendar helpers for "day" semantics.
 *
 * Days are plain `YYYY-MM-DD` strings in the process' local time zone, so
 * they compare lexicographically in chronological order and serialize
 * without a time component.
 *
 * @module utils/date_utils
 */

import { ValidationError } from '../errors';

/** A calendar date, `YYYY-MM-DD` */
export type PlainDate = string;

/** A wall-clock time of day, parsed from `HH:MM` */
export type TimeOfDay = {
  hours: number;
  minutes: number;
};

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const PLAIN_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local calendar date of a timestamp.
 *
 * @example
 * toPlainDate(new Date(2026, 9, 19, 10, 30)) // '2026-10-19'
 */
export function toPlainDate(date: Date): PlainDate {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Validates a `YYYY-MM-DD` string naming a real calendar day.
 * @throws ValidationError for malformed or impossible dates
 */
export function parsePlainDate(value: string): PlainDate {
  const match = PLAIN_DATE_PATTERN.exec(value);
  if (!match || !match[1] || !match[2] || !match[3]) {
    throw new ValidationError(`Invalid date '${value}': expected YYYY-MM-DD`);
  }
  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const day = parseInt(match[3], 10);
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    throw new ValidationError(`Invalid date '${value}': no such calendar day`);
  }
  return value;
}

function toUtcMidnight(date: PlainDate): number {
  const [year, month, day] = date.split('-').map(part => parseInt(part, 10));
  return Date.UTC(year ?? NaN, (month ?? NaN) - 1, day ?? NaN);
}

/**
 * Shifts a date by a whole number of days (negative moves backwards).
 */
export function addDays(date: PlainDate, days: number): PlainDate {
  const shifted = new Date(toUtcMidnight(date) + days * MS_PER_DAY);
  return `${shifted.getUTCFullYear()}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`;
}

/**
 * Whole days from `from` to `to`; positive when `to` is later.
 *
 * @example
 * daysBetween('2026-10-16', '2026-10-19') // 3
 */
export function daysBetween(from: PlainDate, to: PlainDate): number {
  return Math.round((toUtcMidnight(to) - toUtcMidnight(from)) / MS_PER_DAY);
}

/**
 * Parses an `HH:MM` (24h) time of day.
 * @throws ValidationError for anything else
 */
export function parseTimeOfDay(value: string): TimeOfDay {
  const match = TIME_OF_DAY_PATTERN.exec(value);
  if (!match || !match[1] || !match[2]) {
    throw new ValidationError(`Invalid time '${value}': expected HH:MM`);
  }
  return { hours: parseInt(match[1], 10), minutes: parseInt(match[2], 10) };
}

/**
 * The day a timestamp belongs to once a daily cut-off is taken into
 * account: anything before the cut-off still counts as the previous day.
 *
 * @example
 * // cut-off 04:00
 * dateWithCutOff(new Date(2026, 9, 19, 2, 0), { hours: 4, minutes: 0 })  // '2026-10-18'
 * dateWithCutOff(new Date(2026, 9, 19, 9, 0), { hours: 4, minutes: 0 })  // '2026-10-19'
 */
export function dateWithCutOff(timestamp: Date, cutOff: TimeOfDay): PlainDate {
  const date = toPlainDate(timestamp);
  const minutesIntoDay = timestamp.getHours() * 60 + timestamp.getMinutes();
  const cutOffMinutes = cutOff.hours * 60 + cutOff.minutes;
  return minutesIntoDay < cutOffMinutes ? addDays(date, -1) : date;
}
