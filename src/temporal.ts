/**
 * Date and date-time value parsers
 *
 * Lax parsers accept what a permissive runtime would coerce (Unix
 * timestamps, `t`/space separators, naive date-times). Strict parsers only
 * accept RFC 3339: `full-date` for dates and `date-time` with a mandatory
 * offset for date-times. Both check calendar and clock ranges after the
 * format has been recognised.
 *
 * Dates are returned as `YYYY-MM-DD` strings, date-times as `Date`.
 */

import type { ValueIssue, ValueParseResult } from './types/validation.js';

export const RFC3339_DATETIME_PATTERN =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(Z|[+-]\d{2}:\d{2})$/;

export const FULL_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const LAX_DATETIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[Tt _](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?\s*([Zz]|[+-]\d{2}(?::?\d{2})?)?)?$/;

const NUMERIC_PATTERN = /^[+-]?\d+(?:\.\d+)?$/;

const SECONDS_PER_DAY = 86_400;
const MS_PER_SECOND = 1000;

/**
 * Timestamps above this are read as milliseconds
 */
const MILLISECONDS_THRESHOLD = 2e10;

const MAX_YEAR = 9999;

interface DateTimeParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
  offsetMinutes: number;
}

function fail<T>(type: string, message: string, ctx?: Record<string, unknown>): ValueParseResult<T> {
  const issue: ValueIssue = ctx ? { type, message, ctx } : { type, message };
  return { valid: false, issue };
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Range problem in the parts, or undefined when they form a real instant
 */
function rangeError(parts: DateTimeParts): string | undefined {
  if (parts.month < 1 || parts.month > 12) return 'month value is outside expected range of 1-12';
  if (parts.day < 1 || parts.day > daysInMonth(parts.year, parts.month)) {
    return 'day value is outside expected range';
  }
  if (parts.hour > 23) return 'hour value is outside expected range of 0-23';
  if (parts.minute > 59) return 'minute value is outside expected range of 0-59';
  if (parts.second > 59) return 'second value is outside expected range of 0-59';
  if (Math.abs(parts.offsetMinutes) >= 24 * 60) return 'timezone offset must be less than 24 hours';
  return undefined;
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

export function formatDate(year: number, month: number, day: number): string {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

function toDate(parts: DateTimeParts): Date {
  const utc = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second, parts.millisecond);
  return new Date(utc - parts.offsetMinutes * 60_000);
}

function parseOffset(offset: string | undefined): number {
  if (!offset || offset === 'Z' || offset === 'z') return 0;
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (hours * 60 + minutes);
}

function parseFraction(fraction: string | undefined): number {
  if (!fraction) return 0;
  return Number(fraction.slice(0, 3).padEnd(3, '0'));
}

function matchDateTime(value: string): DateTimeParts | undefined {
  const match = LAX_DATETIME_PATTERN.exec(value);
  if (!match) return undefined;

  const [, year, month, day, hour, minute, second, fraction, offset] = match;
  return {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: hour ? Number(hour) : 0,
    minute: minute ? Number(minute) : 0,
    second: second ? Number(second) : 0,
    millisecond: parseFraction(fraction),
    offsetMinutes: parseOffset(offset),
  };
}

function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

/**
 * Date value of a `Date` instance at midnight UTC
 */
function dateOfInstant(value: Date): ValueParseResult<string> {
  if (value.getTime() % (SECONDS_PER_DAY * MS_PER_SECOND) !== 0) {
    return fail(
      'date_from_datetime_inexact',
      'Datetimes provided to dates should have zero time - e.g. be exact dates'
    );
  }
  return { valid: true, value: formatDate(value.getUTCFullYear(), value.getUTCMonth() + 1, value.getUTCDate()) };
}

/**
 * Milliseconds since the epoch from a number or numeric string of seconds
 * (or milliseconds, above the threshold)
 */
function timestampMillis(value: unknown): number | undefined {
  let numeric: number | undefined;
  if (typeof value === 'number' && Number.isFinite(value)) {
    numeric = value;
  } else if (typeof value === 'string' && NUMERIC_PATTERN.test(value)) {
    numeric = Number(value);
  }
  if (numeric === undefined) return undefined;
  return Math.abs(numeric) > MILLISECONDS_THRESHOLD ? numeric : numeric * MS_PER_SECOND;
}

/**
 * Instant of a timestamp, or undefined when it falls outside years 0-9999
 */
function instantOf(millis: number): Date | undefined {
  const instant = new Date(millis);
  if (Number.isNaN(instant.getTime())) return undefined;
  const year = instant.getUTCFullYear();
  return year < 0 || year > MAX_YEAR ? undefined : instant;
}

// ---------------------------------------------------------------------------
// Strict (RFC 3339)

export function parseStrictDate(value: unknown): ValueParseResult<string> {
  if (isValidDate(value)) return dateOfInstant(value);
  if (typeof value !== 'string') {
    return fail(
      'date_type',
      "Input should be a valid date in RFC 3339 'full-date' format, input is not a string",
      { error: 'input not string' }
    );
  }
  if (!FULL_DATE_PATTERN.test(value)) {
    return fail(
      'date_from_datetime_parsing',
      "Input should be a valid date, in RFC 3339 'full-date' format",
      { error: 'input is not of form YYYY-MM-DD' }
    );
  }
  return checkedDate(value);
}

export function parseStrictDateTime(value: unknown): ValueParseResult<Date> {
  if (isValidDate(value)) return { valid: true, value };
  if (typeof value !== 'string') {
    return fail(
      'datetime_type',
      'Input should be a valid datetime in RFC 3339 format, input is not a string',
      { error: 'input not string' }
    );
  }
  if (!RFC3339_DATETIME_PATTERN.test(value)) {
    return fail(
      'datetime_from_date_parsing',
      'Input should be a valid datetime, in RFC 3339 format',
      { error: 'input does not follow RFC 3339' }
    );
  }
  return checkedDateTime(value);
}

// ---------------------------------------------------------------------------
// Lax

export function parseLaxDate(value: unknown): ValueParseResult<string> {
  if (isValidDate(value)) return dateOfInstant(value);
  const millis = timestampMillis(value);
  if (millis !== undefined) {
    const instant = instantOf(millis);
    if (!instant) {
      return fail('date_parsing', 'Input should be a valid date in the format YYYY-MM-DD, timestamp out of range', {
        error: 'timestamp out of range',
      });
    }
    return dateOfInstant(instant);
  }

  if (typeof value !== 'string') {
    return fail('date_type', 'Input should be a valid date');
  }
  if (!FULL_DATE_PATTERN.test(value)) {
    return fail('date_parsing', 'Input should be a valid date in the format YYYY-MM-DD', {
      error: 'input is too short or has an invalid format',
    });
  }
  return checkedDate(value);
}

export function parseLaxDateTime(value: unknown): ValueParseResult<Date> {
  if (isValidDate(value)) return { valid: true, value };
  const millis = timestampMillis(value);
  if (millis !== undefined) {
    const instant = instantOf(millis);
    if (!instant) {
      return fail('datetime_parsing', 'Input should be a valid datetime, timestamp out of range', {
        error: 'timestamp out of range',
      });
    }
    return { valid: true, value: instant };
  }

  if (typeof value !== 'string') {
    return fail('datetime_type', 'Input should be a valid datetime');
  }
  return checkedDateTime(value);
}

// ---------------------------------------------------------------------------

function checkedDate(value: string): ValueParseResult<string> {
  const parts = matchDateTime(value);
  const problem = parts ? rangeError(parts) : 'invalid date format';
  if (!parts || problem) {
    return fail('date_from_datetime_parsing', `Input should be a valid date or datetime, ${problem}`, {
      error: problem,
    });
  }
  return { valid: true, value: formatDate(parts.year, parts.month, parts.day) };
}

function checkedDateTime(value: string): ValueParseResult<Date> {
  const parts = matchDateTime(value);
  if (!parts) {
    return fail('datetime_parsing', 'Input should be a valid datetime, invalid datetime format', {
      error: 'invalid datetime format',
    });
  }
  const problem = rangeError(parts);
  if (problem) {
    return fail('datetime_parsing', `Input should be a valid datetime, ${problem}`, { error: problem });
  }
  return { valid: true, value: toDate(parts) };
}
