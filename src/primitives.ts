/**
 * Scalar value parsers for generated models
 *
 * Why two modes: lax models coerce what clients commonly send (numeric
 * strings, `"yes"`/`"no"` booleans); strict models accept only values of
 * the declared JSON type. Strings are never coerced in either mode.
 */

import type { ValueIssue, ValueParseResult } from './types/validation.js';

export type ValueParser<T = unknown> = (value: unknown) => ValueParseResult<T>;

const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

const TRUE_STRINGS = new Set(['1', 'on', 't', 'true', 'y', 'yes']);
const FALSE_STRINGS = new Set(['0', 'off', 'f', 'false', 'n', 'no']);

function fail<T>(type: string, message: string, ctx?: Record<string, unknown>): ValueParseResult<T> {
  const issue: ValueIssue = ctx ? { type, message, ctx } : { type, message };
  return { valid: false, issue };
}

export function parseString(value: unknown): ValueParseResult<string> {
  if (typeof value !== 'string') {
    return fail('string_type', 'Input should be a valid string');
  }
  return { valid: true, value };
}

export function parseNumber(value: unknown, strict: boolean): ValueParseResult<number> {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return fail('finite_number', 'Input should be a finite number');
    }
    return { valid: true, value };
  }
  if (!strict && typeof value === 'string') {
    const trimmed = value.trim();
    if (!NUMBER_PATTERN.test(trimmed)) {
      return fail('float_parsing', 'Input should be a valid number, unable to parse string as a number');
    }
    return { valid: true, value: Number(trimmed) };
  }
  return fail('float_type', 'Input should be a valid number');
}

export function parseInteger(value: unknown, strict: boolean): ValueParseResult<number> {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return fail('finite_number', 'Input should be a finite number');
    }
    if (!Number.isInteger(value)) {
      return strict
        ? fail('int_type', 'Input should be a valid integer')
        : fail('int_from_float', 'Input should be a valid integer, got a number with a fractional part');
    }
    return { valid: true, value };
  }
  if (!strict && typeof value === 'string') {
    const trimmed = value.trim();
    if (!INTEGER_PATTERN.test(trimmed)) {
      return fail('int_parsing', 'Input should be a valid integer, unable to parse string as an integer');
    }
    return { valid: true, value: Number(trimmed) };
  }
  return fail('int_type', 'Input should be a valid integer');
}

export function parseBoolean(value: unknown, strict: boolean): ValueParseResult<boolean> {
  if (typeof value === 'boolean') {
    return { valid: true, value };
  }
  if (strict) {
    return fail('bool_type', 'Input should be a valid boolean');
  }
  if (value === 0 || value === 1) {
    return { valid: true, value: value === 1 };
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (TRUE_STRINGS.has(normalized)) return { valid: true, value: true };
    if (FALSE_STRINGS.has(normalized)) return { valid: true, value: false };
    return fail('bool_parsing', 'Input should be a valid boolean, unable to interpret input');
  }
  return fail('bool_type', 'Input should be a valid boolean');
}

// ---------------------------------------------------------------------------
// String formats

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const UUID_PATTERN = /^[0-9a-f]{8}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{12}$/i;

export function isEmail(value: string): boolean {
  return EMAIL_PATTERN.test(value);
}

export function isUri(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Format check for a string that already passed the type check.
 * Unknown formats are accepted as plain strings.
 */
export function checkStringFormat(value: string, format: string | undefined): ValueIssue | undefined {
  switch (format) {
    case 'email':
      return isEmail(value)
        ? undefined
        : { type: 'value_error', message: 'value is not a valid email address' };
    case 'uri':
    case 'url':
      return isUri(value)
        ? undefined
        : { type: 'url_parsing', message: 'Input should be a valid URL' };
    case 'uuid':
      return UUID_PATTERN.test(value)
        ? undefined
        : { type: 'uuid_parsing', message: 'Input should be a valid UUID' };
    default:
      return undefined;
  }
}
