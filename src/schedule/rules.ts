/**
 * Field rules enforced when a schedule is constructed.
 *
 * Violations throw InvalidPatternError with the wire path of the field.
 */

import { InvalidPatternError } from './errors.js';

// Semantic Versioning 2.0.0
export const SEMVER_PATTERN =
  /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-((?:0|[1-9]\d*|\d*[a-zA-Z-][0-9a-zA-Z-]*)(?:\.(?:0|[1-9]\d*|\d*[a-zA-Z-][0-9a-zA-Z-]*))*))?(?:\+([0-9a-zA-Z-]+(?:\.[0-9a-zA-Z-]+)*))?$/;

// RFC 3339 date-time; isDateTime range-checks the captured fields
export const DATE_TIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(?:Z|[+-](\d{2}):(\d{2}))$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

export const FIXED_TIME_PATTERN = /^(?:[01]\d|2[0-3]):[0-5]\d$/;

export const SOLAR_TIME_PATTERN = /^(?:sunrise|sunset)(?:[+-]\d+[smh])?$/;

export function isSemver(value: string): boolean {
  return SEMVER_PATTERN.test(value);
}

function daysInMonth(year: number, month: number): number {
  const leap = year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
  return month === 2 && leap ? 29 : DAYS_IN_MONTH[month - 1];
}

/**
 * Calendar-valid RFC 3339 timestamp. Leap seconds are not accepted.
 */
export function isDateTime(value: string): boolean {
  const match = DATE_TIME_PATTERN.exec(value);
  if (!match) return false;

  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) return false;
  if (hour > 23 || minute > 59 || second > 59) return false;

  const [offsetHour, offsetMinute] = [match[7], match[8]];
  if (offsetHour !== undefined && (Number(offsetHour) > 23 || Number(offsetMinute) > 59)) return false;

  return true;
}

export function isTimeZone(value: string): boolean {
  if (value.trim() === '') return false;
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

export function requireNonEmpty(value: string, field: string): string {
  if (value.trim() === '') {
    throw new InvalidPatternError(`Field "${field}" must not be empty`, field);
  }
  return value;
}

export function requireOneOf<T extends string>(value: string, allowed: readonly T[], field: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new InvalidPatternError(
      `Field "${field}" has invalid value "${value}". Must be one of: ${allowed.join(', ')}`,
      field,
      { provided: value, allowed }
    );
  }
  return match;
}

export function requireInteger(value: number, field: string, min: number, max = Number.MAX_SAFE_INTEGER): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    const bound = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `between ${min} and ${max}`;
    throw new InvalidPatternError(`Field "${field}" must be an integer ${bound}, got ${value}`, field);
  }
  return normalizeZero(value);
}

export function requireFinite(value: number, field: string, min = -Infinity, max = Infinity): number {
  if (!Number.isFinite(value) || value < min || value > max) {
    const bound = Number.isFinite(min) && Number.isFinite(max) ? ` between ${min} and ${max}` : '';
    throw new InvalidPatternError(`Field "${field}" must be a finite number${bound}, got ${value}`, field);
  }
  return normalizeZero(value);
}

export function requireDateTime(value: string, field: string): string {
  if (!isDateTime(value)) {
    throw new InvalidPatternError(`Field "${field}" must be an RFC 3339 date-time, got "${value}"`, field);
  }
  return value;
}

export function requireTimeZone(value: string, field: string): string {
  if (!isTimeZone(value)) {
    throw new InvalidPatternError(`Field "${field}" must be an IANA time zone, got "${value}"`, field);
  }
  return value;
}

export function requireNonEmptyList<T>(items: readonly T[], field: string): readonly T[] {
  if (items.length === 0) {
    throw new InvalidPatternError(`Field "${field}" must contain at least one entry`, field);
  }
  return items;
}

export function requireDistinct<T>(items: readonly T[], field: string): readonly T[] {
  if (new Set(items).size !== items.length) {
    throw new InvalidPatternError(`Field "${field}" must not contain duplicates`, field);
  }
  return items;
}

// JSON has no negative zero; keep values stable across a round trip
function normalizeZero(value: number): number {
  return Object.is(value, -0) ? 0 : value;
}
