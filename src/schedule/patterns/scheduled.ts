import { InvalidPatternError } from '../errors.js';
import {
  asObject,
  asString,
  asInteger,
  fieldPath,
  indexPath,
  readArray,
  readInteger,
  readObject,
  readOptionalArray,
  readOptionalString,
  readString,
} from '../fields.js';
import {
  FIXED_TIME_PATTERN,
  SOLAR_TIME_PATTERN,
  requireDistinct,
  requireInteger,
  requireNonEmptyList,
  requireOneOf,
  requireTimeZone,
} from '../rules.js';
import {
  DAYS_OF_WEEK,
  WINDOW_TYPES,
  type Cycle,
  type DayOfWeek,
  type JsonObject,
  type JsonValue,
  type ScheduledPattern,
  type Window,
  type WindowType,
} from '../types.js';
import type { PatternDefinition } from './definition.js';

export type ScheduledPatternInit = Omit<ScheduledPattern, 'kind'>;

function buildCycle(cycle: Cycle, path: string): Cycle {
  return Object.freeze({
    recordSeconds: requireInteger(cycle.recordSeconds, fieldPath(path, 'record_seconds'), 1),
    sleepSeconds: requireInteger(cycle.sleepSeconds, fieldPath(path, 'sleep_seconds'), 0),
  });
}

function requireWindowTime(value: string, windowType: WindowType, field: string): string {
  const pattern = windowType === 'fixed' ? FIXED_TIME_PATTERN : SOLAR_TIME_PATTERN;
  if (!pattern.test(value)) {
    const expected = windowType === 'fixed' ? '"HH:MM"' : '"sunrise" or "sunset" with an optional offset like "-10m"';
    throw new InvalidPatternError(
      `Field "${field}" must be ${expected} for a ${windowType} window, got "${value}"`,
      field
    );
  }
  return value;
}

export function buildWindow(window: Window, path: string): Window {
  const windowType = requireOneOf(window.windowType, WINDOW_TYPES, fieldPath(path, 'window_type'));
  const start = requireWindowTime(window.start, windowType, fieldPath(path, 'start'));
  const end = requireWindowTime(window.end, windowType, fieldPath(path, 'end'));

  let daysOfWeek: readonly DayOfWeek[] | undefined;
  if (window.daysOfWeek !== undefined) {
    const daysPath = fieldPath(path, 'days_of_week');
    const days = window.daysOfWeek.map((day, index) => requireOneOf(day, DAYS_OF_WEEK, indexPath(daysPath, index)));
    daysOfWeek = Object.freeze([...requireDistinct(requireNonEmptyList(days, daysPath), daysPath)]);
  }

  let months: readonly number[] | undefined;
  if (window.months !== undefined) {
    const monthsPath = fieldPath(path, 'months');
    const values = window.months.map((month, index) => requireInteger(month, indexPath(monthsPath, index), 1, 12));
    months = Object.freeze([...requireDistinct(requireNonEmptyList(values, monthsPath), monthsPath)]);
  }

  return Object.freeze({
    windowType,
    start,
    end,
    ...(daysOfWeek !== undefined ? { daysOfWeek } : {}),
    ...(months !== undefined ? { months } : {}),
  });
}

/**
 * Build a scheduled pattern: one or more windows sharing a duty cycle.
 */
export function scheduledPattern(init: ScheduledPatternInit, path = 'scheduled'): ScheduledPattern {
  const windowsPath = fieldPath(path, 'windows');
  const windows = requireNonEmptyList(init.windows, windowsPath).map((window, index) =>
    buildWindow(window, indexPath(windowsPath, index))
  );
  const cycle = buildCycle(init.cycle, fieldPath(path, 'cycle'));
  const timezone = init.timezone === undefined ? undefined : requireTimeZone(init.timezone, fieldPath(path, 'timezone'));

  return Object.freeze({
    kind: 'scheduled' as const,
    windows: Object.freeze(windows),
    cycle,
    ...(timezone !== undefined ? { timezone } : {}),
  });
}

function decodeDay(value: JsonValue, path: string): DayOfWeek {
  return requireOneOf(asString(value, path), DAYS_OF_WEEK, path);
}

function decodeWindow(value: JsonValue, path: string): Window {
  const raw = asObject(value, path);
  const windowType = requireOneOf(readString(raw, 'window_type', path), WINDOW_TYPES, fieldPath(path, 'window_type'));
  const daysOfWeek = readOptionalArray(raw, 'days_of_week', path, decodeDay);
  const months = readOptionalArray(raw, 'months', path, asInteger);
  return {
    windowType,
    start: readString(raw, 'start', path),
    end: readString(raw, 'end', path),
    ...(daysOfWeek !== undefined ? { daysOfWeek } : {}),
    ...(months !== undefined ? { months } : {}),
  };
}

function encodeWindow(window: Window): JsonObject {
  const payload: JsonObject = {
    window_type: window.windowType,
    start: window.start,
    end: window.end,
  };
  if (window.daysOfWeek !== undefined) payload.days_of_week = [...window.daysOfWeek];
  if (window.months !== undefined) payload.months = [...window.months];
  return payload;
}

export const scheduledDefinition: PatternDefinition<'scheduled'> = {
  type: 'scheduled',
  payloadOptional: false,
  build: (pattern, path) => scheduledPattern(pattern, path),
  decode(payload, path) {
    const windows = readArray(payload, 'windows', path, decodeWindow);
    const cycle = readObject(payload, 'cycle', path);
    const cyclePath = fieldPath(path, 'cycle');
    const timezone = readOptionalString(payload, 'timezone', path);

    return {
      kind: 'scheduled',
      windows,
      cycle: {
        recordSeconds: readInteger(cycle, 'record_seconds', cyclePath),
        sleepSeconds: readInteger(cycle, 'sleep_seconds', cyclePath),
      },
      ...(timezone !== undefined ? { timezone } : {}),
    };
  },
  encode(pattern) {
    const payload: JsonObject = {
      windows: pattern.windows.map(encodeWindow),
      cycle: {
        record_seconds: pattern.cycle.recordSeconds,
        sleep_seconds: pattern.cycle.sleepSeconds,
      },
    };
    if (pattern.timezone !== undefined) payload.timezone = pattern.timezone;
    return payload;
  },
};
