/**
 * Schedule codec
 *
 * Converts between the JSON wire format and Schedule values:
 *
 *   {"version": "0.1.0", "pattern_type": "continuous", "continuous": {}}
 *
 * Decoding is a single pass: envelope, tag, payload types, then schedule
 * construction. The first defect found is thrown; nothing is partially built.
 */

import { componentLogger } from '../logging/index.js';
import {
  InvalidPatternError,
  ScheduleSyntaxError,
  TypeMismatchError,
  UnknownFieldError,
  UnknownPatternTypeError,
  UnsupportedVersionError,
  isScheduleError,
} from './errors.js';
import { hasField, isJsonObject, jsonTypeOf, readObject, readOptionalObject, readString } from './fields.js';
import { createSchedule, isPatternType } from './model.js';
import { PATTERN_REGISTRY } from './patterns/index.js';
import { PATTERN_TYPES, type JsonObject, type JsonValue, type PatternType, type Schedule, type ScheduleOf } from './types.js';

export interface ParseOptions {
  /** Reject top-level keys other than the envelope and pattern payload keys */
  strict?: boolean;
  /** When non-empty, only these DSL versions are accepted */
  supportedVersions?: readonly string[];
}

export interface SerializeOptions {
  /** Pretty-print with this many spaces */
  indent?: number;
}

const ROOT = '$';
const ENVELOPE_KEYS: readonly string[] = ['version', 'pattern_type', ...PATTERN_TYPES];

function decodeJson(text: string): JsonValue {
  if (typeof text !== 'string') {
    throw new TypeMismatchError(ROOT, 'string', jsonTypeOf(text));
  }
  try {
    const value: JsonValue = JSON.parse(text);
    return value;
  } catch (error) {
    throw new ScheduleSyntaxError(error instanceof Error ? error.message : String(error), { cause: error });
  }
}

function decodePayload(doc: JsonObject, patternType: PatternType): JsonObject {
  if (PATTERN_REGISTRY[patternType].payloadOptional) {
    return readOptionalObject(doc, patternType, '') ?? {};
  }
  return readObject(doc, patternType, '');
}

function decodeDocument(value: JsonValue, options: ParseOptions): Schedule {
  if (!isJsonObject(value)) {
    throw new TypeMismatchError(ROOT, 'object', jsonTypeOf(value));
  }

  const version = readString(value, 'version', '');
  const tag = readString(value, 'pattern_type', '');
  if (!isPatternType(tag)) {
    throw new UnknownPatternTypeError(tag, PATTERN_TYPES);
  }

  const supported = options.supportedVersions ?? [];
  if (supported.length > 0 && !supported.includes(version)) {
    throw new UnsupportedVersionError(version, supported);
  }

  for (const other of PATTERN_TYPES) {
    if (other !== tag && hasField(value, other)) {
      throw new InvalidPatternError(
        `Schedule with pattern_type "${tag}" must not carry a "${other}" payload`,
        other,
        { patternType: tag, payloadKey: other }
      );
    }
  }

  if (options.strict) {
    const unknown = Object.keys(value).find((key) => !ENVELOPE_KEYS.includes(key));
    if (unknown !== undefined) {
      throw new UnknownFieldError(unknown);
    }
  }

  const pattern = PATTERN_REGISTRY[tag].decode(decodePayload(value, tag), tag);
  return createSchedule(version, tag, pattern);
}

function withRejectionLogging<T>(decode: () => T): T {
  try {
    return decode();
  } catch (error) {
    if (isScheduleError(error)) {
      componentLogger('CODEC').debug({ code: error.code, field: error.field }, error.message);
    }
    throw error;
  }
}

/**
 * Parse schedule JSON text.
 *
 * @throws ScheduleSyntaxError, MissingFieldError, TypeMismatchError,
 *   UnknownPatternTypeError, InvalidPatternError, UnknownFieldError or
 *   UnsupportedVersionError
 */
export function parse(text: string, options: ParseOptions = {}): Schedule {
  return withRejectionLogging(() => {
    const schedule = decodeDocument(decodeJson(text), options);
    componentLogger('CODEC').debug({ version: schedule.version, patternType: schedule.patternType }, 'Parsed recording schedule');
    return schedule;
  });
}

/**
 * Like parse, but also accepts an already-decoded JSON value.
 */
export function loads(input: string | JsonValue, options: ParseOptions = {}): Schedule {
  if (typeof input === 'string') {
    return parse(input, options);
  }
  return withRejectionLogging(() => decodeDocument(input, options));
}

function encodePattern<K extends PatternType>(schedule: ScheduleOf<K>): JsonObject {
  return PATTERN_REGISTRY[schedule.patternType].encode(schedule.pattern);
}

/**
 * Convert a schedule to its JSON-compatible document: exactly `version`,
 * `pattern_type` and the payload key named by `pattern_type`.
 */
export function dumps(schedule: Schedule): JsonObject {
  // Re-check values that did not come through createSchedule
  const checked = createSchedule(schedule.version, schedule.patternType, schedule.pattern);
  const document: JsonObject = {
    version: checked.version,
    pattern_type: checked.patternType,
  };
  document[checked.patternType] = encodePattern<PatternType>(checked);
  return document;
}

export function serialize(schedule: Schedule, options: SerializeOptions = {}): string {
  return JSON.stringify(dumps(schedule), null, options.indent);
}
