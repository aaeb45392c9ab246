/**
 * Schedule error taxonomy
 *
 * Every failure raised by the model or the codec is a ScheduleError with a
 * stable `code` and, where it applies, the dotted path of the offending field
 * (e.g. "scheduled.windows[0].start").
 */

export type ScheduleErrorCode =
  | 'SYNTAX_ERROR'
  | 'MISSING_FIELD'
  | 'TYPE_MISMATCH'
  | 'UNKNOWN_PATTERN_TYPE'
  | 'INVALID_PATTERN'
  | 'UNKNOWN_FIELD'
  | 'UNSUPPORTED_VERSION';

/** JSON type names used in type mismatch messages */
export type JsonTypeName = 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array' | 'null';

export class ScheduleError extends Error {
  constructor(
    message: string,
    public readonly code: ScheduleErrorCode,
    public readonly field: string | undefined,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'ScheduleError';
  }
}

/**
 * Input text is not well-formed JSON
 */
export class ScheduleSyntaxError extends ScheduleError {
  constructor(message: string, details?: unknown) {
    super(`Schedule is not valid JSON: ${message}`, 'SYNTAX_ERROR', undefined, details);
    this.name = 'ScheduleSyntaxError';
  }
}

export class MissingFieldError extends ScheduleError {
  constructor(field: string) {
    super(`Missing required field "${field}"`, 'MISSING_FIELD', field);
    this.name = 'MissingFieldError';
  }
}

export class TypeMismatchError extends ScheduleError {
  constructor(
    field: string,
    public readonly expected: JsonTypeName,
    public readonly actual: JsonTypeName
  ) {
    super(`Field "${field}" must be ${article(expected)} ${expected}, got ${actual}`, 'TYPE_MISMATCH', field, {
      expected,
      actual,
    });
    this.name = 'TypeMismatchError';
  }
}

export class UnknownPatternTypeError extends ScheduleError {
  constructor(
    public readonly patternType: string,
    known: readonly string[]
  ) {
    super(
      `Unknown pattern_type "${patternType}". Must be one of: ${known.join(', ')}`,
      'UNKNOWN_PATTERN_TYPE',
      'pattern_type',
      { providedType: patternType, known }
    );
    this.name = 'UnknownPatternTypeError';
  }
}

/**
 * A pattern payload that cannot form a valid schedule: wrong variant for the
 * tag, payload under another pattern's key, or a field rule violation.
 */
export class InvalidPatternError extends ScheduleError {
  constructor(message: string, field?: string, details?: unknown) {
    super(message, 'INVALID_PATTERN', field, details);
    this.name = 'InvalidPatternError';
  }
}

export class UnknownFieldError extends ScheduleError {
  constructor(field: string) {
    super(`Unknown top-level field "${field}"`, 'UNKNOWN_FIELD', field);
    this.name = 'UnknownFieldError';
  }
}

export class UnsupportedVersionError extends ScheduleError {
  constructor(
    public readonly version: string,
    supported: readonly string[]
  ) {
    super(
      `Schedule version "${version}" is not supported (supported: ${supported.join(', ')})`,
      'UNSUPPORTED_VERSION',
      'version',
      { version, supported }
    );
    this.name = 'UnsupportedVersionError';
  }
}

export function isScheduleError(value: unknown): value is ScheduleError {
  return value instanceof ScheduleError;
}

function article(word: string): string {
  return /^[aeiou]/.test(word) ? 'an' : 'a';
}
