/**
 * Schedule construction and comparison.
 *
 * Schedules are frozen value objects: construction validates every field
 * rule, copies the input and never stores a tag that disagrees with its
 * pattern.
 */

import { isDeepStrictEqual } from 'util';
import { InvalidPatternError, isScheduleError } from './errors.js';
import { PATTERN_REGISTRY } from './patterns/index.js';
import { isSemver, requireNonEmpty } from './rules.js';
import { PATTERN_TYPES, type Pattern, type PatternByType, type PatternType, type Schedule, type ScheduleOf } from './types.js';

export function isPatternType(value: unknown): value is PatternType {
  return PATTERN_TYPES.some((type) => type === value);
}

function requireVersion(version: string): string {
  if (typeof version !== 'string') {
    throw new InvalidPatternError('Schedule version must be a string', 'version');
  }
  requireNonEmpty(version, 'version');
  if (!isSemver(version)) {
    throw new InvalidPatternError(`Schedule version "${version}" is not a semantic version (e.g. "0.1.0")`, 'version', {
      version,
    });
  }
  return version;
}

function freezeSchedule<K extends PatternType>(version: string, patternType: K, pattern: PatternByType[K]): ScheduleOf<K> {
  return Object.freeze({
    version,
    patternType,
    pattern: PATTERN_REGISTRY[patternType].build(pattern, patternType),
  });
}

function buildSchedule(version: string, pattern: Pattern): Schedule {
  switch (pattern.kind) {
    case 'continuous':
      return freezeSchedule(version, 'continuous', pattern);
    case 'scheduled':
      return freezeSchedule(version, 'scheduled', pattern);
    case 'triggered':
      return freezeSchedule(version, 'triggered', pattern);
  }
}

/**
 * Create a schedule from a version, a pattern tag and the matching pattern.
 *
 * @throws InvalidPatternError when the tag is unknown, the pattern is of
 *   another kind, the version is not semver, or a field rule fails
 */
export function createSchedule(version: string, patternType: PatternType, pattern: Pattern): Schedule {
  const checkedVersion = requireVersion(version);

  if (!isPatternType(patternType)) {
    throw new InvalidPatternError(
      `Unknown pattern type "${String(patternType)}". Must be one of: ${PATTERN_TYPES.join(', ')}`,
      'pattern_type'
    );
  }

  if (typeof pattern !== 'object' || pattern === null) {
    throw new InvalidPatternError(`Pattern for "${patternType}" must be an object`, patternType);
  }

  if (pattern.kind !== patternType) {
    throw new InvalidPatternError(
      `Pattern of kind "${String(pattern.kind)}" cannot be stored under pattern_type "${patternType}"`,
      'pattern_type',
      { patternType, kind: pattern.kind }
    );
  }

  try {
    return buildSchedule(checkedVersion, pattern);
  } catch (error) {
    if (isScheduleError(error)) {
      throw error;
    }
    // Malformed input from untyped callers (e.g. a non-array `windows`)
    throw new InvalidPatternError(
      `Pattern for "${patternType}" is malformed: ${error instanceof Error ? error.message : String(error)}`,
      patternType,
      { cause: error }
    );
  }
}

/**
 * Structural equality: same version, same tag, same pattern field values.
 */
export function schedulesEqual(a: Schedule, b: Schedule): boolean {
  return a.version === b.version && a.patternType === b.patternType && isDeepStrictEqual(a.pattern, b.pattern);
}
