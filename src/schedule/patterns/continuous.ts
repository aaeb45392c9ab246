import { InvalidPatternError } from '../errors.js';
import { fieldPath, readOptionalString } from '../fields.js';
import { requireDateTime } from '../rules.js';
import type { ContinuousPattern, JsonObject } from '../types.js';
import type { PatternDefinition } from './definition.js';

export type ContinuousPatternInit = Omit<ContinuousPattern, 'kind'>;

/**
 * Build a continuous pattern. Both bounds are optional; when both are set the
 * start must come first.
 */
export function continuousPattern(init: ContinuousPatternInit = {}, path = 'continuous'): ContinuousPattern {
  const startAt = init.startAt === undefined ? undefined : requireDateTime(init.startAt, fieldPath(path, 'start_at'));
  const endAt = init.endAt === undefined ? undefined : requireDateTime(init.endAt, fieldPath(path, 'end_at'));

  if (startAt !== undefined && endAt !== undefined && Date.parse(startAt) >= Date.parse(endAt)) {
    throw new InvalidPatternError(
      `Continuous pattern must start before it ends (start_at ${startAt}, end_at ${endAt})`,
      fieldPath(path, 'end_at')
    );
  }

  return Object.freeze({
    kind: 'continuous' as const,
    ...(startAt !== undefined ? { startAt } : {}),
    ...(endAt !== undefined ? { endAt } : {}),
  });
}

export const continuousDefinition: PatternDefinition<'continuous'> = {
  type: 'continuous',
  payloadOptional: true,
  build: (pattern, path) => continuousPattern(pattern, path),
  decode(payload, path) {
    const startAt = readOptionalString(payload, 'start_at', path);
    const endAt = readOptionalString(payload, 'end_at', path);
    return {
      kind: 'continuous',
      ...(startAt !== undefined ? { startAt } : {}),
      ...(endAt !== undefined ? { endAt } : {}),
    };
  },
  encode(pattern) {
    const payload: JsonObject = {};
    if (pattern.startAt !== undefined) payload.start_at = pattern.startAt;
    if (pattern.endAt !== undefined) payload.end_at = pattern.endAt;
    return payload;
  },
};
