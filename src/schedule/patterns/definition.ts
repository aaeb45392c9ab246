import type { JsonObject, PatternByType, PatternType } from '../types.js';

/**
 * Everything the model and codec need to know about one pattern variant.
 *
 * `build` validates field rules and returns a frozen copy; `decode` only
 * checks JSON presence and types, leaving rules to `build`.
 */
export interface PatternDefinition<K extends PatternType> {
  readonly type: K;
  /** True when the variant has no required fields and its payload key may be omitted */
  readonly payloadOptional: boolean;
  build(pattern: PatternByType[K], path: string): PatternByType[K];
  decode(payload: JsonObject, path: string): PatternByType[K];
  encode(pattern: PatternByType[K]): JsonObject;
}

export type PatternRegistry = { readonly [K in PatternType]: PatternDefinition<K> };
