/**
 * Typed readers over decoded JSON.
 *
 * Each reader checks presence and JSON type only; value rules live in
 * rules.ts and run at construction time.
 */

import { MissingFieldError, TypeMismatchError, type JsonTypeName } from './errors.js';
import type { JsonObject, JsonValue } from './types.js';

export function jsonTypeOf(value: unknown): JsonTypeName {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'number';
  if (typeof value === 'string') return 'string';
  if (typeof value === 'boolean') return 'boolean';
  return 'object';
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function fieldPath(parent: string, key: string): string {
  return parent ? `${parent}.${key}` : key;
}

export function indexPath(parent: string, index: number): string {
  return `${parent}[${index}]`;
}

export function hasField(obj: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

function lookup(obj: JsonObject, key: string): JsonValue | undefined {
  return hasField(obj, key) ? obj[key] : undefined;
}

function requirePresent(obj: JsonObject, key: string, path: string): JsonValue {
  const value = lookup(obj, key);
  if (value === undefined) {
    throw new MissingFieldError(fieldPath(path, key));
  }
  return value;
}

/** Absent and null both read as "not set" for optional scalars */
function lookupOptional(obj: JsonObject, key: string): JsonValue | undefined {
  const value = lookup(obj, key);
  return value === null ? undefined : value;
}

// -----------------------------------------------------------------------------
// Value checks
// -----------------------------------------------------------------------------

export function asString(value: JsonValue, path: string): string {
  if (typeof value !== 'string') {
    throw new TypeMismatchError(path, 'string', jsonTypeOf(value));
  }
  return value;
}

export function asNumber(value: JsonValue, path: string): number {
  if (typeof value !== 'number') {
    throw new TypeMismatchError(path, 'number', jsonTypeOf(value));
  }
  return value;
}

export function asInteger(value: JsonValue, path: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new TypeMismatchError(path, 'integer', jsonTypeOf(value));
  }
  return value;
}

export function asObject(value: JsonValue, path: string): JsonObject {
  if (!isJsonObject(value)) {
    throw new TypeMismatchError(path, 'object', jsonTypeOf(value));
  }
  return value;
}

export function asArray<T>(value: JsonValue, path: string, readItem: (item: JsonValue, itemPath: string) => T): T[] {
  if (!Array.isArray(value)) {
    throw new TypeMismatchError(path, 'array', jsonTypeOf(value));
  }
  return value.map((item, index) => readItem(item, indexPath(path, index)));
}

// -----------------------------------------------------------------------------
// Field readers
// -----------------------------------------------------------------------------

export function readString(obj: JsonObject, key: string, path: string): string {
  return asString(requirePresent(obj, key, path), fieldPath(path, key));
}

export function readOptionalString(obj: JsonObject, key: string, path: string): string | undefined {
  const value = lookupOptional(obj, key);
  return value === undefined ? undefined : asString(value, fieldPath(path, key));
}

export function readNumber(obj: JsonObject, key: string, path: string): number {
  return asNumber(requirePresent(obj, key, path), fieldPath(path, key));
}

export function readInteger(obj: JsonObject, key: string, path: string): number {
  return asInteger(requirePresent(obj, key, path), fieldPath(path, key));
}

export function readOptionalInteger(obj: JsonObject, key: string, path: string): number | undefined {
  const value = lookupOptional(obj, key);
  return value === undefined ? undefined : asInteger(value, fieldPath(path, key));
}

export function readObject(obj: JsonObject, key: string, path: string): JsonObject {
  return asObject(requirePresent(obj, key, path), fieldPath(path, key));
}

/**
 * Optional nested object. Unlike scalars, an explicit null is a type mismatch.
 */
export function readOptionalObject(obj: JsonObject, key: string, path: string): JsonObject | undefined {
  const value = lookup(obj, key);
  return value === undefined ? undefined : asObject(value, fieldPath(path, key));
}

export function readArray<T>(
  obj: JsonObject,
  key: string,
  path: string,
  readItem: (item: JsonValue, itemPath: string) => T
): T[] {
  return asArray(requirePresent(obj, key, path), fieldPath(path, key), readItem);
}

export function readOptionalArray<T>(
  obj: JsonObject,
  key: string,
  path: string,
  readItem: (item: JsonValue, itemPath: string) => T
): T[] | undefined {
  const value = lookupOptional(obj, key);
  return value === undefined ? undefined : asArray(value, fieldPath(path, key), readItem);
}
