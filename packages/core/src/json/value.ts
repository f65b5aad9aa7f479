/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

// Untyped JSON tree with order-preserving objects

import { TypeMismatchError } from '../errors';

/**
 * JSON objects are held in a Map so every key, including integer-like
 * version keys such as "2", keeps its insertion order on output.
 */
export type JsonMap = Map<string, JsonValue>;

/**
 * Integers beyond Number.MAX_SAFE_INTEGER are held as bigint.
 */
export type JsonValue = JsonMap | JsonValue[] | string | number | bigint | boolean | null;

export function isJsonMap(value: JsonValue | undefined): value is JsonMap {
  return value instanceof Map;
}

export function describeJson(value: JsonValue | undefined): string {
  if (value === undefined) return 'nothing';
  if (value === null) return 'null';
  if (value instanceof Map) return 'object';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export function expectMap(value: JsonValue | undefined, path: string): JsonMap {
  if (!isJsonMap(value)) {
    throw new TypeMismatchError(path, 'object', describeJson(value));
  }
  return value;
}

/**
 * Like expectMap, but an absent or null value yields undefined
 */
export function optionalMap(value: JsonValue | undefined, path: string): JsonMap | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return expectMap(value, path);
}

export function expectString(value: JsonValue | undefined, path: string): string {
  if (typeof value !== 'string') {
    throw new TypeMismatchError(path, 'string', describeJson(value));
  }
  return value;
}

export function optionalString(value: JsonValue | undefined, path: string): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  return expectString(value, path);
}

export function expectArray(value: JsonValue | undefined, path: string): JsonValue[] {
  if (!Array.isArray(value)) {
    throw new TypeMismatchError(path, 'array', describeJson(value));
  }
  return value;
}

/**
 * Build a JsonMap from entries, keeping their order
 */
export function jsonMap(entries: Iterable<readonly [string, JsonValue]> = []): JsonMap {
  return new Map(entries);
}

/**
 * Convert a JsonValue to plain JS data. Useful for assertions and for
 * handing documents to code that expects ordinary objects.
 */
export function toPlain(value: JsonValue): unknown {
  if (value instanceof Map) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of value) {
      result[key] = toPlain(entry);
    }
    return result;
  }
  if (Array.isArray(value)) {
    return value.map(toPlain);
  }
  return value;
}
