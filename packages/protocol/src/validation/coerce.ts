// Narrowing helpers for decoded wire payloads
//
// The transport hands units a map of dynamic values. Numeric fields may arrive
// as any integer or floating-point representation; these helpers widen them
// to JS numbers in one place.

import type { DynamicMap } from '../types/common.js';
import { UnitError } from '../errors.js';

/**
 * True for a plain string-keyed object (not an array, not null).
 */
export function isDynamicMap(value: unknown): value is DynamicMap {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !ArrayBuffer.isView(value) &&
    !(value instanceof Map) &&
    !(value instanceof Date)
  );
}

/**
 * The input as a map, or an `invalid_input` error.
 */
export function requireMap(input: unknown, domain?: string): DynamicMap {
  if (input === undefined || input === null) {
    return {};
  }
  if (!isDynamicMap(input)) {
    throw new UnitError('invalid_input', 'invalid input type: expected an object', { domain });
  }
  return input;
}

/**
 * Widen any numeric representation to a finite number.
 */
export function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  return undefined;
}

/**
 * Widen and truncate to an integer.
 */
export function toInt(value: unknown): number | undefined {
  const numeric = toNumber(value);
  return numeric === undefined ? undefined : Math.trunc(numeric);
}

/**
 * String value of a key, or '' when absent or not text.
 */
export function readString(map: DynamicMap, key: string): string {
  const value = map[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Text list from a list of strings, or a heterogeneous list whose primitive
 * entries are converted to text. Objects and nulls are dropped.
 */
export function toStringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const result: string[] = [];
  for (const item of value) {
    if (typeof item === 'string') {
      result.push(item);
    } else if (typeof item === 'number' || typeof item === 'boolean' || typeof item === 'bigint') {
      result.push(String(item));
    }
  }
  return result;
}

export function readBoolean(map: DynamicMap, key: string): boolean | undefined {
  const value = map[key];
  return typeof value === 'boolean' ? value : undefined;
}
