// Schema validation
//
// Validates decoded wire payloads against a Schema tree. Validation is pure:
// it never mutates the schema or the value, and the same pair always yields
// the same verdict.

import type { Field, Schema, SchemaType } from '../types/schema.js';
import { UnitError } from '../errors.js';

/**
 * Result of validating a value against a schema
 */
export type SchemaValidationResult =
  | { valid: true }
  | {
      valid: false;
      /** Dotted path to the offending value, empty for the root */
      path: string;
      message: string;
    };

const VALID: SchemaValidationResult = { valid: true };

function fail(path: string, message: string): SchemaValidationResult {
  return { valid: false, path, message };
}

/**
 * Describe a value's type for error messages.
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (ArrayBuffer.isView(value)) return value.constructor.name;
  if (value instanceof Map) return 'map';
  return typeof value;
}

function isNumeric(value: unknown): value is number | bigint {
  return typeof value === 'number' || typeof value === 'bigint';
}

function formatValue(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(formatValue).join(', ')}]`;
  return String(value);
}

/**
 * Anchored regular expression for a schema pattern, or an error message when
 * the pattern does not compile.
 */
function compilePattern(pattern: string): RegExp | string {
  try {
    return new RegExp(`^(?:${pattern})$`, 'u');
  } catch (error) {
    return `invalid pattern "${pattern}": ${error instanceof Error ? error.message : String(error)}`;
  }
}

/**
 * Entries of a key/value map: plain objects and string-keyed Maps qualify.
 */
function asEntries(value: unknown): Map<string, unknown> | undefined {
  if (value instanceof Map) {
    const entries = new Map<string, unknown>();
    for (const [key, item] of value) {
      if (typeof key !== 'string') return undefined;
      entries.set(key, item);
    }
    return entries;
  }
  if (typeof value === 'object' && value !== null && !Array.isArray(value) && !ArrayBuffer.isView(value)) {
    return new Map(Object.entries(value));
  }
  return undefined;
}

/**
 * Elements of a heterogeneous list or a typed numeric list.
 */
function asElements(value: unknown): unknown[] | undefined {
  if (Array.isArray(value)) return value;
  if (ArrayBuffer.isView(value) && !(value instanceof DataView) && isIterable(value)) {
    return Array.from(value);
  }
  return undefined;
}

function isIterable(value: object): value is Iterable<unknown> {
  return Symbol.iterator in value;
}

function join(path: string, segment: string): string {
  return path === '' ? segment : `${path}.${segment}`;
}

function checkEnum(schema: Schema, value: unknown, path: string): SchemaValidationResult {
  if (schema.enum === undefined || schema.enum.length === 0) return VALID;
  if (schema.enum.some((allowed) => allowed === value)) return VALID;
  return fail(path, `value ${formatValue(value)} is not one of allowed values ${formatValue(schema.enum)}`);
}

function validateString(schema: Schema, value: unknown, path: string): SchemaValidationResult {
  if (typeof value !== 'string') {
    return fail(path, `expected string, got ${describeType(value)}`);
  }
  const length = [...value].length;
  if (schema.minLength !== undefined && length < schema.minLength) {
    return fail(path, `string length ${length} is less than minimum ${schema.minLength}`);
  }
  if (schema.maxLength !== undefined && length > schema.maxLength) {
    return fail(path, `string length ${length} exceeds maximum ${schema.maxLength}`);
  }
  if (schema.pattern !== undefined && schema.pattern !== '') {
    const pattern = compilePattern(schema.pattern);
    if (typeof pattern === 'string') {
      return fail(path, pattern);
    }
    if (!pattern.test(value)) {
      return fail(path, `string "${value}" does not match pattern "${schema.pattern}"`);
    }
  }
  return checkEnum(schema, value, path);
}

function validateNumber(schema: Schema, value: unknown, path: string): SchemaValidationResult {
  if (!isNumeric(value)) {
    return fail(path, `expected number, got ${describeType(value)}`);
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return fail(path, `expected finite number, got ${value}`);
  }
  const numeric = Number(value);
  if (schema.min !== undefined && numeric < schema.min) {
    return fail(path, `value ${numeric} is less than minimum ${schema.min}`);
  }
  if (schema.max !== undefined && numeric > schema.max) {
    return fail(path, `value ${numeric} exceeds maximum ${schema.max}`);
  }
  return checkEnum(schema, value, path);
}

function validateBoolean(schema: Schema, value: unknown, path: string): SchemaValidationResult {
  if (typeof value !== 'boolean') {
    return fail(path, `expected boolean, got ${describeType(value)}`);
  }
  return checkEnum(schema, value, path);
}

function validateArray(schema: Schema, value: unknown, path: string): SchemaValidationResult {
  const elements = asElements(value);
  if (elements === undefined) {
    return fail(path, `expected array, got ${describeType(value)}`);
  }
  if (schema.items === undefined) return VALID;
  for (let i = 0; i < elements.length; i++) {
    const result = validateSchema(schema.items, elements[i], `${path}[${i}]`);
    if (!result.valid) {
      return { ...result, message: `array item ${i}: ${result.message}` };
    }
  }
  return VALID;
}

function validateObject(schema: Schema, value: unknown, path: string): SchemaValidationResult {
  const entries = asEntries(value);
  if (entries === undefined) {
    return fail(path, `expected object, got ${describeType(value)}`);
  }

  // Every required key is checked before any property value
  for (const name of schema.required ?? []) {
    if (!entries.has(name)) {
      return fail(join(path, name), `required field "${name}" is missing`);
    }
  }

  const properties: Readonly<Record<string, Field>> = schema.properties ?? {};
  for (const [name, field] of Object.entries(properties)) {
    if (!entries.has(name)) continue;
    const result = validateSchema(field.schema, entries.get(name), join(path, name));
    if (!result.valid) {
      return { ...result, message: `field "${name}": ${result.message}` };
    }
  }
  return VALID;
}

const validators: Record<
  SchemaType,
  (schema: Schema, value: unknown, path: string) => SchemaValidationResult
> = {
  string: validateString,
  number: validateNumber,
  boolean: validateBoolean,
  array: validateArray,
  object: validateObject,
};

/**
 * Validate a value against a schema.
 *
 * Order: null check, object shape, required keys, declared properties
 * (unknown keys ignored), array elements, then type, enum and bound checks.
 */
export function validateSchema(schema: Schema, value: unknown, path = ''): SchemaValidationResult {
  if (value === null || value === undefined) {
    if (schema.optional) return VALID;
    return fail(path, 'input is null');
  }
  const validator = Object.hasOwn(validators, schema.type) ? validators[schema.type] : undefined;
  if (!validator) {
    return fail(path, `unknown schema type: ${String(schema.type)}`);
  }
  return validator(schema, value, path);
}

/**
 * Validate and return an `invalid_input` UnitError on failure, or null.
 */
export function schemaError(schema: Schema, value: unknown, domain?: string): UnitError | null {
  const result = validateSchema(schema, value);
  if (result.valid) return null;
  return new UnitError('invalid_input', result.message, {
    domain,
    details: { path: result.path },
  });
}

/**
 * Throw an `invalid_input` UnitError when the value does not conform.
 */
export function assertSchema(schema: Schema, value: unknown, domain?: string): void {
  const error = schemaError(schema, value, domain);
  if (error) throw error;
}
