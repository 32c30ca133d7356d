// Schema constructors

import type { Field, Schema } from '../types/schema.js';

type SchemaOptions = Omit<Schema, 'type' | 'properties' | 'required' | 'items'>;

export function stringSchema(options: SchemaOptions = {}): Schema {
  return { type: 'string', ...options };
}

export function numberSchema(options: SchemaOptions = {}): Schema {
  return { type: 'number', ...options };
}

export function booleanSchema(options: SchemaOptions = {}): Schema {
  return { type: 'boolean', ...options };
}

export function arraySchema(items: Schema, options: SchemaOptions = {}): Schema {
  return { type: 'array', items, ...options };
}

/**
 * Object schema from a name → schema map. Each entry becomes a Field.
 */
export function objectSchema(
  properties: Record<string, Schema>,
  required: readonly string[] = [],
  options: SchemaOptions = {}
): Schema {
  const fields: Record<string, Field> = {};
  for (const [name, schema] of Object.entries(properties)) {
    fields[name] = { name, schema };
  }
  return { type: 'object', properties: fields, required, ...options };
}
