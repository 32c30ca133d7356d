// Declarative schema tree used to describe unit inputs and outputs

export type SchemaType = 'object' | 'array' | 'string' | 'number' | 'boolean';

/**
 * A named property of an object schema.
 */
export type Field = {
  name: string;
  schema: Schema;
};

/**
 * Schema node. Immutable after construction; validation never mutates it.
 *
 * - `array` schemas carry `items`
 * - `object` schemas carry `properties`, and `required` names a subset of them
 */
export type Schema = {
  type: SchemaType;
  description?: string;
  properties?: Readonly<Record<string, Field>>;
  required?: readonly string[];
  items?: Schema;
  enum?: readonly unknown[];
  min?: number;
  max?: number;
  minLength?: number;
  maxLength?: number;
  /** Regular expression the whole string must match */
  pattern?: string;
  default?: unknown;
  /** Soft hint: a null value is accepted */
  optional?: boolean;
};
