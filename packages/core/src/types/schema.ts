/**
 * Schema types for contract authoring
 * JSON Schema (draft-07 subset understood by Ajv). A schema is either a
 * boolean (true accepts anything, false nothing) or a keyword object.
 */

export type SchemaType =
  | 'object'
  | 'array'
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'null';

// Type alias, not interface: must stay assignable to Ajv's indexed SchemaObject
export type SchemaObject = {
  type?: SchemaType | SchemaType[];
  title?: string;
  description?: string;
  default?: unknown;
  examples?: unknown[];
  const?: unknown;
  enum?: readonly unknown[];

  // object
  properties?: Record<string, Schema>;
  required?: string[];
  additionalProperties?: Schema;
  minProperties?: number;
  maxProperties?: number;

  // array
  items?: Schema;
  minItems?: number;
  maxItems?: number;
  uniqueItems?: boolean;

  // string
  format?: string;
  pattern?: string;
  minLength?: number;
  maxLength?: number;

  // number / integer
  minimum?: number;
  maximum?: number;
  exclusiveMinimum?: number;
  exclusiveMaximum?: number;
  multipleOf?: number;

  // composition
  allOf?: Schema[];
  anyOf?: Schema[];
  oneOf?: Schema[];
  not?: Schema;
};

export type Schema = SchemaObject | boolean;

export type ScalarType = Exclude<SchemaType, 'object' | 'array'>;

export function isSchemaObject(schema: unknown): schema is SchemaObject {
  return (
    typeof schema === 'object' && schema !== null && !Array.isArray(schema)
  );
}

export function schemaTypes(schema: Schema): SchemaType[] {
  if (!isSchemaObject(schema) || schema.type === undefined) return [];
  return Array.isArray(schema.type) ? schema.type : [schema.type];
}

/**
 * Object schemas are those typed 'object' or carrying object keywords
 */
export function isObjectSchema(schema: Schema): schema is SchemaObject {
  if (!isSchemaObject(schema)) return false;
  const types = schemaTypes(schema);
  if (types.length > 0) return types.includes('object');
  return (
    schema.properties !== undefined ||
    schema.required !== undefined ||
    schema.additionalProperties !== undefined
  );
}
