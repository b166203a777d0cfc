/**
 * Authoring vocabulary for contract schemas.
 *
 * Mappings built with `obj` are closed: every key not wrapped in
 * `optional` is required and unknown keys are rejected. `loosen` opens a
 * mapping to arbitrary extra keys.
 */
import {
  isObjectSchema,
  type Schema,
  type SchemaObject,
} from '../types/schema.js';
import { setOwn } from '../util/records.js';

type Constraints = Omit<SchemaObject, 'type'>;

/** Key predicate marking a mapping entry as optional */
export class OptionalKey {
  constructor(public readonly schema: Schema) {}
}

export type Shape = Record<string, Schema | OptionalKey>;

export function optional(schema: Schema): OptionalKey {
  return new OptionalKey(schema);
}

export function str(constraints: Constraints = {}): SchemaObject {
  return { type: 'string', ...constraints };
}

export function int(constraints: Constraints = {}): SchemaObject {
  return { type: 'integer', ...constraints };
}

export function num(constraints: Constraints = {}): SchemaObject {
  return { type: 'number', ...constraints };
}

export function bool(constraints: Constraints = {}): SchemaObject {
  return { type: 'boolean', ...constraints };
}

export function nil(): SchemaObject {
  return { type: 'null' };
}

/** Wildcard: any value matches */
export function any(): SchemaObject {
  return {};
}

export function arrayOf(items: Schema, constraints: Constraints = {}): SchemaObject {
  return { type: 'array', items, ...constraints };
}

export function oneOfValues(...values: unknown[]): SchemaObject {
  return { enum: values };
}

export function maybe(schema: Schema): SchemaObject {
  return { anyOf: [schema, { type: 'null' }] };
}

export function obj(shape: Shape, constraints: Constraints = {}): SchemaObject {
  const properties: Record<string, Schema> = {};
  const required: string[] = [];
  for (const [key, entry] of Object.entries(shape)) {
    if (entry instanceof OptionalKey) {
      setOwn(properties, key, entry.schema);
    } else {
      setOwn(properties, key, entry);
      required.push(key);
    }
  }
  return {
    type: 'object',
    properties,
    ...(required.length > 0 ? { required } : {}),
    additionalProperties: false,
    ...constraints,
  };
}

/**
 * Loosened variant of a mapping schema: arbitrary extra keys are accepted.
 * Non-mapping schemas come back unchanged.
 */
export function loosen(schema: Schema): Schema {
  if (!isObjectSchema(schema)) return schema;
  if (schema.additionalProperties === true) return schema;
  return { ...schema, additionalProperties: true };
}

/** Attach a name reported by the explainer instead of a raw diagnostic */
export function named(name: string, schema: Schema): SchemaObject {
  if (typeof schema === 'boolean') {
    return schema ? { title: name } : { title: name, not: {} };
  }
  return { ...schema, title: name };
}
