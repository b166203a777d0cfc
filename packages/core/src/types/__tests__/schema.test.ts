import { describe, it, expect } from 'vitest';

import { isObjectSchema, isSchemaObject, schemaTypes } from '../schema.js';

describe('Schema type guards', () => {
  it('should tell keyword objects from booleans and arrays', () => {
    expect(isSchemaObject({})).toBe(true);
    expect(isSchemaObject(true)).toBe(false);
    expect(isSchemaObject([])).toBe(false);
    expect(isSchemaObject(null)).toBe(false);
  });

  it('should list declared types', () => {
    expect(schemaTypes({ type: 'string' })).toEqual(['string']);
    expect(schemaTypes({ type: ['integer', 'null'] })).toEqual(['integer', 'null']);
    expect(schemaTypes({})).toEqual([]);
    expect(schemaTypes(false)).toEqual([]);
  });

  it('should recognise object schemas by type or by keywords', () => {
    expect(isObjectSchema({ type: 'object' })).toBe(true);
    expect(isObjectSchema({ type: ['object', 'null'] })).toBe(true);
    expect(isObjectSchema({ properties: {} })).toBe(true);
    expect(isObjectSchema({ required: ['a'] })).toBe(true);
    expect(isObjectSchema({ type: 'string', properties: {} })).toBe(false);
    expect(isObjectSchema({ items: {} })).toBe(false);
    expect(isObjectSchema(true)).toBe(false);
  });
});
