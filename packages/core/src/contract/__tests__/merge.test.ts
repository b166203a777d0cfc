import { describe, it, expect } from 'vitest';

import { int, obj, str } from '../../schema/builders.js';
import { mergeAll, mergeContracts, mergeLocationSchemas } from '../merge.js';

describe('contract merging', () => {
  it('should let the inner fragment win on scalar fields', () => {
    expect(
      mergeContracts(
        { description: 'ambient', summary: 'outer' },
        { summary: 'leaf' }
      )
    ).toEqual({ description: 'ambient', summary: 'leaf' });
  });

  it('should union list fields in first-seen order', () => {
    expect(
      mergeContracts(
        { consumes: ['application/json', 'text/plain'], tags: ['a'] },
        { consumes: ['text/plain', 'application/xml'], tags: ['b', 'a'] }
      )
    ).toEqual({
      consumes: ['application/json', 'text/plain', 'application/xml'],
      tags: ['a', 'b'],
    });
  });

  it('should keep parameter locations from both sides', () => {
    const merged = mergeContracts(
      { parameters: { header: obj({ auth: str() }) } },
      { parameters: { body: obj({ name: str() }) } }
    );
    expect(merged.parameters).toEqual({
      header: obj({ auth: str() }),
      body: obj({ name: str() }),
    });
  });

  it('should combine object schemas declared for the same location', () => {
    expect(
      mergeLocationSchemas(obj({ auth: str() }), obj({ trace: str(), auth: int() }))
    ).toEqual({
      type: 'object',
      properties: { auth: { type: 'integer' }, trace: { type: 'string' } },
      required: ['auth', 'trace'],
      additionalProperties: false,
    });
  });

  it('should replace non-object schemas with the inner one', () => {
    expect(mergeLocationSchemas(str(), int())).toEqual(int());
  });

  it('should union response keys and merge entries per key', () => {
    const merged = mergeContracts(
      { responses: { 400: {}, 200: { description: 'outer' } } },
      { responses: { 200: { schema: str() }, default: {} } }
    );
    expect(merged.responses).toEqual({
      200: { description: 'outer', schema: { type: 'string' } },
      400: {},
      default: {},
    });
  });

  it('mergeAll should fold fragments outer to inner', () => {
    expect(
      mergeAll([
        { description: 'first', responses: { 422: {} } },
        { description: 'second' },
        { summary: 'leaf', responses: { 200: {} } },
      ])
    ).toEqual({
      description: 'second',
      summary: 'leaf',
      responses: { 200: {}, 422: {} },
    });
  });

  it('should not mutate its inputs', () => {
    const outer = { responses: { 400: {} } };
    const inner = { responses: { 200: {} } };
    mergeContracts(outer, inner);
    expect(outer).toEqual({ responses: { 400: {} } });
    expect(inner).toEqual({ responses: { 200: {} } });
  });
});
