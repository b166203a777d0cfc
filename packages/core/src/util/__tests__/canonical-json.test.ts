import { describe, it, expect } from 'vitest';

import { canonicalJson } from '../canonical-json.js';

describe('canonicalJson', () => {
  it('should sort keys at every level and drop undefined members', () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { f: 1, e: 0 }], c: undefined } })).toBe(
      '{"a":{"d":[2,{"e":0,"f":1}]},"b":1}'
    );
  });

  it('should normalise numbers', () => {
    expect(canonicalJson([-0, Infinity, Number.NaN, 1.5])).toBe('[0,null,null,1.5]');
  });

  it('should write bigints and dates as strings', () => {
    expect(canonicalJson({ n: 10n, at: new Date(0) })).toBe(
      '{"at":"1970-01-01T00:00:00.000Z","n":"10"}'
    );
  });

  it('should render undefined array slots and functions as null', () => {
    expect(canonicalJson([undefined, () => 1])).toBe('[null,null]');
  });

  it('should keep "__proto__" as an ordinary key', () => {
    expect(canonicalJson(JSON.parse('{"__proto__":{"x":1},"a":2}'))).toBe(
      '{"__proto__":{"x":1},"a":2}'
    );
  });

  it('should be independent of insertion order', () => {
    expect(canonicalJson({ x: 1, y: [1, 2] })).toBe(canonicalJson({ y: [1, 2], x: 1 }));
  });
});
