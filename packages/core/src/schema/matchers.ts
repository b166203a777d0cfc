import { isSchemaObject, schemaTypes, type Schema } from '../types/schema.js';

/**
 * A matcher sees every schema node the coercer walks together with the
 * value found there, and returns the (possibly converted) value.
 */
export type Matcher = (schema: Schema, value: unknown) => unknown;

const INTEGER_RE = /^[+-]?\d+$/;
const NUMBER_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export const identityMatcher: Matcher = (_schema, value) => value;

/**
 * Converts strings (as found in paths, query strings, headers and form
 * bodies) into the scalar the schema asks for. Strings that do not parse
 * are left alone so validation reports them.
 */
export const stringCoercionMatcher: Matcher = (schema, value) => {
  if (typeof value !== 'string' || !isSchemaObject(schema)) return value;

  if (schema.enum && !schema.enum.includes(value)) {
    const member = schema.enum.find((candidate) => String(candidate) === value);
    if (member !== undefined) return member;
  }

  const types = schemaTypes(schema);
  if (types.includes('string')) return value;

  for (const type of types) {
    switch (type) {
      case 'integer': {
        if (INTEGER_RE.test(value)) {
          const n = Number(value);
          if (Number.isSafeInteger(n)) return n;
        }
        break;
      }
      case 'number': {
        if (NUMBER_RE.test(value)) {
          const n = Number(value);
          if (Number.isFinite(n)) return n;
        }
        break;
      }
      case 'boolean': {
        if (value === 'true') return true;
        if (value === 'false') return false;
        break;
      }
      case 'null': {
        if (value === '' || value === 'null') return null;
        break;
      }
      default:
        break;
    }
  }
  return value;
};

export function composeMatchers(...matchers: Matcher[]): Matcher {
  return (schema, value) =>
    matchers.reduce((current, matcher) => matcher(schema, current), value);
}
