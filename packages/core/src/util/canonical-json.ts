type CanonicalJSONValue =
  | null
  | boolean
  | number
  | string
  | CanonicalJSONValue[]
  | { [key: string]: CanonicalJSONValue };

function normalizeNumber(value: number): number | null {
  if (!Number.isFinite(value)) return null;
  if (Object.is(value, -0)) return 0;
  return value;
}

function toCanonicalValue(value: unknown): CanonicalJSONValue {
  if (value === null || value === undefined) return null;
  switch (typeof value) {
    case 'number':
      return normalizeNumber(value);
    case 'bigint':
      return value.toString();
    case 'string':
    case 'boolean':
      return value;
    case 'function':
    case 'symbol':
      return null;
    default:
      break;
  }
  if (Array.isArray(value)) {
    return value.map((item) => toCanonicalValue(item));
  }
  if (value instanceof Date) return value.toISOString();

  const record: { [key: string]: CanonicalJSONValue } = {};
  for (const [key, child] of Object.entries(value)) {
    if (child === undefined || typeof child === 'function') continue;
    Object.defineProperty(record, key, {
      value: toCanonicalValue(child),
      enumerable: true,
    });
  }
  return record;
}

function canonicalizeParsed(value: CanonicalJSONValue): string {
  if (value === null) return 'null';
  if (typeof value === 'number' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalizeParsed(item)).join(',')}]`;
  }
  const entries = Object.keys(value)
    .sort()
    .map((key) => `${JSON.stringify(key)}:${canonicalizeParsed(value[key] ?? null)}`);
  return `{${entries.join(',')}}`;
}

/**
 * JSON text with object keys sorted at every level. Equal values always
 * serialise to the same bytes.
 */
export function canonicalJson(value: unknown): string {
  return canonicalizeParsed(toCanonicalValue(value));
}
