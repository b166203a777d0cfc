export function isPlainRecord(
  value: unknown
): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Ordered set union: keeps first occurrence order, drops duplicates
 */
export function unionOrdered<T>(
  a: readonly T[] | undefined,
  b: readonly T[] | undefined
): T[] | undefined {
  if (a === undefined && b === undefined) return undefined;
  const out: T[] = [];
  const seen = new Set<T>();
  for (const item of [...(a ?? []), ...(b ?? [])]) {
    if (seen.has(item)) continue;
    seen.add(item);
    out.push(item);
  }
  return out;
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Assign an own enumerable property, including keys such as "__proto__"
 * that plain assignment would route to the prototype setter.
 */
export function setOwn<T>(
  target: Record<string, T>,
  key: string,
  value: T
): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

export function hasOwn(target: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(target, key);
}
