import { NamedFailure, isFailureMap } from './failures.js';
import { setOwn } from '../util/records.js';

export type Explanation = string | { [key: string]: Explanation };

/**
 * Turn a failure tree into a nested map of short diagnostics keyed like
 * the rejected value.
 *
 * Names only surface for leaf mismatches: a named failure that wraps a
 * map is explained through its entries.
 */
export function explain(failure: unknown): Explanation {
  if (failure instanceof NamedFailure) {
    return isFailureMap(failure.error) ? explain(failure.error) : failure.name;
  }

  if (isFailureMap(failure)) {
    const out: { [key: string]: Explanation } = {};
    for (const [key, value] of Object.entries(failure)) {
      setOwn(out, key, explain(value));
    }
    return out;
  }

  return String(failure);
}

/** Flatten an explanation into `path.to.key: message` lines */
export function explanationLines(
  explanation: Explanation,
  path: readonly string[] = []
): string[] {
  if (typeof explanation === 'string') {
    return [path.length > 0 ? `${path.join('.')}: ${explanation}` : explanation];
  }
  return Object.entries(explanation).flatMap(([key, child]) =>
    explanationLines(child, [...path, key])
  );
}
