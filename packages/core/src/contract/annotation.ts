/**
 * Annotation store.
 *
 * Contract fragments live in a side table keyed by interceptor identity;
 * the interceptors themselves are never modified. Annotating returns a
 * fresh interceptor object so a shared interceptor can carry different
 * fragments in different places.
 */
import type { Interceptor, Route } from '../http/types.js';
import { deepFreeze } from '../util/records.js';
import { mergeContracts } from './merge.js';
import { assertContract, type Contract } from './types.js';

const fragments = new WeakMap<Interceptor, Contract>();

/**
 * Attach `fragment` to a copy of `target`. An existing annotation on
 * `target` is kept and merged with the new fragment (the new one wins on
 * scalar conflicts).
 *
 * @throws ContractError when the fragment is malformed
 */
export function annotate<I extends Interceptor>(fragment: Contract, target: I): I {
  assertContract(fragment);
  const existing = fragments.get(target);
  const copy = { ...target };
  fragments.set(
    copy,
    deepFreeze(existing ? mergeContracts(existing, fragment) : fragment)
  );
  Object.freeze(copy);
  return copy;
}

export function annotationOf(interceptor: Interceptor): Contract | undefined {
  return fragments.get(interceptor);
}

export function isAnnotated(interceptor: Interceptor): boolean {
  return fragments.has(interceptor);
}

function isRoute(target: Interceptor | Route): target is Route {
  return 'interceptors' in target;
}

export function terminalInterceptor(route: Route): Interceptor | undefined {
  return route.interceptors[route.interceptors.length - 1];
}

/**
 * Contract of an interceptor, or of a route: the merged runtime contract
 * when the route was compiled, else its terminal handler's fragment.
 */
export function annotation(target: Interceptor | Route): Contract | undefined {
  if (!isRoute(target)) return annotationOf(target);
  if (target.contract !== undefined) return target.contract;
  const terminal = terminalInterceptor(target);
  return terminal ? annotationOf(terminal) : undefined;
}
