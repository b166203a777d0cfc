/**
 * Documentation compiler: folds the contract fragments of every route
 * into one aggregate document.
 */
import {
  annotationOf,
  isAnnotated,
  terminalInterceptor,
} from '../contract/annotation.js';
import { mergeAll } from '../contract/merge.js';
import type { Contract } from '../contract/types.js';
import { routeKey } from '../http/routes.js';
import type { Route } from '../http/types.js';
import { RouteTableError } from '../types/errors.js';
import { deepFreeze, hasOwn, setOwn } from '../util/records.js';
import type { AggregateDocument, DocumentInfo, PathItem } from './types.js';

/**
 * Merged contract of a route: every annotated interceptor of its chain,
 * outer-to-inner, the handler last.
 */
export function routeContract(route: Route): Contract {
  const fragments: Contract[] = [];
  for (const interceptor of route.interceptors) {
    const fragment = annotationOf(interceptor);
    if (fragment) fragments.push(fragment);
  }
  return mergeAll(fragments);
}

/** Only routes whose handler carries a contract are documented */
export function isDocumented(route: Route): boolean {
  const terminal = terminalInterceptor(route);
  return terminal !== undefined && isAnnotated(terminal);
}

/**
 * @throws RouteTableError when two routes share a path and method
 */
export function compile(
  routes: readonly Route[],
  info: DocumentInfo
): AggregateDocument {
  const paths: Record<string, PathItem> = {};
  for (const route of routes) {
    if (!isDocumented(route)) continue;
    const item: PathItem = hasOwn(paths, route.path) ? (paths[route.path] ?? {}) : {};
    if (item[route.method] !== undefined) {
      throw new RouteTableError(
        `Duplicate route ${routeKey(route.path, route.method)}`,
        { path: route.path, method: route.method }
      );
    }
    item[route.method] = routeContract(route);
    setOwn(paths, route.path, item);
  }
  return deepFreeze({ info: { ...info }, paths });
}

/**
 * Compile the table and hand every route its merged contract and the
 * shared document. Input routes are left untouched.
 */
export function injectDocs(info: DocumentInfo, routes: readonly Route[]): Route[] {
  const document = compile(routes, info);
  return routes.map((route) =>
    Object.freeze({
      ...route,
      contract: deepFreeze(routeContract(route)),
      document,
    })
  );
}
