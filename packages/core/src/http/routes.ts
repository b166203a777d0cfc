/**
 * Route-tree expansion: a declarative tree of nodes becomes a flat list
 * of routes, each carrying its full interceptor chain.
 */
import { RouteTableError } from '../types/errors.js';
import { interceptor } from './interceptor.js';
import {
  HTTP_METHODS,
  type HandlerFn,
  type Interceptor,
  type MethodEntry,
  type Route,
  type RouteNode,
} from './types.js';

export function joinPaths(parent: string, child: string): string {
  const segments = [...splitPath(parent), ...splitPath(child)];
  return '/' + segments.join('/');
}

export function splitPath(path: string): string[] {
  return path.split('/').filter((segment) => segment.length > 0);
}

function isHandlerFn(entry: MethodEntry): entry is HandlerFn {
  return typeof entry === 'function';
}

function isInterceptorList(
  entry: Interceptor | readonly Interceptor[]
): entry is readonly Interceptor[] {
  return Array.isArray(entry);
}

// Bare functions become undocumented handlers
function methodInterceptors(entry: MethodEntry, name: string): Interceptor[] {
  if (isHandlerFn(entry)) {
    return [
      interceptor({
        name,
        enter: async (context) => ({
          ...context,
          response: await entry(context.request),
        }),
      }),
    ];
  }
  return isInterceptorList(entry) ? [...entry] : [entry];
}

export function routeKey(path: string, method: string): string {
  return `${method.toUpperCase()} ${path}`;
}

/**
 * Flatten a route tree. Ambient interceptors accumulate outer-to-inner and
 * the method's own interceptors come last.
 *
 * @throws RouteTableError on an empty method chain or a duplicate
 * (path, method) pair
 */
export function expandRoutes(tree: RouteNode | readonly RouteNode[]): Route[] {
  const routes: Route[] = [];
  const seen = new Set<string>();

  const visit = (
    node: RouteNode,
    prefix: string,
    ambient: readonly Interceptor[]
  ): void => {
    const path = joinPaths(prefix, node.path);
    const chain = [...ambient, ...(node.interceptors ?? [])];

    for (const method of HTTP_METHODS) {
      const entry = node.methods?.[method];
      if (entry === undefined) continue;
      const key = routeKey(path, method);
      if (seen.has(key)) {
        throw new RouteTableError(`Duplicate route ${key}`, { path, method });
      }
      seen.add(key);

      const own = methodInterceptors(entry, key);
      const terminal = own[own.length - 1];
      if (terminal === undefined) {
        throw new RouteTableError(`Route ${key} has no handler`, {
          path,
          method,
        });
      }
      routes.push({
        name: terminal.name,
        path,
        method,
        pathParts: splitPath(path),
        interceptors: [...chain, ...own],
      });
    }

    for (const child of node.children ?? []) {
      visit(child, path, chain);
    }
  };

  const roots: readonly RouteNode[] = isNodeList(tree) ? tree : [tree];
  for (const root of roots) {
    visit(root, '/', []);
  }
  return routes;
}

function isNodeList(
  tree: RouteNode | readonly RouteNode[]
): tree is readonly RouteNode[] {
  return Array.isArray(tree);
}
