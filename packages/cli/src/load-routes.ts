import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { RouteModuleError, type RouteNode } from '@routedoc/core';

export type RouteTree = RouteNode | readonly RouteNode[];

function isRouteNode(value: unknown): value is RouteNode {
  return (
    typeof value === 'object' &&
    value !== null &&
    'path' in value &&
    typeof value.path === 'string'
  );
}

export function isRouteTree(value: unknown): value is RouteTree {
  if (Array.isArray(value)) return value.every(isRouteNode);
  return isRouteNode(value);
}

function moduleExports(mod: unknown): Map<string, unknown> {
  if (typeof mod !== 'object' || mod === null) return new Map();
  return new Map<string, unknown>(Object.entries(mod));
}

/**
 * Import a route module and return the route tree it exports under
 * `exportName`. Relative paths resolve against `cwd`.
 *
 * @throws RouteModuleError when the module cannot be imported or the
 * export is missing or not a route tree
 */
export async function loadRouteTree(
  modulePath: string,
  exportName = 'routes',
  cwd: string = process.cwd()
): Promise<RouteTree> {
  const resolved = path.resolve(cwd, modulePath);

  let mod: unknown;
  try {
    mod = await import(pathToFileURL(resolved).href);
  } catch (error) {
    const failure = new RouteModuleError(
      `Cannot load route module ${modulePath}`,
      { path: modulePath },
      error instanceof Error ? error : new Error(String(error))
    );
    failure.suggestions = ['Check the --routes path'];
    throw failure;
  }

  const exported = moduleExports(mod);
  if (!exported.has(exportName)) {
    const failure = new RouteModuleError(
      `Route module ${modulePath} has no export "${exportName}"`,
      { path: modulePath }
    );
    failure.suggestions = [
      `Export the route tree as "${exportName}" or name the export with --export`,
    ];
    throw failure;
  }

  const tree = exported.get(exportName);
  if (!isRouteTree(tree)) {
    throw new RouteModuleError(
      `Export "${exportName}" of ${modulePath} is not a route tree`,
      { path: modulePath }
    );
  }
  return tree;
}
