import { splitPath } from './routes.js';
import type { HttpMethod, Route } from './types.js';

export interface RouteMatch {
  route: Route;
  pathParams: Record<string, string>;
}

function decode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

function matchParts(
  parts: readonly string[],
  segments: readonly string[]
): Record<string, string> | undefined {
  const params: Record<string, string> = {};
  for (const [index, part] of parts.entries()) {
    if (part.startsWith('*')) {
      params[part.slice(1)] = segments.slice(index).map(decode).join('/');
      return params;
    }
    const segment = segments[index];
    if (segment === undefined) return undefined;
    if (part.startsWith(':')) {
      params[part.slice(1)] = decode(segment);
    } else if (part !== segment) {
      return undefined;
    }
  }
  return segments.length === parts.length ? params : undefined;
}

/**
 * First route whose method and template match. Templates support
 * `:param` (one segment) and `*splat` (the rest of the path).
 */
export function matchRoute(
  routes: readonly Route[],
  method: HttpMethod,
  path: string
): RouteMatch | undefined {
  const segments = splitPath(path);
  for (const route of routes) {
    if (route.method !== method) continue;
    const pathParams = matchParts(route.pathParts, segments);
    if (pathParams) return { route, pathParams };
  }
  return undefined;
}
