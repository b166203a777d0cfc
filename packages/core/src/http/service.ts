/**
 * In-process host: matches a materialised request against the route
 * table and runs the route's interceptor chain.
 */
import { ErrorPresenter } from '../errors/presenter.js';
import { isRouteDocError } from '../types/errors.js';
import { resolveOptions, type RouteDocOptions } from '../types/options.js';
import { setOwn } from '../util/records.js';
import { execute } from './chain.js';
import { matchRoute } from './router.js';
import { routeKey } from './routes.js';
import type { Context, HttpMethod, Request, Response, Route } from './types.js';

/** A request before routing: no path parameters, nothing decoded */
export type RawRequest = Omit<Request, 'pathParams' | 'bodyParams' | 'formParams'>;

export type Service = (request: RawRequest) => Promise<Response>;

export interface RequestOptions {
  headers?: Record<string, string>;
  body?: string;
}

function describeError(error: unknown, requestId: unknown): Record<string, unknown> {
  if (isRouteDocError(error)) {
    const presenter = new ErrorPresenter(
      'prod',
      typeof requestId === 'string' ? { requestId } : {}
    );
    return { ...presenter.formatForProduction(error) };
  }
  if (error instanceof Error) return { name: error.name, message: error.message };
  return { value: String(error) };
}

export function createService(
  routes: readonly Route[],
  options: RouteDocOptions = {}
): Service {
  const { logger, statuses } = resolveOptions(options);

  return async (raw) => {
    const match = matchRoute(routes, raw.method, raw.path);
    if (!match) {
      return { status: 404, headers: {}, body: { error: 'Not Found' } };
    }

    const context: Context = {
      request: { ...raw, pathParams: match.pathParams },
      route: match.route,
    };
    try {
      const result = await execute(context, match.route.interceptors);
      return (
        result.response ?? { status: 404, headers: {}, body: { error: 'Not Found' } }
      );
    } catch (error) {
      logger.error('Unhandled error while serving route', {
        route: routeKey(match.route.path, match.route.method),
        error: describeError(error, raw.headers['x-request-id']),
      });
      return {
        status: statuses.internalError,
        headers: {},
        body: { error: 'Internal Server Error' },
      };
    }
  };
}

function parseQuery(params: URLSearchParams): Record<string, unknown> {
  const query: Record<string, unknown> = {};
  for (const key of new Set(params.keys())) {
    const values = params.getAll(key);
    setOwn(query, key, values.length === 1 ? values[0] : values);
  }
  return query;
}

/**
 * Build a raw request from a method and URL. Header names are
 * lower-cased; repeated query keys become arrays.
 */
export function requestFor(
  method: HttpMethod,
  url: string,
  init: RequestOptions = {}
): RawRequest {
  const parsed = new URL(url, 'http://localhost');
  const headers: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(init.headers ?? {})) {
    setOwn(headers, name.toLowerCase(), value);
  }
  return {
    method,
    path: parsed.pathname,
    headers,
    queryParams: parseQuery(parsed.searchParams),
    ...(init.body !== undefined ? { body: init.body } : {}),
  };
}
