import {
  ConfigurationError,
  HTTP_METHODS,
  isHttpMethod,
  type HttpMethod,
} from '@routedoc/core';

export interface RouteModuleOptions {
  routes: string;
  export: string;
}

export interface OpenApiOptions extends RouteModuleOptions {
  title: string;
  apiVersion: string;
  description?: string;
  out?: string;
  canonical?: boolean;
}

export interface CoerceCommandOptions extends RouteModuleOptions {
  method: string;
  url: string;
  header: string[];
  body?: string;
  contentType?: string;
}

export const DEFAULT_BODY_TYPE = 'application/json';

/**
 * Commander reducer for repeatable flags.
 */
export function collect(value: string, previous: readonly string[] = []): string[] {
  return [...previous, value];
}

/**
 * Resolve --method into a known HTTP method (case-insensitive).
 */
export function resolveMethod(value: string): HttpMethod {
  const normalized = value.trim().toLowerCase();
  if (isHttpMethod(normalized)) return normalized;
  throw new ConfigurationError(
    `Invalid --method value "${value}". Expected one of ${HTTP_METHODS.join(', ')}.`
  );
}

/**
 * Split a `name: value` header flag. Names are lower-cased.
 */
export function parseHeader(value: string): [string, string] {
  const separator = value.indexOf(':');
  const name = separator > 0 ? value.slice(0, separator).trim() : '';
  if (name.length === 0) {
    throw new ConfigurationError(
      `Invalid --header value "${value}". Expected "name: value".`
    );
  }
  return [name.toLowerCase(), value.slice(separator + 1).trim()];
}

/**
 * Headers for an offline request. A body without an explicit content type
 * is sent as --content-type, or JSON.
 */
export function resolveHeaders(
  options: Pick<CoerceCommandOptions, 'header' | 'body' | 'contentType'>
): Record<string, string> {
  const headers = new Map<string, string>();
  for (const flag of options.header) {
    const [name, value] = parseHeader(flag);
    headers.set(name, value);
  }
  if (options.contentType !== undefined) {
    headers.set('content-type', options.contentType);
  } else if (options.body !== undefined && !headers.has('content-type')) {
    headers.set('content-type', DEFAULT_BODY_TYPE);
  }
  return Object.fromEntries(headers);
}
