/**
 * Content-type keyed body decoding. This is the only place where raw body
 * text becomes structured data.
 */
import { DeserializationError } from '../types/errors.js';
import { hasOwn, setOwn } from '../util/records.js';
import type { Request } from './types.js';

/** Decodes raw body text into the request fields it feeds */
export type BodyParser = (
  body: string,
  request: Request
) => Pick<Request, 'bodyParams' | 'formParams'>;

export type ParserMap = Readonly<Record<string, BodyParser>>;

export function parseFormBody(body: string): Record<string, unknown> {
  const params = new URLSearchParams(body);
  const fields: Record<string, unknown> = {};
  for (const key of new Set(params.keys())) {
    const values = params.getAll(key);
    setOwn(fields, key, values.length === 1 ? values[0] : values);
  }
  return fields;
}

export const DEFAULT_PARSER_MAP: ParserMap = Object.freeze({
  'application/json': (body: string) => ({ bodyParams: parseJson(body) }),
  'application/x-www-form-urlencoded': (body: string) => ({
    formParams: parseFormBody(body),
  }),
  'text/plain': (body: string) => ({ bodyParams: body }),
});

function parseJson(body: string): unknown {
  const parsed: unknown = JSON.parse(body);
  return parsed;
}

/** Media type without parameters, lower-cased */
export function mediaType(contentType: unknown): string | undefined {
  if (typeof contentType !== 'string') return undefined;
  const [type] = contentType.split(';');
  const normalized = type?.trim().toLowerCase();
  return normalized ? normalized : undefined;
}

/**
 * Decode the request body with the parser registered for its content
 * type. Requests without a body or with an unregistered type pass through.
 *
 * @throws DeserializationError when the parser rejects the body
 */
export function parseContentType(parsers: ParserMap, request: Request): Request {
  const type = mediaType(request.headers['content-type']);
  if (request.body === undefined || type === undefined) return request;
  const parser = hasOwn(parsers, type) ? parsers[type] : undefined;
  if (parser === undefined) return request;

  try {
    return { ...request, ...parser(request.body, request) };
  } catch (error) {
    throw new DeserializationError(
      type,
      error instanceof Error ? error : new Error(String(error))
    );
  }
}
