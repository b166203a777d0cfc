/**
 * Request/response schema adapter.
 *
 * Turns the location-keyed parameter contract and the per-status response
 * contract into the single composite schemas the coercer runs against.
 */
import { loosen } from '../schema/builders.js';
import { coerce, type CoerceOptions } from '../schema/coercer.js';
import { SchemaMismatch } from '../schema/failures.js';
import type { Matcher } from '../schema/matchers.js';
import { err, isErr, ok, type Result } from '../types/result.js';
import type { Schema, SchemaObject } from '../types/schema.js';
import type { Request, Response } from '../http/types.js';
import { hasOwn, isPlainRecord } from '../util/records.js';
import {
  DEFAULT_RESPONSE,
  PARAMETER_LOCATIONS,
  type ParameterLocation,
  type ParameterMap,
  type ResponseMap,
  type ResponseSpec,
} from './types.js';

export const REQUEST_FIELDS = {
  body: 'bodyParams',
  formData: 'formParams',
  path: 'pathParams',
  query: 'queryParams',
  header: 'headers',
} as const satisfies Record<ParameterLocation, string>;

export type RequestField = (typeof REQUEST_FIELDS)[ParameterLocation];

// Real requests carry query and header keys beyond any contract
const LOOSENED_LOCATIONS: ReadonlySet<ParameterLocation> = new Set([
  'query',
  'header',
]);

/** The five parameter fields of a request, each present */
export interface RequestParams {
  bodyParams: unknown;
  formParams: Record<string, unknown>;
  pathParams: Record<string, unknown>;
  queryParams: Record<string, unknown>;
  headers: Record<string, unknown>;
}

export interface NormalizedResponse {
  status: number;
  headers: Record<string, unknown>;
  body: unknown;
}

const requestSchemas = new WeakMap<ParameterMap, SchemaObject>();
const responseSchemas = new WeakMap<ResponseSpec, SchemaObject>();

function buildRequestSchema(parameters: ParameterMap): SchemaObject {
  const properties: Record<string, Schema> = {};
  const required: string[] = [];
  for (const location of PARAMETER_LOCATIONS) {
    const schema = parameters[location];
    if (schema === undefined) continue;
    const field = REQUEST_FIELDS[location];
    properties[field] = LOOSENED_LOCATIONS.has(location) ? loosen(schema) : schema;
    required.push(field);
  }
  return {
    type: 'object',
    properties,
    ...(required.length > 0 ? { required } : {}),
    additionalProperties: true,
  };
}

/**
 * Composite request schema keyed by request field. Memoised per
 * parameter map so each contract compiles once.
 */
export function toRequestSchema(parameters: ParameterMap): SchemaObject {
  let schema = requestSchemas.get(parameters);
  if (!schema) {
    schema = buildRequestSchema(parameters);
    requestSchemas.set(parameters, schema);
  }
  return schema;
}

function recordOrEmpty(value: unknown): Record<string, unknown> {
  return isPlainRecord(value) ? value : {};
}

/** Fill absent parameter fields: null for the body, {} otherwise */
export function withRequestDefaults(request: Partial<RequestParams>): RequestParams {
  return {
    bodyParams: request.bodyParams ?? null,
    formParams: request.formParams ?? {},
    pathParams: request.pathParams ?? {},
    queryParams: request.queryParams ?? {},
    headers: request.headers ?? {},
  };
}

export function requestParams(request: Request): RequestParams {
  return withRequestDefaults(request);
}

function buildResponseSchema(spec: ResponseSpec): SchemaObject {
  const properties: Record<string, Schema> = {};
  if (spec.schema !== undefined) properties['body'] = spec.schema;
  if (spec.headers !== undefined) properties['headers'] = loosen(spec.headers);
  return { type: 'object', properties, additionalProperties: true };
}

export function toResponseSchema(spec: ResponseSpec): SchemaObject {
  let schema = responseSchemas.get(spec);
  if (!schema) {
    schema = buildResponseSchema(spec);
    responseSchemas.set(spec, schema);
  }
  return schema;
}

export function withResponseDefaults(response: Response): NormalizedResponse {
  return {
    status: response.status,
    headers: response.headers ?? {},
    body: response.body ?? null,
  };
}

/**
 * Exact status first, then the default entry; undefined means the
 * response goes unchecked.
 */
export function selectResponseSpec(
  responses: ResponseMap | undefined,
  status: number
): ResponseSpec | undefined {
  if (responses === undefined) return undefined;
  const key = String(status);
  if (hasOwn(responses, key)) return responses[key];
  if (hasOwn(responses, DEFAULT_RESPONSE)) return responses[DEFAULT_RESPONSE];
  return undefined;
}

export type RequestCoercion = (
  parameters: ParameterMap,
  request: Request
) => Result<Request, SchemaMismatch<ParameterMap>>;

export type ResponseValidation = (
  spec: ResponseSpec,
  response: Response
) => Result<Response, SchemaMismatch<ResponseSpec>>;

/**
 * Request coercion: defaults, composite schema, coerce, then the coerced
 * fields are written back over the request. A mismatch names the
 * parameter map and the request as given.
 */
export function makeCoerceRequest(
  matcher: Matcher,
  options: Omit<CoerceOptions, 'matcher'> = {}
): RequestCoercion {
  return (parameters, request) => {
    const result = coerce(toRequestSchema(parameters), requestParams(request), {
      ...options,
      matcher,
    });
    if (isErr(result)) {
      return err(new SchemaMismatch(parameters, request, result.error.error));
    }
    const coerced = recordOrEmpty(result.value);
    const next: Request = { ...request };
    for (const field of Object.values(REQUEST_FIELDS)) {
      if (!hasOwn(coerced, field)) continue;
      const value = coerced[field];
      if (field === 'bodyParams') {
        next.bodyParams = value;
      } else {
        next[field] = recordOrEmpty(value);
      }
    }
    return ok(next);
  };
}

export function makeValidateResponse(
  matcher: Matcher,
  options: Omit<CoerceOptions, 'matcher'> = {}
): ResponseValidation {
  return (spec, response) => {
    const normalized = withResponseDefaults(response);
    const result = coerce(
      toResponseSchema(spec),
      { headers: normalized.headers, body: normalized.body },
      { ...options, matcher }
    );
    if (isErr(result)) {
      return err(new SchemaMismatch(spec, response, result.error.error));
    }
    const coerced = recordOrEmpty(result.value);
    return ok({
      status: normalized.status,
      headers: recordOrEmpty(coerced['headers']),
      body: coerced['body'],
    });
  };
}
