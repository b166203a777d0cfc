/**
 * Contract interceptors: request coercion, response validation, body
 * decoding and the document endpoint.
 *
 * Each one annotates itself with the responses it can produce, so the
 * compiled document lists them for every route that carries it.
 */
import { annotate, annotation } from '../contract/annotation.js';
import {
  makeCoerceRequest,
  makeValidateResponse,
  selectResponseSpec,
} from '../contract/adapter.js';
import type { AggregateDocument } from '../docs/types.js';
import { toSwagger } from '../docs/swagger.js';
import { explain } from '../schema/explain.js';
import type { SchemaMismatch } from '../schema/failures.js';
import {
  InternalError,
  isSchemaMismatchError,
  DeserializationError,
} from '../types/errors.js';
import { resolveOptions, type RouteDocOptions } from '../types/options.js';
import { isErr } from '../types/result.js';
import { routeKey } from './routes.js';
import {
  DEFAULT_PARSER_MAP,
  parseContentType,
  type ParserMap,
} from './body-params.js';
import { interceptor } from './interceptor.js';
import type { Context, Interceptor, Response } from './types.js';

export const COERCE_REQUEST = 'routedoc/coerce-request';
export const VALIDATE_RESPONSE = 'routedoc/validate-response';
export const BODY_PARAMS = 'routedoc/body-params';
export const OPENAPI_JSON = 'routedoc/openapi-json';

export const MALFORMED_BODY = 'Malformed request body';

function mismatchResponse(status: number, mismatch: SchemaMismatch<unknown>): Response {
  return { status, headers: {}, body: { error: explain(mismatch.error) } };
}

function describeRoute(context: Context): string {
  return routeKey(context.route.path, context.route.method);
}

/**
 * Coerces path, query, header, body and form parameters against the
 * route's parameter contract. A mismatch answers with the unprocessable
 * status and the explained failure.
 */
export function coerceRequest(options: RouteDocOptions = {}): Interceptor {
  const resolved = resolveOptions(options);
  const status = resolved.statuses.unprocessable;
  const coerce = makeCoerceRequest(resolved.coercion.request, {
    validateFormats: resolved.validateFormats,
  });

  return annotate(
    { responses: { [status]: {} } },
    interceptor({
      name: COERCE_REQUEST,
      enter: (context) => {
        const parameters = annotation(context.route)?.parameters;
        if (parameters === undefined) return context;
        const result = coerce(parameters, context.request);
        if (isErr(result)) {
          resolved.logger.debug('Request rejected by parameter contract', {
            route: describeRoute(context),
          });
          return { ...context, response: mismatchResponse(status, result.error) };
        }
        return { ...context, request: result.value };
      },
      error: (context, error) => {
        if (!isSchemaMismatchError(error, 'request')) throw error;
        return { ...context, response: mismatchResponse(status, error.mismatch) };
      },
    })
  );
}

/**
 * Validates the outgoing response against the contract entry for its
 * status (or the default entry). A mismatch replaces the response with
 * the internal-error status and the explained failure.
 */
export function validateResponse(options: RouteDocOptions = {}): Interceptor {
  const resolved = resolveOptions(options);
  const status = resolved.statuses.internalError;
  const validate = makeValidateResponse(resolved.coercion.response, {
    validateFormats: resolved.validateFormats,
  });

  return annotate(
    { responses: { [status]: {} } },
    interceptor({
      name: VALIDATE_RESPONSE,
      leave: (context) => {
        const { response } = context;
        if (response === undefined) return context;
        const spec = selectResponseSpec(
          annotation(context.route)?.responses,
          response.status
        );
        if (spec === undefined) return context;
        const result = validate(spec, response);
        if (isErr(result)) {
          resolved.logger.warn('Response rejected by response contract', {
            route: describeRoute(context),
            status: response.status,
          });
          return { ...context, response: mismatchResponse(status, result.error) };
        }
        return { ...context, response: result.value };
      },
      error: (context, error) => {
        if (!isSchemaMismatchError(error, 'response')) throw error;
        return { ...context, response: mismatchResponse(status, error.mismatch) };
      },
    })
  );
}

/**
 * Decodes the request body through `parsers`, keyed by media type. An
 * undecodable body answers with the bad-request status.
 */
export function bodyParams(
  parsers: ParserMap = DEFAULT_PARSER_MAP,
  options: RouteDocOptions = {}
): Interceptor {
  const resolved = resolveOptions(options);
  const status = resolved.statuses.badRequest;
  const malformed = (context: Context, error: DeserializationError): Context => {
    resolved.logger.debug('Request body could not be decoded', {
      route: describeRoute(context),
      contentType: error.context?.['contentType'],
    });
    return {
      ...context,
      response: { status, headers: {}, body: { error: MALFORMED_BODY } },
    };
  };

  return annotate(
    { consumes: Object.keys(parsers), responses: { [status]: {} } },
    interceptor({
      name: BODY_PARAMS,
      enter: (context) => {
        try {
          return { ...context, request: parseContentType(parsers, context.request) };
        } catch (error) {
          if (error instanceof DeserializationError) return malformed(context, error);
          throw error;
        }
      },
      error: (context, error) => {
        if (!(error instanceof DeserializationError)) throw error;
        return malformed(context, error);
      },
    })
  );
}

export type DocumentRenderer = (document: AggregateDocument) => unknown;

/**
 * Serves the compiled document of the route table it belongs to.
 */
export function openApiJson(render: DocumentRenderer = toSwagger): Interceptor {
  return interceptor({
    name: OPENAPI_JSON,
    enter: (context) => {
      const { document } = context.route;
      if (document === undefined) {
        throw new InternalError(
          `Route ${describeRoute(context)} has no compiled document; build the table with injectDocs`
        );
      }
      return {
        ...context,
        response: {
          status: 200,
          headers: { 'content-type': 'application/json' },
          body: render(document),
        },
      };
    },
  });
}
