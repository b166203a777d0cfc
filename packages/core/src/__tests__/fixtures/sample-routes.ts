import { arrayOf, int, obj, str } from '../../schema/builders.js';
import { DEFAULT_PARSER_MAP } from '../../http/body-params.js';
import { before, handler, response } from '../../http/interceptor.js';
import {
  bodyParams,
  coerceRequest,
  openApiJson,
  validateResponse,
} from '../../http/interceptors.js';
import type { RouteNode } from '../../http/types.js';
import type { RouteDocOptions } from '../../types/options.js';
import { silentLogger } from '../../util/logger.js';

export const quiet: RouteDocOptions = { logger: silentLogger };

export const requireAuth = before(
  'require-auth',
  { parameters: { header: obj({ auth: str() }) } },
  (context) => context
);

export const PARSED_TYPES = [
  'application/json',
  'application/x-www-form-urlencoded',
  'text/plain',
];

/**
 * Small route table: an authenticated API with a documented root, an
 * item resource, an echo route, a route whose handler breaks its own
 * response contract and the document endpoint.
 */
export function sampleTree(options: RouteDocOptions = quiet): RouteNode {
  return {
    path: '/',
    interceptors: [
      bodyParams(DEFAULT_PARSER_MAP, options),
      validateResponse(options),
      coerceRequest(options),
      requireAuth,
    ],
    methods: {
      get: handler(
        'root',
        {
          description: 'Service status',
          responses: { 200: { schema: obj({ status: str() }) } },
        },
        () => response({ status: 'ok' })
      ),
    },
    children: [
      {
        path: '/x/:id',
        methods: {
          put: handler(
            'put-x',
            {
              summary: 'Replace x',
              parameters: { path: obj({ id: int() }), body: obj({ name: str() }) },
            },
            (request) =>
              response({ id: request.pathParams['id'], body: request.bodyParams })
          ),
          delete: handler(
            'delete-x',
            { parameters: { path: obj({ id: int() }) }, responses: { 204: {} } },
            () => response(null, 204)
          ),
        },
      },
      {
        path: '/echo/:id',
        methods: {
          get: handler(
            'echo',
            { parameters: { path: obj({ id: int() }) } },
            (request) =>
              response({ headers: request.headers, pathParams: request.pathParams })
          ),
        },
      },
      {
        path: '/broken',
        methods: {
          post: handler(
            'broken',
            {
              responses: {
                200: { schema: obj({ status: str() }) },
                default: {
                  schema: obj({ result: arrayOf(str()) }),
                  headers: obj({ Location: str() }),
                },
              },
            },
            () => ({ status: 201, body: { result: 'fail' } })
          ),
        },
      },
      { path: '/doc', methods: { get: openApiJson() } },
    ],
  };
}
