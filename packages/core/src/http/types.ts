/**
 * Exchange model shared by the interceptor chain, the route table and the
 * contract interceptors. Transport is out of scope: requests arrive as
 * already-materialised records.
 */
import type { Contract } from '../contract/types.js';
import type { AggregateDocument } from '../docs/types.js';

export const HTTP_METHODS = [
  'get',
  'put',
  'post',
  'delete',
  'patch',
  'head',
  'options',
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export interface Request {
  method: HttpMethod;
  path: string;
  /** Header names are lower-case */
  headers: Record<string, unknown>;
  queryParams: Record<string, unknown>;
  pathParams: Record<string, unknown>;
  /** Decoded body (set by body parsing) */
  bodyParams?: unknown;
  /** Decoded form fields (set by body parsing) */
  formParams?: Record<string, unknown>;
  /** Undecoded body text */
  body?: string;
}

export interface Response {
  status: number;
  headers?: Record<string, unknown>;
  body?: unknown;
}

export interface Context {
  request: Request;
  response?: Response;
  route: Route;
}

type Stage = (context: Context) => Context | Promise<Context>;

export interface Interceptor {
  readonly name: string;
  readonly enter?: Stage;
  readonly leave?: Stage;
  readonly error?: (
    context: Context,
    error: unknown
  ) => Context | Promise<Context>;
}

export type HandlerFn = (request: Request) => Response | Promise<Response>;

/** A method entry: one interceptor, a chain ending in the handler, or a bare function */
export type MethodEntry = Interceptor | readonly Interceptor[] | HandlerFn;

export interface RouteNode {
  path: string;
  /** Applied to every method of this node and of its children */
  interceptors?: readonly Interceptor[];
  methods?: Partial<Record<HttpMethod, MethodEntry>>;
  children?: readonly RouteNode[];
}

export interface Route {
  readonly name: string;
  readonly path: string;
  readonly method: HttpMethod;
  readonly pathParts: readonly string[];
  /** Ambient interceptors outer-to-inner, handler last */
  readonly interceptors: readonly Interceptor[];
  /** Merged runtime contract, set by injectDocs */
  readonly contract?: Contract;
  /** Compiled document shared by every route, set by injectDocs */
  readonly document?: AggregateDocument;
}

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}
