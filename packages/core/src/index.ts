// @routedoc/core entry point
//
// Schema engine (builders, matchers, coercer, failure trees, explainer),
// route contracts (annotation store, merge rules, request/response
// adapter), the documentation compiler with its Swagger 2.0 renderer, and
// the in-process host the contract interceptors run on.

// Schema engine
export * from './types/schema.js';
export {
  optional,
  OptionalKey,
  str,
  int,
  num,
  bool,
  nil,
  any,
  arrayOf,
  oneOfValues,
  maybe,
  obj,
  loosen,
  named,
  type Shape,
} from './schema/builders.js';
export {
  identityMatcher,
  stringCoercionMatcher,
  composeMatchers,
  type Matcher,
} from './schema/matchers.js';
export {
  coerce,
  coerceOrThrow,
  type CoerceOptions,
  type CoercionResult,
} from './schema/coercer.js';
export {
  LeafFailure,
  NamedFailure,
  SchemaMismatch,
  MISSING_REQUIRED_KEY,
  DISALLOWED_KEY,
  failureTreeFromAjv,
  isFailureMap,
  type FailureMap,
  type FailureTree,
} from './schema/failures.js';
export { explain, explanationLines, type Explanation } from './schema/explain.js';

// Contracts
export {
  PARAMETER_LOCATIONS,
  DEFAULT_RESPONSE,
  assertContract,
  isParameterLocation,
  isResponseKey,
  type Contract,
  type ParameterLocation,
  type ParameterMap,
  type ResponseMap,
  type ResponseSpec,
} from './contract/types.js';
export {
  mergeContracts,
  mergeAll,
  mergeParameters,
  mergeResponses,
  mergeLocationSchemas,
} from './contract/merge.js';
export {
  annotate,
  annotation,
  annotationOf,
  isAnnotated,
  terminalInterceptor,
} from './contract/annotation.js';
export {
  REQUEST_FIELDS,
  toRequestSchema,
  withRequestDefaults,
  toResponseSchema,
  withResponseDefaults,
  selectResponseSpec,
  makeCoerceRequest,
  makeValidateResponse,
  type RequestField,
  type RequestParams,
  type NormalizedResponse,
  type RequestCoercion,
  type ResponseValidation,
} from './contract/adapter.js';

// Documentation
export type { AggregateDocument, DocumentInfo, PathItem } from './docs/types.js';
export {
  compile,
  injectDocs,
  routeContract,
  isDocumented,
} from './docs/compiler.js';
export {
  toSwagger,
  toSwaggerSchema,
  toSwaggerPath,
  toOperation,
  renderDocument,
  type SwaggerDocument,
  type SwaggerOperation,
  type SwaggerParameter,
  type SwaggerResponse,
  type SwaggerSchema,
} from './docs/swagger.js';

// Host and interceptors
export * from './http/types.js';
export {
  interceptor,
  handler,
  middleware,
  onRequest,
  onResponse,
  before,
  after,
  around,
  response,
} from './http/interceptor.js';
export { execute } from './http/chain.js';
export { expandRoutes, joinPaths, routeKey } from './http/routes.js';
export { matchRoute, type RouteMatch } from './http/router.js';
export {
  createService,
  requestFor,
  type RawRequest,
  type RequestOptions,
  type Service,
} from './http/service.js';
export {
  DEFAULT_PARSER_MAP,
  parseContentType,
  parseFormBody,
  mediaType,
  type BodyParser,
  type ParserMap,
} from './http/body-params.js';
export {
  coerceRequest,
  validateResponse,
  bodyParams,
  openApiJson,
  COERCE_REQUEST,
  VALIDATE_RESPONSE,
  BODY_PARAMS,
  OPENAPI_JSON,
  MALFORMED_BODY,
  type DocumentRenderer,
} from './http/interceptors.js';

// Options
export {
  resolveOptions,
  validateOptions,
  DEFAULT_STATUSES,
  type RouteDocOptions,
  type ResolvedOptions,
  type StatusOptions,
  type CoercionOptions,
} from './types/options.js';

// Errors
export {
  ErrorCode,
  type Severity,
  getExitCode,
  getHttpStatus,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type ProductionView,
  type PresenterOptions,
} from './errors/presenter.js';
export * from './types/errors.js';
export * from './types/result.js';

// Logging and utilities
export {
  createConsoleLogger,
  silentLogger,
  isLogLevel,
  type Logger,
  type LogLevel,
} from './util/logger.js';
export { createContractAjv, getSharedAjv, type AjvInstance } from './util/ajv.js';
export { canonicalJson } from './util/canonical-json.js';
