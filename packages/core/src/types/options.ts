/**
 * Configuration options for contract enforcement
 *
 * All options are optional with conservative defaults. Interceptor
 * factories and the documentation compiler resolve them once, at route
 * construction time.
 */
import { ErrorCode, getHttpStatus } from '../errors/codes.js';
import { ConfigurationError } from './errors.js';
import {
  identityMatcher,
  stringCoercionMatcher,
  type Matcher,
} from '../schema/matchers.js';
import {
  createConsoleLogger,
  isLogLevel,
  type LogLevel,
  type Logger,
} from '../util/logger.js';

/**
 * Status codes used when an interceptor short-circuits an exchange
 */
export interface StatusOptions {
  /** Body cannot be deserialized (default: 400) */
  badRequest?: number;
  /** Request does not match its parameter contract (default: 422) */
  unprocessable?: number;
  /** Response does not match its response contract (default: 500) */
  internalError?: number;
}

/**
 * Scalar coercions applied before validation
 */
export interface CoercionOptions {
  /** Matcher for inbound parameters (default: stringCoercionMatcher) */
  request?: Matcher;
  /** Matcher for outbound payloads (default: identityMatcher) */
  response?: Matcher;
}

export interface RouteDocOptions {
  statuses?: StatusOptions;
  coercion?: CoercionOptions;
  /** Validate `format` keywords through ajv-formats (default: false) */
  validateFormats?: boolean;
  /** Threshold for the default logger (default: ROUTEDOC_LOG_LEVEL or 'warn') */
  logLevel?: LogLevel;
  /** Replaces the default stderr logger */
  logger?: Logger;
}

export interface ResolvedOptions {
  statuses: Required<StatusOptions>;
  coercion: Required<CoercionOptions>;
  validateFormats: boolean;
  logLevel: LogLevel;
  logger: Logger;
}

export const DEFAULT_STATUSES: Readonly<Required<StatusOptions>> = {
  badRequest: getHttpStatus(ErrorCode.DESERIALIZATION_FAILED),
  unprocessable: getHttpStatus(ErrorCode.REQUEST_SCHEMA_MISMATCH),
  internalError: getHttpStatus(ErrorCode.RESPONSE_SCHEMA_MISMATCH),
};

function defaultLogLevel(): LogLevel {
  const fromEnv = process.env.ROUTEDOC_LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : 'warn';
}

export function resolveOptions(
  userOptions: RouteDocOptions = {}
): ResolvedOptions {
  const logLevel = userOptions.logLevel ?? defaultLogLevel();
  const resolved: ResolvedOptions = {
    validateFormats: userOptions.validateFormats ?? false,
    logLevel,
    logger: userOptions.logger ?? createConsoleLogger(logLevel),

    // Deep merge nested objects
    statuses: { ...DEFAULT_STATUSES, ...userOptions.statuses },
    coercion: {
      request: userOptions.coercion?.request ?? stringCoercionMatcher,
      response: userOptions.coercion?.response ?? identityMatcher,
    },
  };

  validateOptions(resolved);
  return resolved;
}

/**
 * Validates option combinations
 *
 * @throws ConfigurationError when a status code is not a 4xx/5xx integer
 */
export function validateOptions(options: ResolvedOptions): void {
  for (const [name, status] of Object.entries(options.statuses)) {
    if (!Number.isInteger(status) || status < 400 || status > 599) {
      throw new ConfigurationError(
        `statuses.${name} must be an HTTP error status (400-599), got ${String(status)}`,
        { option: `statuses.${name}`, value: status }
      );
    }
  }
}
