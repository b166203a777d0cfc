/**
 * Error hierarchy for routedoc
 * Faults are raised for programmer errors and for failures surfaced by
 * wrapped code; ordinary validation failures travel as Result values.
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';
import type { SchemaMismatch } from '../schema/failures.js';
import { isPlainRecord } from '../util/records.js';

export interface ErrorContext {
  path?: string; // route path template or JSON Pointer into a value
  method?: string;
  location?: string; // parameter location or request field
  value?: unknown; // problematic value (may contain PII)
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface RouteDocErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

const SENSITIVE_KEYS = new Set([
  'password',
  'apikey',
  'authorization',
  'secret',
  'token',
  'cookie',
]);

/**
 * Base error class for all routedoc errors
 */
export abstract class RouteDocError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  public suggestions?: string[];

  constructor(params: RouteDocErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging
   * - dev: includes stack and full context
   * - prod: excludes stack and redacts sensitive keys in context.value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context:
        env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context) return context;

    const redactValue = (val: unknown): unknown => {
      if (Array.isArray(val)) return val.map(redactValue);
      if (isPlainRecord(val)) {
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(val)) {
          out[k] = SENSITIVE_KEYS.has(k.toLowerCase())
            ? '[REDACTED]'
            : redactValue(v);
        }
        return out;
      }
      return val;
    };

    const redacted: ErrorContext = { ...context };
    if ('value' in redacted) {
      redacted.value = redactValue(redacted.value);
    }
    return redacted;
  }
}

/**
 * A contract fragment that does not respect the contract shape
 */
export class ContractError extends RouteDocError {
  constructor(message: string, context?: ErrorContext) {
    super({ message, errorCode: ErrorCode.INVALID_CONTRACT, context });
  }
}

/**
 * Ajv refused to compile a schema found in a contract
 */
export class SchemaCompileError extends RouteDocError {
  constructor(message: string, cause?: Error, context?: ErrorContext) {
    super({
      message,
      errorCode: ErrorCode.SCHEMA_COMPILE_FAILED,
      context,
      cause,
    });
  }
}

/**
 * Route tree cannot be expanded or compiled (duplicate path+method, bad node)
 */
export class RouteTableError extends RouteDocError {
  constructor(message: string, context?: ErrorContext) {
    super({ message, errorCode: ErrorCode.DUPLICATE_ROUTE, context });
  }
}

export type MismatchStage = 'request' | 'response';

/**
 * Thrown form of a SchemaMismatch. The stage tells which interceptor owns it.
 */
export class SchemaMismatchError extends RouteDocError {
  constructor(
    public readonly stage: MismatchStage,
    public readonly mismatch: SchemaMismatch<unknown>
  ) {
    super({
      message: `Value does not match ${stage} schema`,
      errorCode:
        stage === 'request'
          ? ErrorCode.REQUEST_SCHEMA_MISMATCH
          : ErrorCode.RESPONSE_SCHEMA_MISMATCH,
      severity: stage === 'request' ? 'warn' : 'error',
      context: { value: mismatch.value },
    });
  }
}

export class ConfigurationError extends RouteDocError {
  constructor(message: string, context?: ErrorContext) {
    super({ message, errorCode: ErrorCode.CONFIGURATION_ERROR, context });
  }
}

/**
 * Raw body bytes could not be decoded for the declared content type
 */
export class DeserializationError extends RouteDocError {
  constructor(contentType: string, cause?: Error) {
    super({
      message: `Cannot deserialize body as ${contentType}`,
      errorCode: ErrorCode.DESERIALIZATION_FAILED,
      severity: 'warn',
      context: { contentType },
      cause,
    });
  }
}

/**
 * A module handed to the CLI does not export a usable route tree
 */
export class RouteModuleError extends RouteDocError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super({
      message,
      errorCode: ErrorCode.ROUTE_MODULE_INVALID,
      context,
      cause,
    });
  }
}

export class InternalError extends RouteDocError {
  constructor(message: string, cause?: Error) {
    super({ message, errorCode: ErrorCode.INTERNAL_ERROR, cause });
  }
}

export function isRouteDocError(error: unknown): error is RouteDocError {
  return error instanceof RouteDocError;
}

export function isSchemaMismatchError(
  error: unknown,
  stage?: MismatchStage
): error is SchemaMismatchError {
  return (
    error instanceof SchemaMismatchError &&
    (stage === undefined || error.stage === stage)
  );
}
