/**
 * ErrorPresenter - pure presentation layer for RouteDocError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import { explain, explanationLines } from '../schema/explain.js';
import {
  SchemaMismatchError,
  type ErrorContext,
  type RouteDocError,
  type SerializedError,
} from '../types/errors.js';
import { isPlainRecord } from '../util/records.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
  redactKeys?: string[];
  requestId?: string;
}

export interface CLIErrorView {
  code: ErrorCode;
  message: string;
  /** `METHOD /path` when the error names both */
  route?: string;
  /** Path, parameter location or module the error points at */
  location?: string;
  cause?: string;
  /** One `key.path: diagnostic` line per rejected value */
  details: string[];
  hints: string[];
  colors: boolean;
  terminalWidth: number;
}

export type ProductionView = SerializedError & { requestId?: string };

const DEFAULT_REDACT_KEYS = [
  'password',
  'apiKey',
  'secret',
  'token',
  'authorization',
  'cookie',
];

function contextText(ctx: ErrorContext | undefined, key: string): string | undefined {
  const value = ctx?.[key];
  return typeof value === 'string' ? value : undefined;
}

export class ErrorPresenter {
  constructor(
    private readonly env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: RouteDocError): CLIErrorView {
    return {
      code: error.errorCode,
      message: error.message,
      route: this.#formatRoute(error.context),
      location: this.#formatLocation(error.context),
      cause:
        this.env === 'dev' && error.cause ? error.cause.message : undefined,
      details:
        error instanceof SchemaMismatchError
          ? explanationLines(explain(error.mismatch.error))
          : [],
      hints: [...(error.suggestions ?? [])],
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth ?? process.stdout.columns ?? 80,
    };
  }

  formatForProduction(error: RouteDocError): ProductionView {
    // the error's own serializer redacts its defaults; presenter keys on top
    const base = error.toJSON('prod');
    return { ...this.#applyAdditionalRedaction(base), requestId: this.#getRequestId() };
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    return contextText(ctx, 'path') ?? contextText(ctx, 'location');
  }

  #formatRoute(ctx?: ErrorContext): string | undefined {
    const method = contextText(ctx, 'method');
    const path = contextText(ctx, 'path');
    return method && path ? `${method.toUpperCase()} ${path}` : undefined;
  }

  #getRequestId(): string | undefined {
    return this.options.requestId || process.env.REQUEST_ID || undefined;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return this.env === 'dev';
    return opt;
  }

  #applyAdditionalRedaction(view: SerializedError): SerializedError {
    const keys = new Set(this.options.redactKeys ?? DEFAULT_REDACT_KEYS);
    const redactor = (val: unknown): unknown => {
      if (Array.isArray(val)) return val.map(redactor);
      if (isPlainRecord(val)) {
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(val)) {
          out[k] = keys.has(k) ? '[REDACTED]' : redactor(v);
        }
        return out;
      }
      return val;
    };
    if (view.context && 'value' in view.context) {
      return {
        ...view,
        context: { ...view.context, value: redactor(view.context.value) },
      };
    }
    return view;
  }
}
