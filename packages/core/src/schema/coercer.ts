/**
 * Schema-driven coercion.
 *
 * The walk follows schema and value in lock-step and hands every node to
 * the matcher; the walked value is then validated by Ajv. Input values
 * are never mutated: containers are rebuilt where the walk descends.
 */
import { SchemaMismatchError, type MismatchStage } from '../types/errors.js';
import { err, isErr, ok, type Result } from '../types/result.js';
import { isSchemaObject, type Schema } from '../types/schema.js';
import {
  getSharedAjv,
  getValidator,
  type AjvInstance,
} from '../util/ajv.js';
import { hasOwn, isPlainRecord } from '../util/records.js';
import { SchemaMismatch, failureTreeFromAjv } from './failures.js';
import { stringCoercionMatcher, type Matcher } from './matchers.js';

export interface CoerceOptions {
  /** Scalar coercion applied at every walked node (default: stringCoercionMatcher) */
  matcher?: Matcher;
  /** Ajv instance to validate with (default: shared contract instance) */
  ajv?: AjvInstance;
  validateFormats?: boolean;
}

export type CoercionResult = Result<unknown, SchemaMismatch>;

interface WalkContext {
  matcher: Matcher;
  ajv: AjvInstance;
}

function walk(schema: Schema, value: unknown, ctx: WalkContext): unknown {
  const matched = ctx.matcher(schema, value);
  if (!isSchemaObject(schema)) return matched;

  const branches = schema.anyOf ?? schema.oneOf;
  if (branches) {
    // first branch whose coerced candidate validates wins
    for (const branch of branches) {
      const candidate = walk(branch, matched, ctx);
      if (getValidator(ctx.ajv, branch)(candidate)) return candidate;
    }
    return matched;
  }

  if (schema.allOf) {
    return schema.allOf.reduce<unknown>(
      (current, member) => walk(member, current, ctx),
      matched
    );
  }

  if (Array.isArray(matched)) {
    const items = schema.items;
    if (items === undefined) return matched;
    return matched.map((item) => walk(items, item, ctx));
  }

  if (isPlainRecord(matched)) {
    const { properties, additionalProperties } = schema;
    const extra = isSchemaObject(additionalProperties)
      ? additionalProperties
      : undefined;
    if (properties === undefined && extra === undefined) return matched;

    return Object.fromEntries(
      Object.entries(matched).map(([key, child]) => {
        const childSchema =
          properties !== undefined && hasOwn(properties, key)
            ? properties[key]
            : extra;
        return [
          key,
          childSchema === undefined ? child : walk(childSchema, child, ctx),
        ];
      })
    );
  }

  return matched;
}

/**
 * Coerce `value` into the shape `schema` demands.
 *
 * Returns the coerced value, or a SchemaMismatch carrying the schema, the
 * original value and the failure tree (see `explain`).
 */
export function coerce(
  schema: Schema,
  value: unknown,
  options: CoerceOptions = {}
): CoercionResult {
  const ctx: WalkContext = {
    matcher: options.matcher ?? stringCoercionMatcher,
    ajv: options.ajv ?? getSharedAjv(options.validateFormats),
  };
  const walked = walk(schema, value, ctx);
  const validate = getValidator(ctx.ajv, schema);
  if (validate(walked)) {
    return ok(walked);
  }
  return err(
    new SchemaMismatch(schema, value, failureTreeFromAjv(validate.errors ?? []))
  );
}

/**
 * Throwing variant for code that prefers exceptions. The stage decides
 * which interceptor converts the error into a response.
 *
 * @throws SchemaMismatchError
 */
export function coerceOrThrow(
  stage: MismatchStage,
  schema: Schema,
  value: unknown,
  options: CoerceOptions = {}
): unknown {
  const result = coerce(schema, value, options);
  if (isErr(result)) {
    throw new SchemaMismatchError(stage, result.error);
  }
  return result.value;
}
