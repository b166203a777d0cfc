import { isObjectSchema, type Schema } from '../types/schema.js';
import { unionOrdered } from '../util/records.js';
import {
  PARAMETER_LOCATIONS,
  type Contract,
  type ParameterMap,
  type ResponseMap,
} from './types.js';

/**
 * Two object schemas declared for the same location combine their
 * properties and required keys; `inner` wins per property. Anything else
 * is replaced by `inner`.
 */
export function mergeLocationSchemas(outer: Schema, inner: Schema): Schema {
  if (!isObjectSchema(outer) || !isObjectSchema(inner)) return inner;
  const required = unionOrdered(outer.required, inner.required);
  const properties =
    outer.properties === undefined && inner.properties === undefined
      ? undefined
      : { ...outer.properties, ...inner.properties };
  return {
    ...outer,
    ...inner,
    ...(properties ? { properties } : {}),
    ...(required ? { required } : {}),
  };
}

export function mergeParameters(
  outer: ParameterMap | undefined,
  inner: ParameterMap | undefined
): ParameterMap | undefined {
  if (outer === undefined) return inner;
  if (inner === undefined) return outer;
  const merged: ParameterMap = {};
  for (const location of PARAMETER_LOCATIONS) {
    const a = outer[location];
    const b = inner[location];
    if (a !== undefined && b !== undefined) {
      merged[location] = mergeLocationSchemas(a, b);
    } else if (a !== undefined || b !== undefined) {
      merged[location] = b ?? a;
    }
  }
  return merged;
}

export function mergeResponses(
  outer: ResponseMap | undefined,
  inner: ResponseMap | undefined
): ResponseMap | undefined {
  if (outer === undefined) return inner;
  if (inner === undefined) return outer;
  const merged: ResponseMap = { ...outer };
  for (const [key, spec] of Object.entries(inner)) {
    merged[key] = { ...merged[key], ...spec };
  }
  return merged;
}

/**
 * Merge two contract fragments, `inner` being the one closer to the
 * handler. Scalars: inner wins. Lists: ordered union. Parameters and
 * responses: union of their keys.
 */
export function mergeContracts(outer: Contract, inner: Contract): Contract {
  const merged: Contract = {};

  const description = inner.description ?? outer.description;
  const summary = inner.summary ?? outer.summary;
  const operationId = inner.operationId ?? outer.operationId;
  if (description !== undefined) merged.description = description;
  if (summary !== undefined) merged.summary = summary;
  if (operationId !== undefined) merged.operationId = operationId;

  const tags = unionOrdered(outer.tags, inner.tags);
  const consumes = unionOrdered(outer.consumes, inner.consumes);
  const produces = unionOrdered(outer.produces, inner.produces);
  if (tags) merged.tags = tags;
  if (consumes) merged.consumes = consumes;
  if (produces) merged.produces = produces;

  const parameters = mergeParameters(outer.parameters, inner.parameters);
  const responses = mergeResponses(outer.responses, inner.responses);
  if (parameters) merged.parameters = parameters;
  if (responses) merged.responses = responses;

  return merged;
}

/** Fold fragments outer-to-inner */
export function mergeAll(fragments: readonly Contract[]): Contract {
  return fragments.reduce<Contract>(
    (acc, fragment) => mergeContracts(acc, fragment),
    {}
  );
}
