/**
 * Swagger 2.0 rendering of an aggregate document.
 */
import { STATUS_CODES } from 'node:http';
import type { OpenAPIV2 } from 'openapi-types';

import { DEFAULT_RESPONSE, type Contract, type ResponseSpec } from '../contract/types.js';
import { HTTP_METHODS } from '../http/types.js';
import {
  isObjectSchema,
  isSchemaObject,
  schemaTypes,
  type Schema,
  type SchemaObject,
} from '../types/schema.js';
import { canonicalJson } from '../util/canonical-json.js';
import type { AggregateDocument } from './types.js';

export type SwaggerSchema = OpenAPIV2.SchemaObject;
export type SwaggerParameter = OpenAPIV2.Parameter;
export type SwaggerResponse = OpenAPIV2.ResponseObject;
export type SwaggerOperation = OpenAPIV2.OperationObject;
export type SwaggerDocument = OpenAPIV2.Document;

type ParameterIn = 'path' | 'query' | 'header' | 'formData';

const PASS_THROUGH_KEYWORDS = [
  'title',
  'description',
  'default',
  'format',
  'pattern',
  'minLength',
  'maxLength',
  'minimum',
  'maximum',
  'multipleOf',
  'minItems',
  'maxItems',
  'uniqueItems',
  'minProperties',
  'maxProperties',
  'required',
] as const satisfies readonly (keyof SchemaObject)[];

// Keywords a non-body parameter or a response header may carry
const SIMPLE_KEYWORDS = [
  'type',
  'format',
  'items',
  'collectionFormat',
  'enum',
  'default',
  'description',
  'pattern',
  'minLength',
  'maxLength',
  'minimum',
  'maximum',
  'exclusiveMinimum',
  'exclusiveMaximum',
  'multipleOf',
  'minItems',
  'maxItems',
  'uniqueItems',
] as const;

/** `/pets/:pet-id/*rest` → `/pets/{pet-id}/{rest}` */
export function toSwaggerPath(template: string): string {
  return template.replace(/[:*]([^/]+)/g, '{$1}');
}

function nullableBranch(branches: readonly Schema[]): Schema | undefined {
  if (branches.length !== 2) return undefined;
  const [first, second] = branches;
  if (first === undefined || second === undefined) return undefined;
  const isNull = (s: Schema): boolean =>
    isSchemaObject(s) && s.type === 'null' && Object.keys(s).length === 1;
  if (isNull(second)) return first;
  if (isNull(first)) return second;
  return undefined;
}

/**
 * JSON Schema → Swagger 2.0 schema object. Union types and nullable
 * unions fold into `x-nullable`; other unions keep their branches under
 * `x-anyOf` / `x-oneOf`.
 */
export function toSwaggerSchema(schema: Schema): SwaggerSchema {
  if (!isSchemaObject(schema)) return {};

  const unions = schema.anyOf ?? schema.oneOf;
  if (unions) {
    const inner = nullableBranch(unions);
    if (inner !== undefined) {
      return { ...toSwaggerSchema(inner), 'x-nullable': true };
    }
  }

  const out: Record<string, unknown> = {};
  const types = schemaTypes(schema);
  const concrete = types.filter((type) => type !== 'null');
  if (concrete[0] !== undefined) out['type'] = concrete[0];
  if (concrete.length > 1) out['x-types'] = concrete;
  if (types.includes('null')) out['x-nullable'] = true;

  for (const keyword of PASS_THROUGH_KEYWORDS) {
    if (schema[keyword] !== undefined) out[keyword] = schema[keyword];
  }
  if (schema.exclusiveMinimum !== undefined) {
    out['minimum'] = schema.exclusiveMinimum;
    out['exclusiveMinimum'] = true;
  }
  if (schema.exclusiveMaximum !== undefined) {
    out['maximum'] = schema.exclusiveMaximum;
    out['exclusiveMaximum'] = true;
  }
  if (schema.enum !== undefined) out['enum'] = [...schema.enum];
  if (schema.const !== undefined) out['enum'] = [schema.const];
  if (schema.examples?.[0] !== undefined) out['example'] = schema.examples[0];

  if (schema.properties !== undefined) {
    out['properties'] = Object.fromEntries(
      Object.entries(schema.properties).map(([key, child]) => [
        key,
        toSwaggerSchema(child),
      ])
    );
  }
  if (schema.additionalProperties !== undefined) {
    out['additionalProperties'] =
      typeof schema.additionalProperties === 'boolean'
        ? schema.additionalProperties
        : toSwaggerSchema(schema.additionalProperties);
  }
  if (schema.items !== undefined) out['items'] = toSwaggerSchema(schema.items);
  if (schema.allOf !== undefined) out['allOf'] = schema.allOf.map(toSwaggerSchema);
  if (schema.anyOf !== undefined) out['x-anyOf'] = schema.anyOf.map(toSwaggerSchema);
  if (schema.oneOf !== undefined) out['x-oneOf'] = schema.oneOf.map(toSwaggerSchema);

  return out;
}

function simpleSchema(schema: Schema, multi: boolean): OpenAPIV2.ItemsObject {
  const full: Record<string, unknown> = toSwaggerSchema(schema);
  const out: Record<string, unknown> = {};
  for (const keyword of SIMPLE_KEYWORDS) {
    if (full[keyword] !== undefined) out[keyword] = full[keyword];
  }
  const type = typeof out['type'] === 'string' ? out['type'] : 'string';
  if (type === 'array') {
    if (out['items'] === undefined) out['items'] = { type: 'string' };
    if (multi) out['collectionFormat'] = 'multi';
  }
  return { ...out, type };
}

function expandLocation(
  location: ParameterIn,
  schema: Schema
): OpenAPIV2.GeneralParameterObject[] {
  if (!isObjectSchema(schema) || schema.properties === undefined) return [];
  const required = new Set(schema.required ?? []);
  const multi = location === 'query' || location === 'formData';
  return Object.entries(schema.properties).map(([name, child]) => ({
    ...simpleSchema(child, multi),
    name,
    in: location,
    required: location === 'path' || required.has(name),
  }));
}

function toParameters(contract: Contract): SwaggerParameter[] {
  const parameters = contract.parameters ?? {};
  const out: SwaggerParameter[] = [
    ...(parameters.path ? expandLocation('path', parameters.path) : []),
    ...(parameters.query ? expandLocation('query', parameters.query) : []),
    ...(parameters.header ? expandLocation('header', parameters.header) : []),
    ...(parameters.formData ? expandLocation('formData', parameters.formData) : []),
  ];
  if (parameters.body !== undefined) {
    out.push({
      name: 'body',
      in: 'body',
      required: true,
      schema: toSwaggerSchema(parameters.body),
    });
  }
  return out;
}

export function statusDescription(key: string): string {
  if (key === DEFAULT_RESPONSE) return '';
  return STATUS_CODES[key] ?? '';
}

function toResponse(key: string, spec: ResponseSpec): SwaggerResponse {
  const out: SwaggerResponse = {
    description: spec.description ?? statusDescription(key),
  };
  if (spec.schema !== undefined) out.schema = toSwaggerSchema(spec.schema);
  if (
    spec.headers !== undefined &&
    isObjectSchema(spec.headers) &&
    spec.headers.properties !== undefined
  ) {
    out.headers = Object.fromEntries(
      Object.entries(spec.headers.properties).map(([name, child]) => [
        name,
        simpleSchema(child, false),
      ])
    );
  }
  return out;
}

export function toOperation(contract: Contract): SwaggerOperation {
  const responses = Object.entries(contract.responses ?? {});
  const operation: SwaggerOperation = {
    parameters: toParameters(contract),
    responses:
      responses.length === 0
        ? { [DEFAULT_RESPONSE]: { description: '' } }
        : Object.fromEntries(responses.map(([key, spec]) => [key, toResponse(key, spec)])),
  };
  if (contract.summary !== undefined) operation.summary = contract.summary;
  if (contract.description !== undefined) operation.description = contract.description;
  if (contract.operationId !== undefined) operation.operationId = contract.operationId;
  if (contract.tags !== undefined) operation.tags = [...contract.tags];
  if (contract.consumes !== undefined) operation.consumes = [...contract.consumes];
  if (contract.produces !== undefined) operation.produces = [...contract.produces];
  return operation;
}

export function toSwagger(document: AggregateDocument): SwaggerDocument {
  const paths: OpenAPIV2.PathsObject = {};
  for (const [template, item] of Object.entries(document.paths)) {
    const operations: OpenAPIV2.PathItemObject = {};
    for (const method of HTTP_METHODS) {
      const contract = item[method];
      if (contract !== undefined) operations[method] = toOperation(contract);
    }
    paths[toSwaggerPath(template)] = operations;
  }
  return {
    swagger: '2.0',
    info: { ...document.info },
    paths,
  };
}

/** Canonical JSON text of a rendered document */
export function renderDocument(value: unknown): string {
  return canonicalJson(value);
}
