/**
 * Route contracts: the declarative description of what a route accepts
 * and what it may answer.
 */
import { ContractError } from '../types/errors.js';
import { isSchemaObject, type Schema } from '../types/schema.js';
import { isPlainRecord } from '../util/records.js';

export const PARAMETER_LOCATIONS = [
  'path',
  'query',
  'header',
  'body',
  'formData',
] as const;

export type ParameterLocation = (typeof PARAMETER_LOCATIONS)[number];

export type ParameterMap = Partial<Record<ParameterLocation, Schema>>;

export interface ResponseSpec {
  description?: string;
  /** Schema of the response body */
  schema?: Schema;
  /** Schema of the response headers, keyed by header name */
  headers?: Schema;
}

/** Keyed by status code ("200", 404, ...) or "default" */
export type ResponseMap = Record<string, ResponseSpec>;

export interface Contract {
  description?: string;
  summary?: string;
  operationId?: string;
  tags?: readonly string[];
  consumes?: readonly string[];
  produces?: readonly string[];
  parameters?: ParameterMap;
  responses?: ResponseMap;
}

export const DEFAULT_RESPONSE = 'default';

const CONTRACT_KEYS = new Set([
  'description',
  'summary',
  'operationId',
  'tags',
  'consumes',
  'produces',
  'parameters',
  'responses',
]);
const TEXT_KEYS = ['description', 'summary', 'operationId'] as const;
const LIST_KEYS = ['tags', 'consumes', 'produces'] as const;
const RESPONSE_SPEC_KEYS = new Set(['description', 'schema', 'headers']);
const STATUS_KEY_RE = /^[1-5]\d\d$/;

export function isParameterLocation(key: string): key is ParameterLocation {
  return PARAMETER_LOCATIONS.some((location) => location === key);
}

export function isResponseKey(key: string): boolean {
  return key === DEFAULT_RESPONSE || STATUS_KEY_RE.test(key);
}

function isSchema(value: unknown): value is Schema {
  return typeof value === 'boolean' || isSchemaObject(value);
}

function assertResponseSpec(key: string, spec: unknown): void {
  if (!isPlainRecord(spec)) {
    throw new ContractError(`Response "${key}" must be an object`, {
      path: `responses/${key}`,
      value: spec,
    });
  }
  for (const field of Object.keys(spec)) {
    if (!RESPONSE_SPEC_KEYS.has(field)) {
      throw new ContractError(`Unknown response field "${field}"`, {
        path: `responses/${key}/${field}`,
      });
    }
  }
  if (spec.description !== undefined && typeof spec.description !== 'string') {
    throw new ContractError('Response description must be a string', {
      path: `responses/${key}/description`,
      value: spec.description,
    });
  }
  for (const field of ['schema', 'headers'] as const) {
    const value = spec[field];
    if (value !== undefined && !isSchema(value)) {
      throw new ContractError(`Response ${field} must be a schema`, {
        path: `responses/${key}/${field}`,
        value,
      });
    }
  }
}

/**
 * Check the shape of a contract fragment.
 *
 * @throws ContractError on unknown keys, parameter locations outside the
 * closed set, malformed response keys or non-schema values
 */
export function assertContract(value: unknown): asserts value is Contract {
  if (!isPlainRecord(value)) {
    throw new ContractError('Contract must be a plain object', { value });
  }

  for (const key of Object.keys(value)) {
    if (!CONTRACT_KEYS.has(key)) {
      throw new ContractError(`Unknown contract key "${key}"`, { path: key });
    }
  }

  for (const key of TEXT_KEYS) {
    const text = value[key];
    if (text !== undefined && typeof text !== 'string') {
      throw new ContractError(`Contract ${key} must be a string`, {
        path: key,
        value: text,
      });
    }
  }

  for (const key of LIST_KEYS) {
    const list = value[key];
    if (
      list !== undefined &&
      !(Array.isArray(list) && list.every((item) => typeof item === 'string'))
    ) {
      throw new ContractError(`Contract ${key} must be a list of strings`, {
        path: key,
        value: list,
      });
    }
  }

  const { parameters, responses } = value;
  if (parameters !== undefined) {
    if (!isPlainRecord(parameters)) {
      throw new ContractError('Contract parameters must be an object', {
        path: 'parameters',
      });
    }
    for (const [location, schema] of Object.entries(parameters)) {
      if (!isParameterLocation(location)) {
        throw new ContractError(
          `Unknown parameter location "${location}" (expected one of ${PARAMETER_LOCATIONS.join(', ')})`,
          { path: `parameters/${location}`, location }
        );
      }
      if (!isSchema(schema)) {
        throw new ContractError(`Parameters for ${location} must be a schema`, {
          path: `parameters/${location}`,
          location,
          value: schema,
        });
      }
    }
  }

  if (responses !== undefined) {
    if (!isPlainRecord(responses)) {
      throw new ContractError('Contract responses must be an object', {
        path: 'responses',
      });
    }
    for (const [key, spec] of Object.entries(responses)) {
      if (!isResponseKey(key)) {
        throw new ContractError(
          `Response key "${key}" must be an HTTP status or "default"`,
          { path: `responses/${key}` }
        );
      }
      assertResponseSpec(key, spec);
    }
  }
}
