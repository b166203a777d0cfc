import AjvModule, {
  type ErrorObject,
  type Options as AjvOptions,
  type ValidateFunction,
} from 'ajv';
import addFormatsModule from 'ajv-formats';

import { SchemaCompileError } from '../types/errors.js';
import type { Schema } from '../types/schema.js';

// ajv ships CommonJS; under NodeNext the default import is module.exports
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

export type AjvInstance = InstanceType<typeof Ajv>;
export type { ErrorObject, ValidateFunction };

export interface ContractAjvOptions {
  validateFormats?: boolean;
}

const withFormats = new WeakSet<AjvInstance>();

/**
 * Create an Ajv instance for contract validation. Coercion is done by
 * the coercer's matcher walk, so Ajv itself never rewrites data.
 */
export function createContractAjv(options: ContractAjvOptions = {}): AjvInstance {
  const flags: AjvOptions = {
    allErrors: true,
    verbose: true, // errors carry parentSchema and data for the explainer
    strict: false,
    strictNumbers: true,
    allowUnionTypes: true,
    coerceTypes: false,
    useDefaults: false,
    removeAdditional: false,
    validateFormats: options.validateFormats ?? false,
  };
  const ajv = new Ajv(flags);
  if (flags.validateFormats) {
    addFormats(ajv);
    withFormats.add(ajv);
  }
  return ajv;
}

export function hasFormatsPlugin(ajv: AjvInstance): boolean {
  return withFormats.has(ajv);
}

const sharedInstances = new Map<boolean, AjvInstance>();

/** Process-wide instance per format flag; validators compiled once */
export function getSharedAjv(validateFormats = false): AjvInstance {
  let ajv = sharedInstances.get(validateFormats);
  if (!ajv) {
    ajv = createContractAjv({ validateFormats });
    sharedInstances.set(validateFormats, ajv);
  }
  return ajv;
}

const objectValidators = new WeakMap<
  AjvInstance,
  WeakMap<object, ValidateFunction>
>();
const booleanValidators = new WeakMap<
  AjvInstance,
  Map<boolean, ValidateFunction>
>();

/**
 * Compiled validator for a schema, cached by schema identity. Contracts are
 * immutable, so identity is a sound key.
 *
 * @throws SchemaCompileError when Ajv rejects the schema
 */
export function getValidator(ajv: AjvInstance, schema: Schema): ValidateFunction {
  if (typeof schema === 'boolean') {
    let byValue = booleanValidators.get(ajv);
    if (!byValue) {
      byValue = new Map();
      booleanValidators.set(ajv, byValue);
    }
    let validate = byValue.get(schema);
    if (!validate) {
      validate = compile(ajv, schema);
      byValue.set(schema, validate);
    }
    return validate;
  }

  let byIdentity = objectValidators.get(ajv);
  if (!byIdentity) {
    byIdentity = new WeakMap();
    objectValidators.set(ajv, byIdentity);
  }
  let validate = byIdentity.get(schema);
  if (!validate) {
    validate = compile(ajv, schema);
    byIdentity.set(schema, validate);
  }
  return validate;
}

function compile(ajv: AjvInstance, schema: Schema): ValidateFunction {
  try {
    return ajv.compile(schema);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new SchemaCompileError(
      `Schema cannot be compiled: ${cause.message}`,
      cause
    );
  }
}
