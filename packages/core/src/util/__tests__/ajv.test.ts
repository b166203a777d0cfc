import { describe, it, expect } from 'vitest';

import {
  createContractAjv,
  getSharedAjv,
  getValidator,
  hasFormatsPlugin,
} from '../ajv.js';
import { SchemaCompileError } from '../../types/errors.js';

describe('contract Ajv', () => {
  it('should register formats only when format validation is on', () => {
    const strict = createContractAjv({ validateFormats: true });
    expect(hasFormatsPlugin(strict)).toBe(true);
    expect(hasFormatsPlugin(createContractAjv())).toBe(false);
    expect(getValidator(strict, { type: 'string', format: 'email' })('nope')).toBe(false);
    expect(getValidator(createContractAjv(), { type: 'string', format: 'email' })('nope')).toBe(
      true
    );
  });

  it('should share one instance per format flag', () => {
    expect(getSharedAjv()).toBe(getSharedAjv(false));
    expect(getSharedAjv(true)).not.toBe(getSharedAjv(false));
  });

  it('should cache validators by schema identity', () => {
    const ajv = createContractAjv();
    const schema = { type: 'integer' as const };
    expect(getValidator(ajv, schema)).toBe(getValidator(ajv, schema));
    expect(getValidator(ajv, true)).toBe(getValidator(ajv, true));
    expect(getValidator(ajv, false)(1)).toBe(false);
  });

  it('should not coerce data while validating', () => {
    const validate = getValidator(createContractAjv(), { type: 'integer' });
    expect(validate('1')).toBe(false);
  });

  it('should wrap compile failures', () => {
    expect(() => getValidator(createContractAjv(), { type: 'string', pattern: '(' })).toThrow(
      SchemaCompileError
    );
  });
});
