import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { ErrorPresenter } from '../presenter.js';
import {
  ContractError,
  RouteModuleError,
  RouteTableError,
  SchemaMismatchError,
} from '../../types/errors.js';
import { LeafFailure, SchemaMismatch } from '../../schema/failures.js';

describe('ErrorPresenter', () => {
  const origEnv = { ...process.env };

  beforeEach(() => {
    process.env.NO_COLOR = '';
    process.env.FORCE_COLOR = '';
    process.env.REQUEST_ID = '';
  });

  afterEach(() => {
    process.env = { ...origEnv };
  });

  test('production redacts sensitive fields deeply', () => {
    const sensitive = {
      user: {
        password: 'test-password',
        profile: { apiKey: 'test-key', nested: [{ token: 'test-token' }] },
      },
    };
    const err = new SchemaMismatchError(
      'request',
      new SchemaMismatch(true, sensitive, new LeafFailure('type', 'must be object', sensitive))
    );
    const presenter = new ErrorPresenter('prod', {
      redactKeys: ['password', 'apiKey', 'token'],
    });
    const prod = presenter.formatForProduction(err);
    expect(prod.context?.value).toEqual({
      user: {
        password: '[REDACTED]',
        profile: { apiKey: '[REDACTED]', nested: [{ token: '[REDACTED]' }] },
      },
    });
  });

  test('production omits stack and includes requestId', () => {
    const err = new RouteTableError('Duplicate route GET /x');
    const presenter = new ErrorPresenter('prod', { requestId: 'req-123' });
    const prod = presenter.formatForProduction(err);
    expect(prod.stack).toBeUndefined();
    expect(prod.requestId).toBe('req-123');
  });

  test('production takes the requestId from REQUEST_ID when none is given', () => {
    process.env.REQUEST_ID = 'req-456';
    const err = new RouteTableError('Duplicate route GET /x');
    expect(new ErrorPresenter('prod').formatForProduction(err).requestId).toBe('req-456');
  });

  test('CLI view respects NO_COLOR and FORCE_COLOR', () => {
    const err = new RouteTableError('Duplicate route GET /x');

    process.env.NO_COLOR = '1';
    let presenter = new ErrorPresenter('dev', { colors: true });
    expect(presenter.formatForCLI(err).colors).toBe(false);

    process.env.NO_COLOR = '';
    process.env.FORCE_COLOR = '1';
    presenter = new ErrorPresenter('dev', { colors: false });
    expect(presenter.formatForCLI(err).colors).toBe(true);
  });

  test('CLI view carries code, message, location and route', () => {
    const err = new RouteTableError('Duplicate route GET /x/:id', {
      path: '/x/:id',
      method: 'get',
    });
    const cli = new ErrorPresenter('dev', { terminalWidth: 100 }).formatForCLI(err);
    expect(cli.code).toBe('E012');
    expect(cli.message).toBe('Duplicate route GET /x/:id');
    expect(cli.location).toBe('/x/:id');
    expect(cli.route).toBe('GET /x/:id');
    expect(cli.details).toEqual([]);
    expect(cli.terminalWidth).toBe(100);
  });

  test('CLI view falls back to the parameter location', () => {
    const err = new ContractError('Unknown parameter location', { location: 'cookie' });
    const cli = new ErrorPresenter('dev', {}).formatForCLI(err);
    expect(cli.location).toBe('cookie');
    expect(cli.route).toBeUndefined();
  });

  test('CLI view lists the explained mismatch of a schema error', () => {
    const err = new SchemaMismatchError(
      'request',
      new SchemaMismatch(true, { pathParams: { id: 'W' } }, {
        pathParams: { id: new LeafFailure('type', 'must be integer', 'W') },
        headers: { auth: new LeafFailure('required', "must have required property 'auth'", {}) },
      })
    );
    expect(new ErrorPresenter('dev').formatForCLI(err).details).toEqual([
      'pathParams.id: must be integer, got "W"',
      'headers.auth: missing-required-key',
    ]);
  });

  test('CLI view shows the cause in dev only and every suggestion', () => {
    const err = new RouteModuleError(
      'Cannot load routes',
      { path: './routes.js' },
      new Error('ENOENT')
    );
    err.suggestions = ['Check the --routes path', 'Run from the project root'];
    expect(new ErrorPresenter('dev').formatForCLI(err)).toMatchObject({
      cause: 'ENOENT',
      hints: ['Check the --routes path', 'Run from the project root'],
    });
    expect(new ErrorPresenter('prod').formatForCLI(err).cause).toBeUndefined();
  });
});
