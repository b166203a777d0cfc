import { describe, it, expect } from 'vitest';

import { annotationOf } from '../../contract/annotation.js';
import { injectDocs } from '../../docs/compiler.js';
import { canonicalJson } from '../../util/canonical-json.js';
import { int, str } from '../../schema/builders.js';
import { coerceOrThrow } from '../../schema/coercer.js';
import { handler, response } from '../interceptor.js';
import {
  bodyParams,
  coerceRequest,
  openApiJson,
  validateResponse,
} from '../interceptors.js';
import { expandRoutes } from '../routes.js';
import { createService, requestFor } from '../service.js';
import { silentLogger } from '../../util/logger.js';

const quiet = { logger: silentLogger };

describe('contract interceptors', () => {
  it('should annotate themselves with the statuses they produce', () => {
    expect(annotationOf(coerceRequest(quiet))).toEqual({ responses: { 422: {} } });
    expect(annotationOf(validateResponse({ ...quiet, statuses: { internalError: 502 } }))).toEqual({
      responses: { 502: {} },
    });
    expect(
      annotationOf(bodyParams({ 'text/csv': (body) => ({ bodyParams: body }) }, quiet))
    ).toEqual({ consumes: ['text/csv'], responses: { 400: {} } });
    expect(annotationOf(openApiJson())).toBeUndefined();
  });

  describe('error stages', () => {
    const routes = injectDocs(
      { title: 'Errors', version: '1' },
      expandRoutes({
        path: '/',
        interceptors: [validateResponse(quiet), coerceRequest(quiet)],
        children: [
          {
            path: '/in',
            methods: {
              get: handler('in', {}, () => response(coerceOrThrow('request', int(), 'x'))),
            },
          },
          {
            path: '/out',
            methods: {
              get: handler('out', {}, () => response(coerceOrThrow('response', str(), 1))),
            },
          },
        ],
      })
    );
    const service = createService(routes, quiet);

    it('should turn a thrown request mismatch into the unprocessable status', async () => {
      expect(await service(requestFor('get', '/in'))).toEqual({
        status: 422,
        headers: {},
        body: { error: 'must be integer, got "x"' },
      });
    });

    it('should turn a thrown response mismatch into the internal-error status', async () => {
      expect(await service(requestFor('get', '/out'))).toEqual({
        status: 500,
        headers: {},
        body: { error: 'must be string, got 1' },
      });
    });
  });

  it('should serve the document through a custom renderer', async () => {
    const routes = injectDocs(
      { title: 'Docs', version: '2' },
      expandRoutes([
        { path: '/a', methods: { get: handler('a', { summary: 'A' }, () => response('a')) } },
        { path: '/doc', methods: { get: openApiJson(canonicalJson) } },
      ])
    );
    const res = await createService(routes, quiet)(requestFor('get', '/doc'));
    expect(res.body).toBe('{"info":{"title":"Docs","version":"2"},"paths":{"/a":{"get":{"summary":"A"}}}}');
  });
});
