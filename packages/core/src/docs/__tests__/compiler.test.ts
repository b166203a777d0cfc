import { describe, it, expect } from 'vitest';

import { compile, injectDocs, isDocumented, routeContract } from '../compiler.js';
import { renderDocument, toSwagger } from '../swagger.js';
import { annotationOf } from '../../contract/annotation.js';
import { arrayOf, int, obj, str } from '../../schema/builders.js';
import { expandRoutes } from '../../http/routes.js';
import type { Route } from '../../http/types.js';
import { RouteTableError } from '../../types/errors.js';
import { PARSED_TYPES, sampleTree } from '../../__tests__/fixtures/sample-routes.js';

const info = { title: 'Sample', version: '0.1.0' };

const ambientResponses = { 400: {}, 500: {}, 422: {} };
const authHeader = obj({ auth: str() });

function routeAt(routes: readonly Route[], path: string, method: string): Route {
  const route = routes.find((r) => r.path === path && r.method === method);
  if (!route) throw new Error(`no route ${method} ${path}`);
  return route;
}

describe('documentation compiler', () => {
  const routes = expandRoutes(sampleTree());

  it('should document every route with an annotated handler', () => {
    const document = compile(routes, info);
    expect(document.info).toEqual(info);
    expect(Object.keys(document.paths)).toEqual([
      '/',
      '/x/:id',
      '/echo/:id',
      '/broken',
    ]);
  });

  it('should merge ambient and handler fragments per operation', () => {
    const { paths } = compile(routes, info);
    expect(paths['/']).toEqual({
      get: {
        description: 'Service status',
        consumes: PARSED_TYPES,
        parameters: { header: authHeader },
        responses: { ...ambientResponses, 200: { schema: obj({ status: str() }) } },
      },
    });
    expect(paths['/x/:id']).toEqual({
      put: {
        summary: 'Replace x',
        consumes: PARSED_TYPES,
        parameters: {
          header: authHeader,
          path: obj({ id: int() }),
          body: obj({ name: str() }),
        },
        responses: ambientResponses,
      },
      delete: {
        consumes: PARSED_TYPES,
        parameters: { header: authHeader, path: obj({ id: int() }) },
        responses: { ...ambientResponses, 204: {} },
      },
    });
    expect(paths['/broken']?.post?.responses).toEqual({
      ...ambientResponses,
      200: { schema: obj({ status: str() }) },
      default: {
        schema: obj({ result: arrayOf(str()) }),
        headers: obj({ Location: str() }),
      },
    });
  });

  it('should leave the document endpoint out', () => {
    expect(isDocumented(routeAt(routes, '/doc', 'get'))).toBe(false);
    expect(isDocumented(routeAt(routes, '/', 'get'))).toBe(true);
  });

  it('should be idempotent', () => {
    expect(renderDocument(toSwagger(compile(routes, info)))).toBe(
      renderDocument(toSwagger(compile(routes, info)))
    );
  });

  it('should freeze the document and leave the routes untouched', () => {
    const document = compile(routes, info);
    expect(Object.isFrozen(document.paths['/'])).toBe(true);
    expect(routeAt(routes, '/', 'get').contract).toBeUndefined();
    const root = routeAt(routes, '/', 'get').interceptors.at(-1);
    expect(root && annotationOf(root)).toEqual({
      description: 'Service status',
      responses: { 200: { schema: obj({ status: str() }) } },
    });
  });

  it('should reject a duplicate path and method', () => {
    const root = routeAt(routes, '/', 'get');
    expect(() => compile([...routes, root], info)).toThrow(RouteTableError);
  });

  describe('injectDocs', () => {
    const injected = injectDocs(info, routes);

    it('should give every route its merged contract and the shared document', () => {
      const doc = routeAt(injected, '/doc', 'get');
      expect(doc.contract).toEqual({
        consumes: PARSED_TYPES,
        parameters: { header: authHeader },
        responses: ambientResponses,
      });
      expect(doc.document).toBe(routeAt(injected, '/', 'get').document);
      expect(routeAt(injected, '/echo/:id', 'get').contract).toEqual(
        routeContract(routeAt(routes, '/echo/:id', 'get'))
      );
    });

    it('should return frozen copies', () => {
      const root = routeAt(injected, '/', 'get');
      expect(root).not.toBe(routeAt(routes, '/', 'get'));
      expect(Object.isFrozen(root)).toBe(true);
      expect(Object.isFrozen(root.contract)).toBe(true);
    });
  });
});
