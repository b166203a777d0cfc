import { describe, it, expect } from 'vitest';

import { annotationOf, isAnnotated } from '../../contract/annotation.js';
import { handler, interceptor, response } from '../interceptor.js';
import { matchRoute } from '../router.js';
import { expandRoutes, joinPaths, routeKey, splitPath } from '../routes.js';
import type { Route } from '../types.js';
import { RouteTableError } from '../../types/errors.js';

const ambient = interceptor({ name: 'ambient', enter: (context) => context });
const nested = interceptor({ name: 'nested', enter: (context) => context });
const show = handler('show', { summary: 'Show' }, () => response('shown'));

describe('route expansion', () => {
  it('should join and split paths', () => {
    expect(joinPaths('/', '/')).toBe('/');
    expect(joinPaths('/api/', 'x/:id')).toBe('/api/x/:id');
    expect(splitPath('/api//x/')).toEqual(['api', 'x']);
    expect(routeKey('/x', 'delete')).toBe('DELETE /x');
  });

  it('should flatten nested nodes with accumulated interceptors', () => {
    const routes = expandRoutes({
      path: '/',
      interceptors: [ambient],
      methods: { get: show },
      children: [
        {
          path: '/items',
          interceptors: [nested],
          methods: { post: [nested, show] },
          children: [{ path: ':id', methods: { delete: show } }],
        },
      ],
    });

    expect(routes.map((r) => [r.method, r.path, r.pathParts])).toEqual([
      ['get', '/', []],
      ['post', '/items', ['items']],
      ['delete', '/items/:id', ['items', ':id']],
    ]);
    expect(routes.map((r) => r.interceptors.map((i) => i.name))).toEqual([
      ['ambient', 'show'],
      ['ambient', 'nested', 'nested', 'show'],
      ['ambient', 'nested', 'show'],
    ]);
    expect(routes.map((r) => r.name)).toEqual(['show', 'show', 'show']);
  });

  it('should wrap bare functions as undocumented handlers', () => {
    const [route] = expandRoutes({ path: '/ping', methods: { get: () => response('pong') } });
    const terminal = route?.interceptors.at(-1);
    expect(route?.name).toBe('GET /ping');
    expect(terminal && isAnnotated(terminal)).toBe(false);
  });

  it('should keep handler annotations on the expanded chain', () => {
    const [route] = expandRoutes({ path: '/', methods: { get: show } });
    const terminal = route?.interceptors.at(-1);
    expect(terminal && annotationOf(terminal)).toEqual({ summary: 'Show' });
  });

  it('should accept a list of root nodes', () => {
    const routes = expandRoutes([
      { path: '/a', methods: { get: show } },
      { path: '/b', methods: { get: show } },
    ]);
    expect(routes.map((r) => r.path)).toEqual(['/a', '/b']);
  });

  it('should reject duplicate routes', () => {
    expect(() =>
      expandRoutes([
        { path: '/a', methods: { get: show } },
        { path: '/a/', methods: { get: show } },
      ])
    ).toThrow(RouteTableError);
  });

  it('should reject an empty method chain', () => {
    expect(() => expandRoutes({ path: '/a', methods: { get: [] } })).toThrow(
      'Route GET /a has no handler'
    );
  });
});

describe('matchRoute', () => {
  const routes: Route[] = expandRoutes({
    path: '/',
    methods: { get: show },
    children: [
      { path: '/x/:id', methods: { get: show, put: show } },
      { path: '/files/*rest', methods: { get: show } },
    ],
  });

  it('should bind path parameters', () => {
    const match = matchRoute(routes, 'put', '/x/a%20b');
    expect(match?.route.path).toBe('/x/:id');
    expect(match?.route.method).toBe('put');
    expect(match?.pathParams).toEqual({ id: 'a b' });
  });

  it('should bind the rest of the path to a splat', () => {
    expect(matchRoute(routes, 'get', '/files/a/b.txt')?.pathParams).toEqual({
      rest: 'a/b.txt',
    });
  });

  it('should match the root', () => {
    expect(matchRoute(routes, 'get', '/')?.route.path).toBe('/');
  });

  it('should keep undecodable segments as they are', () => {
    expect(matchRoute(routes, 'get', '/x/%E0')?.pathParams).toEqual({ id: '%E0' });
  });

  it('should not match another method or a longer path', () => {
    expect(matchRoute(routes, 'delete', '/x/1')).toBeUndefined();
    expect(matchRoute(routes, 'get', '/x/1/2')).toBeUndefined();
  });
});
