/**
 * Interceptor builders.
 *
 * `interceptor` wraps a plain stage map. The named builders bind a
 * contract fragment to the interceptor they create, so one call both
 * defines the behavior and documents it.
 */
import { annotate } from '../contract/annotation.js';
import type { Contract } from '../contract/types.js';
import type {
  Context,
  HandlerFn,
  Interceptor,
  Request,
  Response,
} from './types.js';

type ContextFn = (context: Context) => Context | Promise<Context>;

export function interceptor(stages: Interceptor): Interceptor {
  return Object.freeze({ ...stages });
}

/** Terminal interceptor: turns the request into the response */
export function handler(name: string, contract: Contract, fn: HandlerFn): Interceptor {
  return annotate(
    contract,
    interceptor({
      name,
      enter: async (context) => ({
        ...context,
        response: await fn(context.request),
      }),
    })
  );
}

/** Rewrites the request on the way in */
export function onRequest(
  name: string,
  contract: Contract,
  fn: (request: Request) => Request | Promise<Request>
): Interceptor {
  return annotate(
    contract,
    interceptor({
      name,
      enter: async (context) => ({
        ...context,
        request: await fn(context.request),
      }),
    })
  );
}

/** Rewrites the response on the way out */
export function onResponse(
  name: string,
  contract: Contract,
  fn: (response: Response) => Response | Promise<Response>
): Interceptor {
  return annotate(
    contract,
    interceptor({
      name,
      leave: async (context) =>
        context.response === undefined
          ? context
          : { ...context, response: await fn(context.response) },
    })
  );
}

/** Request rewrite in, response rewrite out */
export function middleware(
  name: string,
  contract: Contract,
  requestFn: (request: Request) => Request | Promise<Request>,
  responseFn: (response: Response) => Response | Promise<Response>
): Interceptor {
  return annotate(
    contract,
    interceptor({
      name,
      enter: async (context) => ({
        ...context,
        request: await requestFn(context.request),
      }),
      leave: async (context) =>
        context.response === undefined
          ? context
          : { ...context, response: await responseFn(context.response) },
    })
  );
}

export function before(name: string, contract: Contract, fn: ContextFn): Interceptor {
  return annotate(contract, interceptor({ name, enter: fn }));
}

export function after(name: string, contract: Contract, fn: ContextFn): Interceptor {
  return annotate(contract, interceptor({ name, leave: fn }));
}

export function around(
  name: string,
  contract: Contract,
  enter: ContextFn,
  leave: ContextFn
): Interceptor {
  return annotate(contract, interceptor({ name, enter, leave }));
}

export function response(body: unknown, status = 200): Response {
  return { status, headers: {}, body };
}
