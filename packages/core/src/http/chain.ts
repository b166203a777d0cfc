import type { Context, Interceptor } from './types.js';

interface Failure {
  error: unknown;
}

/**
 * Run a context through an interceptor chain.
 *
 * Each interceptor is pushed on the stack before its enter stage runs.
 * Entering stops once a response exists; leave stages then run in
 * reverse. A thrown error unwinds the stack through `error` stages until
 * one returns a context, after which the remaining leave stages resume.
 *
 * @throws the error no interceptor handled
 */
export async function execute(
  context: Context,
  interceptors: readonly Interceptor[]
): Promise<Context> {
  const stack: Interceptor[] = [];
  let current = context;
  let failure: Failure | undefined;

  for (const interceptor of interceptors) {
    if (current.response !== undefined) break;
    stack.push(interceptor);
    if (!interceptor.enter) continue;
    try {
      current = await interceptor.enter(current);
    } catch (error) {
      failure = { error };
      break;
    }
  }

  for (let top = stack.pop(); top !== undefined; top = stack.pop()) {
    if (failure) {
      if (!top.error) continue;
      try {
        current = await top.error(current, failure.error);
        failure = undefined;
      } catch (error) {
        failure = { error };
      }
      continue;
    }
    if (!top.leave) continue;
    try {
      current = await top.leave(current);
    } catch (error) {
      failure = { error };
    }
  }

  if (failure) throw failure.error;
  return current;
}
