#!/usr/bin/env node

// CLI entry point
// - Command name: `routedoc` with subcommands `openapi` and `coerce`.
// - `openapi` imports a route module, compiles its table and prints (or
//   writes) the Swagger 2.0 document.
// - `coerce` runs one request through body parsing and request coercion
//   offline and prints the coerced parameters or the explained mismatch.

import { Command } from 'commander';
import fs from 'node:fs';
import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  DEFAULT_PARSER_MAP,
  ConfigurationError,
  ErrorCode,
  ErrorPresenter,
  RouteDocError,
  annotation,
  compile,
  createConsoleLogger,
  expandRoutes,
  explain,
  getExitCode,
  injectDocs,
  isErr,
  isRouteDocError,
  makeCoerceRequest,
  matchRoute,
  parseContentType,
  renderDocument,
  requestFor,
  resolveOptions,
  routeKey,
  stringCoercionMatcher,
  toSwagger,
  withRequestDefaults,
  type DocumentInfo,
  type Logger,
} from '@routedoc/core';
import { renderCLIView } from './render.js';
import {
  collect,
  resolveHeaders,
  resolveMethod,
  type CoerceCommandOptions,
  type OpenApiOptions,
} from './flags.js';
import { loadRouteTree } from './load-routes.js';

const OFFLINE_INFO: DocumentInfo = { title: 'routedoc', version: '0.0.0' };

function cliLogger(): Logger {
  return createConsoleLogger(resolveOptions().logLevel);
}

function printJson(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

async function runOpenApi(options: OpenApiOptions): Promise<void> {
  const logger = cliLogger();
  const tree = await loadRouteTree(options.routes, options.export);
  const routes = expandRoutes(tree);
  logger.debug('Loaded route table', {
    module: options.routes,
    routes: routes.length,
  });

  const info: DocumentInfo = {
    title: options.title,
    version: options.apiVersion,
    ...(options.description !== undefined
      ? { description: options.description }
      : {}),
  };
  const swagger = toSwagger(compile(routes, info));
  const text = options.canonical
    ? renderDocument(swagger)
    : JSON.stringify(swagger, null, 2);

  if (options.out) {
    const target = path.resolve(options.out);
    await writeFile(target, `${text}\n`, 'utf8');
    logger.info('Wrote OpenAPI document', {
      out: target,
      paths: Object.keys(swagger.paths).length,
    });
    return;
  }
  process.stdout.write(`${text}\n`);
}

async function runCoerce(options: CoerceCommandOptions): Promise<void> {
  const logger = cliLogger();
  const method = resolveMethod(options.method);
  const tree = await loadRouteTree(options.routes, options.export);
  const routes = injectDocs(OFFLINE_INFO, expandRoutes(tree));

  const raw = requestFor(method, options.url, {
    headers: resolveHeaders(options),
    ...(options.body !== undefined ? { body: options.body } : {}),
  });
  const match = matchRoute(routes, method, raw.path);
  if (!match) {
    throw new ConfigurationError(`No route matches ${routeKey(raw.path, method)}`, {
      path: raw.path,
      method,
    });
  }

  const route = routeKey(match.route.path, match.route.method);
  const request = parseContentType(DEFAULT_PARSER_MAP, {
    ...raw,
    pathParams: match.pathParams,
  });
  const coerce = makeCoerceRequest(stringCoercionMatcher);
  const result = coerce(annotation(match.route)?.parameters ?? {}, request);

  if (isErr(result)) {
    logger.warn('Request rejected by parameter contract', { route });
    printJson({ route, error: explain(result.error.error) });
    process.exitCode = getExitCode(ErrorCode.REQUEST_SCHEMA_MISMATCH);
    return;
  }
  printJson({ route, ...withRequestDefaults(result.value) });
}

/**
 * Build a fresh command tree. Commander keeps parsed option values on the
 * command, so each parse gets its own program.
 */
export function createProgram(): Command {
  const cli = new Command();

  cli
    .name('routedoc')
    .description('Compile and exercise schema-driven route contracts')
    .version('0.1.0');

  cli
    .command('openapi')
    .description('Print the Swagger 2.0 document of a route module')
    .requiredOption('-r, --routes <module>', 'Route module path')
    .option('-e, --export <name>', 'Export holding the route tree', 'routes')
    .option('--title <title>', 'Document title', 'API')
    .option('--api-version <version>', 'Document version', '1.0.0')
    .option('--description <text>', 'Document description')
    .option('-o, --out <file>', 'Write the document to a file instead of stdout')
    .option('--canonical', 'Emit canonical JSON (sorted keys, no whitespace)', false)
    .action(async (options: OpenApiOptions) => {
      await runOpenApi(options);
    });

  cli
    .command('coerce')
    .description('Coerce one request against the contract of its route')
    .requiredOption('-r, --routes <module>', 'Route module path')
    .option('-e, --export <name>', 'Export holding the route tree', 'routes')
    .option('-X, --method <method>', 'HTTP method', 'get')
    .requiredOption('-u, --url <url>', 'Request path and query string')
    .option('-H, --header <header>', 'Request header as "name: value" (repeatable)', collect, [])
    .option('-d, --body <text>', 'Raw request body')
    .option('--content-type <type>', 'Content type of --body')
    .action(async (options: CoerceCommandOptions) => {
      await runCoerce(options);
    });

  return cli;
}

const program = createProgram();

export async function handleCliError(err: unknown): Promise<never> {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: RouteDocError;
  if (isRouteDocError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new (class extends RouteDocError {})({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
    });
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
