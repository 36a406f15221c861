/**
 * Application loading.
 *
 * Resolves an application reference of the form "path/to/module[:export]"
 * to a Handler. The export defaults to `default` and may be either a
 * handler function or an object with a handle(request) method.
 */

import { existsSync, statSync } from 'node:fs';
import { extname, isAbsolute, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { Application, Handler } from '../http/handler.js';
import { createLogger, errorMessage } from '../logging/index.js';
import { ApplicationLoadError } from '../types/errors.js';

const log = createLogger({ component: 'app-loader' });

const MODULE_EXTENSIONS = ['.js', '.mjs', '.cjs', '.ts', '.mts'];

/**
 * Parsed application reference.
 */
export interface AppReference {
  modulePath: string;
  exportName: string;
}

/**
 * Split "module[:export]" into its parts.
 *
 * @example
 * parseAppReference('./app.js:server'); // { modulePath: './app.js', exportName: 'server' }
 * parseAppReference('./app.js');        // { modulePath: './app.js', exportName: 'default' }
 */
export function parseAppReference(reference: string): AppReference {
  const value = reference.trim();
  const match = /^(.+?)(?::([A-Za-z_$][\w$]*))?$/.exec(value);
  const modulePath = match?.[1];
  if (!modulePath) {
    throw new ApplicationLoadError(reference, 'empty application reference');
  }
  return { modulePath, exportName: match?.[2] ?? 'default' };
}

export function isHandler(value: unknown): value is Handler {
  return typeof value === 'function';
}

export function isApplication(value: unknown): value is Application {
  return (
    typeof value === 'object' &&
    value !== null &&
    'handle' in value &&
    typeof value.handle === 'function'
  );
}

/**
 * Turn an exported value into a Handler.
 *
 * @throws ApplicationLoadError when the value is neither a function nor an
 *   object with a handle() method
 */
export function toHandler(value: unknown, reference: string): Handler {
  if (isHandler(value)) {
    return value;
  }
  if (isApplication(value)) {
    return (request) => value.handle(request);
  }
  throw new ApplicationLoadError(
    reference,
    `export is ${value === null ? 'null' : typeof value}, expected a handler function or an object with handle()`
  );
}

function resolveModuleFile(modulePath: string, cwd: string): string | null {
  const base = isAbsolute(modulePath) ? modulePath : resolve(cwd, modulePath);
  const candidates = [base];
  if (extname(base) === '') {
    for (const extension of MODULE_EXTENSIONS) {
      candidates.push(base + extension);
    }
    for (const extension of MODULE_EXTENSIONS) {
      candidates.push(resolve(base, `index${extension}`));
    }
  }
  return candidates.find((candidate) => existsSync(candidate) && statSync(candidate).isFile()) ?? null;
}

/**
 * Load the application referenced by "path/to/module[:export]".
 *
 * @param reference - Module path relative to cwd, optionally followed by ":export"
 * @param cwd - Directory relative paths resolve against (default: process.cwd())
 * @throws ApplicationLoadError when the module is missing, fails to
 *   evaluate, or does not export a handler
 */
export async function loadApplication(reference: string, cwd = process.cwd()): Promise<Handler> {
  const { modulePath, exportName } = parseAppReference(reference);

  const file = resolveModuleFile(modulePath, cwd);
  if (file === null) {
    throw new ApplicationLoadError(reference, `module '${modulePath}' not found from ${cwd}`);
  }

  let namespace: Record<string, unknown>;
  try {
    namespace = await import(pathToFileURL(file).href);
  } catch (error) {
    throw new ApplicationLoadError(reference, `module failed to load: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (!(exportName in namespace)) {
    throw new ApplicationLoadError(reference, `module has no export '${exportName}'`);
  }

  const handler = toHandler(namespace[exportName], reference);
  log.info(`Loaded application ${reference}`, { operation: 'load', file, export: exportName });
  return handler;
}
