/**
 * Loads operation modules named on the command line.
 *
 * A module is a file path (resolved against the working directory) or a
 * package name, and must export `registerOperations(registry)` either
 * directly or on its default export.
 *
 * @module operations/loader
 */

import * as path from 'node:path';
import { pathToFileURL } from 'node:url';
import type { OperationModule, OperationRegistry } from './registry.js';
import { OperationModuleError } from './errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('operation-loader');

function isOperationModule(value: unknown): value is OperationModule {
  return (
    typeof value === 'object' &&
    value !== null &&
    'registerOperations' in value &&
    typeof value.registerOperations === 'function'
  );
}

/**
 * Import specifier for a module argument: paths become file URLs, package
 * names are passed through.
 */
export function toImportSpecifier(specifier: string, cwd: string = process.cwd()): string {
  const isPath =
    specifier.startsWith('.') || path.isAbsolute(specifier) || /\.[cm]?[jt]s$/.test(specifier);
  return isPath ? pathToFileURL(path.resolve(cwd, specifier)).href : specifier;
}

/**
 * Pick the operation module out of an imported namespace.
 */
export function resolveOperationModule(specifier: string, loaded: unknown): OperationModule {
  if (isOperationModule(loaded)) {
    return loaded;
  }
  if (typeof loaded === 'object' && loaded !== null && 'default' in loaded) {
    if (isOperationModule(loaded.default)) {
      return loaded.default;
    }
  }
  throw new OperationModuleError(
    specifier,
    `Module '${specifier}' does not export registerOperations(registry)`
  );
}

/**
 * Import each module and let it register its operations.
 */
export async function loadOperationModules(
  specifiers: readonly string[],
  registry: OperationRegistry
): Promise<void> {
  for (const specifier of specifiers) {
    let loaded: unknown;
    try {
      loaded = await import(toImportSpecifier(specifier));
    } catch (err) {
      throw new OperationModuleError(
        specifier,
        `Failed to import operations module '${specifier}': ${err instanceof Error ? err.message : String(err)}`
      );
    }

    registry.registerModule(resolveOperationModule(specifier, loaded));
    log.info({ module: specifier, operations: registry.size }, 'Operations module loaded');
  }
}
