import { OperationRegistry } from '../operations/registry.js';
import { loadOperationModules } from '../operations/loader.js';
import { createDryRunModule, loadDryRunCatalog } from '../operations/dry-run.js';

export interface CliOperationOptions {
  operations: readonly string[];
  dryRun: boolean;
}

/**
 * Registry for a CLI command: the dry-run catalog when asked for, then every
 * module named with --operations.
 */
export async function createCliOperationRegistry(options: CliOperationOptions): Promise<OperationRegistry> {
  const registry = new OperationRegistry();
  if (options.dryRun) {
    registry.registerModule(createDryRunModule(await loadDryRunCatalog()));
  }
  await loadOperationModules(options.operations, registry);
  return registry;
}
