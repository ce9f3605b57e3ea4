/**
 * Dry-run operation catalog
 *
 * Registers the standard document operations with handlers that touch no
 * document: each call succeeds, echoes its parameters and returns fresh
 * numeric ids for the fields the real operation would produce. Templates can
 * be exercised end to end, context threading included, without a host.
 *
 * @module operations/dry-run
 */

import * as fs from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { OperationDefinition, OperationResult } from '../types/index.js';
import type { OperationModule, OperationRegistry } from './registry.js';
import { InvalidOperationError } from './errors.js';

export const DRY_RUN_CATALOG_PATH = fileURLToPath(
  new URL('../../catalog/dry-run-operations.json', import.meta.url)
);

const catalogEntrySchema = z.object({
  name: z.string().min(1),
  aliases: z.array(z.string().min(1)).default([]),
  category: z.string().default('General'),
  description: z.string().optional(),
  presetParameters: z.record(z.unknown()).optional(),
  /** Result fields the operation produces, e.g. sheetId */
  returns: z.array(z.string().min(1)).default([]),
});

export type DryRunEntry = z.infer<typeof catalogEntrySchema>;

const catalogSchema = z.array(catalogEntrySchema);

/**
 * Read the catalog file.
 */
export async function loadDryRunCatalog(filePath: string = DRY_RUN_CATALOG_PATH): Promise<DryRunEntry[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  const result = catalogSchema.safeParse(JSON.parse(content));
  if (!result.success) {
    throw new InvalidOperationError(
      `Invalid dry-run catalog at ${filePath}: ${result.error.errors.map((e) => e.message).join('; ')}`
    );
  }
  return result.data;
}

/**
 * Operation module for a catalog. Ids are numbered from 1 per module.
 */
export function createDryRunModule(entries: readonly DryRunEntry[]): OperationModule {
  let nextId = 1;

  return {
    registerOperations(registry: OperationRegistry): void {
      for (const entry of entries) {
        const definition: OperationDefinition = {
          name: entry.name,
          aliases: entry.aliases,
          category: entry.category,
          description: entry.description ?? entry.name,
          handler: (params) => {
            const result: OperationResult = {
              success: true,
              dryRun: true,
              operation: entry.name,
              parameters: params,
            };
            for (const field of entry.returns) {
              result[field] = nextId++;
            }
            return result;
          },
          ...(entry.presetParameters && { presetParameters: entry.presetParameters }),
        };
        registry.register(definition);
      }
    },
  };
}
