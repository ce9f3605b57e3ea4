/**
 * Operation Registry
 *
 * Name-keyed dispatch table for the document operations a workflow task can
 * call. The host application populates it once at startup; the workflow
 * engine only uses `invoke`, which never throws.
 *
 * @module operations/registry
 */

import {
  OperationFailureReason,
  type OperationContext,
  type OperationDefinition,
  type OperationFailure,
  type OperationInfo,
  type OperationResult,
  type Result,
} from '../types/index.js';
import { DuplicateOperationError, InvalidOperationError } from './errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('operation-registry');

/**
 * A module that contributes operations registers them through this hook.
 */
export interface OperationModule {
  registerOperations(registry: OperationRegistry): void;
}

export interface InvokeOptions {
  /** Fail the call when the handler has not settled after this many ms (0 = wait forever) */
  timeoutMs?: number;
}

/**
 * Registration entry shared by a primary name and its aliases.
 */
interface OperationEntry {
  definition: OperationDefinition;
  info: OperationInfo;
}

const TIMED_OUT: unique symbol = Symbol('timed-out');

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

function isOperationResult(value: unknown): value is OperationResult {
  return (
    typeof value === 'object' &&
    value !== null &&
    'success' in value &&
    typeof value.success === 'boolean'
  );
}

export class OperationRegistry {
  private readonly entries: Map<string, OperationEntry> = new Map();
  private readonly primaries: Map<string, OperationEntry> = new Map();

  /**
   * Register an operation under its name and every alias.
   * @throws DuplicateOperationError if any of the names is taken
   */
  register(definition: OperationDefinition): void {
    const primary = normalizeName(definition.name);
    if (primary.length === 0) {
      throw new InvalidOperationError('Operation name must not be empty');
    }

    const aliases = (definition.aliases ?? [])
      .map(normalizeName)
      .filter((alias) => alias.length > 0 && alias !== primary);
    const names = [primary, ...new Set(aliases)];

    // Check every name before touching the table
    for (const name of names) {
      const existing = this.entries.get(name);
      if (existing) {
        throw new DuplicateOperationError(name, existing.info.name);
      }
    }

    const entry: OperationEntry = {
      definition,
      info: {
        name: definition.name,
        aliases: definition.aliases ?? [],
        category: definition.category ?? 'General',
        description: definition.description ?? definition.name,
        presetParameters: definition.presetParameters ?? null,
      },
    };

    for (const name of names) {
      this.entries.set(name, entry);
    }
    this.primaries.set(primary, entry);

    log.debug({ name: definition.name, aliases: entry.info.aliases }, 'Operation registered');
  }

  /**
   * Let a module register its operations.
   */
  registerModule(module: OperationModule): void {
    const before = this.primaries.size;
    module.registerOperations(this);
    log.debug({ added: this.primaries.size - before }, 'Operation module registered');
  }

  /**
   * Check if a name or alias is registered
   */
  has(name: string): boolean {
    return this.entries.has(normalizeName(name));
  }

  /**
   * Metadata for every registered operation, sorted by name
   */
  list(): OperationInfo[] {
    return Array.from(this.primaries.values())
      .map((entry) => entry.info)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Number of operations (aliases not counted)
   */
  get size(): number {
    return this.primaries.size;
  }

  /**
   * Call an operation by name. Failures of any kind come back as
   * `{ ok: false }`; an operation reporting `success: false` is still `ok`.
   */
  async invoke(
    name: string,
    params: Record<string, unknown>,
    context: OperationContext,
    options: InvokeOptions = {}
  ): Promise<Result<OperationResult, OperationFailure>> {
    const entry = this.entries.get(normalizeName(name));
    if (!entry) {
      return {
        ok: false,
        error: {
          reason: OperationFailureReason.NOT_FOUND,
          message: `Method '${name}' not implemented in workflow routing`,
        },
      };
    }

    const { definition } = entry;
    const callParams = definition.presetParameters
      ? { ...params, ...definition.presetParameters }
      : { ...params };

    log.debug({ operation: definition.name, requested: name, ...context }, 'Routing operation');

    const timeoutMs = options.timeoutMs ?? 0;
    const controller = timeoutMs > 0 ? new AbortController() : null;
    const handlerContext = controller ? { ...context, signal: controller.signal } : context;
    let timer: NodeJS.Timeout | undefined;

    try {
      const pending = Promise.resolve(definition.handler(callParams, handlerContext));
      const value: unknown =
        timeoutMs > 0
          ? await Promise.race([
              pending,
              new Promise<typeof TIMED_OUT>((resolve) => {
                timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
              }),
            ])
          : await pending;

      if (value === TIMED_OUT) {
        controller?.abort();
        // The handler may still be changing the document; nothing else runs until it stops
        await this.settleAfterTimeout(name, pending, context);
        return {
          ok: false,
          error: {
            reason: OperationFailureReason.TIMED_OUT,
            message: `Operation '${name}' timed out after ${timeoutMs}ms`,
          },
        };
      }

      if (!isOperationResult(value)) {
        return {
          ok: false,
          error: {
            reason: OperationFailureReason.REJECTED,
            message: `Operation '${name}' returned an invalid result`,
          },
        };
      }

      return { ok: true, value };
    } catch (err) {
      log.warn({ err, operation: definition.name, ...context }, 'Operation threw');
      return {
        ok: false,
        error: {
          reason: OperationFailureReason.THREW,
          message: err instanceof Error ? err.message : String(err),
        },
      };
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
    }
  }

  /**
   * Wait for a timed-out handler to stop. Its outcome is logged but not used.
   */
  private async settleAfterTimeout(
    name: string,
    pending: Promise<OperationResult>,
    context: OperationContext
  ): Promise<void> {
    try {
      const late = await pending;
      log.warn(
        { operation: name, ...context, success: isOperationResult(late) && late.success },
        'Operation settled after its timeout; result discarded'
      );
    } catch (err) {
      log.warn({ err, operation: name, ...context }, 'Operation failed after its timeout');
    }
  }
}

/**
 * Create a registry and let each module register its operations.
 */
export function createOperationRegistry(modules: OperationModule[] = []): OperationRegistry {
  const registry = new OperationRegistry();
  for (const module of modules) {
    registry.registerModule(module);
  }
  return registry;
}
