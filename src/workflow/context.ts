/**
 * Implicit data flow between tasks.
 *
 * A successful operation that returns one of the context fields (by default
 * `scheduleId`, `sheetId`, `viewId`) has the value stored as `last<Field>`.
 * Later tasks that do not set the field themselves receive that value.
 */

import type { OperationResult } from '../types/index.js';

/**
 * Context key under which a field's latest value is stored, e.g.
 * `sheetId` -> `lastSheetId`.
 */
export function contextKey(field: string): string {
  return `last${field.charAt(0).toUpperCase()}${field.slice(1)}`;
}

/**
 * Build the parameters an operation is called with. The task's own
 * parameters are copied, never mutated, and always win over injected ones.
 */
export function injectContext(
  parameters: Record<string, unknown>,
  context: Record<string, unknown>,
  fields: readonly string[]
): Record<string, unknown> {
  const injected: Record<string, unknown> = { ...parameters };

  for (const field of fields) {
    if (field in parameters) {
      continue;
    }
    const key = contextKey(field);
    if (key in context) {
      injected[field] = context[key];
    }
  }

  return injected;
}

/**
 * Extract the context updates carried by an operation result.
 */
export function collectOutputs(
  result: OperationResult,
  fields: readonly string[]
): Record<string, unknown> {
  const outputs: Record<string, unknown> = {};

  for (const field of fields) {
    const value = result[field];
    if (value !== undefined && value !== null) {
      outputs[contextKey(field)] = value;
    }
  }

  return outputs;
}
