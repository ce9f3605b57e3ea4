import type { ZodError } from 'zod';
import { formatValidationErrors, printError } from './formatter.js';

/**
 * Commander argument parser for repeatable options.
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Parse repeated `key=value` options into an object. Values that read as
 * JSON (numbers, booleans, quoted strings, objects) are decoded.
 */
export function parseKeyValuePairs(pairs: readonly string[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      throw new Error(`Invalid parameter '${pair}', expected key=value`);
    }
    const key = pair.slice(0, separator).trim();
    const raw = pair.slice(separator + 1);
    result[key] = decodeValue(raw);
  }
  return result;
}

function decodeValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

/**
 * Print zod option errors and flag the process as failed.
 */
export function reportOptionErrors(error: ZodError): void {
  printError(
    formatValidationErrors(
      error.errors.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
      }))
    )
  );
  process.exitCode = 1;
}
