/**
 * cadflow Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

export const DEFAULT_CONTEXT_FIELDS = ['scheduleId', 'sheetId', 'viewId'] as const;

/**
 * Boolean flags arrive as strings; "false" and "0" must not coerce to true.
 */
const envBoolean = z
  .union([z.boolean(), z.string()])
  .transform((value) => {
    if (typeof value === 'boolean') {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    return normalized !== 'false' && normalized !== '0' && normalized !== '';
  });

/**
 * Comma separated list, e.g. "scheduleId,sheetId,viewId"
 */
const fieldList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((field) => field.trim())
      .filter((field) => field.length > 0)
  )
  .pipe(z.array(z.string().regex(/^[A-Za-z][A-Za-z0-9_]*$/)).min(1));

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Templates
  templatesDir: z.string().min(1).default('./workflows'),
  cacheTemplates: envBoolean.default(false),

  // Workflow execution
  /** Completed workflows kept for status queries before the oldest are evicted */
  maxRetainedWorkflows: z.coerce.number().int().min(1).max(10000).default(100),
  /** Per-task operation timeout in milliseconds, 0 disables it */
  taskTimeoutMs: z.coerce.number().int().min(0).max(86400000).default(0),
  /** Result fields threaded forward to later tasks as last<Field> */
  contextFields: fieldList.default(DEFAULT_CONTEXT_FIELDS.join(',')),

  // Server
  port: z.coerce.number().int().min(1).max(65535).default(3001),
  host: z.string().default('0.0.0.0'),
  apiKey: z.string().min(1).optional(),
});

export type CadflowConfig = z.infer<typeof configSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CadflowConfig {
  const raw = {
    templatesDir: env['CADFLOW_TEMPLATES_DIR'],
    cacheTemplates: env['CADFLOW_CACHE_TEMPLATES'],
    maxRetainedWorkflows: env['CADFLOW_MAX_RETAINED_WORKFLOWS'],
    taskTimeoutMs: env['CADFLOW_TASK_TIMEOUT_MS'],
    contextFields: env['CADFLOW_CONTEXT_FIELDS'],
    port: env['CADFLOW_PORT'],
    host: env['CADFLOW_HOST'],
    apiKey: env['CADFLOW_API_KEY'],
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }

  log.info(
    {
      templatesDir: result.data.templatesDir,
      cacheTemplates: result.data.cacheTemplates,
      maxRetainedWorkflows: result.data.maxRetainedWorkflows,
      taskTimeoutMs: result.data.taskTimeoutMs,
      contextFields: result.data.contextFields,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: CadflowConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): CadflowConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
