/**
 * cadflow Library API
 *
 * Exports the workflow engine for embedding in a host application.
 */

// Types
export * from './types/index.js';

// Workflow engine (main entry point)
export * from './workflow/index.js';

// Operations
export {
  OperationRegistry,
  createOperationRegistry,
  type OperationModule,
  type InvokeOptions,
} from './operations/registry.js';
export { loadOperationModules } from './operations/loader.js';
export {
  DuplicateOperationError,
  InvalidOperationError,
  OperationModuleError,
} from './operations/errors.js';

// Templates
export {
  WorkflowTemplateStore,
  parseTemplate,
  loadTemplateFile,
  TEMPLATE_EXTENSIONS,
  type TemplateStoreOptions,
} from './templates/store.js';
export {
  TemplateNotFoundError,
  TemplateParseError,
  TemplateValidationError,
} from './templates/errors.js';

// Configuration
export { loadConfig, getConfig, resetConfig, type CadflowConfig } from './config/index.js';

// HTTP server
export * as server from './server/index.js';

// Utilities
export { createLogger, logger } from './utils/logger.js';
