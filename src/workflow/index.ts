/**
 * Workflow engine entry point
 *
 * @module workflow
 */

import type { CadflowConfig } from '../config/index.js';
import type { OperationRegistry } from '../operations/registry.js';
import { WorkflowTemplateStore } from '../templates/store.js';
import { WorkflowCoordinator } from './coordinator.js';
import { WorkflowRegistry } from './workflow-registry.js';

export type CoordinatorConfig = Pick<
  CadflowConfig,
  'templatesDir' | 'cacheTemplates' | 'maxRetainedWorkflows' | 'taskTimeoutMs' | 'contextFields'
>;

/**
 * Wire a coordinator from configuration and a populated operation registry.
 */
export function createCoordinator(
  config: CoordinatorConfig,
  operations: OperationRegistry
): WorkflowCoordinator {
  return new WorkflowCoordinator({
    operations,
    templates: new WorkflowTemplateStore({
      templatesDir: config.templatesDir,
      cache: config.cacheTemplates,
    }),
    registry: new WorkflowRegistry({ maxRetained: config.maxRetainedWorkflows }),
    contextFields: config.contextFields,
    taskTimeoutMs: config.taskTimeoutMs,
  });
}

export {
  WorkflowCoordinator,
  type WorkflowCoordinatorOptions,
  type StartedWorkflow,
} from './coordinator.js';
export { WorkflowRegistry, type WorkflowRegistryOptions } from './workflow-registry.js';
export {
  TaskExecutor,
  recordTaskOutcome,
  isCustomTask,
  CUSTOM_TASK_DECISION,
  DEFAULT_DECISION_REASON,
  type TaskExecution,
  type TaskExecutorOptions,
} from './task-executor.js';
export { PhaseExecutor } from './phase-executor.js';
export {
  applyTransition,
  canTransition,
  getNextStatus,
  getProgressDescription,
  isTerminalStatus,
} from './state-machine.js';
export { contextKey, injectContext, collectOutputs } from './context.js';
export { InvalidArgumentError, WorkflowNotFoundError, WorkflowStateError } from './errors.js';
