/**
 * Task Executor
 *
 * Runs one task definition against the operation registry. Dispatch is kept
 * apart from recording: `execute` awaits the operation and touches nothing,
 * `recordTaskOutcome` then folds the outcome into the workflow state in a
 * single synchronous step so status queries never see half an update.
 *
 * @module workflow/task-executor
 */

import {
  CUSTOM_METHOD,
  type PhaseSummary,
  type TaskDefinition,
  type TaskResult,
  type WorkflowDecision,
  type WorkflowState,
} from '../types/index.js';
import type { OperationRegistry } from '../operations/registry.js';
import { DEFAULT_CONTEXT_FIELDS } from '../config/index.js';
import { collectOutputs, injectContext } from './context.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('task-executor');

export const CUSTOM_TASK_DECISION = 'Custom task - marked for future implementation';
export const DEFAULT_DECISION_REASON = 'No specific logic defined yet';

export interface TaskExecutorOptions {
  operations: OperationRegistry;
  /** Result fields carried forward to later tasks */
  contextFields?: readonly string[];
  /** 0 disables the per-task timeout */
  taskTimeoutMs?: number;
}

/**
 * Outcome of a task plus the context updates it produced.
 */
export interface TaskExecution {
  result: TaskResult;
  outputs: Record<string, unknown>;
  /** Parameters the operation was called with; null for custom tasks */
  dispatchedParameters: Record<string, unknown> | null;
  startedAt: Date;
  durationMs: number;
}

export function isCustomTask(task: TaskDefinition): boolean {
  return task.method.trim().length === 0 || task.method === CUSTOM_METHOD;
}

export class TaskExecutor {
  private readonly operations: OperationRegistry;
  readonly contextFields: readonly string[];
  private readonly taskTimeoutMs: number;

  constructor(options: TaskExecutorOptions) {
    this.operations = options.operations;
    this.contextFields = options.contextFields ?? DEFAULT_CONTEXT_FIELDS;
    this.taskTimeoutMs = options.taskTimeoutMs ?? 0;
  }

  /**
   * Execute a task. Never throws; every failure is returned as
   * `{ success: false }`.
   */
  async execute(state: WorkflowState, task: TaskDefinition): Promise<TaskExecution> {
    const startedAt = new Date();

    if (isCustomTask(task)) {
      return {
        result: {
          success: true,
          decision: {
            task: task.id,
            decision: CUSTOM_TASK_DECISION,
            reason: task.autonomousDecisionHint ?? DEFAULT_DECISION_REASON,
            timestamp: new Date(),
          },
        },
        outputs: {},
        dispatchedParameters: null,
        startedAt,
        durationMs: 0,
      };
    }

    const parameters = injectContext(task.parameters, state.context, this.contextFields);

    log.info(
      { workflowId: state.id, taskId: task.id, method: task.method },
      `Executing: ${task.description}`
    );

    const dispatched = await this.operations.invoke(
      task.method,
      parameters,
      { workflowId: state.id, taskId: task.id },
      { timeoutMs: this.taskTimeoutMs }
    );
    const durationMs = Date.now() - startedAt.getTime();

    if (!dispatched.ok) {
      return {
        result: { success: false, error: dispatched.error.message },
        outputs: {},
        dispatchedParameters: parameters,
        startedAt,
        durationMs,
      };
    }

    const operationResult = dispatched.value;
    if (!operationResult.success) {
      const error =
        typeof operationResult.error === 'string' && operationResult.error.length > 0
          ? operationResult.error
          : 'Unknown error';
      return {
        result: { success: false, error },
        outputs: {},
        dispatchedParameters: parameters,
        startedAt,
        durationMs,
      };
    }

    let decision: WorkflowDecision | null = null;
    if (task.autonomousDecisionHint) {
      decision = {
        task: task.id,
        decision: `Executed ${task.method} successfully`,
        reason: task.autonomousDecisionHint,
        timestamp: new Date(),
      };
    }

    return {
      result: { success: true, decision },
      outputs: collectOutputs(operationResult, this.contextFields),
      dispatchedParameters: parameters,
      startedAt,
      durationMs,
    };
  }
}

/**
 * Fold a task's outcome into the workflow state: task lists, decisions,
 * history, context, the phase summary and the cursor all change together.
 */
export function recordTaskOutcome(
  state: WorkflowState,
  phase: string,
  task: TaskDefinition,
  execution: TaskExecution,
  summary: PhaseSummary
): void {
  const { result } = execution;

  if (result.success) {
    state.completedTasks.push(task.description);
    summary.tasksCompleted++;
    if (result.decision) {
      state.decisions.push(result.decision);
      summary.decisionsRecorded++;
      log.info(
        { workflowId: state.id, taskId: task.id, reason: result.decision.reason },
        `[DECISION] ${result.decision.decision}`
      );
    }
    Object.assign(state.context, execution.outputs);
  } else {
    state.failedTasks.push(`${task.description}: ${result.error}`);
    summary.tasksFailed++;
    log.warn({ workflowId: state.id, taskId: task.id, error: result.error }, `Task failed: ${task.description}`);
  }

  state.history.push({
    phase,
    taskId: task.id,
    description: task.description,
    method: isCustomTask(task) ? null : task.method,
    success: result.success,
    error: result.success ? null : result.error,
    startedAt: execution.startedAt,
    durationMs: execution.durationMs,
  });

  state.cursor = {
    phaseIndex: state.cursor.phaseIndex,
    taskIndex: state.cursor.taskIndex + 1,
  };
}
