/**
 * Workflow Coordinator
 *
 * Owns the lifecycle of a workflow: template resolution, registration,
 * phase execution, pause/resume and status queries.
 *
 * A template is resolved before anything is registered, so a workflow that
 * cannot start never gets an id.
 *
 * @module workflow/coordinator
 */

import { nanoid } from 'nanoid';
import {
  DEFAULT_BUILDING_CODE,
  DEFAULT_PROJECT_TYPE,
  WorkflowEvent,
  WorkflowStatus,
  type CreateWorkflowRequest,
  type RunOutcome,
  type TemplateInfo,
  type WorkflowListItem,
  type WorkflowSnapshot,
  type WorkflowState,
  type WorkflowTemplate,
} from '../types/index.js';
import type { OperationRegistry } from '../operations/registry.js';
import type { WorkflowTemplateStore } from '../templates/store.js';
import { WorkflowRegistry } from './workflow-registry.js';
import { TaskExecutor } from './task-executor.js';
import { PhaseExecutor } from './phase-executor.js';
import { applyTransition, getProgressDescription } from './state-machine.js';
import { InvalidArgumentError, WorkflowNotFoundError, WorkflowStateError } from './errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('workflow-coordinator');

export interface WorkflowCoordinatorOptions {
  operations: OperationRegistry;
  templates: WorkflowTemplateStore;
  /** Defaults to a fresh registry retaining 100 workflows */
  registry?: WorkflowRegistry;
  contextFields?: readonly string[];
  taskTimeoutMs?: number;
  /** Id generator, overridable for tests */
  generateId?: () => string;
}

/**
 * A workflow that has been registered and is executing in the background.
 */
export interface StartedWorkflow {
  workflowId: string;
  completion: Promise<RunOutcome>;
}

function secondsBetween(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / 1000;
}

export class WorkflowCoordinator {
  readonly operations: OperationRegistry;
  readonly templates: WorkflowTemplateStore;
  private readonly registry: WorkflowRegistry;
  private readonly phaseExecutor: PhaseExecutor;
  private readonly generateId: () => string;
  private readonly workflowTemplates: WeakMap<WorkflowState, WorkflowTemplate> = new WeakMap();
  private readonly executing: Set<string> = new Set();

  constructor(options: WorkflowCoordinatorOptions) {
    this.operations = options.operations;
    this.templates = options.templates;
    this.registry = options.registry ?? new WorkflowRegistry();
    this.generateId = options.generateId ?? (() => nanoid());

    const taskExecutor = new TaskExecutor({
      operations: options.operations,
      ...(options.contextFields && { contextFields: options.contextFields }),
      ...(options.taskTimeoutMs !== undefined && { taskTimeoutMs: options.taskTimeoutMs }),
    });
    this.phaseExecutor = new PhaseExecutor(taskExecutor);
  }

  /**
   * Create a workflow and run it until it completes or is paused.
   *
   * @throws InvalidArgumentError if workflowType is empty
   * @throws TemplateNotFoundError, TemplateParseError, TemplateValidationError
   *   if the template cannot be resolved
   */
  async createAndRun(request: CreateWorkflowRequest): Promise<RunOutcome> {
    const { completion } = await this.start(request);
    return completion;
  }

  /**
   * Create a workflow and return as soon as it is registered. Execution
   * continues in the background; `completion` settles when it stops.
   */
  async start(request: CreateWorkflowRequest): Promise<StartedWorkflow> {
    const workflowType = request.workflowType.trim();
    if (workflowType.length === 0) {
      throw new InvalidArgumentError(
        'workflowType',
        "workflowType is required (e.g., 'DD_Package', 'CD_Set')"
      );
    }

    const projectType = request.projectType ?? DEFAULT_PROJECT_TYPE;
    const buildingCode = request.buildingCode ?? DEFAULT_BUILDING_CODE;

    const template = await this.templates.load(workflowType, projectType);

    const state: WorkflowState = {
      id: this.generateId(),
      workflowType,
      projectType,
      buildingCode,
      templateName: template.name ?? workflowType,
      startTime: new Date(),
      completedAt: null,
      currentPhase: null,
      completedTasks: [],
      failedTasks: [],
      decisions: [],
      history: [],
      context: {
        projectType,
        buildingCode,
        customParameters: request.customParameters ?? {},
      },
      isPaused: false,
      status: WorkflowStatus.RUNNING,
      cursor: { phaseIndex: 0, taskIndex: 0 },
      phaseSummaries: {},
    };

    this.workflowTemplates.set(state, template);
    this.registry.add(state);

    log.info(
      { workflowId: state.id, workflowType, projectType, phases: template.phases.length },
      `Starting autonomous workflow: ${workflowType} for ${projectType}`
    );

    return { workflowId: state.id, completion: this.drive(state) };
  }

  /**
   * Run the remaining phases of a resumed workflow.
   *
   * @throws WorkflowNotFoundError for an unknown id
   * @throws WorkflowStateError if the workflow is paused, finished or already executing
   */
  async continueWorkflow(workflowId: string): Promise<RunOutcome> {
    const state = this.require(workflowId);

    if (this.executing.has(workflowId)) {
      throw new WorkflowStateError(workflowId, state.status, 'Workflow is already executing');
    }
    if (state.status !== WorkflowStatus.RUNNING) {
      throw new WorkflowStateError(
        workflowId,
        state.status,
        `Cannot continue workflow in status '${state.status}'`
      );
    }

    return this.drive(state);
  }

  /**
   * Full state of one workflow.
   *
   * @throws WorkflowNotFoundError for an unknown id
   */
  getStatus(workflowId: string): WorkflowSnapshot {
    return this.snapshot(this.require(workflowId));
  }

  /**
   * Lightweight view of every workflow held by the registry.
   */
  listWorkflows(): WorkflowListItem[] {
    const now = new Date();
    return this.registry.values().map((state) => ({
      workflowId: state.id,
      workflowType: state.workflowType,
      status: state.status,
      currentPhase: state.currentPhase,
      tasksCompleted: state.completedTasks.length,
      runtimeSeconds: secondsBetween(state.startTime, state.completedAt ?? now),
      progress: getProgressDescription(state),
    }));
  }

  /**
   * Pause at the next task boundary. Pausing a paused workflow is a no-op.
   *
   * @throws WorkflowNotFoundError for an unknown id
   * @throws WorkflowStateError if the workflow has finished
   */
  pause(workflowId: string): WorkflowSnapshot {
    const state = this.require(workflowId);
    applyTransition(state, WorkflowEvent.PAUSE);
    return this.snapshot(state);
  }

  /**
   * Clear the pause flag. A workflow paused while still executing carries
   * on by itself; one that had stopped needs `continueWorkflow`.
   *
   * @throws WorkflowNotFoundError for an unknown id
   * @throws WorkflowStateError if the workflow is not paused
   */
  resume(workflowId: string): WorkflowSnapshot {
    const state = this.require(workflowId);
    applyTransition(state, WorkflowEvent.RESUME);
    return this.snapshot(state);
  }

  /**
   * Whether a workflow's phases are being executed right now
   */
  isExecuting(workflowId: string): boolean {
    return this.executing.has(workflowId);
  }

  listTemplates(): Promise<TemplateInfo[]> {
    return this.templates.list();
  }

  private require(workflowId: string): WorkflowState {
    const state = this.registry.get(workflowId);
    if (!state) {
      throw new WorkflowNotFoundError(workflowId);
    }
    return state;
  }

  private async drive(state: WorkflowState): Promise<RunOutcome> {
    const template = this.workflowTemplates.get(state);
    if (!template) {
      throw new WorkflowStateError(state.id, state.status, 'Workflow template is no longer available');
    }

    this.executing.add(state.id);
    try {
      await this.phaseExecutor.executePhases(state, template);

      if (!state.isPaused) {
        applyTransition(state, WorkflowEvent.FINISH);
      }
    } finally {
      this.executing.delete(state.id);
    }

    const outcome = this.outcome(state);
    log.info(
      {
        workflowId: state.id,
        status: outcome.status,
        tasksCompleted: outcome.tasksCompleted,
        tasksFailed: outcome.tasksFailed,
        decisionsMade: outcome.decisionsMade,
      },
      'Workflow run finished'
    );
    return outcome;
  }

  private outcome(state: WorkflowState): RunOutcome {
    const phases: RunOutcome['phases'] = {};
    for (const [name, summary] of Object.entries(state.phaseSummaries)) {
      phases[name] = { ...summary };
    }

    return {
      workflowId: state.id,
      workflowType: state.workflowType,
      status: state.status,
      tasksCompleted: state.completedTasks.length,
      tasksFailed: state.failedTasks.length,
      decisionsMade: state.decisions.length,
      executionTimeSeconds: secondsBetween(state.startTime, state.completedAt ?? new Date()),
      phases,
    };
  }

  private snapshot(state: WorkflowState): WorkflowSnapshot {
    const { cursor: _cursor, ...rest } = state;
    const phaseSummaries: WorkflowSnapshot['phaseSummaries'] = {};
    for (const [name, summary] of Object.entries(state.phaseSummaries)) {
      phaseSummaries[name] = { ...summary };
    }

    const context = { ...state.context };
    if (context['customParameters'] !== undefined) {
      context['customParameters'] = structuredClone(context['customParameters']);
    }

    return {
      ...rest,
      startTime: new Date(state.startTime),
      completedAt: state.completedAt ? new Date(state.completedAt) : null,
      completedTasks: [...state.completedTasks],
      failedTasks: [...state.failedTasks],
      decisions: state.decisions.map((decision) => ({
        ...decision,
        timestamp: new Date(decision.timestamp),
      })),
      history: state.history.map((record) => ({ ...record, startedAt: new Date(record.startedAt) })),
      context,
      phaseSummaries,
      runtimeSeconds: secondsBetween(state.startTime, state.completedAt ?? new Date()),
    };
  }
}
