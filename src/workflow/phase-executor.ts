/**
 * Phase Executor
 *
 * Walks a template's phases and tasks in declared order, starting from the
 * workflow's cursor. Pausing is cooperative: the flag is checked after every
 * task and every phase, never in the middle of an operation.
 *
 * @module workflow/phase-executor
 */

import type {
  Phase,
  PhaseSummary,
  WorkflowState,
  WorkflowTemplate,
} from '../types/index.js';
import { recordTaskOutcome, type TaskExecutor } from './task-executor.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('phase-executor');

/**
 * Summary entry for a phase, created on first use and shared across runs
 */
function phaseSummaryFor(state: WorkflowState, phaseName: string): PhaseSummary {
  const existing = state.phaseSummaries[phaseName];
  if (existing) {
    return existing;
  }
  const created: PhaseSummary = { tasksCompleted: 0, tasksFailed: 0, decisionsRecorded: 0 };
  state.phaseSummaries[phaseName] = created;
  return created;
}

export class PhaseExecutor {
  constructor(private readonly taskExecutor: TaskExecutor) {}

  /**
   * Execute the remaining phases. Returns once every phase has finished or
   * the workflow has been paused.
   */
  async executePhases(state: WorkflowState, template: WorkflowTemplate): Promise<void> {
    const { phases } = template;

    while (state.cursor.phaseIndex < phases.length) {
      const phase = phases[state.cursor.phaseIndex];
      if (!phase) {
        break;
      }

      state.currentPhase = phase.name;
      log.info({ workflowId: state.id, workflowType: state.workflowType }, `Executing phase: ${phase.name}`);

      const finished = await this.executePhase(state, phase);
      if (!finished) {
        log.info({ workflowId: state.id }, `Workflow paused at phase: ${phase.name}`);
        return;
      }

      state.cursor = { phaseIndex: state.cursor.phaseIndex + 1, taskIndex: 0 };

      if (state.isPaused) {
        log.info({ workflowId: state.id }, `Workflow paused after phase: ${phase.name}`);
        return;
      }
    }
  }

  /**
   * Execute a phase's remaining tasks.
   * Returns false if the workflow was paused before the last task ran.
   */
  async executePhase(state: WorkflowState, phase: Phase): Promise<boolean> {
    const summary = phaseSummaryFor(state, phase.name);

    while (state.cursor.taskIndex < phase.tasks.length) {
      if (state.isPaused) {
        return false;
      }

      const task = phase.tasks[state.cursor.taskIndex];
      if (!task) {
        break;
      }

      const execution = await this.taskExecutor.execute(state, task);
      recordTaskOutcome(state, phase.name, task, execution, summary);
    }

    return true;
  }
}
