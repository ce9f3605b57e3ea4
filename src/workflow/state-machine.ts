/**
 * State machine for workflow execution.
 * Paused workflows can be resumed; completed workflows are final.
 */

import {
  WorkflowEvent,
  WorkflowStatus,
  type WorkflowState,
} from '../types/index.js';
import { WorkflowStateError } from './errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('state-machine');

/**
 * State transition table.
 * Maps (current status, event) -> next status. FINISH is resolved separately
 * because its target depends on whether any task failed.
 */
const transitions: Record<WorkflowStatus, Partial<Record<WorkflowEvent, WorkflowStatus>>> = {
  [WorkflowStatus.RUNNING]: {
    [WorkflowEvent.PAUSE]: WorkflowStatus.PAUSED,
    [WorkflowEvent.FINISH]: WorkflowStatus.COMPLETED,
  },
  [WorkflowStatus.PAUSED]: {
    [WorkflowEvent.PAUSE]: WorkflowStatus.PAUSED,
    [WorkflowEvent.RESUME]: WorkflowStatus.RUNNING,
  },
  // Terminal states - no transitions out
  [WorkflowStatus.COMPLETED]: {},
  [WorkflowStatus.COMPLETED_WITH_ERRORS]: {},
};

/**
 * Check if a status is terminal (no more transitions possible).
 */
export function isTerminalStatus(status: WorkflowStatus): boolean {
  return status === WorkflowStatus.COMPLETED || status === WorkflowStatus.COMPLETED_WITH_ERRORS;
}

/**
 * Check if a transition is valid.
 */
export function canTransition(status: WorkflowStatus, event: WorkflowEvent): boolean {
  return event in transitions[status];
}

/**
 * Get the next status for a given transition.
 * Returns null if the transition is invalid.
 */
export function getNextStatus(
  state: Pick<WorkflowState, 'status' | 'failedTasks'>,
  event: WorkflowEvent
): WorkflowStatus | null {
  const next = transitions[state.status][event];
  if (next === undefined) {
    return null;
  }
  if (event === WorkflowEvent.FINISH && state.failedTasks.length > 0) {
    return WorkflowStatus.COMPLETED_WITH_ERRORS;
  }
  return next;
}

/**
 * Apply a transition in place. `isPaused`, `status` and `completedAt` are
 * updated together.
 *
 * @throws WorkflowStateError if the transition is invalid
 */
export function applyTransition(state: WorkflowState, event: WorkflowEvent): WorkflowState {
  const next = getNextStatus(state, event);

  if (next === null) {
    log.warn({ workflowId: state.id, status: state.status, event }, 'Invalid transition');
    throw new WorkflowStateError(
      state.id,
      state.status,
      `Cannot ${event} workflow in status '${state.status}'`
    );
  }

  log.info({ workflowId: state.id, from: state.status, event, to: next }, 'State transition');

  state.status = next;
  state.isPaused = next === WorkflowStatus.PAUSED;
  if (isTerminalStatus(next)) {
    state.completedAt = new Date();
  }

  return state;
}

/**
 * Get human-readable progress description.
 */
export function getProgressDescription(state: WorkflowState): string {
  switch (state.status) {
    case WorkflowStatus.RUNNING:
      return state.currentPhase ? `Running phase '${state.currentPhase}'` : 'Starting';
    case WorkflowStatus.PAUSED:
      return state.currentPhase ? `Paused in phase '${state.currentPhase}'` : 'Paused';
    case WorkflowStatus.COMPLETED:
      return 'Completed successfully';
    case WorkflowStatus.COMPLETED_WITH_ERRORS:
      return `Completed with ${state.failedTasks.length} failed task(s)`;
  }
}
