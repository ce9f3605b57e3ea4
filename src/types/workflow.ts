import { z } from 'zod';

// Workflow Status (State Machine States)
export const WorkflowStatus = {
  RUNNING: 'Running',
  PAUSED: 'Paused',
  COMPLETED: 'Completed successfully',
  COMPLETED_WITH_ERRORS: 'Completed with errors',
} as const;

export type WorkflowStatus = (typeof WorkflowStatus)[keyof typeof WorkflowStatus];

// Workflow Events
export const WorkflowEvent = {
  PAUSE: 'pause',
  RESUME: 'resume',
  FINISH: 'finish',
} as const;

export type WorkflowEvent = (typeof WorkflowEvent)[keyof typeof WorkflowEvent];

export const DEFAULT_PROJECT_TYPE = 'General';
export const DEFAULT_BUILDING_CODE = 'IBC_2021';

// Create request
export const createWorkflowRequestSchema = z.object({
  workflowType: z.string(),
  projectType: z.string().min(1).optional(),
  buildingCode: z.string().min(1).optional(),
  customParameters: z.record(z.unknown()).optional(),
});

export type CreateWorkflowRequest = z.infer<typeof createWorkflowRequestSchema>;

/**
 * An autonomous choice attributed to a task.
 */
export interface WorkflowDecision {
  task: string;
  decision: string;
  reason: string;
  timestamp: Date;
}

/**
 * One entry per executed task, in execution order.
 */
export interface TaskRecord {
  phase: string;
  taskId: string;
  description: string;
  method: string | null;
  success: boolean;
  error: string | null;
  startedAt: Date;
  durationMs: number;
}

export interface PhaseSummary {
  tasksCompleted: number;
  tasksFailed: number;
  decisionsRecorded: number;
}

/**
 * Position of the next task to execute.
 */
export interface WorkflowCursor {
  phaseIndex: number;
  taskIndex: number;
}

export interface WorkflowState {
  id: string;
  workflowType: string;
  projectType: string;
  buildingCode: string;
  templateName: string;
  startTime: Date;
  completedAt: Date | null;
  currentPhase: string | null;
  completedTasks: string[];
  failedTasks: string[];
  decisions: WorkflowDecision[];
  history: TaskRecord[];
  context: Record<string, unknown>;
  isPaused: boolean;
  status: WorkflowStatus;
  cursor: WorkflowCursor;
  phaseSummaries: Record<string, PhaseSummary>;
}

/**
 * Copy of a workflow's state handed to callers, with its current runtime.
 */
export type WorkflowSnapshot = Omit<WorkflowState, 'cursor'> & {
  runtimeSeconds: number;
};

export interface WorkflowListItem {
  workflowId: string;
  workflowType: string;
  status: WorkflowStatus;
  currentPhase: string | null;
  tasksCompleted: number;
  runtimeSeconds: number;
  progress: string;
}

export interface RunOutcome {
  workflowId: string;
  workflowType: string;
  status: WorkflowStatus;
  tasksCompleted: number;
  tasksFailed: number;
  decisionsMade: number;
  executionTimeSeconds: number;
  phases: Record<string, PhaseSummary>;
}

// Task Result (internal to the executors)
export type TaskResult =
  | { success: true; decision: WorkflowDecision | null }
  | { success: false; error: string };
