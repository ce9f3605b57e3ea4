import { z } from 'zod';
import type { TaskRecord, WorkflowDecision, WorkflowSnapshot } from '../../types/index.js';

/**
 * Workflow ID parameter
 */
export const workflowIdParamsSchema = z.object({
  id: z.string().min(1),
});

export type WorkflowIdParams = z.infer<typeof workflowIdParamsSchema>;

/**
 * Create workflow request body
 */
export const createWorkflowBodySchema = z.object({
  workflowType: z.string({ required_error: 'workflowType is required' }),
  projectType: z.string().min(1).optional(),
  buildingCode: z.string().min(1).optional(),
  parameters: z.record(z.unknown()).optional(),
  /** Respond once the run stops (true) or as soon as it is registered (false) */
  wait: z.boolean().default(true),
});

export type CreateWorkflowBody = z.input<typeof createWorkflowBodySchema>;

/**
 * Workflow detail with timestamps serialized
 */
export type WorkflowDetail = Omit<
  WorkflowSnapshot,
  'startTime' | 'completedAt' | 'decisions' | 'history'
> & {
  workflowId: string;
  startTime: string;
  completedAt: string | null;
  decisions: Array<Omit<WorkflowDecision, 'timestamp'> & { timestamp: string }>;
  history: Array<Omit<TaskRecord, 'startedAt'> & { startedAt: string }>;
};

export function toWorkflowDetail(snapshot: WorkflowSnapshot): WorkflowDetail {
  const { id, startTime, completedAt, decisions, history, ...rest } = snapshot;
  return {
    workflowId: id,
    id,
    ...rest,
    startTime: startTime.toISOString(),
    completedAt: completedAt ? completedAt.toISOString() : null,
    decisions: decisions.map((d) => ({ ...d, timestamp: d.timestamp.toISOString() })),
    history: history.map((h) => ({ ...h, startedAt: h.startedAt.toISOString() })),
  };
}
