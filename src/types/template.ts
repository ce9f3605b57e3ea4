import { z } from 'zod';

/**
 * Method value that marks a task as a placeholder with no operation behind it
 */
export const CUSTOM_METHOD = 'custom';

/**
 * Task definition as authored in a template document
 */
export const taskDefinitionSchema = z
  .object({
    id: z.string().min(1).nullish(),
    description: z.string().nullish(),
    method: z.string().nullish(),
    parameters: z.record(z.unknown()).nullish(),
    autonomous_decision: z.string().nullish(),
  })
  .transform((task) => {
    const id = task.id ?? 'unknown';
    return {
      id,
      description: task.description ?? id,
      method: task.method ?? '',
      parameters: task.parameters ?? {},
      autonomousDecisionHint: task.autonomous_decision ?? null,
    };
  });

export type TaskDefinition = z.output<typeof taskDefinitionSchema>;

export const phaseSchema = z.object({
  name: z.string().min(1),
  tasks: z.array(taskDefinitionSchema).default([]),
});

export type Phase = z.output<typeof phaseSchema>;

/**
 * Workflow template document. Unknown top-level keys are kept.
 */
export const workflowTemplateSchema = z
  .object({
    workflowType: z.string().optional(),
    name: z.string().optional(),
    description: z.string().optional(),
    projectTypes: z.array(z.string()).default([]),
    estimatedTime: z.string().optional(),
    phases: z.array(phaseSchema),
  })
  .passthrough();

export type WorkflowTemplate = z.output<typeof workflowTemplateSchema>;

/**
 * Template listing entry
 */
export interface TemplateInfo {
  workflowType: string | null;
  name: string | null;
  description: string | null;
  projectTypes: string[];
  phases: number;
  estimatedTime: string | null;
  file: string;
}
