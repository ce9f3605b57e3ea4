// Workflow Types
export {
  WorkflowStatus,
  WorkflowEvent,
  DEFAULT_PROJECT_TYPE,
  DEFAULT_BUILDING_CODE,
  createWorkflowRequestSchema,
  type CreateWorkflowRequest,
  type WorkflowDecision,
  type TaskRecord,
  type PhaseSummary,
  type WorkflowCursor,
  type WorkflowState,
  type WorkflowSnapshot,
  type WorkflowListItem,
  type RunOutcome,
  type TaskResult,
} from './workflow.js';

// Template Types
export {
  CUSTOM_METHOD,
  taskDefinitionSchema,
  phaseSchema,
  workflowTemplateSchema,
  type TaskDefinition,
  type Phase,
  type WorkflowTemplate,
  type TemplateInfo,
} from './template.js';

// Operation Types
export {
  OperationFailureReason,
  type OperationResult,
  type OperationContext,
  type OperationHandler,
  type OperationDefinition,
  type OperationInfo,
  type OperationFailure,
  type Result,
} from './operation.js';
