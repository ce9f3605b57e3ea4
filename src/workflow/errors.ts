/**
 * Custom error types for the workflow engine.
 */

/**
 * Error thrown when a request argument is missing or malformed.
 */
export class InvalidArgumentError extends Error {
  readonly name = 'InvalidArgumentError';
  readonly argument: string;

  constructor(argument: string, message: string) {
    super(message);
    this.argument = argument;
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}

/**
 * Error thrown when no workflow is registered under an id.
 */
export class WorkflowNotFoundError extends Error {
  readonly name = 'WorkflowNotFoundError';
  readonly workflowId: string;

  constructor(workflowId: string) {
    super(`Workflow not found: ${workflowId}`);
    this.workflowId = workflowId;
    Object.setPrototypeOf(this, WorkflowNotFoundError.prototype);
  }
}

/**
 * Error thrown when an operation is not allowed in the workflow's current state.
 */
export class WorkflowStateError extends Error {
  readonly name = 'WorkflowStateError';
  readonly workflowId: string;
  readonly status: string;

  constructor(workflowId: string, status: string, message: string) {
    super(message);
    this.workflowId = workflowId;
    this.status = status;
    Object.setPrototypeOf(this, WorkflowStateError.prototype);
  }
}
