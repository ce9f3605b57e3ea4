/**
 * Structured result every operation returns. Besides `success` and `error`
 * an operation may add any named output fields.
 */
export interface OperationResult {
  success: boolean;
  error?: string;
  [field: string]: unknown;
}

/**
 * Call-site information handed to an operation
 */
export interface OperationContext {
  workflowId: string;
  taskId: string;
  /** Present when the call has a timeout; aborted once it elapses */
  signal?: AbortSignal;
}

export type OperationHandler = (
  params: Record<string, unknown>,
  context: OperationContext
) => OperationResult | Promise<OperationResult>;

export interface OperationDefinition {
  /** Primary name; matched case-insensitively */
  name: string;
  handler: OperationHandler;
  /** Additional names that route to the same handler */
  aliases?: string[];
  /** Grouping for discovery, e.g. "Sheet" or "Schedule" */
  category?: string;
  description?: string;
  /** Parameters applied on every call, overriding the caller's */
  presetParameters?: Record<string, unknown>;
}

export interface OperationInfo {
  name: string;
  aliases: string[];
  category: string;
  description: string;
  presetParameters: Record<string, unknown> | null;
}

export const OperationFailureReason = {
  NOT_FOUND: 'not_found',
  REJECTED: 'rejected',
  THREW: 'threw',
  TIMED_OUT: 'timed_out',
} as const;

export type OperationFailureReason =
  (typeof OperationFailureReason)[keyof typeof OperationFailureReason];

export interface OperationFailure {
  reason: OperationFailureReason;
  message: string;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };
