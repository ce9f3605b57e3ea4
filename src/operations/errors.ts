/**
 * Custom error types for the operation registry.
 */

/**
 * Error thrown when a name or alias is registered twice.
 */
export class DuplicateOperationError extends Error {
  readonly name = 'DuplicateOperationError';
  readonly operationName: string;
  readonly existingOperation: string;

  constructor(operationName: string, existingOperation: string) {
    super(
      `Operation name '${operationName}' is already registered (routes to '${existingOperation}')`
    );
    this.operationName = operationName;
    this.existingOperation = existingOperation;
    Object.setPrototypeOf(this, DuplicateOperationError.prototype);
  }
}

/**
 * Error thrown when an operation definition is malformed.
 */
export class InvalidOperationError extends Error {
  readonly name = 'InvalidOperationError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, InvalidOperationError.prototype);
  }
}

/**
 * Error thrown when a module given to the loader does not export
 * `registerOperations(registry)`.
 */
export class OperationModuleError extends Error {
  readonly name = 'OperationModuleError';
  readonly specifier: string;

  constructor(specifier: string, message: string) {
    super(message);
    this.specifier = specifier;
    Object.setPrototypeOf(this, OperationModuleError.prototype);
  }
}
