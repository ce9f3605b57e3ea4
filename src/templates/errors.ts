/**
 * Custom error types for the workflow template store.
 */

import type { ZodError } from 'zod';

/**
 * Error thrown when neither the project-specific nor the generic template exists.
 */
export class TemplateNotFoundError extends Error {
  readonly name = 'TemplateNotFoundError';
  readonly workflowType: string;
  readonly searchPaths: string[];

  constructor(workflowType: string, searchPaths: string[]) {
    super(`Workflow template not found: ${workflowType}. Searched: ${searchPaths.join(', ')}`);
    this.workflowType = workflowType;
    this.searchPaths = searchPaths;
    Object.setPrototypeOf(this, TemplateNotFoundError.prototype);
  }
}

/**
 * Error thrown when a template document cannot be parsed.
 */
export class TemplateParseError extends Error {
  readonly name = 'TemplateParseError';
  readonly filePath: string;
  readonly parseError: Error;

  constructor(filePath: string, parseError: Error) {
    super(`Failed to parse workflow template at ${filePath}: ${parseError.message}`);
    this.filePath = filePath;
    this.parseError = parseError;
    Object.setPrototypeOf(this, TemplateParseError.prototype);
  }
}

/**
 * Error thrown when a template document does not have the expected structure.
 */
export class TemplateValidationError extends Error {
  readonly name = 'TemplateValidationError';
  readonly filePath: string;
  readonly validationErrors: string[];

  constructor(filePath: string, zodError: ZodError) {
    const validationErrors = zodError.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    super(`Workflow template validation failed at ${filePath}: ${validationErrors.join('; ')}`);
    this.filePath = filePath;
    this.validationErrors = validationErrors;
    Object.setPrototypeOf(this, TemplateValidationError.prototype);
  }
}
