/**
 * Maps engine errors onto HTTP status codes and API error codes.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { createErrorResponse, ErrorCode } from './types.js';
import {
  InvalidArgumentError,
  WorkflowNotFoundError,
  WorkflowStateError,
} from '../workflow/errors.js';
import {
  TemplateNotFoundError,
  TemplateParseError,
  TemplateValidationError,
} from '../templates/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('server:errors');

interface MappedError {
  statusCode: number;
  code: ErrorCode;
  details?: Record<string, unknown>;
}

export function mapEngineError(error: unknown): MappedError | null {
  if (error instanceof InvalidArgumentError) {
    return { statusCode: 400, code: ErrorCode.BAD_REQUEST, details: { argument: error.argument } };
  }
  if (error instanceof WorkflowNotFoundError) {
    return { statusCode: 404, code: ErrorCode.NOT_FOUND };
  }
  if (error instanceof TemplateNotFoundError) {
    return { statusCode: 404, code: ErrorCode.NOT_FOUND, details: { workflowType: error.workflowType } };
  }
  if (error instanceof WorkflowStateError) {
    return { statusCode: 409, code: ErrorCode.CONFLICT, details: { status: error.status } };
  }
  if (error instanceof TemplateValidationError) {
    return {
      statusCode: 422,
      code: ErrorCode.UNPROCESSABLE_ENTITY,
      details: { errors: error.validationErrors },
    };
  }
  if (error instanceof TemplateParseError) {
    return { statusCode: 422, code: ErrorCode.UNPROCESSABLE_ENTITY };
  }
  return null;
}

/**
 * Send the API error matching `error`; unknown errors become a 500.
 */
export function sendEngineError(
  request: FastifyRequest,
  reply: FastifyReply,
  error: unknown,
  fallbackMessage: string
): FastifyReply {
  const mapped = mapEngineError(error);
  if (mapped && error instanceof Error) {
    return reply
      .status(mapped.statusCode)
      .send(createErrorResponse(mapped.code, error.message, mapped.details, request.id));
  }

  logger.error({ err: error, requestId: request.id }, fallbackMessage);
  return reply
    .status(500)
    .send(createErrorResponse(ErrorCode.INTERNAL_ERROR, fallbackMessage, undefined, request.id));
}
