/**
 * Workflow Routes
 *
 * Create, inspect, pause, resume and continue workflows.
 *
 * @module server/routes/workflows
 */

import type { FastifyInstance } from 'fastify';
import { createSuccessResponse, createErrorResponse, ErrorCode } from '../types.js';
import {
  createWorkflowBodySchema,
  workflowIdParamsSchema,
  toWorkflowDetail,
  type CreateWorkflowBody,
  type WorkflowIdParams,
} from '../types/workflows.js';
import { sendEngineError } from '../errors.js';
import type { WorkflowCoordinator } from '../../workflow/coordinator.js';
import type { CreateWorkflowRequest } from '../../types/index.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('routes:workflows');

/**
 * Register workflow API routes
 */
export function registerWorkflowRoutes(app: FastifyInstance, coordinator: WorkflowCoordinator): void {
  /**
   * POST /api/v1/workflows - Create and run a workflow
   */
  app.post<{ Body: CreateWorkflowBody }>('/api/v1/workflows', async (request, reply) => {
    const bodyResult = createWorkflowBodySchema.safeParse(request.body);
    if (!bodyResult.success) {
      return reply.status(400).send(
        createErrorResponse(
          ErrorCode.BAD_REQUEST,
          'Invalid workflow request',
          { errors: bodyResult.error.errors },
          request.id
        )
      );
    }

    const { workflowType, projectType, buildingCode, parameters, wait } = bodyResult.data;
    const createRequest: CreateWorkflowRequest = {
      workflowType,
      ...(projectType !== undefined && { projectType }),
      ...(buildingCode !== undefined && { buildingCode }),
      ...(parameters !== undefined && { customParameters: parameters }),
    };

    try {
      const started = await coordinator.start(createRequest);

      if (!wait) {
        void started.completion.catch((error: unknown) => {
          logger.error({ err: error, workflowId: started.workflowId }, 'Background workflow run failed');
        });
        return reply
          .status(202)
          .send(createSuccessResponse({ workflowId: started.workflowId }, request.id));
      }

      const outcome = await started.completion;
      return reply.send(createSuccessResponse(outcome, request.id));
    } catch (error) {
      return sendEngineError(request, reply, error, 'Failed to create workflow');
    }
  });

  /**
   * GET /api/v1/workflows - List workflows
   */
  app.get('/api/v1/workflows', async (request, reply) => {
    const items = coordinator.listWorkflows();
    return reply.send(createSuccessResponse({ items, total: items.length }, request.id));
  });

  /**
   * GET /api/v1/workflows/:id - Workflow detail
   */
  app.get<{ Params: WorkflowIdParams }>('/api/v1/workflows/:id', async (request, reply) => {
    const paramsResult = workflowIdParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      return reply.status(400).send(
        createErrorResponse(
          ErrorCode.BAD_REQUEST,
          'Invalid workflow ID',
          { errors: paramsResult.error.errors },
          request.id
        )
      );
    }

    try {
      const snapshot = coordinator.getStatus(paramsResult.data.id);
      return reply.send(createSuccessResponse(toWorkflowDetail(snapshot), request.id));
    } catch (error) {
      return sendEngineError(request, reply, error, 'Failed to get workflow');
    }
  });

  app.post<{ Params: WorkflowIdParams }>('/api/v1/workflows/:id/pause', async (request, reply) => {
    const paramsResult = workflowIdParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      return reply.status(400).send(
        createErrorResponse(ErrorCode.BAD_REQUEST, 'Invalid workflow ID', undefined, request.id)
      );
    }

    try {
      const snapshot = coordinator.pause(paramsResult.data.id);
      logger.info({ workflowId: snapshot.id }, 'Workflow paused');
      return reply.send(createSuccessResponse(toWorkflowDetail(snapshot), request.id));
    } catch (error) {
      return sendEngineError(request, reply, error, 'Failed to pause workflow');
    }
  });

  app.post<{ Params: WorkflowIdParams }>('/api/v1/workflows/:id/resume', async (request, reply) => {
    const paramsResult = workflowIdParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      return reply.status(400).send(
        createErrorResponse(ErrorCode.BAD_REQUEST, 'Invalid workflow ID', undefined, request.id)
      );
    }

    try {
      const snapshot = coordinator.resume(paramsResult.data.id);
      logger.info({ workflowId: snapshot.id }, 'Workflow resumed');
      return reply.send(createSuccessResponse(toWorkflowDetail(snapshot), request.id));
    } catch (error) {
      return sendEngineError(request, reply, error, 'Failed to resume workflow');
    }
  });

  /**
   * POST /api/v1/workflows/:id/continue - Run the remaining phases of a resumed workflow
   */
  app.post<{ Params: WorkflowIdParams }>('/api/v1/workflows/:id/continue', async (request, reply) => {
    const paramsResult = workflowIdParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      return reply.status(400).send(
        createErrorResponse(ErrorCode.BAD_REQUEST, 'Invalid workflow ID', undefined, request.id)
      );
    }

    try {
      const outcome = await coordinator.continueWorkflow(paramsResult.data.id);
      return reply.send(createSuccessResponse(outcome, request.id));
    } catch (error) {
      return sendEngineError(request, reply, error, 'Failed to continue workflow');
    }
  });
}
