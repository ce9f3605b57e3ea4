import type { FastifyInstance } from 'fastify';
import { createSuccessResponse } from '../types.js';
import { sendEngineError } from '../errors.js';
import type { WorkflowCoordinator } from '../../workflow/coordinator.js';

/**
 * GET /api/v1/templates - Templates available in the templates directory
 */
export function registerTemplateRoutes(app: FastifyInstance, coordinator: WorkflowCoordinator): void {
  app.get('/api/v1/templates', async (request, reply) => {
    try {
      const items = await coordinator.listTemplates();
      return reply.send(createSuccessResponse({ items, total: items.length }, request.id));
    } catch (error) {
      return sendEngineError(request, reply, error, 'Failed to list templates');
    }
  });
}
