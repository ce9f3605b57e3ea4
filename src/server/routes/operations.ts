import type { FastifyInstance } from 'fastify';
import { createSuccessResponse } from '../types.js';
import type { OperationRegistry } from '../../operations/registry.js';

/**
 * GET /api/v1/operations - Registered operations and their aliases
 */
export function registerOperationRoutes(app: FastifyInstance, operations: OperationRegistry): void {
  app.get('/api/v1/operations', async (request, reply) => {
    const items = operations.list();
    return reply.send(createSuccessResponse({ items, total: items.length }, request.id));
  });
}
