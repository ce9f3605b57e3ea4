import { access } from 'node:fs/promises';
import type { FastifyInstance } from 'fastify';
import {
  createSuccessResponse,
  type HealthStatus,
  type ReadinessResponse,
  type ComponentCheck,
} from '../types.js';
import type { WorkflowCoordinator } from '../../workflow/coordinator.js';

/**
 * Package version - should match package.json
 */
export const VERSION = '0.1.0';

/**
 * Register health check routes
 */
export function registerHealthRoutes(app: FastifyInstance, coordinator: WorkflowCoordinator): void {
  /**
   * GET /health - Basic health check
   */
  app.get('/health', async (request, reply) => {
    const response: HealthStatus & { workflows: number; operations: number } = {
      status: 'ok',
      version: VERSION,
      timestamp: new Date().toISOString(),
      workflows: coordinator.listWorkflows().length,
      operations: coordinator.operations.size,
    };
    return reply.send(createSuccessResponse(response, request.id));
  });

  /**
   * GET /health/ready - Templates directory readable and operations registered
   */
  app.get('/health/ready', async (request, reply) => {
    const checks: ComponentCheck[] = [
      await checkTemplatesDir(coordinator.templates.templatesDir),
      checkOperations(coordinator.operations.size),
    ];

    const allHealthy = checks.every((c) => c.healthy);
    const response: ReadinessResponse = {
      ready: allHealthy,
      checks,
      timestamp: new Date().toISOString(),
    };

    if (!allHealthy) {
      return reply.status(503).send(createSuccessResponse(response, request.id));
    }
    return reply.send(createSuccessResponse(response, request.id));
  });
}

async function checkTemplatesDir(templatesDir: string): Promise<ComponentCheck> {
  try {
    await access(templatesDir);
    return { name: 'templates', healthy: true, message: `Templates directory: ${templatesDir}` };
  } catch (error) {
    return {
      name: 'templates',
      healthy: false,
      message: `Templates directory not accessible: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
}

function checkOperations(count: number): ComponentCheck {
  return count > 0
    ? { name: 'operations', healthy: true, message: `${count} operation(s) registered` }
    : { name: 'operations', healthy: false, message: 'No operations registered' };
}
