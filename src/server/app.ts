import Fastify, { type FastifyInstance, type FastifyRequest, type FastifyError } from 'fastify';
import cors from '@fastify/cors';
import { nanoid } from 'nanoid';
import {
  serverConfigSchema,
  createErrorResponse,
  ErrorCode,
  type ServerConfig,
} from './types.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerTemplateRoutes } from './routes/templates.js';
import { registerOperationRoutes } from './routes/operations.js';
import { registerWorkflowRoutes } from './routes/workflows.js';
import { registerAuthPlugin } from './middleware/auth.js';
import type { WorkflowCoordinator } from '../workflow/coordinator.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('server');

/**
 * Server configuration plus the coordinator the routes drive
 */
export interface AppConfig extends Partial<ServerConfig> {
  coordinator: WorkflowCoordinator;
  apiKey?: string;
}

/**
 * Create and configure a Fastify application instance
 */
export async function createApp(config: AppConfig): Promise<FastifyInstance> {
  // coordinator and apiKey are not part of the ServerConfig schema
  const { coordinator, apiKey, ...serverConfig } = config;

  const validatedConfig = serverConfigSchema.parse(serverConfig);

  const app = Fastify({
    logger: validatedConfig.enableLogging
      ? {
          level: 'info',
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
            },
          },
        }
      : false,
    requestTimeout: validatedConfig.requestTimeout,
    genReqId: () => nanoid(12),
  });

  await app.register(cors, {
    origin: validatedConfig.corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
  });

  app.addHook('onRequest', (request: FastifyRequest, reply, done) => {
    void reply.header('X-Request-ID', request.id);
    done();
  });

  app.setErrorHandler(async (error: FastifyError, request, reply) => {
    logger.error({ err: error, requestId: request.id }, 'Request error');

    if (error.validation) {
      return reply.status(400).send(
        createErrorResponse(
          ErrorCode.BAD_REQUEST,
          'Validation error',
          { errors: error.validation },
          request.id
        )
      );
    }

    if (error.statusCode) {
      const code = mapStatusToErrorCode(error.statusCode);
      return reply.status(error.statusCode).send(
        createErrorResponse(code, error.message, undefined, request.id)
      );
    }

    return reply.status(500).send(
      createErrorResponse(
        ErrorCode.INTERNAL_ERROR,
        'An unexpected error occurred',
        undefined,
        request.id
      )
    );
  });

  app.setNotFoundHandler(async (request, reply) => {
    return reply.status(404).send(
      createErrorResponse(
        ErrorCode.NOT_FOUND,
        `Route ${request.method} ${request.url} not found`,
        undefined,
        request.id
      )
    );
  });

  registerAuthPlugin(app, apiKey);

  registerHealthRoutes(app, coordinator);
  registerTemplateRoutes(app, coordinator);
  registerOperationRoutes(app, coordinator.operations);
  registerWorkflowRoutes(app, coordinator);

  return app;
}

function mapStatusToErrorCode(status: number): ErrorCode {
  switch (status) {
    case 400:
      return ErrorCode.BAD_REQUEST;
    case 401:
      return ErrorCode.UNAUTHORIZED;
    case 404:
      return ErrorCode.NOT_FOUND;
    case 409:
      return ErrorCode.CONFLICT;
    case 422:
      return ErrorCode.UNPROCESSABLE_ENTITY;
    default:
      return ErrorCode.INTERNAL_ERROR;
  }
}
