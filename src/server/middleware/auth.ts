import type { FastifyRequest, FastifyReply, FastifyInstance } from 'fastify';
import { createErrorResponse, ErrorCode } from '../types.js';

/**
 * Build a preHandler validating `Authorization: Bearer <key>`.
 * Without a configured key every request passes.
 */
export function createApiKeyAuth(
  apiKey: string | undefined
): (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined> {
  return async (request, reply) => {
    if (!apiKey) {
      return undefined;
    }

    const authHeader = request.headers.authorization;

    if (!authHeader) {
      return reply.status(401).send(
        createErrorResponse(
          ErrorCode.UNAUTHORIZED,
          'Authorization header required',
          undefined,
          request.id
        )
      );
    }

    if (!authHeader.startsWith('Bearer ')) {
      return reply.status(401).send(
        createErrorResponse(
          ErrorCode.UNAUTHORIZED,
          'Invalid authorization format. Use: Bearer <api-key>',
          undefined,
          request.id
        )
      );
    }

    const token = authHeader.slice(7);

    if (token !== apiKey) {
      return reply.status(401).send(
        createErrorResponse(ErrorCode.UNAUTHORIZED, 'Invalid API key', undefined, request.id)
      );
    }

    return undefined;
  };
}

/**
 * Require the API key on every route under /api/
 */
export function registerAuthPlugin(app: FastifyInstance, apiKey?: string): void {
  if (!apiKey) {
    return;
  }
  const auth = createApiKeyAuth(apiKey);
  app.addHook('preHandler', async (request, reply) => {
    if (request.url.startsWith('/api/')) {
      return auth(request, reply);
    }
    return undefined;
  });
}
