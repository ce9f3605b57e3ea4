import { z } from 'zod';

/**
 * Server configuration schema
 */
export const serverConfigSchema = z.object({
  /** Port to listen on */
  port: z.number().int().min(1).max(65535).default(3001),
  /** Host to bind to */
  host: z.string().default('0.0.0.0'),
  /** CORS origins to allow */
  corsOrigins: z.array(z.string()).default(['*']),
  /** Request timeout in milliseconds; 0 lets long workflow runs finish */
  requestTimeout: z.number().int().min(0).default(0),
  /** Enable request logging */
  enableLogging: z.boolean().default(true),
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;

export type ApiResponse<T> = {
  success: true;
  data: T;
  requestId?: string;
};

/**
 * API error response schema
 */
export const apiErrorSchema = z.object({
  success: z.literal(false),
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.record(z.unknown()).optional(),
  }),
  requestId: z.string().optional(),
});

export type ApiError = z.infer<typeof apiErrorSchema>;

/**
 * Health check status
 */
export interface HealthStatus {
  status: 'ok' | 'degraded' | 'unhealthy';
  version: string;
  timestamp: string;
}

/**
 * Component check result
 */
export interface ComponentCheck {
  name: string;
  healthy: boolean;
  message?: string;
}

export interface ReadinessResponse {
  ready: boolean;
  checks: ComponentCheck[];
  timestamp: string;
}

/**
 * Error codes for API errors
 */
export const ErrorCode = {
  BAD_REQUEST: 'BAD_REQUEST',
  UNAUTHORIZED: 'UNAUTHORIZED',
  NOT_FOUND: 'NOT_FOUND',
  CONFLICT: 'CONFLICT',
  UNPROCESSABLE_ENTITY: 'UNPROCESSABLE_ENTITY',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Create a success response
 */
export function createSuccessResponse<T>(
  data: T,
  requestId?: string
): ApiResponse<T> {
  return {
    success: true,
    data,
    ...(requestId && { requestId }),
  };
}

/**
 * Create an error response
 */
export function createErrorResponse(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ApiError {
  return {
    success: false,
    error: {
      code,
      message,
      ...(details && { details }),
    },
    ...(requestId && { requestId }),
  };
}
