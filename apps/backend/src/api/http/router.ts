// =============================================================================
// Main HTTP Router
// =============================================================================
// Hono-based HTTP router for the chat history API

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as requestLogger } from 'hono/logger';
import { HTTPException } from 'hono/http-exception';
import { createHealthRoutes } from './routes/health.js';
import { createChatHistoryRoutes } from './routes/chat-history.js';
import { AppError } from '../../domain/errors/index.js';
import type { ChatHistoryService } from '../../application/services/index.js';
import type { ConversationIndexPort } from '../../ports/index.js';
import {
  correlationMiddleware,
  logger,
  type CorrelationVariables,
} from '../../infrastructure/logging/logger.js';
import { tracingMiddleware } from '../../infrastructure/observability/index.js';

// =============================================================================
// App Type
// =============================================================================

/**
 * Hono app with typed context variables
 */
type AppBindings = {
  Variables: CorrelationVariables;
};

export interface AppDependencies {
  chatHistory: ChatHistoryService;
  index: ConversationIndexPort;
  /** Include error messages of unexpected failures in responses */
  exposeErrors?: boolean;
}

/**
 * Status codes AppError subclasses carry
 */
const ERROR_STATUSES = [400, 404, 500, 502, 503, 504] as const;

function toErrorStatus(statusCode: number) {
  return ERROR_STATUSES.find((status) => status === statusCode) ?? 500;
}

// =============================================================================
// Create App
// =============================================================================

export function createApp(deps: AppDependencies) {
  const app = new Hono<AppBindings>();

  /**
   * OpenTelemetry tracing middleware
   * MUST be first to capture full request lifecycle
   */
  app.use('*', tracingMiddleware);

  app.use(
    '*',
    cors({
      origin: '*',
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'X-Correlation-ID', 'traceparent', 'tracestate'],
      exposeHeaders: ['X-Correlation-ID', 'X-Trace-ID'],
      maxAge: 86400, // 24 hours
    })
  );

  app.use('*', correlationMiddleware);

  /**
   * Request logging
   */
  app.use('*', requestLogger((message) => logger.info(message, { component: 'http' })));

  // ===========================================================================
  // Mount Routes
  // ===========================================================================

  app.route('/health', createHealthRoutes(deps.index));
  app.route('/api/v1/chat-history', createChatHistoryRoutes(deps.chatHistory));

  app.get('/', (c) => {
    return c.json({
      name: 'Chat Recall API',
      version: '1.0.0',
      docs: '/api/v1/chat-history',
      health: '/health',
    });
  });

  // ===========================================================================
  // Error Handling
  // ===========================================================================

  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: `Route ${c.req.method} ${c.req.path} not found`,
        },
      },
      404
    );
  });

  /**
   * Global error handler
   * Handles AppError instances with proper status codes and formats
   */
  app.onError((err, c) => {
    if (err instanceof AppError) {
      return c.json(err.toJSON(), toErrorStatus(err.statusCode));
    }

    if (err instanceof HTTPException) {
      return c.json(
        {
          error: {
            code: 'HTTP_ERROR',
            message: err.message,
          },
        },
        err.status
      );
    }

    logger.error('Unhandled error', err, { path: c.req.path, method: c.req.method });

    return c.json(
      {
        error: {
          code: 'INTERNAL_SERVER_ERROR',
          message: deps.exposeErrors ? err.message : 'An unexpected error occurred',
        },
      },
      500
    );
  });

  return app;
}

export type AppType = ReturnType<typeof createApp>;
