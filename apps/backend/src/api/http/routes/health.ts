// =============================================================================
// Health Check Routes
// =============================================================================

import { Hono } from 'hono';
import type { ConversationIndexPort } from '../../../ports/index.js';

export function createHealthRoutes(index: ConversationIndexPort) {
  const healthRoutes = new Hono();

  /**
   * GET /health
   * Basic health check endpoint
   */
  healthRoutes.get('/', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: '1.0.0',
    });
  });

  /**
   * GET /health/ready
   * Readiness check - indicates if the service is ready to accept requests
   */
  healthRoutes.get('/ready', async (c) => {
    const checks: Record<string, { status: 'ok' | 'error'; latencyMs?: number; error?: string }> = {};

    // Conversation store connectivity check
    const storeStart = Date.now();
    try {
      await index.ping();
      checks.store = { status: 'ok', latencyMs: Date.now() - storeStart };
    } catch (error) {
      checks.store = {
        status: 'error',
        latencyMs: Date.now() - storeStart,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }

    const allHealthy = Object.values(checks).every((check) => check.status === 'ok');

    return c.json(
      {
        status: allHealthy ? 'ready' : 'degraded',
        timestamp: new Date().toISOString(),
        checks,
      },
      allHealthy ? 200 : 503
    );
  });

  return healthRoutes;
}
