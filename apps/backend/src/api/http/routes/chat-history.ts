// =============================================================================
// Chat History Routes
// =============================================================================
// HTTP counterpart of the MCP tools: search, ask, stats and record lookup.

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { ProviderSchema } from '@chat-recall/shared-types';
import type { ChatHistoryService } from '../../../application/services/index.js';
import type { CorrelationVariables } from '../../../infrastructure/logging/logger.js';
import { toConversationView, toSearchResultView, toStatsView } from '../../views.js';
import { filterQuerySchema, rejectInvalid, toSearchFilter } from '../validation.js';

// =============================================================================
// Request Schemas
// =============================================================================

const searchQuerySchema = filterQuerySchema.extend({
  query: z.string(),
  size: z.coerce.number().optional(),
});

const askBodySchema = z.object({
  provider: ProviderSchema.default('openai'),
  prompt: z.string(),
});

// =============================================================================
// Routes
// =============================================================================

export function createChatHistoryRoutes(service: ChatHistoryService) {
  const routes = new Hono<{ Variables: CorrelationVariables }>();

  /**
   * GET /search
   * Conversations most similar to `query`
   *
   * Query params:
   * - query: search text (required)
   * - size: number of results (default: 5)
   * - providers, since, until: optional filter
   */
  routes.get('/search', zValidator('query', searchQuerySchema, rejectInvalid), async (c) => {
    const { query, size, ...filter } = c.req.valid('query');
    const results = await service.searchChatHistory(query, size, toSearchFilter(filter));

    return c.json({ data: results.map(toSearchResultView) });
  });

  /**
   * POST /ask
   * Ask a provider and record the exchange
   */
  routes.post('/ask', zValidator('json', askBodySchema, rejectInvalid), async (c) => {
    const { provider, prompt } = c.req.valid('json');
    const response = await service.askLlm(provider, prompt);

    c.get('logger').info('Answered via HTTP', { provider });

    return c.json({ data: { provider, response } }, 201);
  });

  /**
   * GET /stats
   * Conversation counts per provider and time span
   */
  routes.get('/stats', zValidator('query', filterQuerySchema, rejectInvalid), async (c) => {
    const stats = await service.getChatStats(toSearchFilter(c.req.valid('query')));
    return c.json({ data: toStatsView(stats) });
  });

  /**
   * GET /records/:id
   */
  routes.get('/records/:id', async (c) => {
    const record = await service.getRecord(c.req.param('id'));
    return c.json({ data: toConversationView(record) });
  });

  return routes;
}
