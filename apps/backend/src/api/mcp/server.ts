// =============================================================================
// MCP Server
// =============================================================================
// Exposes the chat history operations as MCP tools, plus the most recent
// conversations as the chat://history resource.

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ChatHistoryService } from '../../application/services/index.js';
import { toConversationView } from '../views.js';
import {
  askLlmSchema,
  createToolHandlers,
  getChatStatsSchema,
  searchChatHistorySchema,
} from './tools.js';

export const SERVER_NAME = 'chat-history-server';
export const HISTORY_RESOURCE_URI = 'chat://history';

/** Conversations listed by the history resource */
const HISTORY_RESOURCE_SIZE = 10;

export function createMcpServer(service: ChatHistoryService): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: '1.0.0' });
  const handlers = createToolHandlers(service);

  server.tool(
    'search_chat_history',
    'Search past LLM conversations for exchanges similar to a query',
    searchChatHistorySchema,
    (args) => handlers.searchChatHistory(args)
  );

  server.tool(
    'ask_llm',
    'Ask an LLM provider a question; the exchange is saved to the chat history',
    askLlmSchema,
    (args) => handlers.askLlm(args)
  );

  server.tool(
    'get_chat_stats',
    'Count saved conversations per provider, optionally filtered by provider and time range',
    getChatStatsSchema,
    (args) => handlers.getChatStats(args)
  );

  server.resource(
    'chat-history',
    HISTORY_RESOURCE_URI,
    { description: 'The most recent saved conversations', mimeType: 'application/json' },
    async (uri) => {
      const records = await service.listRecent(HISTORY_RESOURCE_SIZE);
      return {
        contents: [
          {
            uri: uri.href,
            mimeType: 'application/json',
            text: JSON.stringify(records.map(toConversationView), null, 2),
          },
        ],
      };
    }
  );

  return server;
}
