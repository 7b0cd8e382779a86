// =============================================================================
// Chat Recall Backend - MCP Entry Point
// =============================================================================
// Serves the chat history tools over stdio. stdout belongs to the protocol;
// all logging goes to stderr.

import 'dotenv/config';

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createMcpServer } from './api/mcp/server.js';
import { createServices } from './services/index.js';
import { loadConfig } from './infrastructure/config/index.js';
import { logger } from './infrastructure/logging/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  logger.setLevel(config.logLevel);

  const services = await createServices(config);
  const server = createMcpServer(services.chatHistory);

  const shutdown = () => {
    server
      .close()
      .then(() => services.close())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Failed to shut down MCP server', error);
        process.exit(1);
      });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);

  await server.connect(new StdioServerTransport());
  logger.info('MCP server listening on stdio');
}

main().catch((error: unknown) => {
  logger.error('Failed to start MCP server', error);
  process.exit(1);
});
