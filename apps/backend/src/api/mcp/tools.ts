// =============================================================================
// Chat History Tools
// =============================================================================
// Tool schemas, handlers and text formatting for the MCP front end. Handlers
// never throw: failures come back as `isError` results carrying the error code.

import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import {
  ProviderSchema,
  type SearchFilter,
  type SearchResult,
  type StatsSummary,
} from '@chat-recall/shared-types';
import type { ChatHistoryService } from '../../application/services/index.js';
import { AppError, InvalidArgumentError } from '../../domain/errors/index.js';
import { logger } from '../../infrastructure/logging/logger.js';

/** Characters of each answer shown in search output */
const ANSWER_PREVIEW_LENGTH = 200;

// =============================================================================
// Tool Schemas
// =============================================================================

export const searchChatHistorySchema = {
  query: z.string().describe('Text to search for in past conversations'),
  limit: z.number().optional().describe('Maximum number of results (default: 5)'),
};

export const askLlmSchema = {
  question: z.string().describe('The question to ask'),
  provider: ProviderSchema.optional().describe('LLM provider to use (default: openai)'),
};

export const getChatStatsSchema = {
  providers: z.array(ProviderSchema).optional().describe('Only count these providers'),
  since: z.string().optional().describe('ISO datetime; only count conversations at or after it'),
  until: z.string().optional().describe('ISO datetime; only count conversations at or before it'),
};

const searchArgs = z.object(searchChatHistorySchema);
const askArgs = z.object(askLlmSchema);
const statsArgs = z.object(getChatStatsSchema);

export type SearchChatHistoryArgs = z.infer<typeof searchArgs>;
export type AskLlmArgs = z.infer<typeof askArgs>;
export type GetChatStatsArgs = z.infer<typeof statsArgs>;

// =============================================================================
// Handlers
// =============================================================================

export interface ChatHistoryToolHandlers {
  searchChatHistory(args: SearchChatHistoryArgs): Promise<CallToolResult>;
  askLlm(args: AskLlmArgs): Promise<CallToolResult>;
  getChatStats(args: GetChatStatsArgs): Promise<CallToolResult>;
}

export function createToolHandlers(service: ChatHistoryService): ChatHistoryToolHandlers {
  return {
    searchChatHistory: (args) =>
      runTool('search_chat_history', async () => {
        const results = await service.searchChatHistory(args.query, args.limit);
        return formatSearchResults(results);
      }),

    askLlm: (args) =>
      runTool('ask_llm', () => service.askLlm(args.provider ?? 'openai', args.question)),

    getChatStats: (args) =>
      runTool('get_chat_stats', async () => {
        const stats = await service.getChatStats(toFilter(args));
        return formatStats(stats);
      }),
  };
}

async function runTool(tool: string, run: () => Promise<string>): Promise<CallToolResult> {
  try {
    const text = await run();
    return { content: [{ type: 'text', text }] };
  } catch (error) {
    if (!(error instanceof AppError)) {
      logger.error('Tool failed unexpectedly', error, { tool });
    }
    return {
      content: [{ type: 'text', text: formatError(error) }],
      isError: true,
    };
  }
}

function toFilter(args: GetChatStatsArgs): SearchFilter | undefined {
  if (!args.providers && !args.since && !args.until) {
    return undefined;
  }
  return {
    providers: args.providers,
    since: args.since ? parseTimestamp('since', args.since) : undefined,
    until: args.until ? parseTimestamp('until', args.until) : undefined,
  };
}

function parseTimestamp(name: string, value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError(`${name} must be an ISO datetime`, { [name]: value });
  }
  return date;
}

// =============================================================================
// Formatting
// =============================================================================

export function formatSearchResults(results: SearchResult[]): string {
  if (results.length === 0) {
    return 'No similar conversations found.';
  }

  const entries = results.map((result, i) => {
    const { record } = result;
    return [
      `${i + 1}. **[${record.provider.toUpperCase()}]** ${record.createdAt.toISOString()} (score ${result.score.toFixed(3)})`,
      `Q: ${record.prompt}`,
      `A: ${truncate(record.response, ANSWER_PREVIEW_LENGTH)}`,
    ].join('\n');
  });

  return `Found ${results.length} similar conversation${results.length === 1 ? '' : 's'}:\n\n${entries.join('\n\n')}`;
}

export function formatStats(stats: StatsSummary): string {
  const lines = [`Total conversations: ${stats.totalCount}`];

  const providers = Object.entries(stats.perProviderCount);
  if (providers.length > 0) {
    lines.push('By provider:');
    for (const [provider, count] of providers) {
      lines.push(`- ${provider.toUpperCase()}: ${count}`);
    }
  }
  if (stats.earliest && stats.latest) {
    lines.push(`Earliest: ${stats.earliest.toISOString()}`);
    lines.push(`Latest: ${stats.latest.toISOString()}`);
  }

  return lines.join('\n');
}

export function formatError(error: unknown): string {
  if (error instanceof AppError) {
    return `Error [${error.code}]: ${error.message}`;
  }
  return `Error [INTERNAL_ERROR]: ${error instanceof Error ? error.message : String(error)}`;
}

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}
