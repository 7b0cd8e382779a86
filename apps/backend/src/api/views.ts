// =============================================================================
// Response Views
// =============================================================================
// JSON shapes shared by the HTTP API and the MCP resource. Embeddings are
// internal to search and never leave the process.

import type {
  ConversationMetadata,
  ConversationRecord,
  Provider,
  SearchResult,
  StatsSummary,
} from '@chat-recall/shared-types';

export interface ConversationView {
  id: string;
  provider: Provider;
  prompt: string;
  response: string;
  metadata: ConversationMetadata;
  createdAt: string;
}

export interface SearchResultView {
  recordId: string;
  score: number;
  record: ConversationView;
}

export interface StatsView {
  totalCount: number;
  perProviderCount: Partial<Record<Provider, number>>;
  earliest: string | null;
  latest: string | null;
}

export function toConversationView(record: ConversationRecord): ConversationView {
  return {
    id: record.id,
    provider: record.provider,
    prompt: record.prompt,
    response: record.response,
    metadata: record.metadata,
    createdAt: record.createdAt.toISOString(),
  };
}

export function toSearchResultView(result: SearchResult): SearchResultView {
  return {
    recordId: result.recordId,
    score: result.score,
    record: toConversationView(result.record),
  };
}

export function toStatsView(stats: StatsSummary): StatsView {
  return {
    totalCount: stats.totalCount,
    perProviderCount: stats.perProviderCount,
    earliest: stats.earliest?.toISOString() ?? null,
    latest: stats.latest?.toISOString() ?? null,
  };
}
