// =============================================================================
// Conversation Domain Types
// =============================================================================
// Types for the indexed chat history: one record per prompt/response exchange
// with an LLM provider, stored with its embedding for similarity search.

import { z } from 'zod';

// =============================================================================
// Provider
// =============================================================================

export const PROVIDERS = ['openai', 'anthropic', 'google'] as const;

export const ProviderSchema = z.enum(PROVIDERS);

export type Provider = z.infer<typeof ProviderSchema>;

// =============================================================================
// Record Metadata
// =============================================================================

/**
 * Open mapping of scalar values (model name, token counts, cost, ...)
 */
export const ConversationMetadataSchema = z.record(
  z.string(),
  z.union([z.string(), z.number(), z.boolean(), z.null()])
);

export type ConversationMetadata = z.infer<typeof ConversationMetadataSchema>;

// =============================================================================
// Conversation Record
// =============================================================================

/**
 * A record before it is persisted. The store assigns `id` and `createdAt`.
 */
export const ConversationDraftSchema = z.object({
  provider: ProviderSchema,
  prompt: z.string().min(1),
  response: z.string().min(1),
  embedding: z.array(z.number()).min(1),
  metadata: ConversationMetadataSchema,
});

export type ConversationDraft = z.infer<typeof ConversationDraftSchema>;

export const ConversationRecordSchema = ConversationDraftSchema.extend({
  id: z.string().uuid(),
  createdAt: z.date(),
});

export type ConversationRecord = z.infer<typeof ConversationRecordSchema>;

// =============================================================================
// Search
// =============================================================================

/**
 * Restricts search and stats to a provider set and/or an inclusive time range
 */
export const SearchFilterSchema = z.object({
  providers: z.array(ProviderSchema).optional(),
  since: z.date().optional(),
  until: z.date().optional(),
});

export type SearchFilter = z.infer<typeof SearchFilterSchema>;

export const SearchResultSchema = z.object({
  recordId: z.string().uuid(),
  score: z.number().min(-1).max(1), // Cosine similarity
  record: ConversationRecordSchema,
});

export type SearchResult = z.infer<typeof SearchResultSchema>;

// =============================================================================
// Stats
// =============================================================================

export const StatsSummarySchema = z.object({
  totalCount: z.number().int().nonnegative(),
  perProviderCount: z.record(ProviderSchema, z.number().int().positive()),
  earliest: z.date().nullable(),
  latest: z.date().nullable(),
});

export type StatsSummary = z.infer<typeof StatsSummarySchema>;
