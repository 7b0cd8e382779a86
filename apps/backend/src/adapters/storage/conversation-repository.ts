// =============================================================================
// Conversation Repository - Storage Adapter
// =============================================================================
// Handles all database operations for the conversations table with pgvector
// support. Works with pre-computed embeddings; validation, timeouts and error
// mapping live in PgConversationIndex.

import { and, desc, eq, getTableColumns, gte, inArray, lte, sql, type SQL } from 'drizzle-orm';
import type {
  ConversationDraft,
  ConversationRecord,
  SearchFilter,
} from '@chat-recall/shared-types';
import type { ProviderAggregate } from '../../domain/conversation/index.js';
import type { Database } from '../../infrastructure/db/client.js';
import { conversations, toVectorLiteral, type ConversationRow } from '../../infrastructure/db/schema.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Conversation with cosine similarity from vector search
 */
export interface ConversationWithSimilarity extends ConversationRecord {
  similarity: number;
}

/**
 * DDL for the conversations table
 *
 * No approximate index covers the embedding column: similarity search is an
 * exact scan, so filters apply before the top-k cut. An HNSW index left by an
 * earlier schema is dropped.
 */
export function schemaStatements(dimensions: number): SQL[] {
  if (!Number.isInteger(dimensions) || dimensions <= 0) {
    throw new Error(`Invalid embedding dimensionality: ${dimensions}`);
  }

  return [
    sql`CREATE EXTENSION IF NOT EXISTS vector`,
    sql`
      CREATE TABLE IF NOT EXISTS conversations (
        id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
        provider varchar(20) NOT NULL,
        prompt text NOT NULL,
        response text NOT NULL,
        embedding vector(${sql.raw(String(dimensions))}) NOT NULL,
        metadata jsonb NOT NULL DEFAULT '{}'::jsonb,
        created_at timestamptz NOT NULL DEFAULT now()
      )
    `,
    sql`
      CREATE INDEX IF NOT EXISTS conversations_provider_created_at_idx
      ON conversations (provider, created_at)
    `,
    sql`
      CREATE INDEX IF NOT EXISTS conversations_text_idx
      ON conversations USING gin (to_tsvector('english', prompt || ' ' || response))
    `,
    sql`DROP INDEX IF EXISTS conversations_embedding_hnsw_idx`,
  ];
}

// =============================================================================
// Repository
// =============================================================================

/**
 * Repository for conversation storage with pgvector similarity search
 *
 * Similarity is cosine similarity computed as `1 - (embedding <=> query)`,
 * ranging from -1 to 1.
 */
export class ConversationRepository {
  constructor(private db: Database) {}

  /**
   * Create the pgvector extension, the conversations table and its indexes
   *
   * An existing table is left untouched; call getEmbeddingDimensions afterwards
   * to verify the column matches the configured dimensionality.
   */
  async ensureSchema(dimensions: number): Promise<void> {
    for (const statement of schemaStatements(dimensions)) {
      await this.db.execute(statement);
    }
  }

  /**
   * Read the declared dimensionality of conversations.embedding
   *
   * @returns The vector dimension, or null when the table does not exist
   */
  async getEmbeddingDimensions(): Promise<number | null> {
    const rows = await this.db.execute<{ atttypmod: number }>(sql`
      SELECT a.atttypmod
      FROM pg_attribute a
      WHERE a.attrelid = to_regclass('conversations')
        AND a.attname = 'embedding'
        AND NOT a.attisdropped
    `);

    const row = rows[0];
    return row ? Number(row.atttypmod) : null;
  }

  /**
   * Insert a conversation; id and created_at are assigned by the database
   */
  async create(draft: ConversationDraft): Promise<ConversationRecord> {
    const result = await this.db
      .insert(conversations)
      .values({
        provider: draft.provider,
        prompt: draft.prompt,
        response: draft.response,
        embedding: draft.embedding,
        metadata: draft.metadata,
      })
      .returning();

    const row = result[0];
    if (!row) {
      throw new Error('Insert returned no row');
    }
    return this.mapToRecord(row);
  }

  async findById(id: string): Promise<ConversationRecord | null> {
    const result = await this.db
      .select()
      .from(conversations)
      .where(eq(conversations.id, id))
      .limit(1);

    return result[0] ? this.mapToRecord(result[0]) : null;
  }

  /**
   * Search conversations by exact cosine similarity
   *
   * Filters apply before ranking. Ordered by ascending cosine distance, then newest first, so equal scores
   * come back in a deterministic order.
   */
  async searchSimilar(
    embedding: number[],
    limit: number,
    filter?: SearchFilter
  ): Promise<ConversationWithSimilarity[]> {
    const distance = sql`${conversations.embedding} <=> ${toVectorLiteral(embedding)}::vector`;

    const result = await this.db
      .select({
        ...getTableColumns(conversations),
        similarity: sql<number>`1 - (${distance})`.mapWith(Number),
      })
      .from(conversations)
      .where(this.filterConditions(filter))
      .orderBy(distance, desc(conversations.createdAt), desc(conversations.id))
      .limit(limit);

    return result.map((row) => ({
      ...this.mapToRecord(row),
      similarity: row.similarity,
    }));
  }

  /**
   * Find the most recent conversations, newest first
   */
  async findRecent(limit: number, filter?: SearchFilter): Promise<ConversationRecord[]> {
    const result = await this.db
      .select()
      .from(conversations)
      .where(this.filterConditions(filter))
      .orderBy(desc(conversations.createdAt), desc(conversations.id))
      .limit(limit);

    return result.map((row) => this.mapToRecord(row));
  }

  /**
   * Count conversations and their time span, grouped by provider
   */
  async aggregateByProvider(filter?: SearchFilter): Promise<ProviderAggregate[]> {
    const result = await this.db
      .select({
        provider: conversations.provider,
        count: sql<number>`count(*)::int`.mapWith(Number),
        earliest: sql<Date | null>`min(${conversations.createdAt})`.mapWith(conversations.createdAt),
        latest: sql<Date | null>`max(${conversations.createdAt})`.mapWith(conversations.createdAt),
      })
      .from(conversations)
      .where(this.filterConditions(filter))
      .groupBy(conversations.provider);

    return result;
  }

  async ping(): Promise<void> {
    await this.db.execute(sql`SELECT 1`);
  }

  // =============================================================================
  // Private Helpers
  // =============================================================================

  private filterConditions(filter?: SearchFilter): SQL | undefined {
    const conditions: SQL[] = [];

    if (filter?.providers) {
      conditions.push(inArray(conversations.provider, filter.providers));
    }
    if (filter?.since) {
      conditions.push(gte(conversations.createdAt, filter.since));
    }
    if (filter?.until) {
      conditions.push(lte(conversations.createdAt, filter.until));
    }

    return conditions.length > 0 ? and(...conditions) : undefined;
  }

  private mapToRecord(row: ConversationRow): ConversationRecord {
    return {
      id: row.id,
      provider: row.provider,
      prompt: row.prompt,
      response: row.response,
      embedding: row.embedding,
      metadata: row.metadata,
      createdAt: row.createdAt,
    };
  }
}
