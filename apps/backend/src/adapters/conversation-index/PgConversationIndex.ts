// =============================================================================
// PostgreSQL Conversation Index Adapter
// =============================================================================
// Implements ConversationIndexPort over ConversationRepository (pgvector).
// Adds the dimensionality checks, the store timeout and the mapping of driver
// failures to StoreUnavailableError.

import type {
  ConversationDraft,
  ConversationRecord,
  SearchFilter,
  SearchResult,
  StatsSummary,
} from '@chat-recall/shared-types';
import type { ConversationIndexPort } from '../../ports/ConversationIndexPort.js';
import type { ConversationRepository } from '../storage/conversation-repository.js';
import {
  AppError,
  SchemaMismatchError,
  StoreUnavailableError,
} from '../../domain/errors/index.js';
import {
  assertDimensions,
  assertFiniteVector,
  assertPositiveCount,
  assertRecordId,
  summarizeAggregates,
  validateSearchFilter,
} from '../../domain/conversation/index.js';
import { withTimeout } from '../../infrastructure/timeout/index.js';
import { logger } from '../../infrastructure/logging/logger.js';

/**
 * The repository operations the index relies on
 */
export type ConversationStore = Pick<
  ConversationRepository,
  | 'ensureSchema'
  | 'getEmbeddingDimensions'
  | 'create'
  | 'findById'
  | 'searchSimilar'
  | 'findRecent'
  | 'aggregateByProvider'
  | 'ping'
>;

export interface PgConversationIndexOptions {
  /** Embedding dimensionality of the conversations table */
  dimensions: number;
  /** Bound on every database round trip */
  timeoutMs: number;
}

/**
 * PostgreSQL implementation of ConversationIndexPort
 *
 * Features:
 * - Append-only inserts; ids and timestamps assigned by the database
 * - Exact cosine similarity search using pgvector, filtered in the query
 */
export class PgConversationIndex implements ConversationIndexPort {
  constructor(
    private repository: ConversationStore,
    private options: PgConversationIndexOptions
  ) {}

  async initialize(): Promise<void> {
    const log = logger.child({ operation: 'conversation.initialize' });
    const expected = this.options.dimensions;

    await this.run('initialize', () => this.repository.ensureSchema(expected));
    const actual = await this.run('initialize', () => this.repository.getEmbeddingDimensions());

    if (actual !== expected) {
      throw new SchemaMismatchError(
        `conversations.embedding is vector(${actual}), configured dimensionality is ${expected}`,
        { expected, actual }
      );
    }

    log.info('Conversation index ready', { dimensions: expected });
  }

  getDimensions(): number {
    return this.options.dimensions;
  }

  async insert(draft: ConversationDraft): Promise<ConversationRecord> {
    assertDimensions(draft.embedding, this.options.dimensions, 'embedding');
    assertFiniteVector(draft.embedding, 'embedding');

    const record = await this.run('insert', () => this.repository.create(draft));

    logger.info('Conversation stored', {
      operation: 'conversation.insert',
      recordId: record.id,
      provider: record.provider,
    });

    return record;
  }

  async search(queryVector: number[], k: number, filter?: SearchFilter): Promise<SearchResult[]> {
    assertPositiveCount('k', k);
    validateSearchFilter(filter);
    assertDimensions(queryVector, this.options.dimensions, 'query vector');
    assertFiniteVector(queryVector, 'query vector');

    const rows = await this.run('search', () => this.repository.searchSimilar(queryVector, k, filter));

    logger.debug('Conversation search completed', {
      operation: 'conversation.search',
      k,
      resultsReturned: rows.length,
    });

    return rows.map(({ similarity, ...record }) => ({
      recordId: record.id,
      // pgvector's float arithmetic can land a hair outside [-1, 1]
      score: Math.max(-1, Math.min(1, similarity)),
      record,
    }));
  }

  async stats(filter?: SearchFilter): Promise<StatsSummary> {
    validateSearchFilter(filter);

    const aggregates = await this.run('stats', () => this.repository.aggregateByProvider(filter));
    return summarizeAggregates(aggregates);
  }

  async findById(id: string): Promise<ConversationRecord | null> {
    assertRecordId(id);
    return this.run('findById', () => this.repository.findById(id));
  }

  async recent(limit: number, filter?: SearchFilter): Promise<ConversationRecord[]> {
    assertPositiveCount('limit', limit);
    validateSearchFilter(filter);
    return this.run('recent', () => this.repository.findRecent(limit, filter));
  }

  async ping(): Promise<void> {
    await this.run('ping', () => this.repository.ping());
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  private async run<T>(operation: string, query: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(`store.${operation}`, this.options.timeoutMs, () => query());
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Conversation store failure', error, { operation: `conversation.${operation}` });
      throw new StoreUnavailableError(`store.${operation}`, message);
    }
  }
}
