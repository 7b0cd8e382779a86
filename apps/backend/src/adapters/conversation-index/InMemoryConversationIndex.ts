// =============================================================================
// In-Memory Conversation Index Adapter
// =============================================================================
// Implements ConversationIndexPort with brute-force cosine similarity.
// Same contract as PgConversationIndex; used for development and tests.

import { v4 as uuidv4 } from 'uuid';
import type {
  ConversationDraft,
  ConversationRecord,
  SearchFilter,
  SearchResult,
  StatsSummary,
} from '@chat-recall/shared-types';
import type { ConversationIndexPort } from '../../ports/ConversationIndexPort.js';
import {
  assertDimensions,
  assertFiniteVector,
  assertPositiveCount,
  assertRecordId,
  cosineSimilarity,
  matchesFilter,
  summarizeAggregates,
  validateSearchFilter,
  type ProviderAggregate,
} from '../../domain/conversation/index.js';
import { logger } from '../../infrastructure/logging/logger.js';

export interface InMemoryConversationIndexOptions {
  dimensions: number;
  /** Clock used to stamp createdAt (defaults to the system clock) */
  now?: () => Date;
}

interface StoredRecord {
  record: ConversationRecord;
  /** Insertion order, the last tie-breaker after score and createdAt */
  sequence: number;
}

/**
 * In-memory implementation of ConversationIndexPort
 *
 * Note: This is a development/testing implementation; records live only as
 * long as the process.
 */
export class InMemoryConversationIndex implements ConversationIndexPort {
  private records: Map<string, StoredRecord> = new Map();
  private sequence = 0;
  private readonly now: () => Date;

  constructor(private options: InMemoryConversationIndexOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async initialize(): Promise<void> {
    logger.debug('In-memory conversation index ready', { dimensions: this.options.dimensions });
  }

  getDimensions(): number {
    return this.options.dimensions;
  }

  async insert(draft: ConversationDraft): Promise<ConversationRecord> {
    assertDimensions(draft.embedding, this.options.dimensions, 'embedding');
    assertFiniteVector(draft.embedding, 'embedding');

    const record: ConversationRecord = {
      id: uuidv4(),
      provider: draft.provider,
      prompt: draft.prompt,
      response: draft.response,
      embedding: [...draft.embedding],
      metadata: { ...draft.metadata },
      createdAt: this.now(),
    };

    this.records.set(record.id, { record, sequence: this.sequence++ });

    logger.info('Conversation stored', {
      operation: 'conversation.insert',
      recordId: record.id,
      provider: record.provider,
    });

    return copyRecord(record);
  }

  async search(queryVector: number[], k: number, filter?: SearchFilter): Promise<SearchResult[]> {
    assertPositiveCount('k', k);
    validateSearchFilter(filter);
    assertDimensions(queryVector, this.options.dimensions, 'query vector');
    assertFiniteVector(queryVector, 'query vector');

    const scored: Array<StoredRecord & { score: number }> = [];

    for (const stored of this.records.values()) {
      if (!matchesFilter(stored.record, filter)) continue;
      scored.push({ ...stored, score: cosineSimilarity(queryVector, stored.record.embedding) });
    }

    scored.sort(
      (a, b) =>
        b.score - a.score ||
        b.record.createdAt.getTime() - a.record.createdAt.getTime() ||
        b.sequence - a.sequence
    );

    return scored.slice(0, k).map(({ record, score }) => ({
      recordId: record.id,
      score,
      record: copyRecord(record),
    }));
  }

  async stats(filter?: SearchFilter): Promise<StatsSummary> {
    validateSearchFilter(filter);

    const aggregates = new Map<ConversationRecord['provider'], ProviderAggregate>();

    for (const { record } of this.records.values()) {
      if (!matchesFilter(record, filter)) continue;

      const aggregate: ProviderAggregate = aggregates.get(record.provider) ?? {
        provider: record.provider,
        count: 0,
        earliest: null,
        latest: null,
      };
      aggregate.count++;
      if (!aggregate.earliest || record.createdAt < aggregate.earliest) {
        aggregate.earliest = record.createdAt;
      }
      if (!aggregate.latest || record.createdAt > aggregate.latest) {
        aggregate.latest = record.createdAt;
      }
      aggregates.set(record.provider, aggregate);
    }

    return summarizeAggregates([...aggregates.values()]);
  }

  async findById(id: string): Promise<ConversationRecord | null> {
    assertRecordId(id);
    const stored = this.records.get(id);
    return stored ? copyRecord(stored.record) : null;
  }

  async recent(limit: number, filter?: SearchFilter): Promise<ConversationRecord[]> {
    assertPositiveCount('limit', limit);
    validateSearchFilter(filter);

    return [...this.records.values()]
      .filter((stored) => matchesFilter(stored.record, filter))
      .sort(
        (a, b) =>
          b.record.createdAt.getTime() - a.record.createdAt.getTime() || b.sequence - a.sequence
      )
      .slice(0, limit)
      .map((stored) => copyRecord(stored.record));
  }

  async ping(): Promise<void> {}

  // =========================================================================
  // Test/Debug helpers (not part of port interface)
  // =========================================================================

  /**
   * Get count of stored records
   */
  getCount(): number {
    return this.records.size;
  }
}

function copyRecord(record: ConversationRecord): ConversationRecord {
  return {
    ...record,
    embedding: [...record.embedding],
    metadata: { ...record.metadata },
    createdAt: new Date(record.createdAt.getTime()),
  };
}
