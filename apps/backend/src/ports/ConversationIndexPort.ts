import type {
  ConversationDraft,
  ConversationRecord,
  SearchFilter,
  SearchResult,
  StatsSummary,
} from '@chat-recall/shared-types';

// =============================================================================
// Conversation Index Port
// =============================================================================

/**
 * Port interface for the durable, vector-searchable conversation store
 *
 * The store is append-only: records are inserted and read, never updated.
 * Every stored embedding has the single dimensionality the index was
 * configured with.
 */
export interface ConversationIndexPort {
  /**
   * Prepare the backing schema and verify its embedding dimensionality
   *
   * @throws SchemaMismatchError if an existing schema disagrees with the configuration
   */
  initialize(): Promise<void>;

  /**
   * The embedding dimensionality every record and query vector must have
   */
  getDimensions(): number;

  /**
   * Persist a new record
   *
   * Not idempotent: identical drafts produce distinct records.
   *
   * @returns The stored record with its assigned id and createdAt
   * @throws SchemaMismatchError if the embedding has the wrong dimensionality
   */
  insert(draft: ConversationDraft): Promise<ConversationRecord>;

  /**
   * Nearest-neighbour search over the embedding field
   *
   * @param queryVector - Vector of the index's dimensionality
   * @param k - Maximum number of results
   * @param filter - Optional provider set and/or time range
   * @returns At most k results by descending score, ties newest first
   * @throws SchemaMismatchError if the query vector has the wrong dimensionality
   */
  search(queryVector: number[], k: number, filter?: SearchFilter): Promise<SearchResult[]>;

  /**
   * Usage summary over the records matching the filter
   */
  stats(filter?: SearchFilter): Promise<StatsSummary>;

  /**
   * Exact-match lookup by id
   *
   * @returns The record, or null if no record has this id
   */
  findById(id: string): Promise<ConversationRecord | null>;

  /**
   * Most recently created records, newest first
   */
  recent(limit: number, filter?: SearchFilter): Promise<ConversationRecord[]>;

  /**
   * Check the backing store is reachable
   *
   * @throws StoreUnavailableError or TimeoutError when it is not
   */
  ping(): Promise<void>;
}
