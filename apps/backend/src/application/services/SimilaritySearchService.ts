// =============================================================================
// Similarity Search Service
// =============================================================================
// Retrieves the conversations closest to a text query or a query vector.

import type { SearchFilter, SearchResult } from '@chat-recall/shared-types';
import type { ConversationIndexPort } from '../../ports/ConversationIndexPort.js';
import type { EmbeddingPort } from '../../ports/EmbeddingPort.js';
import { InvalidArgumentError } from '../../domain/errors/index.js';
import {
  assertPositiveCount,
  isFiniteVector,
  isZeroVector,
  validateSearchFilter,
} from '../../domain/conversation/index.js';
import { embedText } from './RecordBuilder.js';
import { logger } from '../../infrastructure/logging/logger.js';

export const DEFAULT_SEARCH_SIZE = 5;

export interface SimilaritySearchOptions {
  /** Larger requests are clamped to this many results (default: 50) */
  maxResults: number;
  embeddingTimeoutMs: number;
}

export class SimilaritySearchService {
  private log = logger.child({ service: 'SimilaritySearchService' });

  constructor(
    private index: ConversationIndexPort,
    private embedder: EmbeddingPort,
    private options: SimilaritySearchOptions
  ) {}

  /**
   * Search by free text
   *
   * Arguments are validated before the embedder or the store is touched.
   *
   * @throws InvalidArgumentError for a bad k, a blank query or a zero-vector embedding
   */
  async searchSimilar(
    queryText: string,
    k: number = DEFAULT_SEARCH_SIZE,
    filter?: SearchFilter
  ): Promise<SearchResult[]> {
    assertPositiveCount('k', k);
    validateSearchFilter(filter);
    if (queryText.trim().length === 0) {
      throw new InvalidArgumentError('query must not be blank');
    }

    const queryVector = await embedText(this.embedder, queryText, this.options.embeddingTimeoutMs);
    return this.searchByVector(queryVector, k, filter);
  }

  /**
   * Search by a precomputed query vector
   *
   * @throws InvalidArgumentError for a bad k, or a zero or non-finite vector
   */
  async searchByVector(
    queryVector: number[],
    k: number = DEFAULT_SEARCH_SIZE,
    filter?: SearchFilter
  ): Promise<SearchResult[]> {
    assertPositiveCount('k', k);
    validateSearchFilter(filter);
    if (!isFiniteVector(queryVector)) {
      throw new InvalidArgumentError('query vector contains non-finite components');
    }
    if (isZeroVector(queryVector)) {
      throw new InvalidArgumentError('query vector has zero magnitude');
    }

    const limit = Math.min(k, this.options.maxResults);
    const results = await this.index.search(queryVector, limit, filter);

    this.log.debug('Similarity search completed', {
      requested: k,
      limit,
      resultsReturned: results.length,
      topScore: results[0]?.score,
    });

    return results;
  }
}
