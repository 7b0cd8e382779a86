// =============================================================================
// Similarity Search Service - Unit Tests
// =============================================================================

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  EmbeddingFailureError,
  InvalidArgumentError,
  type Provider,
} from '@chat-recall/shared-types';
import { SimilaritySearchService } from './SimilaritySearchService.js';
import { RecordBuilder } from './RecordBuilder.js';
import { InMemoryConversationIndex } from '../../adapters/conversation-index/InMemoryConversationIndex.js';
import {
  FailingEmbedder,
  HashingEmbedder,
  StaticEmbedder,
  TEST_DIMENSIONS,
} from '../../test-utils/fakes.js';

describe('SimilaritySearchService', () => {
  let embedder: HashingEmbedder;
  let index: InMemoryConversationIndex;
  let service: SimilaritySearchService;

  async function record(provider: Provider, prompt: string, response: string) {
    const builder = new RecordBuilder(embedder, { embeddingTimeoutMs: 1000 });
    return index.insert(await builder.build(provider, prompt, response));
  }

  beforeEach(() => {
    embedder = new HashingEmbedder();
    index = new InMemoryConversationIndex({ dimensions: TEST_DIMENSIONS });
    service = new SimilaritySearchService(index, embedder, { maxResults: 3, embeddingTimeoutMs: 1000 });
  });

  it('returns an empty list when nothing is indexed', async () => {
    expect(await service.searchSimilar('machine learning')).toEqual([]);
  });

  it('ranks the exchange sharing the query terms first', async () => {
    const a = await record('openai', 'machine learning basics', 'an overview of machine learning');
    const b = await record('anthropic', 'quantum computing intro', 'an overview of quantum computing');

    const [top] = await service.searchSimilar('machine learning', 1);
    const both = await service.searchSimilar('machine learning', 2);

    expect(top?.recordId).toBe(a.id);
    expect(both.map((result) => result.recordId)).toEqual([a.id, b.id]);
    expect(both[0]?.score).toBeCloseTo(4 / Math.sqrt(24), 10);
    expect(both[1]?.score).toBe(0);
  });

  it('rejects a non-positive or fractional k before embedding or searching', async () => {
    const search = vi.spyOn(index, 'search');

    for (const k of [0, -1, 1.5]) {
      await expect(service.searchSimilar('machine learning', k)).rejects.toBeInstanceOf(InvalidArgumentError);
    }
    expect(embedder.calls).toEqual([]);
    expect(search).not.toHaveBeenCalled();
  });

  it('rejects a blank query before embedding', async () => {
    await expect(service.searchSimilar('   ')).rejects.toThrow('query must not be blank');
    expect(embedder.calls).toEqual([]);
  });

  it('rejects a query that embeds to the zero vector', async () => {
    const zero = new StaticEmbedder(new Array<number>(TEST_DIMENSIONS).fill(0));
    const zeroService = new SimilaritySearchService(index, zero, { maxResults: 3, embeddingTimeoutMs: 1000 });

    await expect(zeroService.searchSimilar('anything')).rejects.toThrow('query vector has zero magnitude');
  });

  it('clamps k to the configured maximum', async () => {
    for (let i = 0; i < 5; i++) {
      await record('openai', `question ${i}`, 'machine learning');
    }
    const search = vi.spyOn(index, 'search');

    const results = await service.searchSimilar('machine learning', 10);

    expect(results).toHaveLength(3);
    expect(search).toHaveBeenCalledWith(expect.any(Array), 3, undefined);
  });

  it('passes the filter to the index', async () => {
    await record('openai', 'machine learning basics', 'an overview');
    const google = await record('google', 'machine learning at scale', 'an overview');

    const results = await service.searchSimilar('machine learning', 5, { providers: ['google'] });

    expect(results.map((result) => result.recordId)).toEqual([google.id]);
  });

  it('surfaces embedder failures', async () => {
    const failing = new SimilaritySearchService(index, new FailingEmbedder(), {
      maxResults: 3,
      embeddingTimeoutMs: 1000,
    });

    await expect(failing.searchSimilar('machine learning')).rejects.toBeInstanceOf(EmbeddingFailureError);
  });

  describe('searchByVector', () => {
    it('searches with a precomputed vector', async () => {
      const a = await record('openai', 'machine learning basics', 'an overview of machine learning');

      const [top] = await service.searchByVector(a.embedding);

      expect(top?.recordId).toBe(a.id);
      expect(top?.score).toBeCloseTo(1, 10);
    });

    it('rejects the zero vector', async () => {
      await expect(
        service.searchByVector(new Array<number>(TEST_DIMENSIONS).fill(0))
      ).rejects.toBeInstanceOf(InvalidArgumentError);
    });

    it('rejects a vector with NaN or infinite components before searching', async () => {
      await record('openai', 'machine learning basics', 'an overview of machine learning');
      await record('anthropic', 'cooking pasta', 'boil water first');
      const searchSpy = vi.spyOn(index, 'search');

      for (const bad of [Number.NaN, Number.POSITIVE_INFINITY]) {
        const vector = new Array<number>(TEST_DIMENSIONS).fill(1);
        vector[0] = bad;

        await expect(service.searchByVector(vector, 2)).rejects.toThrow(
          new InvalidArgumentError('query vector contains non-finite components')
        );
      }
      expect(searchSpy).not.toHaveBeenCalled();
    });
  });
});
