// =============================================================================
// PostgreSQL Conversation Index - Unit Tests
// =============================================================================
// Runs against a stubbed repository; no database is involved.

import { describe, it, expect, vi } from 'vitest';
import {
  InvalidArgumentError,
  SchemaMismatchError,
  StoreUnavailableError,
  TimeoutError,
  type ConversationRecord,
} from '@chat-recall/shared-types';
import { PgConversationIndex, type ConversationStore } from './PgConversationIndex.js';

const record: ConversationRecord = {
  id: '9d2c5a1e-3f4b-4c6d-8e7f-0a1b2c3d4e5f',
  provider: 'openai',
  prompt: 'What is pgvector?',
  response: 'A vector similarity extension for PostgreSQL.',
  embedding: [0.5, 0.5, 0, 0],
  metadata: { model: 'openai:gpt-4o' },
  createdAt: new Date('2026-02-10T08:30:00.000Z'),
};

function createRepository(overrides: Partial<ConversationStore> = {}): ConversationStore {
  return {
    ensureSchema: vi.fn().mockResolvedValue(undefined),
    getEmbeddingDimensions: vi.fn().mockResolvedValue(4),
    create: vi.fn().mockResolvedValue(record),
    findById: vi.fn().mockResolvedValue(record),
    searchSimilar: vi.fn().mockResolvedValue([]),
    findRecent: vi.fn().mockResolvedValue([record]),
    aggregateByProvider: vi.fn().mockResolvedValue([]),
    ping: vi.fn().mockResolvedValue(undefined),
    ...overrides,
  };
}

function createIndex(repository: ConversationStore, timeoutMs: number = 1000) {
  return new PgConversationIndex(repository, { dimensions: 4, timeoutMs });
}

describe('PgConversationIndex', () => {
  describe('initialize', () => {
    it('creates the schema with the configured dimensionality', async () => {
      const repository = createRepository();

      await createIndex(repository).initialize();

      expect(repository.ensureSchema).toHaveBeenCalledWith(4);
    });

    it('fails when the existing column has another dimensionality', async () => {
      const repository = createRepository({
        getEmbeddingDimensions: vi.fn().mockResolvedValue(1536),
      });

      await expect(createIndex(repository).initialize()).rejects.toThrow(
        'conversations.embedding is vector(1536), configured dimensionality is 4'
      );
      await expect(createIndex(repository).initialize()).rejects.toBeInstanceOf(SchemaMismatchError);
    });
  });

  describe('insert', () => {
    it('checks the dimensionality before touching the database', async () => {
      const repository = createRepository();
      const index = createIndex(repository);

      await expect(
        index.insert({ ...record, embedding: [1, 2, 3] })
      ).rejects.toBeInstanceOf(SchemaMismatchError);
      expect(repository.create).not.toHaveBeenCalled();
    });

    it('rejects non-finite components before touching the database', async () => {
      const repository = createRepository();

      await expect(
        createIndex(repository).insert({ ...record, embedding: [0.5, Number.NaN, 0, 0] })
      ).rejects.toThrow(new SchemaMismatchError('embedding contains non-finite components'));
      expect(repository.create).not.toHaveBeenCalled();
    });

    it('returns the stored record', async () => {
      const repository = createRepository();
      const { id: _id, createdAt: _createdAt, ...draft } = record;

      expect(await createIndex(repository).insert(draft)).toEqual(record);
      expect(repository.create).toHaveBeenCalledWith(draft);
    });
  });

  describe('search', () => {
    it('maps similarity to score and strips it from the record', async () => {
      const repository = createRepository({
        searchSimilar: vi.fn().mockResolvedValue([{ ...record, similarity: 0.75 }]),
      });

      const results = await createIndex(repository).search([1, 0, 0, 0], 3, { providers: ['openai'] });

      expect(results).toEqual([{ recordId: record.id, score: 0.75, record }]);
      expect(repository.searchSimilar).toHaveBeenCalledWith([1, 0, 0, 0], 3, { providers: ['openai'] });
    });

    it('clamps rounding drift to the cosine range', async () => {
      const repository = createRepository({
        searchSimilar: vi.fn().mockResolvedValue([{ ...record, similarity: 1.0000000002 }]),
      });

      const [result] = await createIndex(repository).search([1, 0, 0, 0], 1);

      expect(result?.score).toBe(1);
    });

    it('validates arguments without querying', async () => {
      const repository = createRepository();
      const index = createIndex(repository);

      await expect(index.search([1, 0, 0, 0], 0)).rejects.toBeInstanceOf(InvalidArgumentError);
      await expect(index.search([1, 0, 0], 1)).rejects.toBeInstanceOf(SchemaMismatchError);
      await expect(index.search([1, Number.NaN, 0, 0], 1)).rejects.toBeInstanceOf(SchemaMismatchError);
      await expect(index.search([1, 0, 0, 0], 1, { providers: [] })).rejects.toBeInstanceOf(
        InvalidArgumentError
      );
      expect(repository.searchSimilar).not.toHaveBeenCalled();
    });

    it('reports driver failures as StoreUnavailableError', async () => {
      const repository = createRepository({
        searchSimilar: vi.fn().mockRejectedValue(new Error('connection refused')),
      });

      await expect(createIndex(repository).search([1, 0, 0, 0], 1)).rejects.toThrow(
        new StoreUnavailableError('store.search', 'connection refused')
      );
    });

    it('gives up after the store timeout', async () => {
      const repository = createRepository({
        searchSimilar: vi.fn(() => new Promise<never>(() => {})),
      });

      await expect(createIndex(repository, 20).search([1, 0, 0, 0], 1)).rejects.toThrow(
        new TimeoutError('store.search', 20)
      );
    });
  });

  describe('stats', () => {
    it('summarizes the per-provider aggregates', async () => {
      const repository = createRepository({
        aggregateByProvider: vi.fn().mockResolvedValue([
          {
            provider: 'openai',
            count: 3,
            earliest: new Date('2026-02-01T00:00:00.000Z'),
            latest: new Date('2026-02-03T00:00:00.000Z'),
          },
          {
            provider: 'anthropic',
            count: 2,
            earliest: new Date('2026-01-30T00:00:00.000Z'),
            latest: new Date('2026-02-02T00:00:00.000Z'),
          },
        ]),
      });

      expect(await createIndex(repository).stats()).toEqual({
        totalCount: 5,
        perProviderCount: { openai: 3, anthropic: 2 },
        earliest: new Date('2026-01-30T00:00:00.000Z'),
        latest: new Date('2026-02-03T00:00:00.000Z'),
      });
    });
  });

  describe('lookups', () => {
    it('rejects a malformed id without querying', async () => {
      const repository = createRepository();

      await expect(createIndex(repository).findById('abc')).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(repository.findById).not.toHaveBeenCalled();
    });

    it('lists recent records', async () => {
      const repository = createRepository();

      expect(await createIndex(repository).recent(10)).toEqual([record]);
      expect(repository.findRecent).toHaveBeenCalledWith(10, undefined);
    });

    it('pings the database', async () => {
      const repository = createRepository({
        ping: vi.fn().mockRejectedValue(new Error('ECONNRESET')),
      });

      await expect(createIndex(repository).ping()).rejects.toBeInstanceOf(StoreUnavailableError);
    });
  });
});
