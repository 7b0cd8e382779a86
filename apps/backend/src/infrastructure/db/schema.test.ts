import { describe, it, expect } from 'vitest';
import { getTableConfig } from 'drizzle-orm/pg-core';
import { conversations, parseVectorLiteral, toVectorLiteral } from './schema.js';

describe('pgvector literals', () => {
  it('formats a vector as a bracketed list', () => {
    expect(toVectorLiteral([0.25, -1, 3])).toBe('[0.25,-1,3]');
  });

  it('parses the driver representation', () => {
    expect(parseVectorLiteral('[0.25,-1,3]')).toEqual([0.25, -1, 3]);
    expect(parseVectorLiteral(' [] ')).toEqual([]);
  });
});

describe('conversations table', () => {
  it('declares the columns the repository queries', () => {
    const config = getTableConfig(conversations);

    expect(config.name).toBe('conversations');
    expect(config.columns.map((column) => column.name)).toEqual([
      'id',
      'provider',
      'prompt',
      'response',
      'embedding',
      'metadata',
      'created_at',
    ]);
    expect(config.indexes.map((index) => index.config.name)).toEqual([
      'conversations_provider_created_at_idx',
    ]);
  });
});
