import { describe, it, expect } from 'vitest';
import { InvalidArgumentError, type ConversationRecord } from '@chat-recall/shared-types';
import {
  assertPositiveCount,
  assertRecordId,
  matchesFilter,
  validateSearchFilter,
} from './filter.js';

const record: ConversationRecord = {
  id: '4a8d7f3e-2b1c-4d5e-9f60-7a8b9c0d1e2f',
  provider: 'anthropic',
  prompt: 'What is a monad?',
  response: 'A monoid in the category of endofunctors.',
  embedding: [0.1, 0.2],
  metadata: {},
  createdAt: new Date('2026-03-01T12:00:00.000Z'),
};

describe('validateSearchFilter', () => {
  it('accepts no filter and an empty filter', () => {
    expect(() => validateSearchFilter()).not.toThrow();
    expect(() => validateSearchFilter({})).not.toThrow();
  });

  it('rejects an empty provider set', () => {
    expect(() => validateSearchFilter({ providers: [] })).toThrow(InvalidArgumentError);
  });

  it('rejects an inverted time range', () => {
    expect(() =>
      validateSearchFilter({
        since: new Date('2026-03-02T00:00:00.000Z'),
        until: new Date('2026-03-01T00:00:00.000Z'),
      })
    ).toThrow('since must not be later than until');
  });

  it('accepts a range of a single instant', () => {
    const instant = new Date('2026-03-01T00:00:00.000Z');
    expect(() => validateSearchFilter({ since: instant, until: instant })).not.toThrow();
  });
});

describe('matchesFilter', () => {
  it('matches on provider membership', () => {
    expect(matchesFilter(record, { providers: ['anthropic', 'google'] })).toBe(true);
    expect(matchesFilter(record, { providers: ['openai'] })).toBe(false);
  });

  it('treats both time bounds as inclusive', () => {
    const at = record.createdAt;
    expect(matchesFilter(record, { since: at, until: at })).toBe(true);
    expect(matchesFilter(record, { since: new Date(at.getTime() + 1) })).toBe(false);
    expect(matchesFilter(record, { until: new Date(at.getTime() - 1) })).toBe(false);
  });
});

describe('argument checks', () => {
  it('accepts only positive integer counts', () => {
    expect(() => assertPositiveCount('k', 1)).not.toThrow();
    for (const value of [0, -1, 2.5, Number.NaN]) {
      expect(() => assertPositiveCount('k', value)).toThrow('k must be a positive integer');
    }
  });

  it('accepts only UUID record ids', () => {
    expect(() => assertRecordId(record.id)).not.toThrow();
    expect(() => assertRecordId('not-a-uuid')).toThrow('Invalid record id "not-a-uuid"');
  });
});
