import { describe, it, expect } from 'vitest';
import { summarizeAggregates } from './stats.js';

describe('summarizeAggregates', () => {
  it('returns an empty summary for no aggregates', () => {
    expect(summarizeAggregates([])).toEqual({
      totalCount: 0,
      perProviderCount: {},
      earliest: null,
      latest: null,
    });
  });

  it('sums counts and spans the time range across providers', () => {
    const summary = summarizeAggregates([
      {
        provider: 'openai',
        count: 3,
        earliest: new Date('2026-01-02T00:00:00.000Z'),
        latest: new Date('2026-01-05T00:00:00.000Z'),
      },
      {
        provider: 'google',
        count: 1,
        earliest: new Date('2026-01-01T00:00:00.000Z'),
        latest: new Date('2026-01-01T00:00:00.000Z'),
      },
    ]);

    expect(summary).toEqual({
      totalCount: 4,
      perProviderCount: { openai: 3, google: 1 },
      earliest: new Date('2026-01-01T00:00:00.000Z'),
      latest: new Date('2026-01-05T00:00:00.000Z'),
    });
  });

  it('leaves out providers with no records', () => {
    const summary = summarizeAggregates([
      { provider: 'anthropic', count: 0, earliest: null, latest: null },
    ]);

    expect(summary.perProviderCount).toEqual({});
    expect(summary.totalCount).toBe(0);
  });
});
