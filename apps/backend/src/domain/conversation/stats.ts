// =============================================================================
// Stats Summaries
// =============================================================================

import type { Provider, StatsSummary } from '@chat-recall/shared-types';

/**
 * Count and time span of one provider's records
 */
export interface ProviderAggregate {
  provider: Provider;
  count: number;
  earliest: Date | null;
  latest: Date | null;
}

/**
 * Fold per-provider aggregates into a StatsSummary
 */
export function summarizeAggregates(aggregates: ProviderAggregate[]): StatsSummary {
  const summary: StatsSummary = {
    totalCount: 0,
    perProviderCount: {},
    earliest: null,
    latest: null,
  };

  for (const aggregate of aggregates) {
    if (aggregate.count === 0) continue;

    summary.totalCount += aggregate.count;
    summary.perProviderCount[aggregate.provider] =
      (summary.perProviderCount[aggregate.provider] ?? 0) + aggregate.count;

    if (aggregate.earliest && (!summary.earliest || aggregate.earliest < summary.earliest)) {
      summary.earliest = aggregate.earliest;
    }
    if (aggregate.latest && (!summary.latest || aggregate.latest > summary.latest)) {
      summary.latest = aggregate.latest;
    }
  }

  return summary;
}
