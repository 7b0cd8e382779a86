// =============================================================================
// Search Filter Rules
// =============================================================================

import {
  InvalidArgumentError,
  type ConversationRecord,
  type SearchFilter,
} from '@chat-recall/shared-types';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Validate a filter before it reaches a store
 *
 * @throws InvalidArgumentError for an empty provider set or an inverted time range
 */
export function validateSearchFilter(filter?: SearchFilter): void {
  if (!filter) return;

  if (filter.providers && filter.providers.length === 0) {
    throw new InvalidArgumentError('providers filter must name at least one provider');
  }
  if (filter.since && filter.until && filter.since.getTime() > filter.until.getTime()) {
    throw new InvalidArgumentError('since must not be later than until', {
      since: filter.since.toISOString(),
      until: filter.until.toISOString(),
    });
  }
}

/**
 * Whether a record satisfies a filter (inclusive time bounds)
 */
export function matchesFilter(record: ConversationRecord, filter?: SearchFilter): boolean {
  if (!filter) return true;

  if (filter.providers && !filter.providers.includes(record.provider)) {
    return false;
  }
  const createdAt = record.createdAt.getTime();
  if (filter.since && createdAt < filter.since.getTime()) {
    return false;
  }
  if (filter.until && createdAt > filter.until.getTime()) {
    return false;
  }
  return true;
}

/**
 * Validate a result count: a positive integer
 *
 * @throws InvalidArgumentError for zero, negative or fractional values
 */
export function assertPositiveCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(`${name} must be a positive integer`, { [name]: value });
  }
}

export function assertRecordId(id: string): void {
  if (!UUID_PATTERN.test(id)) {
    throw new InvalidArgumentError(`Invalid record id "${id}"`);
  }
}
