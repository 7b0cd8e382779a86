// =============================================================================
// Stats Service
// =============================================================================

import type { SearchFilter, StatsSummary } from '@chat-recall/shared-types';
import type { ConversationIndexPort } from '../../ports/ConversationIndexPort.js';
import { validateSearchFilter } from '../../domain/conversation/index.js';

/**
 * Usage summaries over the conversation index
 */
export class StatsService {
  constructor(private index: ConversationIndexPort) {}

  async getStats(filter?: SearchFilter): Promise<StatsSummary> {
    validateSearchFilter(filter);
    return this.index.stats(filter);
  }
}
