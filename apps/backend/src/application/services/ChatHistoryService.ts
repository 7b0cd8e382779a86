// =============================================================================
// Chat History Service
// =============================================================================
// The operations the MCP tools and the HTTP API expose:
// - Search past exchanges by similarity to a text query
// - Ask a provider a question and record the exchange
// - Summarize usage per provider

import type {
  ConversationRecord,
  Provider,
  SearchFilter,
  SearchResult,
  StatsSummary,
} from '@chat-recall/shared-types';
import type { ConversationIndexPort } from '../../ports/ConversationIndexPort.js';
import type { LLMProviderPort, LLMResponse } from '../../ports/LLMProviderPort.js';
import {
  AppError,
  InvalidArgumentError,
  NotFoundError,
  ProviderFailureError,
} from '../../domain/errors/index.js';
import { assertRecordId } from '../../domain/conversation/index.js';
import type { RecordBuilder } from './RecordBuilder.js';
import { DEFAULT_SEARCH_SIZE, type SimilaritySearchService } from './SimilaritySearchService.js';
import type { StatsService } from './StatsService.js';
import { withTimeout } from '../../infrastructure/timeout/index.js';
import { logger } from '../../infrastructure/logging/logger.js';

/**
 * One adapter per supported provider
 */
export type ProviderAdapters = { readonly [P in Provider]: LLMProviderPort };

export interface ChatHistoryServiceOptions {
  /** Bound on each provider call */
  llmTimeoutMs: number;
  /** Maximum tokens a provider may generate per answer */
  maxTokens: number;
  /** Size used when a search names none (default: 5) */
  defaultSearchSize?: number;
}

export interface ChatHistoryDependencies {
  index: ConversationIndexPort;
  recordBuilder: RecordBuilder;
  search: SimilaritySearchService;
  stats: StatsService;
  providers: ProviderAdapters;
}

export class ChatHistoryService {
  private log = logger.child({ service: 'ChatHistoryService' });

  constructor(
    private deps: ChatHistoryDependencies,
    private options: ChatHistoryServiceOptions
  ) {}

  /**
   * Find past exchanges similar to a query
   */
  async searchChatHistory(
    query: string,
    size?: number,
    filter?: SearchFilter
  ): Promise<SearchResult[]> {
    return this.deps.search.searchSimilar(
      query,
      size ?? this.options.defaultSearchSize ?? DEFAULT_SEARCH_SIZE,
      filter
    );
  }

  /**
   * Ask a provider, record the exchange, and return the answer
   *
   * The answer is only returned once the exchange is stored; if building or
   * inserting the record fails, that failure propagates.
   *
   * @throws ProviderFailureError when the provider fails or answers with nothing
   * @throws TimeoutError when the provider does not answer in time
   */
  async askLlm(provider: Provider, prompt: string): Promise<string> {
    if (prompt.trim().length === 0) {
      throw new InvalidArgumentError('prompt must not be blank');
    }

    const adapter = this.selectProvider(provider);
    const response = await this.generate(provider, adapter, prompt);

    const draft = await this.deps.recordBuilder.build(provider, prompt, response.content, {
      model: adapter.getModel(),
      promptTokens: response.usage.promptTokens,
      completionTokens: response.usage.completionTokens,
      costUsd: adapter.calculateCost(response.usage.promptTokens, response.usage.completionTokens),
      finishReason: response.finishReason,
    });
    const record = await this.deps.index.insert(draft);

    this.log.info('Exchange recorded', {
      provider,
      recordId: record.id,
      promptTokens: response.usage.promptTokens,
      completionTokens: response.usage.completionTokens,
    });

    return response.content;
  }

  async getChatStats(filter?: SearchFilter): Promise<StatsSummary> {
    return this.deps.stats.getStats(filter);
  }

  /**
   * @throws NotFoundError when no record has this id
   */
  async getRecord(id: string): Promise<ConversationRecord> {
    assertRecordId(id);
    const record = await this.deps.index.findById(id);
    if (!record) {
      throw new NotFoundError('Conversation', id);
    }
    return record;
  }

  async listRecent(limit: number, filter?: SearchFilter): Promise<ConversationRecord[]> {
    return this.deps.index.recent(limit, filter);
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private selectProvider(provider: Provider): LLMProviderPort {
    switch (provider) {
      case 'openai':
        return this.deps.providers.openai;
      case 'anthropic':
        return this.deps.providers.anthropic;
      case 'google':
        return this.deps.providers.google;
    }
  }

  private async generate(
    provider: Provider,
    adapter: LLMProviderPort,
    prompt: string
  ): Promise<LLMResponse> {
    let response: LLMResponse;

    try {
      response = await withTimeout(`llm.${provider}`, this.options.llmTimeoutMs, (abortSignal) =>
        adapter.generate([{ role: 'user', content: prompt }], {
          maxTokens: this.options.maxTokens,
          abortSignal,
        })
      );
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.log.error('Provider call failed', error, { provider, model: adapter.getModel() });
      throw new ProviderFailureError(provider, message, { model: adapter.getModel() });
    }

    if (response.content.trim().length === 0) {
      throw new ProviderFailureError(provider, 'provider returned an empty response', {
        model: adapter.getModel(),
        finishReason: response.finishReason,
      });
    }

    return response;
  }
}
