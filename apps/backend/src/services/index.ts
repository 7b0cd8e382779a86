// =============================================================================
// Services - Composition Root
// =============================================================================
// Builds the object graph from an AppConfig. Nothing here is a module-level
// singleton: each entry point calls createServices once with its own config.

import type { AppConfig } from '../infrastructure/config/index.js';
import { createDatabase } from '../infrastructure/db/client.js';
import { ConversationRepository } from '../adapters/storage/conversation-repository.js';
import { PgConversationIndex } from '../adapters/conversation-index/PgConversationIndex.js';
import { InMemoryConversationIndex } from '../adapters/conversation-index/InMemoryConversationIndex.js';
import { VercelEmbeddingAdapter } from '../adapters/embedding/VercelEmbeddingAdapter.js';
import { VercelAIAdapter } from '../adapters/llm/VercelAIAdapter.js';
import type { ConversationIndexPort, EmbeddingPort } from '../ports/index.js';
import { SchemaMismatchError } from '../domain/errors/index.js';
import {
  ChatHistoryService,
  RecordBuilder,
  SimilaritySearchService,
  StatsService,
  type ProviderAdapters,
} from '../application/services/index.js';
import { logger } from '../infrastructure/logging/logger.js';

export interface Services {
  index: ConversationIndexPort;
  chatHistory: ChatHistoryService;
  /** Release the database pool, if any */
  close(): Promise<void>;
}

/**
 * Collaborators that replace the Vercel AI adapters (used by tests)
 */
export interface ServiceOverrides {
  embedder?: EmbeddingPort;
  providers?: ProviderAdapters;
  index?: ConversationIndexPort;
}

/**
 * Wire the application and initialize the conversation index
 *
 * @throws SchemaMismatchError when the embedder, the config and the store disagree on dimensionality
 */
export async function createServices(
  config: AppConfig,
  overrides: ServiceOverrides = {}
): Promise<Services> {
  const embedder =
    overrides.embedder ?? new VercelEmbeddingAdapter(config.embedding.model, config.embedding.dimensions);

  if (embedder.getDimension() !== config.embedding.dimensions) {
    throw new SchemaMismatchError(
      `${embedder.getModel()} produces ${embedder.getDimension()}-dimensional embeddings, configured ${config.embedding.dimensions}`,
      { expected: config.embedding.dimensions, actual: embedder.getDimension() }
    );
  }

  const providers: ProviderAdapters = overrides.providers ?? {
    openai: new VercelAIAdapter(config.llm.models.openai),
    anthropic: new VercelAIAdapter(config.llm.models.anthropic),
    google: new VercelAIAdapter(config.llm.models.google),
  };

  let close = async (): Promise<void> => {};
  let index: ConversationIndexPort;

  if (overrides.index) {
    index = overrides.index;
  } else if (config.store.backend === 'postgres') {
    const { db, queryClient } = createDatabase(config.store.databaseUrl);
    index = new PgConversationIndex(new ConversationRepository(db), {
      dimensions: config.embedding.dimensions,
      timeoutMs: config.store.timeoutMs,
    });
    close = async () => {
      await queryClient.end();
    };
  } else {
    index = new InMemoryConversationIndex({ dimensions: config.embedding.dimensions });
  }

  try {
    await index.initialize();
  } catch (error) {
    await close();
    throw error;
  }

  const recordBuilder = new RecordBuilder(embedder, {
    embeddingTimeoutMs: config.embedding.timeoutMs,
  });
  const search = new SimilaritySearchService(index, embedder, {
    maxResults: config.search.maxSize,
    embeddingTimeoutMs: config.embedding.timeoutMs,
  });
  const stats = new StatsService(index);

  const chatHistory = new ChatHistoryService(
    { index, recordBuilder, search, stats, providers },
    {
      llmTimeoutMs: config.llm.timeoutMs,
      maxTokens: config.llm.maxTokens,
      defaultSearchSize: config.search.defaultSize,
    }
  );

  logger.info('Services initialized', {
    store: config.store.backend,
    embeddingModel: embedder.getModel(),
    dimensions: config.embedding.dimensions,
  });

  return { index, chatHistory, close };
}
