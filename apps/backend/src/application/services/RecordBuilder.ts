// =============================================================================
// Record Builder
// =============================================================================
// Turns a raw prompt/response exchange into a ConversationDraft ready for the
// conversation index. The embedded text is always `prompt + "\n" + response`.

import {
  ProviderSchema,
  type ConversationDraft,
  type ConversationMetadata,
} from '@chat-recall/shared-types';
import type { EmbeddingPort } from '../../ports/EmbeddingPort.js';
import {
  AppError,
  EmbeddingFailureError,
  InvalidArgumentError,
} from '../../domain/errors/index.js';
import { isFiniteVector, isZeroVector } from '../../domain/conversation/index.js';
import { withTimeout } from '../../infrastructure/timeout/index.js';
import { logger } from '../../infrastructure/logging/logger.js';

/**
 * The single text representation embedded for every record
 */
export function toEmbeddingText(prompt: string, response: string): string {
  return `${prompt}\n${response}`;
}

/**
 * Embed text under a timeout
 *
 * Timeouts surface as TimeoutError; every other embedder failure, and any
 * empty, zero-magnitude or non-finite vector, surfaces as EmbeddingFailureError.
 */
export async function embedText(
  embedder: EmbeddingPort,
  text: string,
  timeoutMs: number
): Promise<number[]> {
  const model = embedder.getModel();
  let embedding: number[];

  try {
    embedding = await withTimeout('embedding.embed', timeoutMs, (abortSignal) =>
      embedder.embed(text, { abortSignal })
    );
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Embedding request failed', error, { operation: 'embedding.embed', model });
    throw new EmbeddingFailureError(model, message);
  }

  if (
    !Array.isArray(embedding) ||
    embedding.length === 0 ||
    !isFiniteVector(embedding) ||
    isZeroVector(embedding)
  ) {
    throw new EmbeddingFailureError(model, 'embedder returned a malformed vector');
  }

  return embedding;
}

export interface RecordBuilderOptions {
  /** Bound on the embedder call */
  embeddingTimeoutMs: number;
}

export class RecordBuilder {
  constructor(
    private embedder: EmbeddingPort,
    private options: RecordBuilderOptions
  ) {}

  /**
   * Build a draft from one exchange with a provider
   *
   * @throws InvalidArgumentError for an unknown provider or a blank prompt/response
   * @throws EmbeddingFailureError or TimeoutError when embedding fails
   */
  async build(
    provider: string,
    prompt: string,
    response: string,
    metadata: ConversationMetadata = {}
  ): Promise<ConversationDraft> {
    const parsedProvider = ProviderSchema.safeParse(provider);
    if (!parsedProvider.success) {
      throw new InvalidArgumentError(`Unknown provider "${provider}"`, { provider });
    }
    if (prompt.trim().length === 0) {
      throw new InvalidArgumentError('prompt must not be blank');
    }
    if (response.trim().length === 0) {
      throw new InvalidArgumentError('response must not be blank');
    }

    const embedding = await embedText(
      this.embedder,
      toEmbeddingText(prompt, response),
      this.options.embeddingTimeoutMs
    );

    return {
      provider: parsedProvider.data,
      prompt,
      response,
      embedding,
      metadata: { ...metadata },
    };
  }
}
