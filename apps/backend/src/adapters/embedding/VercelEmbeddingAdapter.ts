// =============================================================================
// Vercel Embedding Adapter
// =============================================================================
// Implements EmbeddingPort using the Vercel AI SDK

import { embed } from 'ai';
import type { EmbeddingPort, EmbedOptions } from '../../ports/EmbeddingPort.js';
import { getEmbeddingModel } from '../../infrastructure/ai/registry.js';
import { createTracer, SpanKind, SpanStatusCode } from '../../infrastructure/observability/index.js';

const tracer = createTracer('embedding', '1.0.0');

/**
 * Embedding adapter using Vercel AI SDK
 *
 * Requests are sent once: retries are left to the caller.
 *
 * @example
 * ```typescript
 * const adapter = new VercelEmbeddingAdapter('openai:text-embedding-3-small', 1536);
 * const embedding = await adapter.embed('Hello, world!');
 * console.log(embedding.length); // 1536
 * ```
 */
export class VercelEmbeddingAdapter implements EmbeddingPort {
  /**
   * @param modelId - Model ID in format "provider:model"
   * @param dimensions - Dimensionality the model is configured to produce
   */
  constructor(
    private readonly modelId: string,
    private readonly dimensions: number
  ) {}

  async embed(text: string, options?: EmbedOptions): Promise<number[]> {
    return tracer.startActiveSpan(
      `embedding.embed ${this.modelId}`,
      {
        kind: SpanKind.CLIENT,
        attributes: {
          'gen_ai.request.model': this.modelId,
          'gen_ai.request.input_length': text.length,
        },
      },
      async (span) => {
        try {
          const { embedding, usage } = await embed({
            model: getEmbeddingModel(this.modelId),
            value: text,
            maxRetries: 0,
            abortSignal: options?.abortSignal,
          });

          span.setAttributes({
            'gen_ai.usage.input_tokens': usage.tokens,
            'gen_ai.response.dimensions': embedding.length,
          });

          return embedding;
        } catch (error) {
          const err = error instanceof Error ? error : new Error(String(error));
          span.recordException(err);
          span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
          throw error;
        } finally {
          span.end();
        }
      }
    );
  }

  getDimension(): number {
    return this.dimensions;
  }

  getModel(): string {
    return this.modelId;
  }
}
