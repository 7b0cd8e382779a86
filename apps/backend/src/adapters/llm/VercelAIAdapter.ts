// =============================================================================
// Vercel AI SDK Adapter
// =============================================================================
// Implements LLMProviderPort using the Vercel AI SDK

import { generateText, type CoreMessage } from 'ai';
import type {
  LLMProviderPort,
  GenerateOptions,
  LLMMessage,
  LLMResponse,
  LLMFinishReason,
} from '../../ports/LLMProviderPort.js';
import { getLanguageModel } from '../../infrastructure/ai/registry.js';
import { calculateModelCost } from '../../infrastructure/ai/config.js';
import { createTracer, SpanKind, SpanStatusCode } from '../../infrastructure/observability/index.js';

// =============================================================================
// Tracing
// =============================================================================

const tracer = createTracer('llm-provider', '1.0.0');

/**
 * LLM Provider adapter using Vercel AI SDK
 *
 * One instance per provider, each bound to its configured model. Requests are
 * sent once (`maxRetries: 0`); retry policy belongs to the caller.
 *
 * @example
 * ```typescript
 * const adapter = new VercelAIAdapter('openai:gpt-4o');
 * const response = await adapter.generate([
 *   { role: 'user', content: 'Hello!' }
 * ]);
 * ```
 */
export class VercelAIAdapter implements LLMProviderPort {
  private modelId: string;

  /**
   * Create a new Vercel AI adapter
   * @param modelId - Model ID in format "provider:model" (e.g., "google:gemini-1.5-pro")
   */
  constructor(modelId: string) {
    this.modelId = modelId;
  }

  /**
   * Generate a complete response from the LLM
   */
  async generate(
    messages: LLMMessage[],
    options?: GenerateOptions
  ): Promise<LLMResponse> {
    const [provider] = this.modelId.split(':');

    return tracer.startActiveSpan(
      `llm.generate ${this.modelId}`,
      {
        kind: SpanKind.CLIENT,
        attributes: {
          'gen_ai.system': provider,
          'gen_ai.request.model': this.modelId,
          'gen_ai.request.temperature': options?.temperature,
          'gen_ai.request.max_tokens': options?.maxTokens,
          'gen_ai.request.message_count': messages.length,
        },
      },
      async (span) => {
        try {
          const result = await generateText({
            model: getLanguageModel(this.modelId),
            messages: this.convertMessagesToCore(messages),
            system: options?.systemPrompt,
            temperature: options?.temperature,
            maxTokens: options?.maxTokens,
            maxRetries: 0,
            abortSignal: options?.abortSignal,
          });

          // Record usage metrics
          span.setAttributes({
            'gen_ai.usage.prompt_tokens': result.usage.promptTokens,
            'gen_ai.usage.completion_tokens': result.usage.completionTokens,
            'gen_ai.usage.total_tokens': result.usage.totalTokens,
            'gen_ai.response.finish_reason': result.finishReason,
          });

          return {
            content: result.text,
            usage: {
              promptTokens: result.usage.promptTokens,
              completionTokens: result.usage.completionTokens,
              totalTokens: result.usage.totalTokens,
            },
            finishReason: this.mapFinishReason(result.finishReason),
          };
        } catch (error) {
          const err = error instanceof Error ? error : new Error(String(error));
          span.recordException(err);
          span.setStatus({
            code: SpanStatusCode.ERROR,
            message: err.message,
          });
          throw error;
        } finally {
          span.end();
        }
      }
    );
  }

  /**
   * Get the current model identifier
   */
  getModel(): string {
    return this.modelId;
  }

  /**
   * Calculate the cost for a given token usage
   */
  calculateCost(promptTokens: number, completionTokens: number): number {
    return calculateModelCost(this.modelId, promptTokens, completionTokens);
  }

  // ===========================================================================
  // Private Helper Methods
  // ===========================================================================

  /**
   * Convert our LLMMessage format to AI SDK CoreMessage format
   */
  private convertMessagesToCore(messages: LLMMessage[]): CoreMessage[] {
    return messages.map((m): CoreMessage => {
      switch (m.role) {
        case 'system':
          return { role: 'system', content: m.content };
        case 'assistant':
          return { role: 'assistant', content: m.content };
        case 'user':
          return { role: 'user', content: m.content };
      }
    });
  }

  /**
   * Map AI SDK finish reason to our LLMFinishReason type
   */
  private mapFinishReason(reason: string): LLMFinishReason {
    switch (reason) {
      case 'stop':
        return 'stop';
      case 'length':
        return 'length';
      case 'content-filter':
        return 'content_filter';
      case 'error':
        return 'error';
      default:
        return 'other';
    }
  }
}
