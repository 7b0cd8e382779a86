// =============================================================================
// LLM Types
// =============================================================================

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export type LLMFinishReason = 'stop' | 'length' | 'content_filter' | 'error' | 'other';

export interface LLMResponse {
  content: string;
  usage: LLMUsage;
  finishReason: LLMFinishReason;
}

// =============================================================================
// Generate Options
// =============================================================================

/**
 * Options for LLM generation requests
 */
export interface GenerateOptions {
  /** Sampling temperature (0-2, default varies by provider) */
  temperature?: number;
  /** Maximum tokens to generate */
  maxTokens?: number;
  /** System prompt to prepend to messages */
  systemPrompt?: string;
  /** Aborts the in-flight request when the caller stops waiting */
  abortSignal?: AbortSignal;
}

// =============================================================================
// LLM Provider Port
// =============================================================================

/**
 * Port interface for LLM providers (OpenAI, Anthropic, Google)
 *
 * This port abstracts the details of different LLM APIs, providing a unified
 * interface for text generation.
 */
export interface LLMProviderPort {
  /**
   * Generate a complete response from the LLM
   *
   * @param messages - The conversation so far
   * @param options - Generation options (temperature, max tokens, abort signal)
   * @returns The response text with usage stats
   */
  generate(messages: LLMMessage[], options?: GenerateOptions): Promise<LLMResponse>;

  /**
   * Get the current model identifier
   *
   * @returns The model ID (e.g., "openai:gpt-4o", "anthropic:claude-3-5-sonnet-20241022")
   */
  getModel(): string;

  /**
   * Calculate the cost for a given token usage
   *
   * @returns Cost in USD
   */
  calculateCost(promptTokens: number, completionTokens: number): number;
}
