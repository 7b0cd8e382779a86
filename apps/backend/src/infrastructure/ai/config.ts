// =============================================================================
// AI Model Configuration
// =============================================================================

/**
 * Model pricing per 1M tokens [input, output] in USD
 */
export const MODEL_PRICING: Record<string, [number, number]> = {
  // OpenAI models
  'gpt-4o-mini': [0.15, 0.60],
  'gpt-4o': [2.50, 10.00],
  'gpt-4-turbo': [10.00, 30.00],
  'gpt-4.1': [2.00, 8.00],
  'gpt-4.1-mini': [0.40, 1.60],
  // Anthropic models
  'claude-3-5-sonnet-20241022': [3.00, 15.00],
  'claude-3-5-haiku-20241022': [0.80, 4.00],
  'claude-sonnet-4-20250514': [3.00, 15.00],
  // Google models
  'gemini-1.5-pro': [1.25, 5.00],
  'gemini-1.5-flash': [0.075, 0.30],
  'gemini-2.0-flash': [0.10, 0.40],
};

/**
 * Embedding model dimensions
 */
export const EMBEDDING_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
  'text-embedding-004': 768,
};

/**
 * Strip the "provider:" prefix from a model ID
 */
export function modelName(modelId: string): string {
  const separator = modelId.indexOf(':');
  return separator === -1 ? modelId : modelId.slice(separator + 1);
}

/**
 * Calculate cost for token usage
 * @param modelId - The model ID (with or without provider prefix)
 * @returns Cost in USD, 0 for models without known pricing
 */
export function calculateModelCost(
  modelId: string,
  promptTokens: number,
  completionTokens: number
): number {
  const pricing = MODEL_PRICING[modelName(modelId)];
  if (!pricing) return 0;

  const [inputPrice, outputPrice] = pricing;
  return (promptTokens * inputPrice + completionTokens * outputPrice) / 1_000_000;
}

export function isKnownEmbeddingModel(modelId: string): boolean {
  return Object.hasOwn(EMBEDDING_DIMENSIONS, modelName(modelId));
}

/**
 * Get embedding dimension for a model
 * @returns Dimension count, defaults to 1536
 */
export function getEmbeddingDimension(modelId: string): number {
  return EMBEDDING_DIMENSIONS[modelName(modelId)] ?? 1536;
}
