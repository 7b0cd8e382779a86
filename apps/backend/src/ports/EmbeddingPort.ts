// =============================================================================
// Embedding Port
// =============================================================================

/**
 * Options for a single embedding request
 */
export interface EmbedOptions {
  /** Aborts the in-flight request when the caller stops waiting */
  abortSignal?: AbortSignal;
}

/**
 * Port interface for text embedding generation
 *
 * This port abstracts the generation of vector embeddings from text.
 * Every record in the index and every search query is embedded through the
 * same port, so all vectors share one model and one dimensionality.
 */
export interface EmbeddingPort {
  /**
   * Generate embedding for a single text
   *
   * @param text - The text to embed
   * @returns Vector embedding as an array of numbers
   */
  embed(text: string, options?: EmbedOptions): Promise<number[]>;

  /**
   * Get the dimension of embeddings produced by this provider
   *
   * Checked against the index's configured dimensionality at startup.
   * Common dimensions:
   * - OpenAI text-embedding-3-small: 1536
   * - OpenAI text-embedding-3-large: 3072
   * - Google text-embedding-004: 768
   */
  getDimension(): number;

  /**
   * Get the model identifier used for embeddings
   *
   * @returns The model name (e.g., "openai:text-embedding-3-small")
   */
  getModel(): string;
}
