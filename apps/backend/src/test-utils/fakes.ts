// =============================================================================
// Test Fakes
// =============================================================================
// In-process stand-ins for the embedding model and the LLM providers.

import type {
  EmbeddingPort,
  EmbedOptions,
  GenerateOptions,
  LLMMessage,
  LLMProviderPort,
  LLMResponse,
} from '../ports/index.js';
import type { ProviderAdapters } from '../application/services/index.js';
import { parseConfig, type AppConfig } from '../infrastructure/config/index.js';

export const TEST_DIMENSIONS = 64;

// =============================================================================
// Embedders
// =============================================================================

/**
 * 32-bit FNV-1a hash
 */
function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/**
 * Bag-of-words embedder: each lowercase word adds 1 to the slot its hash
 * selects, so texts sharing words score closer.
 */
export class HashingEmbedder implements EmbeddingPort {
  readonly calls: string[] = [];

  constructor(
    private dimensions: number = TEST_DIMENSIONS,
    private model: string = 'test:hashing'
  ) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      vector[fnv1a(word) % this.dimensions] += 1;
    }
    return vector;
  }

  getDimension(): number {
    return this.dimensions;
  }

  getModel(): string {
    return this.model;
  }
}

/**
 * Returns the same vector for every text
 */
export class StaticEmbedder implements EmbeddingPort {
  constructor(
    private vector: number[],
    private dimensions: number = TEST_DIMENSIONS
  ) {}

  async embed(): Promise<number[]> {
    return [...this.vector];
  }

  getDimension(): number {
    return this.dimensions;
  }

  getModel(): string {
    return 'test:static';
  }
}

export class FailingEmbedder implements EmbeddingPort {
  constructor(private message: string = 'embedding service unavailable') {}

  async embed(): Promise<number[]> {
    throw new Error(this.message);
  }

  getDimension(): number {
    return TEST_DIMENSIONS;
  }

  getModel(): string {
    return 'test:failing';
  }
}

/**
 * Never answers; rejects once the caller aborts
 */
export class HangingEmbedder implements EmbeddingPort {
  aborted = false;

  embed(_text: string, options?: EmbedOptions): Promise<number[]> {
    return new Promise((_, reject) => {
      options?.abortSignal?.addEventListener('abort', () => {
        this.aborted = true;
        reject(new Error('aborted'));
      });
    });
  }

  getDimension(): number {
    return TEST_DIMENSIONS;
  }

  getModel(): string {
    return 'test:hanging';
  }
}

// =============================================================================
// LLM Providers
// =============================================================================

export class FakeLLMProvider implements LLMProviderPort {
  readonly calls: Array<{ messages: LLMMessage[]; options?: GenerateOptions }> = [];

  constructor(
    private model: string,
    private answer: string | Error = 'fake answer',
    private usage = { promptTokens: 12, completionTokens: 34 }
  ) {}

  async generate(messages: LLMMessage[], options?: GenerateOptions): Promise<LLMResponse> {
    this.calls.push({ messages, options });
    if (this.answer instanceof Error) {
      throw this.answer;
    }
    return {
      content: this.answer,
      usage: { ...this.usage, totalTokens: this.usage.promptTokens + this.usage.completionTokens },
      finishReason: 'stop',
    };
  }

  getModel(): string {
    return this.model;
  }

  calculateCost(promptTokens: number, completionTokens: number): number {
    return (promptTokens + completionTokens) / 1_000_000;
  }
}

export function createFakeProviders(answers: Partial<Record<keyof ProviderAdapters, string | Error>> = {}) {
  return {
    openai: new FakeLLMProvider('openai:gpt-4o', answers.openai ?? 'openai answer'),
    anthropic: new FakeLLMProvider(
      'anthropic:claude-3-5-sonnet-20241022',
      answers.anthropic ?? 'anthropic answer'
    ),
    google: new FakeLLMProvider('google:gemini-1.5-pro', answers.google ?? 'google answer'),
  };
}

// =============================================================================
// Config
// =============================================================================

/**
 * In-memory configuration sized for the test embedders
 */
export function createTestConfig(env: Record<string, string> = {}): AppConfig {
  return parseConfig({
    NODE_ENV: 'test',
    STORE_BACKEND: 'memory',
    EMBEDDING_MODEL: 'openai:test-hashing',
    EMBEDDING_DIMENSIONS: String(TEST_DIMENSIONS),
    LOG_LEVEL: 'error',
    ...env,
  });
}
