// =============================================================================
// AI Provider Registry
// =============================================================================
// Centralized provider configuration using Vercel AI SDK

import { createProviderRegistry } from 'ai';
import { openai } from '@ai-sdk/openai';
import { anthropic } from '@ai-sdk/anthropic';
import { google } from '@ai-sdk/google';
import { InvalidArgumentError } from '@chat-recall/shared-types';

/**
 * Provider registry with OpenAI, Anthropic and Google
 *
 * Usage:
 *   registry.languageModel('openai:gpt-4o')
 *   registry.languageModel('google:gemini-1.5-pro')
 *   registry.textEmbeddingModel('openai:text-embedding-3-small')
 *
 * API keys are read from OPENAI_API_KEY, ANTHROPIC_API_KEY and
 * GOOGLE_GENERATIVE_AI_API_KEY by the providers on first use.
 */
export const registry = createProviderRegistry({
  openai,
  anthropic,
  google,
});

export type RegistryModelId = `${'openai' | 'anthropic' | 'google'}:${string}`;

export function isRegistryModelId(modelId: string): modelId is RegistryModelId {
  return /^(openai|anthropic|google):.+$/.test(modelId);
}

function assertRegistryModelId(modelId: string): RegistryModelId {
  if (!isRegistryModelId(modelId)) {
    throw new InvalidArgumentError(`Unsupported model ID "${modelId}"`, { modelId });
  }
  return modelId;
}

/**
 * Get a language model by ID
 * @param modelId - Model ID in format "provider:model" (e.g., "openai:gpt-4o")
 */
export function getLanguageModel(modelId: string) {
  return registry.languageModel(assertRegistryModelId(modelId));
}

/**
 * Get an embedding model by ID
 * @param modelId - Model ID in format "provider:model" (e.g., "openai:text-embedding-3-small")
 */
export function getEmbeddingModel(modelId: string) {
  return registry.textEmbeddingModel(assertRegistryModelId(modelId));
}
