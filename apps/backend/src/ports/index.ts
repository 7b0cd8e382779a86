// =============================================================================
// Port Interfaces - Barrel Export
// =============================================================================
// Ports define the contracts between the application core and external adapters.
// They enable dependency inversion and make the system testable and modular.

// LLM provider interface (OpenAI, Anthropic, Google)
export * from './LLMProviderPort.js';

// Durable conversation store with vector search
export * from './ConversationIndexPort.js';

// Text embedding interface
export * from './EmbeddingPort.js';
