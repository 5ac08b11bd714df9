/**
 * @fileoverview Provider Types for policy-qa
 *
 * Two provider roles back the query engine:
 * - an embedding provider that turns a question into a vector
 * - an LLM provider that completes a chat message sequence
 *
 * The engine still runs without either: missing embeddings degrade retrieval
 * to an empty result and a missing LLM produces the fixed apology answer.
 *
 * @packageDocumentation
 */

import type { ChatMessage } from '../types.js';

// ============================================================================
// BASE PROVIDER TYPES
// ============================================================================

export type ProviderId = 'azure-openai' | 'custom';

/**
 * Provider status information
 */
export interface ProviderStatus {
  available: boolean;
  reason?: string;
  lastCheck?: number;
  /** Deployment or model the provider talks to, when configured. */
  model?: string;
}

/**
 * Base provider interface
 */
export interface Provider {
  readonly id: ProviderId;
  readonly name: string;
  readonly type: 'llm' | 'embedding';

  /** Reports configuration state; does not call the service. */
  checkAvailability(): Promise<ProviderStatus>;
}

// ============================================================================
// LLM PROVIDER
// ============================================================================

/**
 * Sampling settings are fixed per provider instance.
 */
export interface LLMRequest {
  messages: ChatMessage[];
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    inputTokens?: number;
    outputTokens?: number;
    totalTokens?: number;
  };
}

/**
 * Single non-streaming completion. Implementations do not retry.
 */
export interface LLMProvider extends Provider {
  readonly type: 'llm';

  complete(request: LLMRequest): Promise<LLMResponse>;
}

// ============================================================================
// EMBEDDING PROVIDER
// ============================================================================

export interface EmbeddingProvider extends Provider {
  readonly type: 'embedding';

  /** Embedding for a single text; the dimension is fixed per deployment. */
  embedOne(text: string): Promise<number[]>;
}
