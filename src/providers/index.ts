/**
 * @fileoverview Provider Module Exports
 *
 * Embedding and LLM providers for policy-qa. Both are optional: the engine
 * answers with degraded retrieval or the fixed apology without them.
 *
 * @packageDocumentation
 */

export type {
  ProviderId,
  ProviderStatus,
  Provider,
  LLMRequest,
  LLMResponse,
  LLMProvider,
  EmbeddingProvider,
} from './types.js';

export {
  AzureOpenAIChatProvider,
  AzureOpenAIEmbeddingProvider,
  createAzureProviders,
  toLangChainMessage,
  messageText,
  type AzureChatOptions,
  type AzureProviders,
} from './azure_openai.js';
