/**
 * @fileoverview Azure OpenAI providers
 *
 * Chat completions and embeddings through LangChain's Azure clients. Both
 * providers are built from the `azure` config section; a provider whose
 * settings are incomplete is never constructed (see createAzureProviders).
 */

import { AzureChatOpenAI, AzureOpenAIEmbeddings } from '@langchain/openai';
import { AIMessage, HumanMessage, SystemMessage, type BaseMessage, type MessageContent } from '@langchain/core/messages';
import type { AzureSettings } from '../config/index.js';
import type { ChatMessage } from '../types.js';
import type { EmbeddingProvider, LLMProvider, LLMRequest, LLMResponse, ProviderStatus } from './types.js';

export interface AzureChatOptions {
  temperature: number;
  maxTokens: number;
  timeoutMs?: number;
}

interface AzureConnection {
  apiKey: string;
  endpoint: string;
  apiVersion: string;
  deployment: string;
}

// ============================================================================
// CHAT
// ============================================================================

export class AzureOpenAIChatProvider implements LLMProvider {
  readonly id = 'azure-openai' as const;
  readonly name = 'Azure OpenAI chat';
  readonly type = 'llm' as const;
  private readonly model: AzureChatOpenAI;

  constructor(
    private readonly connection: AzureConnection,
    options: AzureChatOptions
  ) {
    this.model = new AzureChatOpenAI({
      azureOpenAIApiKey: connection.apiKey,
      azureOpenAIEndpoint: connection.endpoint,
      azureOpenAIApiVersion: connection.apiVersion,
      azureOpenAIApiDeploymentName: connection.deployment,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      timeout: options.timeoutMs,
      // A failed completion is reported, not retried.
      maxRetries: 0,
    });
  }

  async checkAvailability(): Promise<ProviderStatus> {
    return { available: true, lastCheck: Date.now(), model: this.connection.deployment };
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const reply = await this.model.invoke(request.messages.map(toLangChainMessage));
    const usage = reply.usage_metadata;
    return {
      content: messageText(reply.content),
      model: this.connection.deployment,
      ...(usage
        ? {
            usage: {
              inputTokens: usage.input_tokens,
              outputTokens: usage.output_tokens,
              totalTokens: usage.total_tokens,
            },
          }
        : {}),
    };
  }
}

// ============================================================================
// EMBEDDINGS
// ============================================================================

export class AzureOpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly id = 'azure-openai' as const;
  readonly name = 'Azure OpenAI embeddings';
  readonly type = 'embedding' as const;
  private readonly embeddings: AzureOpenAIEmbeddings;

  constructor(private readonly connection: AzureConnection, timeoutMs?: number) {
    this.embeddings = new AzureOpenAIEmbeddings({
      azureOpenAIApiKey: connection.apiKey,
      azureOpenAIEndpoint: connection.endpoint,
      azureOpenAIApiVersion: connection.apiVersion,
      azureOpenAIApiDeploymentName: connection.deployment,
      timeout: timeoutMs,
      maxRetries: 1,
    });
  }

  async checkAvailability(): Promise<ProviderStatus> {
    return { available: true, lastCheck: Date.now(), model: this.connection.deployment };
  }

  async embedOne(text: string): Promise<number[]> {
    return this.embeddings.embedQuery(text);
  }
}

// ============================================================================
// FACTORY
// ============================================================================

export interface AzureProviders {
  llm: AzureOpenAIChatProvider | null;
  embeddings: AzureOpenAIEmbeddingProvider | null;
  /** Why a provider is absent, keyed by role. */
  missing: { llm?: string; embeddings?: string };
}

export function createAzureProviders(
  settings: AzureSettings,
  chat: AzureChatOptions,
  embeddingTimeoutMs?: number
): AzureProviders {
  const missing: AzureProviders['missing'] = {};
  const { apiKey, endpoint, apiVersion, chatDeployment, embeddingDeployment } = settings;

  let llm: AzureOpenAIChatProvider | null = null;
  if (apiKey && endpoint && chatDeployment) {
    llm = new AzureOpenAIChatProvider({ apiKey, endpoint, apiVersion, deployment: chatDeployment }, chat);
  } else {
    missing.llm = describeMissing(settings, 'AZURE_OPENAI_CHAT_DEPLOYMENT', chatDeployment);
  }

  let embeddings: AzureOpenAIEmbeddingProvider | null = null;
  if (apiKey && endpoint && embeddingDeployment) {
    embeddings = new AzureOpenAIEmbeddingProvider(
      { apiKey, endpoint, apiVersion, deployment: embeddingDeployment },
      embeddingTimeoutMs
    );
  } else {
    missing.embeddings = describeMissing(settings, 'AZURE_OPENAI_EMBEDDING_DEPLOYMENT', embeddingDeployment);
  }

  return { llm, embeddings, missing };
}

function describeMissing(settings: AzureSettings, deploymentVariable: string, deployment: string | undefined): string {
  const absent: string[] = [];
  if (!settings.apiKey) absent.push('AZURE_OPENAI_API_KEY');
  if (!settings.endpoint) absent.push('AZURE_OPENAI_ENDPOINT');
  if (!deployment) absent.push(deploymentVariable);
  return `missing ${absent.join(', ')}`;
}

// ============================================================================
// MESSAGE CONVERSION
// ============================================================================

export function toLangChainMessage(message: ChatMessage): BaseMessage {
  switch (message.role) {
    case 'system':
      return new SystemMessage(message.content);
    case 'assistant':
      return new AIMessage(message.content);
    case 'user':
      return new HumanMessage(message.content);
  }
}

/**
 * Flatten LangChain message content to plain text.
 */
export function messageText(content: MessageContent): string {
  if (typeof content === 'string') return content;
  return content
    .map((part) => ('text' in part && typeof part.text === 'string' ? part.text : ''))
    .join('');
}
