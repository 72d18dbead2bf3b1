// LLM Provider Types

import type { ProviderId } from '../types/index.js';

export type { ProviderId };

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface CompletionResult {
  content: string;
  tokensUsed: number;
  inputTokens?: number;
  outputTokens?: number;
  model: string;
  provider: ProviderId;
}

export interface ProviderModule {
  createCompletion: (model: string, messages: ChatMessage[], options?: CompletionOptions) => Promise<CompletionResult>;
  isConfigured: () => boolean;
}

export type ProviderRegistry = Readonly<Record<ProviderId, ProviderModule>>;

export const PROVIDER_IDS: readonly ProviderId[] = ['google', 'openai'];

/**
 * True for HTTP statuses that mean "try another provider".
 */
export function isRetryableStatus(status: number | undefined): boolean {
  return status === 429 || (status !== undefined && status >= 500);
}
