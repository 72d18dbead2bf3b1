import OpenAI from 'openai';
import { config } from '../../config/index.js';
import { ProviderUnavailableError, errorMessage } from '../../errors/index.js';
import type { ChatMessage, CompletionOptions, CompletionResult, ProviderModule } from '../types.js';
import { isRetryableStatus } from '../types.js';
import logger from '../../utils/logger.js';

export interface OpenAIProviderSettings {
  apiKey: string;
  client?: OpenAI;
}

function isUnavailable(error: unknown): boolean {
  if (error instanceof OpenAI.APIUserAbortError) {
    return false;
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return true;
  }
  return error instanceof OpenAI.APIError && isRetryableStatus(error.status);
}

/**
 * Chat completions through the official SDK. The client is created on first use.
 */
export function createOpenAIProvider(
  settings: OpenAIProviderSettings = { apiKey: config.openai.apiKey }
): ProviderModule {
  let client: OpenAI | null = settings.client ?? null;

  function getClient(): OpenAI {
    if (!client) {
      client = new OpenAI({ apiKey: settings.apiKey });
    }
    return client;
  }

  async function createCompletion(
    model: string,
    messages: ChatMessage[],
    options: CompletionOptions = {}
  ): Promise<CompletionResult> {
    const openai = getClient();

    try {
      const response = await openai.chat.completions.create(
        {
          model,
          messages: messages.map(m => ({ role: m.role, content: m.content })),
          temperature: options.temperature ?? 0.3,
          max_tokens: options.maxTokens,
        },
        { signal: options.signal }
      );

      return {
        content: response.choices[0]?.message?.content || '',
        tokensUsed: response.usage?.total_tokens || 0,
        inputTokens: response.usage?.prompt_tokens,
        outputTokens: response.usage?.completion_tokens,
        model,
        provider: 'openai',
      };
    } catch (error) {
      logger.error('OpenAI completion failed', { error: errorMessage(error), model });
      if (isUnavailable(error)) {
        throw new ProviderUnavailableError('openai', 'OpenAI completion failed', { cause: error });
      }
      throw error;
    }
  }

  return {
    createCompletion,
    isConfigured: () => !!(settings.client || settings.apiKey),
  };
}
