import type { Config } from '../config/index.js';
import type {
  ChatMessage,
  CompletionOptions,
  CompletionResult,
  ProviderId,
  ProviderModule,
  ProviderRegistry,
} from './types.js';
import { PROVIDER_IDS } from './types.js';
import { ProviderUnavailableError } from '../errors/index.js';
import { createGoogleProvider } from './providers/google.provider.js';
import { createOpenAIProvider } from './providers/openai.provider.js';
import logger from '../utils/logger.js';

/**
 * Build the provider registry from configuration.
 */
export function createProviderRegistry(config: Pick<Config, 'google' | 'openai'>): ProviderRegistry {
  return {
    google: createGoogleProvider({ apiKey: config.google.apiKey }),
    openai: createOpenAIProvider({ apiKey: config.openai.apiKey }),
  };
}

function getProvider(registry: ProviderRegistry, providerId: ProviderId): ProviderModule {
  const provider = registry[providerId];
  if (!provider.isConfigured()) {
    throw new ProviderUnavailableError(providerId, `Provider ${providerId} is not configured (missing API key)`);
  }
  return provider;
}

/**
 * Create a chat completion using the specified provider and model
 */
export async function createCompletion(
  registry: ProviderRegistry,
  providerId: ProviderId,
  model: string,
  messages: ChatMessage[],
  options: CompletionOptions = {}
): Promise<CompletionResult> {
  const provider = getProvider(registry, providerId);

  logger.debug('LLM request', { provider: providerId, model, messageCount: messages.length });

  const result = await provider.createCompletion(model, messages, options);

  logger.debug('LLM response', { provider: providerId, model, tokensUsed: result.tokensUsed });

  return result;
}

export function configuredProviders(registry: ProviderRegistry): ProviderId[] {
  return PROVIDER_IDS.filter((id) => registry[id].isConfigured());
}
