import { describe, it, expect, vi } from 'vitest';
import { configuredProviders, createCompletion } from './router.js';
import type { CompletionResult, ProviderModule, ProviderRegistry } from './types.js';
import { ProviderUnavailableError } from '../errors/index.js';

function provider(configured: boolean, content = 'ok'): ProviderModule {
  return {
    isConfigured: () => configured,
    createCompletion: vi.fn(
      async (model: string): Promise<CompletionResult> => ({ content, tokensUsed: 3, model, provider: 'google' })
    ),
  };
}

describe('llm router', () => {
  it('should dispatch to the selected provider', async () => {
    const registry: ProviderRegistry = { google: provider(true, 'from google'), openai: provider(true) };

    const result = await createCompletion(registry, 'google', 'gemini-test', [{ role: 'user', content: 'hi' }], {
      temperature: 0.2,
    });

    expect(result.content).toBe('from google');
    expect(registry.google.createCompletion).toHaveBeenCalledWith('gemini-test', [{ role: 'user', content: 'hi' }], {
      temperature: 0.2,
    });
  });

  it('should reject providers without credentials', async () => {
    const registry: ProviderRegistry = { google: provider(false), openai: provider(true) };

    await expect(createCompletion(registry, 'google', 'gemini-test', [])).rejects.toBeInstanceOf(
      ProviderUnavailableError
    );
    expect(configuredProviders(registry)).toEqual(['openai']);
  });
});
