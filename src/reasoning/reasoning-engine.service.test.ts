import { describe, it, expect, vi } from 'vitest';
import { ReasoningEngine } from './reasoning-engine.service.js';
import { ModelRouter } from '../llm/model-router.service.js';
import { createPolicyConfig } from '../config/policy.js';
import { ProviderUnavailableError, ReasoningFailure } from '../errors/index.js';
import type { ProviderModule, ProviderRegistry } from '../llm/types.js';
import type { ProviderId } from '../types/index.js';
import type { ReasoningContext } from './reasoning.types.js';

type Completion = ProviderModule['createCompletion'];

const policy = createPolicyConfig();

const MODEL_TEXT = ['1. Analysis of the concern', 'Poor sleep [1].', 'Response:', 'Please consult a doctor if this continues.'].join(
  '\n'
);

function answering(provider: ProviderId, content = MODEL_TEXT) {
  return vi.fn<Parameters<Completion>, ReturnType<Completion>>(async (model) => ({
    content,
    tokensUsed: 12,
    inputTokens: 8,
    outputTokens: 4,
    model,
    provider,
  }));
}

function failing(error: Error) {
  return vi.fn<Parameters<Completion>, ReturnType<Completion>>(async () => Promise.reject(error));
}

function engineWith(google: Completion, openai: Completion, available: Partial<Record<ProviderId, boolean>> = { google: true, openai: true }) {
  const providers: ProviderRegistry = {
    google: { createCompletion: google, isConfigured: () => true },
    openai: { createCompletion: openai, isConfigured: () => true },
  };
  return new ReasoningEngine({
    router: new ModelRouter(policy.routing, available),
    providers,
    routing: policy.routing,
    safety: policy.safety,
  });
}

function context(signal?: AbortSignal): ReasoningContext {
  return {
    traceId: 'trace-1',
    input: { userId: 'u', sessionId: 's', content: 'I cannot sleep', inputType: 'text' },
    analyzedInput: {
      text: 'I cannot sleep',
      intent: 'symptom_description',
      medicalEntities: ['insomnia'],
      urgencyLevel: 4,
      confidence: 0.6,
    },
    retrieval: {
      documents: [{ content: 'Sleep hygiene', source: 'nih', confidenceScore: 0.9, metadata: {} }],
      citations: [{ title: 'Sleep', source: 'nih', url: 'https://example.org/sleep', authors: [], relevanceScore: 0.9 }],
    },
    medicalImages: [],
    compressedHistory: '',
    signal,
  };
}

describe('ReasoningEngine', () => {
  it('should build a response from the preferred provider', async () => {
    const google = answering('google');
    const openai = answering('openai');

    const output = await engineWith(google, openai).generate(context());

    expect(openai).not.toHaveBeenCalled();
    expect(google).toHaveBeenCalledWith('gemini-1.5-flash', expect.any(Array), {
      temperature: 0.3,
      maxTokens: 2000,
      signal: undefined,
    });
    expect(output.selection).toEqual({ provider: 'google', model: 'gemini-1.5-flash', complexity: 'simple' });
    expect(output.attempts).toEqual([{ provider: 'google', model: 'gemini-1.5-flash', success: true }]);

    const { response } = output;
    expect(response.content).toBe('Please consult a doctor if this continues.');
    expect(response.reasoningSteps).toHaveLength(1);
    expect(response.reasoningSteps[0]?.evidence).toEqual(['nih']);
    expect(response.confidenceLevel).toBeCloseTo(0.79, 10);
    expect(response.safetyWarnings).toEqual(['Response contains guidance to consult a doctor']);
    expect(response.citations).toHaveLength(1);
    expect(response.medicalDisclaimer).toBe(policy.safety.medicalDisclaimer);
    expect(response.metadata).toMatchObject({
      traceId: 'trace-1',
      modelProvider: 'google',
      modelUsed: 'gemini-1.5-flash',
      complexity: 'simple',
      usage: { inputTokens: 8, outputTokens: 4, totalTokens: 12 },
      reasoningStepsCount: 1,
    });
  });

  it('should fall back when the preferred provider is unavailable', async () => {
    const google = failing(new ProviderUnavailableError('google', 'overloaded'));
    const openai = answering('openai');

    const output = await engineWith(google, openai).generate(context());

    expect(output.selection.provider).toBe('openai');
    expect(output.response.metadata.modelUsed).toBe('gpt-4o-mini');
    expect(output.attempts).toEqual([
      { provider: 'google', model: 'gemini-1.5-flash', success: false, error: 'overloaded' },
      { provider: 'openai', model: 'gpt-4o-mini', success: true },
    ]);
  });

  it('should fail once every provider is unavailable', async () => {
    const engine = engineWith(
      failing(new ProviderUnavailableError('google', 'down')),
      failing(new ProviderUnavailableError('openai', 'down'))
    );

    const failure = engine.generate(context());

    await expect(failure).rejects.toBeInstanceOf(ReasoningFailure);
    await expect(failure).rejects.toThrow('All LLM providers failed');
  });

  it('should not fall back on other provider errors', async () => {
    const openai = answering('openai');
    const engine = engineWith(failing(new Error('bad request')), openai);

    await expect(engine.generate(context())).rejects.toThrow('Completion failed on google');
    expect(openai).not.toHaveBeenCalled();
  });

  it('should reject an empty completion', async () => {
    const engine = engineWith(answering('google', '   '), answering('openai'));

    await expect(engine.generate(context())).rejects.toThrow('Empty response from google/gemini-1.5-flash');
  });

  it('should fail when no provider is configured', async () => {
    const engine = engineWith(answering('google'), answering('openai'), {});

    await expect(engine.generate(context())).rejects.toThrow('No LLM provider is configured or available');
  });

  it('should rethrow when the request was cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const openai = answering('openai');
    const engine = engineWith(failing(new ProviderUnavailableError('google', 'aborted')), openai);

    const failure = engine.generate(context(controller.signal));

    await expect(failure).rejects.toBeInstanceOf(ProviderUnavailableError);
    expect(openai).not.toHaveBeenCalled();
  });
});
