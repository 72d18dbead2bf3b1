import { describe, it, expect } from 'vitest';
import { ModelRouter } from './model-router.service.js';
import { createPolicyConfig } from '../config/policy.js';
import { NoModelAvailableError } from '../errors/index.js';
import type { AnalyzedInput } from '../types/index.js';

const { routing } = createPolicyConfig();

function analyzed(overrides: Partial<AnalyzedInput> = {}): AnalyzedInput {
  return {
    text: 'how do I sleep better',
    intent: 'general_inquiry',
    medicalEntities: [],
    urgencyLevel: 3,
    confidence: 0.5,
    ...overrides,
  };
}

describe('ModelRouter', () => {
  describe('assessComplexity', () => {
    const router = new ModelRouter(routing);

    it('should route high urgency as critical', () => {
      expect(router.assessComplexity({ analyzedInput: analyzed({ urgencyLevel: 8 }), documentCount: 0 })).toBe('critical');
    });

    it('should route crisis keywords as critical', () => {
      expect(
        router.assessComplexity({ analyzedInput: analyzed({ text: 'this is an EMERGENCY' }), documentCount: 0 })
      ).toBe('critical');
    });

    it('should route many entities or documents as complex', () => {
      const entities = ['depression', 'anxiety', 'insomnia', 'sertraline'];
      expect(router.assessComplexity({ analyzedInput: analyzed({ medicalEntities: entities }), documentCount: 0 })).toBe(
        'complex'
      );
      expect(router.assessComplexity({ analyzedInput: analyzed(), documentCount: 6 })).toBe('complex');
    });

    it('should default to simple', () => {
      expect(router.assessComplexity({ analyzedInput: analyzed(), documentCount: 5 })).toBe('simple');
    });
  });

  describe('select', () => {
    it('should prefer the configured provider', () => {
      const router = new ModelRouter(routing, { google: true, openai: true });

      expect(router.select('simple')).toEqual({ provider: 'google', model: 'gemini-1.5-flash', complexity: 'simple' });
      expect(router.select('simple')).toEqual(router.select('simple'));
    });

    it('should fall back to the alternate provider', () => {
      const router = new ModelRouter(routing, { google: true, openai: true });

      expect(router.select('critical', { exclude: ['google'] })).toEqual({
        provider: 'openai',
        model: 'gpt-4-turbo',
        complexity: 'critical',
      });
    });

    it('should skip unavailable providers', () => {
      const router = new ModelRouter(routing, { openai: true });

      expect(router.select('complex').provider).toBe('openai');
      expect(router.availableProviders()).toEqual(['openai']);
    });

    it('should follow a different preferred provider', () => {
      const router = new ModelRouter(createPolicyConfig({ routing: { preferredProvider: 'openai' } }).routing, {
        google: true,
        openai: true,
      });

      expect(router.availableProviders()).toEqual(['openai', 'google']);
      expect(router.select('complex').model).toBe('gpt-4o-mini');
    });

    it('should throw when nothing is left', () => {
      const router = new ModelRouter(routing, { google: true });

      expect(() => router.select('simple', { exclude: ['google'] })).toThrow(NoModelAvailableError);
      expect(() => new ModelRouter(routing).select('simple')).toThrow('No LLM provider is configured or available');
    });

    it('should track availability changes', () => {
      const router = new ModelRouter(routing, { google: true, openai: true });

      router.setAvailability('google', false);

      expect(router.isAvailable('google')).toBe(false);
      expect(router.select('simple').provider).toBe('openai');
    });
  });
});
