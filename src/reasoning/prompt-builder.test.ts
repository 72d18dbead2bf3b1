import { describe, it, expect } from 'vitest';
import { buildSystemPrompt, buildUserPrompt } from './prompt-builder.js';
import type { ReasoningContext } from './reasoning.types.js';
import type { AnalyzedInput } from '../types/index.js';

const analyzed: AnalyzedInput = {
  text: 'I cannot sleep',
  intent: 'symptom_description',
  medicalEntities: ['insomnia'],
  urgencyLevel: 4,
  confidence: 0.6,
  emotionalContext: 'anxiety',
};

describe('buildSystemPrompt', () => {
  it('should add no directives for a calm request', () => {
    const prompt = buildSystemPrompt(analyzed, 8);

    expect(prompt).not.toContain('URGENT:');
    expect(prompt).not.toContain('CRISIS DETECTED');
    expect(prompt).toContain('Response:');
  });

  it('should add urgency and crisis directives', () => {
    const prompt = buildSystemPrompt({ ...analyzed, intent: 'crisis', urgencyLevel: 8 }, 8);

    expect(prompt).toContain(
      '\n\nURGENT: This appears to be a high-urgency situation. Prioritize safety and crisis resources.\n\nCRISIS DETECTED:'
    );
    expect(prompt).toContain('988 Suicide & Crisis Lifeline');
  });
});

describe('buildUserPrompt', () => {
  it('should lay out the query, evidence and history', () => {
    const context: ReasoningContext = {
      traceId: 'trace-1',
      input: { userId: 'u', sessionId: 's', content: 'I cannot sleep', inputType: 'text' },
      analyzedInput: analyzed,
      retrieval: {
        documents: [{ content: 'x'.repeat(310), source: 'nih', confidenceScore: 0.8, metadata: {} }],
        citations: [{ title: 'Sleep and mood', source: 'nih', url: 'https://example.org/a', authors: [], relevanceScore: 0.8 }],
      },
      medicalImages: [],
      compressedHistory: 'Recent conversation:',
    };

    expect(buildUserPrompt(context)).toBe(
      [
        'User Query: I cannot sleep',
        'Intent: symptom_description',
        'Urgency Level: 4/10',
        'Medical Entities: insomnia',
        'Emotional Context: anxiety',
        '\nRelevant Medical Information:',
        `[1] (nih) ${'x'.repeat(300)}...`,
        '\nScientific Sources:',
        '1. Sleep and mood - nih',
        '\nConversation History:\nRecent conversation:',
        '\nPlease provide a structured step-by-step analysis followed by an empathetic, helpful response.',
      ].join('\n')
    );
  });

  it('should omit empty sections', () => {
    const context: ReasoningContext = {
      traceId: 'trace-2',
      input: { userId: 'u', sessionId: 's', content: 'hello', inputType: 'text' },
      analyzedInput: { text: 'hello', intent: 'general_inquiry', medicalEntities: [], urgencyLevel: 3, confidence: 0.5 },
      retrieval: { documents: [], citations: [] },
      medicalImages: [],
      compressedHistory: '',
    };

    expect(buildUserPrompt(context).split('\n')).toEqual([
      'User Query: hello',
      'Intent: general_inquiry',
      'Urgency Level: 3/10',
      '',
      'Please provide a structured step-by-step analysis followed by an empathetic, helpful response.',
    ]);
  });
});
