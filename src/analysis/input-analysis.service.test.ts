import { describe, it, expect } from 'vitest';
import { InputAnalyzer } from './input-analysis.service.js';
import { AnalysisError } from '../errors/index.js';
import type { UserInput } from '../types/index.js';

const analyzer = new InputAnalyzer();

function userInput(content: string, inputType: UserInput['inputType'] = 'text'): UserInput {
  return { userId: 'user-1', sessionId: 'session-1', content, inputType };
}

describe('InputAnalyzer', () => {
  it('should classify explicit self-harm as crisis with maximum urgency', () => {
    const result = analyzer.analyze(userInput('I want to kill myself tonight'));

    expect(result.intent).toBe('crisis');
    expect(result.urgencyLevel).toBe(10);
    expect(result.medicalEntities).toEqual([]);
    expect(result.confidence).toBeCloseTo(0.8);
  });

  it('should classify emotional distress and extract treatments', () => {
    const result = analyzer.analyze(
      userInput("  I've been feeling depressed and anxious about my therapy sessions  ")
    );

    expect(result.text).toBe("I've been feeling depressed and anxious about my therapy sessions");
    expect(result.intent).toBe('emotional_support');
    expect(result.medicalEntities).toEqual(['therapy']);
    expect(result.urgencyLevel).toBe(7);
    expect(result.emotionalContext).toBe('sadness');
    expect(result.confidence).toBeCloseTo(0.85);
  });

  it('should fall back to general inquiry for unmatched text', () => {
    const result = analyzer.analyze(userInput('hello'));

    expect(result.intent).toBe('general_inquiry');
    expect(result.urgencyLevel).toBe(3);
    expect(result.emotionalContext).toBeUndefined();
    expect(result.confidence).toBeCloseTo(0.5);
  });

  it('should read obfuscated crisis language', () => {
    expect(analyzer.analyze(userInput('I w4nt to k1ll mys3lf')).intent).toBe('crisis');
  });

  it('should de-duplicate entities in lexicon order', () => {
    const result = analyzer.analyze(userInput('Does zoloft help with insomnia and depression? My depression is worse'));

    expect(result.medicalEntities).toEqual(['depression', 'insomnia', 'zoloft']);
  });

  it('should reject non-text input', () => {
    expect(() => analyzer.analyze(userInput('...', 'voice'))).toThrow(AnalysisError);
  });
});
