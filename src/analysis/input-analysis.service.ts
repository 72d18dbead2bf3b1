/**
 * Input Analysis
 *
 * Keyword and pattern scoring for intent, lexicon lookups for medical
 * entities and emotion, tiered indicators for urgency. Deterministic and
 * local: no model call is made here.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import type { AnalyzedInput, Intent, UserInput } from '../types/index.js';
import { AnalysisError } from '../errors/index.js';
import { dataFilePath } from '../config/policy.js';
import { findPhrases, matchesPattern, toMatchable, type MatchableText } from '../utils/text-normalizer.js';
import logger from '../utils/logger.js';

const scoredIntentSchema = z.enum([
  'crisis',
  'emotional_support',
  'medical_question',
  'medication_query',
  'symptom_description',
]);

const analysisLexiconSchema = z.object({
  intents: z.array(
    z.object({
      intent: scoredIntentSchema,
      keywords: z.array(z.string()),
      patterns: z.array(z.string()),
    })
  ),
  medicalEntities: z.record(z.array(z.string())),
  urgencyTiers: z.array(
    z.object({
      level: z.number().int().min(1).max(10),
      indicators: z.array(z.string()),
    })
  ),
  intentUrgency: z.object({
    crisis: z.number().int().min(1).max(10),
    emotional_support: z.number().int().min(1).max(10),
    medical_question: z.number().int().min(1).max(10),
    medication_query: z.number().int().min(1).max(10),
    symptom_description: z.number().int().min(1).max(10),
    general_inquiry: z.number().int().min(1).max(10),
  }),
  emotions: z.record(z.array(z.string())),
});

export type AnalysisLexicon = z.infer<typeof analysisLexiconSchema>;

export function loadAnalysisLexicon(path = dataFilePath('analysis-lexicon.json')): AnalysisLexicon {
  return analysisLexiconSchema.parse(JSON.parse(readFileSync(path, 'utf8')));
}

interface CompiledIntent {
  intent: Intent;
  keywords: string[];
  patterns: RegExp[];
}

const KEYWORD_POINTS = 1;
const PATTERN_POINTS = 2;

export class InputAnalyzer {
  private readonly intents: CompiledIntent[];

  constructor(private readonly lexicon: AnalysisLexicon = loadAnalysisLexicon()) {
    this.intents = lexicon.intents.map(({ intent, keywords, patterns }) => ({
      intent,
      keywords,
      patterns: patterns.map((source) => new RegExp(source, 'i')),
    }));
  }

  analyze(input: UserInput): AnalyzedInput {
    if (input.inputType !== 'text') {
      throw new AnalysisError(`Unsupported input type: ${input.inputType}`);
    }

    const text = input.content.trim();
    const matchable = toMatchable(text);

    const intent = this.classifyIntent(matchable);
    const medicalEntities = this.extractEntities(matchable);
    const urgencyLevel = this.assessUrgency(matchable, intent);
    const emotionalContext = this.detectEmotion(matchable);
    const confidence = this.calculateConfidence(text, intent, medicalEntities.length);

    logger.debug('Input analyzed', {
      userId: input.userId,
      intent,
      entityCount: medicalEntities.length,
      urgencyLevel,
      confidence,
    });

    return {
      text,
      intent,
      medicalEntities,
      urgencyLevel,
      confidence,
      ...(emotionalContext ? { emotionalContext } : {}),
    };
  }

  /**
   * Highest score wins; earlier lexicon entries win ties.
   */
  classifyIntent(text: MatchableText): Intent {
    let best: Intent = 'general_inquiry';
    let bestScore = 0;

    for (const { intent, keywords, patterns } of this.intents) {
      const keywordScore = findPhrases(text, keywords).length * KEYWORD_POINTS;
      const patternScore = patterns.filter((pattern) => matchesPattern(text, pattern)).length * PATTERN_POINTS;
      const score = keywordScore + patternScore;
      if (score > bestScore) {
        best = intent;
        bestScore = score;
      }
    }

    return best;
  }

  extractEntities(text: MatchableText): string[] {
    const found = Object.values(this.lexicon.medicalEntities).flatMap((terms) => findPhrases(text, terms));
    return [...new Set(found)];
  }

  assessUrgency(text: MatchableText, intent: Intent): number {
    if (intent === 'crisis') {
      return 10;
    }

    for (const tier of this.lexicon.urgencyTiers) {
      if (findPhrases(text, tier.indicators).length > 0) {
        return tier.level;
      }
    }

    return this.lexicon.intentUrgency[intent];
  }

  detectEmotion(text: MatchableText): string | undefined {
    let best: string | undefined;
    let bestHits = 0;

    for (const [emotion, indicators] of Object.entries(this.lexicon.emotions)) {
      const hits = findPhrases(text, indicators).length;
      if (hits > bestHits) {
        best = emotion;
        bestHits = hits;
      }
    }

    return best;
  }

  calculateConfidence(text: string, intent: Intent, entityCount: number): number {
    let confidence = 0.7;

    if (text.length < 10) {
      confidence -= 0.2;
    } else if (text.length > 100) {
      confidence += 0.1;
    }

    confidence += Math.min(0.2, entityCount * 0.05);

    if (intent !== 'general_inquiry') {
      confidence += 0.1;
    }

    return Math.min(1.0, Math.max(0.1, confidence));
  }
}

export default InputAnalyzer;
