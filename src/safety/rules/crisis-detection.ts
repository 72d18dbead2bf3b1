/**
 * Crisis Detection - input signal families
 *
 * Each family is evaluated independently against both the lowercased text and
 * its folded form (leetspeak, spaced letters, zero-width characters removed).
 * The gate takes the most severe level across families.
 *
 * | Family          | Level    |
 * |-----------------|----------|
 * | crisis keyword  | CRITICAL |
 * | urgency >= 9    | WARNING  |
 * | crisis intent   | CRITICAL |
 * | self-harm       | CRITICAL |
 * | substance use   | CAUTION  |
 * | self-harm + imminence | BLOCKED |
 */

import type { AnalyzedInput, SafetyLevel } from '../../types/index.js';
import { SAFETY_LEVELS } from '../../types/index.js';
import type { SafetyPolicy } from '../../config/policy.js';
import { findPhrases, matchesPattern, toMatchable } from '../../utils/text-normalizer.js';
import type { CrisisDetectionResult, SafetySignal } from '../safety.types.js';

export interface CompiledCrisisRules {
  crisisKeywords: readonly string[];
  substanceKeywords: readonly string[];
  selfHarm: Array<{ pattern: RegExp; label: string }>;
  imminence: Array<{ pattern: RegExp; label: string }>;
  warningUrgency: number;
}

function compilePatterns(sources: readonly string[]): Array<{ pattern: RegExp; label: string }> {
  return sources.map((source) => ({ pattern: new RegExp(source, 'i'), label: source }));
}

export function compileCrisisRules(policy: SafetyPolicy): CompiledCrisisRules {
  return {
    crisisKeywords: policy.crisisKeywords,
    substanceKeywords: policy.substanceKeywords,
    selfHarm: compilePatterns(policy.selfHarmPatterns),
    imminence: compilePatterns(policy.imminencePatterns),
    warningUrgency: policy.warningUrgency,
  };
}

export function severityRank(level: SafetyLevel): number {
  return SAFETY_LEVELS.indexOf(level);
}

export function maxSeverity(levels: readonly SafetyLevel[]): SafetyLevel {
  return levels.reduce<SafetyLevel>(
    (worst, level) => (severityRank(level) > severityRank(worst) ? level : worst),
    'SAFE'
  );
}

export function detectCrisisSignals(
  content: string,
  analyzed: AnalyzedInput,
  rules: CompiledCrisisRules
): CrisisDetectionResult {
  const text = toMatchable(content);
  const signals: SafetySignal[] = [];

  const keywordMatches = findPhrases(text, rules.crisisKeywords);
  if (keywordMatches.length > 0) {
    signals.push({
      family: 'crisis_keyword',
      level: 'CRITICAL',
      concern: 'Crisis keywords detected',
      matches: keywordMatches,
    });
  }

  if (analyzed.urgencyLevel >= rules.warningUrgency) {
    signals.push({
      family: 'urgency',
      level: 'WARNING',
      concern: 'High urgency level detected',
      matches: [String(analyzed.urgencyLevel)],
    });
  }

  if (analyzed.intent === 'crisis') {
    signals.push({
      family: 'crisis_intent',
      level: 'CRITICAL',
      concern: 'Crisis intent detected',
      matches: ['crisis'],
    });
  }

  const selfHarmMatches = rules.selfHarm
    .filter(({ pattern }) => matchesPattern(text, pattern))
    .map(({ label }) => label);
  if (selfHarmMatches.length > 0) {
    signals.push({
      family: 'self_harm',
      level: 'CRITICAL',
      concern: 'Self-harm indicators detected',
      matches: selfHarmMatches,
    });
  }

  const substanceMatches = findPhrases(text, rules.substanceKeywords);
  if (substanceMatches.length > 0) {
    signals.push({
      family: 'substance',
      level: 'CAUTION',
      concern: 'Substance abuse indicators detected',
      matches: substanceMatches,
    });
  }

  const imminenceMatches = rules.imminence
    .filter(({ pattern }) => matchesPattern(text, pattern))
    .map(({ label }) => label);
  const hasDirectSignal = selfHarmMatches.length > 0;
  const hasImminence = imminenceMatches.length > 0;

  if (hasDirectSignal && hasImminence) {
    signals.push({
      family: 'imminence',
      level: 'BLOCKED',
      concern: 'Imminent risk indicators detected',
      matches: imminenceMatches,
    });
  }

  return { signals, hasDirectSignal, hasImminence };
}
