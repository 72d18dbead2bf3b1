import { findPhrases, toMatchable } from '../utils/text-normalizer.js';

/**
 * Guidance phrases found in the answer, reported as warnings.
 */
export function extractSafetyWarnings(answer: string, indicators: readonly string[]): string[] {
  return findPhrases(toMatchable(answer), indicators).map(
    (indicator) => `Response contains guidance to ${indicator}`
  );
}
