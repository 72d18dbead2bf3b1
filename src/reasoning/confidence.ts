import type { ReasoningStep, RetrievedDocument } from '../types/index.js';

const STEP_WEIGHT = 0.5;
const RETRIEVAL_WEIGHT = 0.3;
const ANALYSIS_WEIGHT = 0.2;
const NEUTRAL = 0.5;

function average(values: readonly number[], fallback: number): number {
  if (values.length === 0) return fallback;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Weighted blend of step, retrieval and analysis confidence, clamped to [0, 1].
 * With no steps the result is the neutral 0.5.
 */
export function aggregateConfidence(
  steps: readonly ReasoningStep[],
  documents: readonly RetrievedDocument[],
  analysisConfidence: number
): number {
  if (steps.length === 0) {
    return clamp01(NEUTRAL);
  }

  const stepScore = average(
    steps.map((step) => step.confidence),
    NEUTRAL
  );
  const retrievalScore = average(
    documents.map((doc) => doc.confidenceScore),
    NEUTRAL
  );

  return clamp01(
    STEP_WEIGHT * stepScore + RETRIEVAL_WEIGHT * retrievalScore + ANALYSIS_WEIGHT * analysisConfidence
  );
}
