import type { AgentResponse, Intent, SafetyLevel } from '../types/index.js';
import { COST_PER_1K_TOKENS_USD, type UsageRecord } from './telemetry.types.js';

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export function estimateCost(tokens: number): number {
  return COST_PER_1K_TOKENS_USD * (tokens / 1000);
}

export interface UsageInputs {
  traceId: string;
  userId: string;
  sessionId: string;
  inputText: string;
  response: AgentResponse;
  responseTimeMs: number;
  intent?: Intent;
  safetyLevel?: SafetyLevel;
}

/**
 * Token counts here are word-count estimates, not provider-reported usage.
 */
export function buildUsageRecord(inputs: UsageInputs): UsageRecord {
  const tokensUsed = countWords(inputs.inputText) + countWords(inputs.response.content);
  return {
    traceId: inputs.traceId,
    userId: inputs.userId,
    sessionId: inputs.sessionId,
    modelUsed: inputs.response.metadata.modelUsed ?? null,
    tokensUsed,
    responseTimeMs: inputs.responseTimeMs,
    costEstimateUsd: estimateCost(tokensUsed),
    intent: inputs.intent ?? null,
    safetyLevel: inputs.safetyLevel ?? null,
    confidenceLevel: inputs.response.confidenceLevel,
  };
}
