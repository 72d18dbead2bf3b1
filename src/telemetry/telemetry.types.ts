/**
 * Telemetry Types
 */

import type { Intent, SafetyLevel, StageName } from '../types/index.js';

export interface ProcessingStepRecord {
  name: StageName;
  description: string;
  startTime: string | null;
  endTime: string | null;
  durationMs: number;
  success: boolean;
  error?: string;
  metadata: Record<string, unknown>;
}

export type PipelineOutcome = 'completed' | 'blocked' | 'aborted';

export interface ProcessingMetadata {
  traceId: string;
  outcome: PipelineOutcome;
  totalDurationMs: number;
  stepsCompleted: number;
  stepsSuccessful: number;
  /** stepsSuccessful / stepsCompleted, 0 when no step ran */
  successRate: number;
  steps: ProcessingStepRecord[];
}

export interface UsageRecord {
  traceId: string;
  userId: string;
  sessionId: string;
  modelUsed: string | null;
  /** Whitespace word count of input plus output */
  tokensUsed: number;
  responseTimeMs: number;
  costEstimateUsd: number;
  intent: Intent | null;
  safetyLevel: SafetyLevel | null;
  confidenceLevel: number;
}

export interface TraceRecord {
  userId: string;
  sessionId: string;
  metadata: ProcessingMetadata;
}

/**
 * Persistence/telemetry collaborator. Calls are fire-and-forget from the pipeline.
 */
export interface TelemetrySink {
  recordUsage(record: UsageRecord): Promise<void>;
  recordTrace(record: TraceRecord): Promise<void>;
}

export const COST_PER_1K_TOKENS_USD = 0.001;
