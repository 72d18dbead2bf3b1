/**
 * Pipeline Types - Stage and Capability Contracts
 */

import type { AgentResponse, ProviderId, StageName } from '../types/index.js';
import type { ProcessingMetadata } from '../telemetry/telemetry.types.js';

/**
 * An optional collaborator. Absent capabilities skip their stage.
 */
export type Capability<T> = { present: true; value: T } | { present: false };

export function present<T>(value: T): Capability<T> {
  return { present: true, value };
}

export function absent<T>(): Capability<T> {
  return { present: false };
}

export function capabilityOf<T>(value: T | null | undefined): Capability<T> {
  return value === null || value === undefined ? absent() : present(value);
}

export type StageResult<T> = { ok: true; value: T } | { ok: false; error: Error };

export interface ProcessOptions {
  /** Caller-side cancellation, e.g. a closed connection */
  signal?: AbortSignal;
}

export interface ProcessResult {
  response: AgentResponse;
  metadata: ProcessingMetadata;
}

export interface PipelineHooks {
  onStageStart?: (stage: StageName, traceId: string) => void;
  onStageEnd?: (stage: StageName, traceId: string, success: boolean, durationMs: number) => void;
}

export interface PipelineStatus {
  stages: StageName[];
  capabilities: {
    knowledge: boolean;
    images: boolean;
    context: boolean;
    telemetry: boolean;
  };
  providers: ProviderId[];
}
