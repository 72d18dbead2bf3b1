import type { StageName } from '../types/index.js';
import type { PipelineOutcome, ProcessingMetadata, ProcessingStepRecord } from './telemetry.types.js';
import logger from '../utils/logger.js';

/**
 * Timing and outcome of one pipeline stage.
 */
export class ProcessingStep {
  startTime: Date | null = null;
  endTime: Date | null = null;
  success = false;
  error?: string;
  readonly metadata: Record<string, unknown> = {};

  constructor(
    readonly name: StageName,
    readonly description: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  start(): this {
    this.startTime = this.now();
    logger.debug('Starting step', { step: this.name });
    return this;
  }

  complete(success = true, error?: string, metadata: Record<string, unknown> = {}): void {
    if (this.endTime) {
      return;
    }
    this.endTime = this.now();
    this.success = success;
    if (error !== undefined) {
      this.error = error;
    }
    Object.assign(this.metadata, metadata);
    logger.debug('Completed step', { step: this.name, success, durationMs: this.durationMs });
  }

  /** Started and not yet completed */
  get isOpen(): boolean {
    return this.startTime !== null && this.endTime === null;
  }

  get durationMs(): number {
    if (!this.startTime || !this.endTime) {
      return 0;
    }
    return this.endTime.getTime() - this.startTime.getTime();
  }

  toRecord(): ProcessingStepRecord {
    return {
      name: this.name,
      description: this.description,
      startTime: this.startTime?.toISOString() ?? null,
      endTime: this.endTime?.toISOString() ?? null,
      durationMs: this.durationMs,
      success: this.success,
      ...(this.error !== undefined ? { error: this.error } : {}),
      metadata: { ...this.metadata },
    };
  }
}

export function summarizeSteps(
  traceId: string,
  steps: readonly ProcessingStep[],
  totalDurationMs: number,
  outcome: PipelineOutcome
): ProcessingMetadata {
  const stepsCompleted = steps.filter((step) => step.endTime !== null).length;
  const stepsSuccessful = steps.filter((step) => step.success).length;

  return {
    traceId,
    outcome,
    totalDurationMs,
    stepsCompleted,
    stepsSuccessful,
    successRate: stepsCompleted > 0 ? stepsSuccessful / stepsCompleted : 0,
    steps: steps.map((step) => step.toRecord()),
  };
}
