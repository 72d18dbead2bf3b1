export { ProcessingStep, summarizeSteps } from './processing-step.js';
export { buildUsageRecord, countWords, estimateCost } from './usage.js';
export { LogTelemetrySink } from './log.sink.js';
export { PostgresTelemetrySink } from './postgres.sink.js';
export type {
  PipelineOutcome,
  ProcessingMetadata,
  ProcessingStepRecord,
  TelemetrySink,
  TraceRecord,
  UsageRecord,
} from './telemetry.types.js';
export { COST_PER_1K_TOKENS_USD } from './telemetry.types.js';
