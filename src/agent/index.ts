export { PipelineOrchestrator } from './pipeline-orchestrator.service.js';
export type { PipelineDeps } from './pipeline-orchestrator.service.js';
export { createAgent } from './agent.factory.js';
export type { Agent, AgentOptions } from './agent.factory.js';
export { runStage, isCancellation } from './stage-runner.js';
export type { StageRunOptions, StageWork } from './stage-runner.js';
export { errorResponse } from './responses.js';
export { validateInput } from './input-validation.js';
export { absent, capabilityOf, present } from './agent.types.js';
export type {
  Capability,
  PipelineHooks,
  PipelineStatus,
  ProcessOptions,
  ProcessResult,
  StageResult,
} from './agent.types.js';
