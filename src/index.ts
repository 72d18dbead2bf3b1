/**
 * Linear care agent: a sequential, safety-gated pipeline that answers
 * mental-health queries with retrieval and LLM reasoning.
 */

export * from './types/index.js';
export * from './errors/index.js';
export { config, loadConfig } from './config/index.js';
export type { Config } from './config/index.js';
export { createPolicyConfig, loadSafetyLexicon, policyOverridesFromConfig } from './config/policy.js';
export type {
  CrisisResources,
  PipelinePolicy,
  PolicyConfig,
  PolicyOverrides,
  RetrievalPolicy,
  RoutingPolicy,
  SafetyLexicon,
  SafetyPolicy,
} from './config/policy.js';

export * from './agent/index.js';
export * from './analysis/index.js';
export * from './safety/index.js';
export * from './llm/index.js';
export * from './reasoning/index.js';
export * from './retrieval/index.js';
export * from './images/index.js';
export * from './context/index.js';
export * from './cache/index.js';
export * from './telemetry/index.js';
export { normalizeText } from './utils/text-normalizer.js';
export { logger } from './utils/logger.js';
