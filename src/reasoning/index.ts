export * from './reasoning.types.js';
export { buildSystemPrompt, buildUserPrompt } from './prompt-builder.js';
export { HeuristicResponseParser, citedSources } from './response-parser.js';
export { aggregateConfidence, clamp01 } from './confidence.js';
export { extractSafetyWarnings } from './safety-warnings.js';
export { ReasoningEngine, type ReasoningEngineDeps } from './reasoning-engine.service.js';
