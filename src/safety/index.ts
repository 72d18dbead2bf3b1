export { SafetyGate } from './safety-gate.service.js';
export { formatCrisisResources, containsCrisisResources } from './crisis-resources.js';
export { maxSeverity, severityRank } from './rules/crisis-detection.js';
export type { ComplianceCheck, ComplianceCheckName, SafetySignal } from './safety.types.js';
