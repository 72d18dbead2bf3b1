/**
 * Safety Gate
 *
 * Pre-flight: classifies user input into SAFE < CAUTION < WARNING < CRITICAL < BLOCKED.
 * Post-flight: runs compliance checks on a generated response and enhances it
 * with crisis resources, warnings, a confidence cap and the medical disclaimer.
 *
 * Never mutates the response it is given.
 */

import type {
  AgentResponse,
  AnalyzedInput,
  ComplianceSummary,
  SafetyLevel,
  SafetyVerdict,
  UserInput,
} from '../types/index.js';
import type { SafetyPolicy } from '../config/policy.js';
import type { ComplianceCheck } from './safety.types.js';
import {
  compileCrisisRules,
  detectCrisisSignals,
  maxSeverity,
  severityRank,
  type CompiledCrisisRules,
} from './rules/crisis-detection.js';
import {
  checkConfidenceLevel,
  checkCrisisResponse,
  checkHarmfulContent,
  checkMedicalBoundaries,
  checkMedicalDisclaimer,
  checkProfessionalReferral,
} from './rules/compliance-checks.js';
import { containsCrisisResources, formatCrisisResources } from './crisis-resources.js';
import logger from '../utils/logger.js';

const CRITICAL_WARNINGS = [
  'Crisis situation detected - immediate professional help recommended',
  'Emergency resources provided',
];
const CONCERNING_WARNING = 'Concerning content detected - professional consultation recommended';

const CRISIS_MESSAGE =
  "I'm really concerned about what you've shared, and I want you to know that you don't have to face this alone. " +
  'Please reach out to someone who can help right now. If you are in immediate danger, call your local emergency number.';

export class SafetyGate {
  private readonly rules: CompiledCrisisRules;
  private readonly harmfulPatterns: RegExp[];

  constructor(private readonly policy: SafetyPolicy) {
    this.rules = compileCrisisRules(policy);
    this.harmfulPatterns = policy.harmfulResponsePatterns.map((source) => new RegExp(source, 'i'));
  }

  get medicalDisclaimer(): string {
    return this.policy.medicalDisclaimer;
  }

  /**
   * Verdict is the most severe level raised by any signal family.
   */
  assessInput(input: UserInput, analyzed: AnalyzedInput): SafetyVerdict {
    const { signals } = detectCrisisSignals(input.content, analyzed, this.rules);
    const level = maxSeverity(signals.map((signal) => signal.level));
    const concerns = signals.map((signal) => signal.concern);

    if (severityRank(level) >= severityRank('CRITICAL')) {
      logger.warn('Crisis signals detected in input', {
        userId: input.userId,
        sessionId: input.sessionId,
        level,
        families: signals.map((signal) => signal.family),
      });
    } else if (level !== 'SAFE') {
      logger.info('Input safety assessed', { userId: input.userId, level, concerns });
    }

    return { level, concerns };
  }

  validateResponse(response: AgentResponse, level: SafetyLevel = 'SAFE'): ComplianceCheck[] {
    return [
      checkMedicalDisclaimer(response, this.policy),
      checkCrisisResponse(response, this.policy, level),
      checkHarmfulContent(response, this.harmfulPatterns),
      checkMedicalBoundaries(response, this.policy),
      checkProfessionalReferral(response, this.policy),
      checkConfidenceLevel(response, this.policy),
    ];
  }

  enhance(response: AgentResponse, level: SafetyLevel): AgentResponse {
    const needsCrisisHandling = severityRank(level) >= severityRank('WARNING');

    let content = response.content;
    if (needsCrisisHandling && !containsCrisisResources(content, this.policy.crisisResources)) {
      content = `${content}\n\n${formatCrisisResources(this.policy.crisisResources)}`;
    }

    const added =
      severityRank(level) >= severityRank('CRITICAL')
        ? CRITICAL_WARNINGS
        : level === 'WARNING'
          ? [CONCERNING_WARNING]
          : [];
    const safetyWarnings = [...new Set([...response.safetyWarnings, ...added])];

    const confidenceLevel = needsCrisisHandling
      ? Math.min(response.confidenceLevel, this.policy.crisisConfidenceCap)
      : response.confidenceLevel;

    const medicalDisclaimer = response.medicalDisclaimer.trim()
      ? response.medicalDisclaimer
      : this.policy.medicalDisclaimer;

    return { ...response, content, safetyWarnings, confidenceLevel, medicalDisclaimer };
  }

  summarize(checks: readonly ComplianceCheck[]): ComplianceSummary {
    const passedChecks = checks.filter((check) => check.passed).length;
    return {
      totalChecks: checks.length,
      passedChecks,
      complianceRate: checks.length > 0 ? passedChecks / checks.length : 0,
      failedChecks: checks.filter((check) => !check.passed).map((check) => check.name),
      recommendations: checks.flatMap((check) => check.recommendations),
      overallSafe: passedChecks === checks.length,
    };
  }

  /**
   * The fixed response returned when input is BLOCKED. Reasoning is never run for it.
   */
  crisisResponse(concerns: readonly string[], traceId: string): AgentResponse {
    return {
      content: `${CRISIS_MESSAGE}\n\n${formatCrisisResources(this.policy.crisisResources)}`,
      citations: [],
      medicalImages: [],
      reasoningSteps: [],
      confidenceLevel: this.policy.crisisConfidenceCap,
      safetyWarnings: [...CRITICAL_WARNINGS, ...concerns],
      medicalDisclaimer: this.policy.medicalDisclaimer,
      metadata: {
        traceId,
        safetyLevel: 'BLOCKED',
        safetyBlocked: true,
        safetyConcerns: [...concerns],
        generatedAt: new Date().toISOString(),
      },
    };
  }
}

export default SafetyGate;
