/**
 * Compliance Checks - post-flight response validation
 *
 * Six independent checks. A response is safe overall only when all pass.
 */

import type { AgentResponse, SafetyLevel } from '../../types/index.js';
import type { SafetyPolicy } from '../../config/policy.js';
import { findPhrases, toMatchable } from '../../utils/text-normalizer.js';
import { containsCrisisResources } from '../crisis-resources.js';
import type { ComplianceCheck } from '../safety.types.js';
import { severityRank } from './crisis-detection.js';

const MIN_DISCLAIMER_LENGTH = 50;

/**
 * A disclaimer must be substantial and name at least one of the policy's
 * disclaimer indicators ("not a substitute", "professional advice", ...).
 */
export function checkMedicalDisclaimer(response: AgentResponse, policy: SafetyPolicy): ComplianceCheck {
  const disclaimer = response.medicalDisclaimer.trim();
  const passed =
    disclaimer.length > MIN_DISCLAIMER_LENGTH &&
    findPhrases(toMatchable(disclaimer), policy.disclaimerIndicators).length > 0;
  return {
    name: 'medical_disclaimer',
    passed,
    confidence: passed ? 1.0 : 0.0,
    details: passed ? 'Medical disclaimer present and adequate' : 'Missing or inadequate medical disclaimer',
    recommendations: passed ? [] : ['Add comprehensive medical disclaimer'],
  };
}

/**
 * Crisis resources are only required once the input verdict reaches WARNING.
 */
export function checkCrisisResponse(
  response: AgentResponse,
  policy: SafetyPolicy,
  level: SafetyLevel
): ComplianceCheck {
  if (severityRank(level) < severityRank('WARNING')) {
    return {
      name: 'crisis_response',
      passed: true,
      confidence: 0.9,
      details: 'Crisis resources not required at this safety level',
      recommendations: [],
    };
  }

  const hasResources = containsCrisisResources(response.content, policy.crisisResources);
  const hasGuidance = findPhrases(toMatchable(response.content), policy.emergencyPhrases).length > 0;
  const passed = hasResources || hasGuidance;

  return {
    name: 'crisis_response',
    passed,
    confidence: passed ? 0.9 : 0.3,
    details: passed ? 'Appropriate crisis response provided' : 'May need crisis resources',
    recommendations: passed ? [] : ['Add crisis hotlines and emergency resources'],
  };
}

export function checkHarmfulContent(response: AgentResponse, harmfulPatterns: readonly RegExp[]): ComplianceCheck {
  const content = response.content.toLowerCase();
  const harmful = harmfulPatterns.some((pattern) => pattern.test(content));

  return {
    name: 'harmful_content',
    passed: !harmful,
    confidence: harmful ? 0.1 : 0.95,
    details: harmful ? 'Potentially harmful content detected' : 'No harmful content detected',
    recommendations: harmful ? ['Remove harmful content', 'Rewrite response with safety focus'] : [],
  };
}

export function checkMedicalBoundaries(response: AgentResponse, policy: SafetyPolicy): ComplianceCheck {
  const violations = findPhrases(toMatchable(response.content), policy.diagnosticPhrases);
  const passed = violations.length === 0;

  return {
    name: 'medical_boundaries',
    passed,
    confidence: passed ? 0.9 : 0.2,
    details: passed ? 'Appropriate boundaries maintained' : `Potential boundary violation: ${violations.join(', ')}`,
    recommendations: passed ? [] : ['Avoid diagnostic language', 'Emphasize professional consultation'],
  };
}

export function checkProfessionalReferral(response: AgentResponse, policy: SafetyPolicy): ComplianceCheck {
  const content = response.content.toLowerCase();
  const passed = policy.referralPhrases.some((phrase) => content.includes(phrase.toLowerCase()));

  return {
    name: 'professional_referral',
    passed,
    confidence: passed ? 0.8 : 0.4,
    details: passed ? 'Professional referral included' : 'Consider adding professional referral',
    recommendations: passed ? [] : ['Add recommendation to consult mental health professional'],
  };
}

export function checkConfidenceLevel(response: AgentResponse, policy: SafetyPolicy): ComplianceCheck {
  const { min, max } = policy.complianceConfidenceRange;
  const passed =
    Number.isFinite(response.confidenceLevel) && response.confidenceLevel >= min && response.confidenceLevel <= max;

  return {
    name: 'confidence_levels',
    passed,
    confidence: passed ? 0.9 : 0.5,
    details: passed ? 'Confidence level appropriate' : 'Confidence level may be inappropriate',
    recommendations: passed ? [] : ['Adjust confidence level to appropriate range'],
  };
}
