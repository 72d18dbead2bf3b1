/**
 * Safety Gate Types
 */

import type { SafetyLevel } from '../types/index.js';

export type ComplianceCheckName =
  | 'medical_disclaimer'
  | 'crisis_response'
  | 'harmful_content'
  | 'medical_boundaries'
  | 'professional_referral'
  | 'confidence_levels';

export interface ComplianceCheck {
  name: ComplianceCheckName;
  passed: boolean;
  /** How sure the check is of its own verdict, 0-1 */
  confidence: number;
  details: string;
  recommendations: string[];
}

/**
 * One signal family's contribution to the input verdict.
 */
export interface SafetySignal {
  family: 'crisis_keyword' | 'urgency' | 'crisis_intent' | 'self_harm' | 'substance' | 'imminence';
  level: SafetyLevel;
  concern: string;
  matches: string[];
}

export interface CrisisDetectionResult {
  signals: SafetySignal[];
  /** Direct self-harm or crisis signal present */
  hasDirectSignal: boolean;
  /** Time-bound or plan language present */
  hasImminence: boolean;
}
