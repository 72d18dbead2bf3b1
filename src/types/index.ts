import { z } from 'zod';

// Input types
export const inputTypeSchema = z.enum(['text', 'voice', 'image']);
export type InputType = z.infer<typeof inputTypeSchema>;

export const userInputSchema = z.object({
  userId: z.string(),
  sessionId: z.string(),
  content: z.string(),
  inputType: inputTypeSchema.default('text'),
});

export type UserInput = Readonly<z.infer<typeof userInputSchema>>;

export type Intent =
  | 'crisis'
  | 'emotional_support'
  | 'medical_question'
  | 'medication_query'
  | 'symptom_description'
  | 'general_inquiry';

export interface AnalyzedInput {
  readonly text: string;
  readonly intent: Intent;
  readonly medicalEntities: readonly string[];
  /** 1-10 */
  readonly urgencyLevel: number;
  /** 0-1 */
  readonly confidence: number;
  readonly emotionalContext?: string;
}

// Safety types
export const SAFETY_LEVELS = ['SAFE', 'CAUTION', 'WARNING', 'CRITICAL', 'BLOCKED'] as const;
export type SafetyLevel = (typeof SAFETY_LEVELS)[number];

export interface SafetyVerdict {
  readonly level: SafetyLevel;
  readonly concerns: readonly string[];
}

// Retrieval types
export interface Citation {
  readonly title: string;
  readonly source: string;
  readonly url: string;
  readonly authors: readonly string[];
  readonly relevanceScore: number;
  readonly publicationDate?: string;
  readonly doi?: string;
  readonly excerpt?: string;
}

export interface RetrievedDocument {
  readonly content: string;
  readonly source: string;
  /** 0-1 */
  readonly confidenceScore: number;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface RetrievalResult {
  /** Sorted descending by confidenceScore */
  readonly documents: readonly RetrievedDocument[];
  readonly citations: readonly Citation[];
  readonly searchMetadata?: Readonly<Record<string, unknown>>;
}

export const EMPTY_RETRIEVAL_RESULT: RetrievalResult = Object.freeze({
  documents: [],
  citations: [],
});

export interface MedicalImage {
  readonly url: string;
  readonly caption: string;
  readonly source: string;
  readonly license: string;
  readonly altText: string;
  readonly relevanceScore: number;
}

// Reasoning types
export interface ReasoningStep {
  readonly stepNumber: number;
  readonly description: string;
  readonly reasoningText: string;
  /** 0-1 */
  readonly confidence: number;
  readonly evidence: readonly string[];
}

// Response types
export interface ComplianceSummary {
  readonly totalChecks: number;
  readonly passedChecks: number;
  readonly complianceRate: number;
  readonly failedChecks: readonly string[];
  readonly recommendations: readonly string[];
  readonly overallSafe: boolean;
}

export interface UsageMetadata {
  readonly inputTokens?: number;
  readonly outputTokens?: number;
  readonly totalTokens: number;
}

export interface ResponseMetadata {
  readonly traceId?: string;
  readonly modelProvider?: string;
  readonly modelUsed?: string;
  readonly complexity?: string;
  readonly temperature?: number;
  readonly usage?: UsageMetadata;
  readonly reasoningStepsCount?: number;
  readonly generatedAt?: string;
  readonly processingTimeMs?: number;
  readonly safetyLevel?: SafetyLevel;
  readonly complianceSummary?: ComplianceSummary;
  readonly safetyBlocked?: boolean;
  readonly safetyConcerns?: readonly string[];
  readonly error?: boolean;
  readonly errorCode?: string;
  readonly errors?: readonly string[];
}

export interface AgentResponse {
  readonly content: string;
  readonly citations: readonly Citation[];
  readonly medicalImages: readonly MedicalImage[];
  readonly reasoningSteps: readonly ReasoningStep[];
  /** 0-1 */
  readonly confidenceLevel: number;
  readonly safetyWarnings: readonly string[];
  readonly medicalDisclaimer: string;
  readonly metadata: ResponseMetadata;
}

// Context types
export interface ConversationTurn {
  readonly role: 'user' | 'assistant';
  readonly content: string;
  readonly timestamp: string;
  readonly intent?: Intent;
  readonly safetyLevel?: SafetyLevel;
}

export interface UserContext {
  readonly userId: string;
  readonly sessionId: string;
  readonly compressedHistory: string;
  readonly turnCount: number;
}

// Routing types
export type ProviderId = 'google' | 'openai';
export type Complexity = 'simple' | 'complex' | 'critical';

// Pipeline stages, in execution order
export const PIPELINE_STAGES = [
  'input_validation',
  'input_analysis',
  'context_retrieval',
  'safety_assessment',
  'knowledge_retrieval',
  'image_search',
  'reasoning_generation',
  'safety_validation',
  'response_formatting',
  'context_update',
] as const;
export type StageName = (typeof PIPELINE_STAGES)[number];
