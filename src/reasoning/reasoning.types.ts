/**
 * Reasoning Types
 */

import type {
  AgentResponse,
  AnalyzedInput,
  MedicalImage,
  ProviderId,
  ReasoningStep,
  RetrievalResult,
  RetrievedDocument,
  UserInput,
} from '../types/index.js';
import type { ModelSelection } from '../llm/model-router.service.js';

export interface ReasoningContext {
  traceId: string;
  input: UserInput;
  analyzedInput: AnalyzedInput;
  retrieval: RetrievalResult;
  medicalImages: readonly MedicalImage[];
  compressedHistory: string;
  signal?: AbortSignal;
}

export interface ParsedResponse {
  steps: ReasoningStep[];
  /** The user-facing answer */
  answer: string;
}

/**
 * Turns raw model text into reasoning steps and an answer. The heuristic
 * line parser is the default; a provider with structured output can supply its own.
 */
export interface ResponseParser {
  parse(text: string, documents: readonly RetrievedDocument[]): ParsedResponse;
}

export interface ProviderAttempt {
  provider: ProviderId;
  model: string;
  success: boolean;
  error?: string;
}

export interface ReasoningOutput {
  response: AgentResponse;
  steps: ReasoningStep[];
  selection: ModelSelection;
  attempts: ProviderAttempt[];
}

export interface Reasoner {
  generate(context: ReasoningContext): Promise<ReasoningOutput>;
}
