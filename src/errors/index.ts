/**
 * Error taxonomy for the care pipeline.
 *
 * Every error carries a stable `code` so telemetry and responses can refer to
 * the failure without exposing the underlying message to the user.
 */

export type AgentErrorCode =
  | 'VALIDATION_ERROR'
  | 'ANALYSIS_ERROR'
  | 'RETRIEVAL_DEGRADATION'
  | 'REASONING_FAILURE'
  | 'PROVIDER_UNAVAILABLE'
  | 'NO_MODEL_AVAILABLE'
  | 'STAGE_TIMEOUT'
  | 'STAGE_CANCELLED'
  | 'INTERNAL_ERROR';

export class AgentError extends Error {
  constructor(
    message: string,
    public readonly code: AgentErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AgentError';
  }
}

/** Bad input the user can correct. */
export class ValidationError extends AgentError {
  constructor(public readonly errors: string[]) {
    super(`Input validation failed: ${errors.join('; ')}`, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class AnalysisError extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'ANALYSIS_ERROR', options);
    this.name = 'AnalysisError';
  }
}

export class RetrievalDegradation extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'RETRIEVAL_DEGRADATION', options);
    this.name = 'RetrievalDegradation';
  }
}

export class ReasoningFailure extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'REASONING_FAILURE', options);
    this.name = 'ReasoningFailure';
  }
}

export class ProviderUnavailableError extends AgentError {
  constructor(
    public readonly provider: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'PROVIDER_UNAVAILABLE', options);
    this.name = 'ProviderUnavailableError';
  }
}

export class NoModelAvailableError extends AgentError {
  constructor(message = 'No LLM provider is configured or available') {
    super(message, 'NO_MODEL_AVAILABLE');
    this.name = 'NoModelAvailableError';
  }
}

export class StageTimeoutError extends AgentError {
  constructor(public readonly stage: string, public readonly timeoutMs: number) {
    super(`Stage ${stage} timed out after ${timeoutMs}ms`, 'STAGE_TIMEOUT');
    this.name = 'StageTimeoutError';
  }
}

export class StageCancelledError extends AgentError {
  constructor(public readonly stage: string, reason?: string) {
    super(`Stage ${stage} cancelled${reason ? `: ${reason}` : ''}`, 'STAGE_CANCELLED');
    this.name = 'StageCancelledError';
  }
}

export function isAgentError(error: unknown): error is AgentError {
  return error instanceof AgentError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
