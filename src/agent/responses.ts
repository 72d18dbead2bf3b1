import type { AgentErrorCode } from '../errors/index.js';
import type { AgentResponse } from '../types/index.js';

const APOLOGY_MESSAGE =
  "I'm sorry, but I wasn't able to process your request right now. Please try again in a moment. " +
  'If you are in crisis or need immediate help, call or text 988 or contact your local emergency services.';

const VALIDATION_MESSAGE =
  "I couldn't process that message. Please check that it isn't empty or too long and try again.";

const ERROR_WARNING = 'Request could not be completed - please try again or contact a professional directly';

export interface ErrorResponseInputs {
  code: AgentErrorCode;
  traceId: string;
  medicalDisclaimer: string;
  processingTimeMs: number;
  /** User-correctable problems; only validation errors carry them */
  errors?: readonly string[];
}

/**
 * The response for an aborted request. Internal error text never reaches `content`.
 */
export function errorResponse(inputs: ErrorResponseInputs): AgentResponse {
  const isValidation = inputs.code === 'VALIDATION_ERROR';

  return {
    content: isValidation ? VALIDATION_MESSAGE : APOLOGY_MESSAGE,
    citations: [],
    medicalImages: [],
    reasoningSteps: [],
    confidenceLevel: 0,
    safetyWarnings: [ERROR_WARNING],
    medicalDisclaimer: inputs.medicalDisclaimer,
    metadata: {
      traceId: inputs.traceId,
      error: true,
      errorCode: inputs.code,
      processingTimeMs: inputs.processingTimeMs,
      generatedAt: new Date().toISOString(),
      ...(isValidation && inputs.errors ? { errors: [...inputs.errors] } : {}),
    },
  };
}
