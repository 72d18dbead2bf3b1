/**
 * Prompt Builder
 *
 * System prompt: role, safety rules, output format. Directives are appended
 * for high urgency and crisis intent.
 * User prompt: query, analysis summary, top documents and sources, history.
 */

import type { AnalyzedInput } from '../types/index.js';
import type { ReasoningContext } from './reasoning.types.js';

const PROMPT_DOCUMENTS = 3;
const DOCUMENT_EXCERPT_LENGTH = 300;

const BASE_SYSTEM_PROMPT = `You are a professional mental health support assistant grounded in psychology and psychiatry. Provide empathetic, evidence-based support while keeping appropriate boundaries.

SAFETY RULES:
1. Never diagnose conditions or prescribe, start, stop or change medications.
2. Encourage consultation with a qualified professional for serious concerns.
3. Provide crisis resources whenever there is any risk to the user's safety.
4. Keep an empathetic, non-judgemental and professional tone.

REASONING:
Think through the request in numbered steps:
1. Analysis of the user's concern
2. Relevant medical knowledge, citing the provided sources as [1], [2], [3]
3. Evaluation of the evidence and how confident you are
4. Safety considerations

OUTPUT FORMAT:
Write the numbered reasoning steps first. Then write a line containing only "Response:" followed by the answer for the user.`;

const URGENT_DIRECTIVE =
  'URGENT: This appears to be a high-urgency situation. Prioritize safety and crisis resources.';
const CRISIS_DIRECTIVE =
  'CRISIS DETECTED: Provide immediate crisis resources, including the 988 Suicide & Crisis Lifeline, and encourage professional help.';

export function buildSystemPrompt(analyzed: AnalyzedInput, urgentThreshold: number): string {
  const parts = [BASE_SYSTEM_PROMPT];

  if (analyzed.urgencyLevel >= urgentThreshold) {
    parts.push(URGENT_DIRECTIVE);
  }
  if (analyzed.intent === 'crisis') {
    parts.push(CRISIS_DIRECTIVE);
  }

  return parts.join('\n\n');
}

export function buildUserPrompt(context: ReasoningContext): string {
  const { analyzedInput, retrieval, compressedHistory } = context;
  const parts: string[] = [`User Query: ${analyzedInput.text}`];

  parts.push(`Intent: ${analyzedInput.intent}`);
  parts.push(`Urgency Level: ${analyzedInput.urgencyLevel}/10`);
  if (analyzedInput.medicalEntities.length > 0) {
    parts.push(`Medical Entities: ${analyzedInput.medicalEntities.join(', ')}`);
  }
  if (analyzedInput.emotionalContext) {
    parts.push(`Emotional Context: ${analyzedInput.emotionalContext}`);
  }

  const documents = retrieval.documents.slice(0, PROMPT_DOCUMENTS);
  if (documents.length > 0) {
    parts.push('\nRelevant Medical Information:');
    documents.forEach((doc, index) => {
      const excerpt =
        doc.content.length > DOCUMENT_EXCERPT_LENGTH
          ? `${doc.content.slice(0, DOCUMENT_EXCERPT_LENGTH)}...`
          : doc.content;
      parts.push(`[${index + 1}] (${doc.source}) ${excerpt}`);
    });
  }

  const citations = retrieval.citations.slice(0, PROMPT_DOCUMENTS);
  if (citations.length > 0) {
    parts.push('\nScientific Sources:');
    citations.forEach((citation, index) => {
      parts.push(`${index + 1}. ${citation.title} - ${citation.source}`);
    });
  }

  if (compressedHistory) {
    parts.push(`\nConversation History:\n${compressedHistory}`);
  }

  parts.push('\nPlease provide a structured step-by-step analysis followed by an empathetic, helpful response.');

  return parts.join('\n');
}
