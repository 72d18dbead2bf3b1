/**
 * Heuristic response parser.
 *
 * A line starts a new step when it carries a marker word, a numeric prefix
 * ("1." / "2)") or a bullet. Following lines are appended to the current step.
 * A trailing "Response:" section is split off as the answer.
 */

import type { ReasoningStep, RetrievedDocument } from '../types/index.js';
import type { ParsedResponse, ResponseParser } from './reasoning.types.js';

const STEP_MARKER = /\b(steps?|analys[ie]s|reasoning|considerations?)\b/i;
const NUMERIC_PREFIX = /^\d+[.)]\s+/;
const BULLET_PREFIX = /^[-*•]\s+/;
const RESPONSE_HEADER = /^[#*\s]*(?:final\s+)?response\s*:[*\s]*(.*)$/i;
const CITATION_REF = /\[(\d+)\]/g;

export const PARSED_STEP_CONFIDENCE = 0.8;
export const SYNTHESIZED_STEP_CONFIDENCE = 0.7;

interface StepDraft {
  description: string;
  lines: string[];
}

function isStepStart(line: string): boolean {
  return NUMERIC_PREFIX.test(line) || BULLET_PREFIX.test(line) || STEP_MARKER.test(line);
}

function cleanHeading(line: string): string {
  return line
    .replace(NUMERIC_PREFIX, '')
    .replace(BULLET_PREFIX, '')
    .replace(/\*\*/g, '')
    .trim();
}

/**
 * Sources of the documents referenced as [n], in order of first reference.
 */
export function citedSources(text: string, documents: readonly RetrievedDocument[]): string[] {
  const sources: string[] = [];
  for (const match of text.matchAll(CITATION_REF)) {
    const doc = documents[Number(match[1]) - 1];
    if (doc && !sources.includes(doc.source)) {
      sources.push(doc.source);
    }
  }
  return sources;
}

function splitResponseSection(lines: string[]): { reasoning: string[]; answer: string | null } {
  for (let i = lines.length - 1; i >= 0; i--) {
    const header = RESPONSE_HEADER.exec(lines[i]);
    if (!header) continue;

    const answer = [header[1], ...lines.slice(i + 1)].join('\n').trim();
    if (answer) {
      return { reasoning: lines.slice(0, i), answer };
    }
  }
  return { reasoning: lines, answer: null };
}

export class HeuristicResponseParser implements ResponseParser {
  parse(text: string, documents: readonly RetrievedDocument[]): ParsedResponse {
    const lines = text.split(/\r?\n/).map((line) => line.trim());
    const { reasoning, answer } = splitResponseSection(lines);

    const drafts: StepDraft[] = [];
    for (const line of reasoning) {
      if (!line) continue;

      if (isStepStart(line)) {
        drafts.push({ description: cleanHeading(line), lines: [] });
      } else if (drafts.length > 0) {
        drafts[drafts.length - 1].lines.push(line);
      }
    }

    const steps: ReasoningStep[] = drafts.map((draft, index) => {
      const reasoningText = draft.lines.length > 0 ? draft.lines.join(' ') : draft.description;
      return {
        stepNumber: index + 1,
        description: draft.description,
        reasoningText,
        confidence: PARSED_STEP_CONFIDENCE,
        evidence: citedSources(`${draft.description} ${reasoningText}`, documents),
      };
    });

    if (steps.length === 0) {
      steps.push({
        stepNumber: 1,
        description: 'Response generation',
        reasoningText: 'Generated response based on available context and medical knowledge',
        confidence: SYNTHESIZED_STEP_CONFIDENCE,
        evidence: citedSources(text, documents),
      });
    }

    return { steps, answer: answer ?? text.trim() };
  }
}

export default HeuristicResponseParser;
