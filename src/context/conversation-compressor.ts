/**
 * Conversation Compressor
 *
 * Older turns collapse into themes, concerns and crisis mentions; the most
 * recent turns are quoted. The result is bounded in length.
 */

import type { ConversationTurn } from '../types/index.js';

export interface CompressorOptions {
  maxLength?: number;
  preserveRecent?: number;
  maxTurnLength?: number;
}

const THEME_KEYWORDS: ReadonlyArray<[string, string[]]> = [
  ['depression', ['depressed', 'sad', 'down', 'depression']],
  ['anxiety', ['anxious', 'worried', 'panic', 'anxiety']],
  ['relationships', ['relationship', 'partner', 'family', 'friends']],
  ['work_stress', ['work', 'job', 'career', 'stress', 'workplace']],
  ['sleep_issues', ['sleep', 'insomnia', 'tired', 'exhausted']],
  ['medication', ['medication', 'pills', 'prescription', 'side effects']],
  ['therapy', ['therapy', 'therapist', 'counseling', 'treatment']],
];

const CONCERN_PHRASES = [
  'worried about',
  'concerned about',
  'struggling with',
  'having trouble',
  'difficulty with',
  'problems with',
];

const CRISIS_TERMS = [
  'suicide',
  'self-harm',
  'crisis',
  'emergency',
  'hopeless',
  'worthless',
  'end my life',
  'hurt myself',
];

const MAX_CONCERNS = 5;
const CONCERN_SPAN = 50;

export class ConversationCompressor {
  private readonly maxLength: number;
  private readonly preserveRecent: number;
  private readonly maxTurnLength: number;

  constructor(options: CompressorOptions = {}) {
    this.maxLength = options.maxLength ?? 5000;
    this.preserveRecent = options.preserveRecent ?? 3;
    this.maxTurnLength = options.maxTurnLength ?? 500;
  }

  compress(turns: readonly ConversationTurn[]): string {
    if (turns.length === 0) {
      return '';
    }

    const sorted = [...turns].sort((a, b) => a.timestamp.localeCompare(b.timestamp));
    const splitAt = Math.max(0, sorted.length - this.preserveRecent);
    const older = sorted.slice(0, splitAt);
    const recent = sorted.slice(splitAt);

    const parts: string[] = [];

    if (older.length > 0) {
      const lowered = older.map((turn) => turn.content.toLowerCase());

      const themes = this.extractThemes(lowered);
      if (themes.length > 0) {
        parts.push(`Previous conversation themes: ${themes.join(', ')}`);
      }

      const concerns = this.extractConcerns(lowered);
      if (concerns.length > 0) {
        parts.push(`Key concerns discussed: ${concerns.join(', ')}`);
      }

      const crisisMentions = CRISIS_TERMS.filter((term) => lowered.some((content) => content.includes(term)));
      if (crisisMentions.length > 0) {
        parts.push(`Crisis situations mentioned: ${crisisMentions.join(', ')}`);
      }
    }

    if (recent.length > 0) {
      parts.push('Recent conversation:');
      for (const turn of recent) {
        parts.push(`${turn.role}: ${turn.content.slice(0, this.maxTurnLength)} [${turn.timestamp}]`);
      }
    }

    const compressed = parts.join('\n');
    return compressed.length > this.maxLength ? `${compressed.slice(0, this.maxLength)}...` : compressed;
  }

  private extractThemes(contents: readonly string[]): string[] {
    return THEME_KEYWORDS.filter(([, keywords]) =>
      contents.some((content) => keywords.some((keyword) => content.includes(keyword)))
    ).map(([theme]) => theme);
  }

  private extractConcerns(contents: readonly string[]): string[] {
    const concerns = new Set<string>();
    for (const content of contents) {
      for (const phrase of CONCERN_PHRASES) {
        const index = content.indexOf(phrase);
        if (index === -1) continue;
        const start = index + phrase.length;
        const concern = content.slice(start, start + CONCERN_SPAN).trim().split('.')[0] ?? '';
        if (concern) {
          concerns.add(concern);
        }
      }
    }
    return [...concerns].slice(0, MAX_CONCERNS);
  }
}

export default ConversationCompressor;
