/**
 * Text folding used before keyword and pattern matching, so that
 * "k1ll mys3lf" or "k.i.l.l" match the same entries as the plain spelling.
 */

const LEET_MAP: Readonly<Record<string, string>> = {
  '@': 'a',
  '4': 'a',
  '3': 'e',
  '1': 'i',
  '!': 'i',
  '|': 'i',
  '0': 'o',
  '5': 's',
  $: 's',
  '7': 't',
  '+': 't',
  '8': 'b',
  '9': 'g',
};

const ZERO_WIDTH = /[\u200B-\u200D\u2060\uFEFF\u00AD]/g;
const COMBINING_MARKS = /[\u0300-\u036f]/g;

// Letters separated by single punctuation/space characters: "k.i.l.l", "d i e"
const SPACED_LETTERS = /\b[a-z](?:[\s.\-_*]+[a-z]\b){2,}/g;

function foldLeetspeak(text: string): string {
  let result = '';
  for (const char of text) {
    result += LEET_MAP[char] ?? char;
  }
  return result;
}

function collapseSpacedLetters(text: string): string {
  return text.replace(SPACED_LETTERS, (run) => run.replace(/[\s.\-_*]+/g, ''));
}

export function normalizeText(text: string): string {
  const lowered = text
    .toLowerCase()
    .normalize('NFKD')
    .replace(COMBINING_MARKS, '')
    .replace(ZERO_WIDTH, '');

  return collapseSpacedLetters(foldLeetspeak(lowered)).replace(/\s+/g, ' ').trim();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Word-boundary regex for a literal phrase. Inner spaces match any run of whitespace.
 */
export function phraseRegExp(phrase: string): RegExp {
  const body = escapeRegExp(phrase.toLowerCase()).replace(/\s+/g, '\\s+');
  return new RegExp(`(?<![a-z0-9])${body}(?![a-z0-9])`, 'i');
}

/**
 * Text prepared for matching: the lowercased original and its folded form.
 */
export interface MatchableText {
  readonly raw: string;
  readonly normalized: string;
}

export function toMatchable(text: string): MatchableText {
  return { raw: text.toLowerCase(), normalized: normalizeText(text) };
}

export function matchesPhrase(text: MatchableText, phrase: string): boolean {
  const regex = phraseRegExp(phrase);
  return regex.test(text.raw) || regex.test(text.normalized);
}

export function matchesPattern(text: MatchableText, pattern: RegExp): boolean {
  return pattern.test(text.raw) || pattern.test(text.normalized);
}

export function findPhrases(text: MatchableText, phrases: readonly string[]): string[] {
  return phrases.filter((phrase) => matchesPhrase(text, phrase));
}

export default {
  normalizeText,
  phraseRegExp,
  toMatchable,
  matchesPhrase,
  matchesPattern,
  findPhrases,
};
