/**
 * Text normalization shared by keyword loading and scoring
 */

const WORD_PATTERN = /[\p{L}\p{N}']+/gu;

export interface TermMatch {
  term: string;
  index: number; // Token position of the first word
  length: number; // Number of tokens the term spans
}

/**
 * Removes markup and collapses whitespace
 */
export function cleanText(text: string): string {
  return text
    .replace(/<style[\s\S]*?<\/style>/gi, ' ')
    .replace(/<script[\s\S]*?<\/script>/gi, ' ')
    .replace(/<[^>]*>/g, ' ')
    .replace(/&nbsp;/gi, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Lowercased word tokens. Apostrophes inside words are kept so that
 * contractions like "don't" stay a single token.
 */
export function tokenize(text: string): string[] {
  const normalized = cleanText(text)
    .replace(/[‘’]/g, "'")
    .toLowerCase();

  const words = normalized.match(WORD_PATTERN) ?? [];
  return words
    .map(word => word.replace(/^'+|'+$/g, ''))
    .filter(word => word.length > 0);
}

/**
 * Finds every occurrence of the given terms in a token stream. Longer
 * phrases win where terms overlap, and no token is counted twice.
 */
export function findTermMatches(tokens: readonly string[], terms: ReadonlySet<string>): TermMatch[] {
  const phrases = [...terms]
    .map(term => ({ term, words: term.split(' ') }))
    .sort((a, b) => b.words.length - a.words.length || a.term.localeCompare(b.term));

  const consumed = new Array<boolean>(tokens.length).fill(false);
  const matches: TermMatch[] = [];

  for (const { term, words } of phrases) {
    for (let start = 0; start + words.length <= tokens.length; start++) {
      let matched = true;
      for (let offset = 0; offset < words.length; offset++) {
        if (consumed[start + offset] || tokens[start + offset] !== words[offset]) {
          matched = false;
          break;
        }
      }
      if (!matched) continue;

      for (let offset = 0; offset < words.length; offset++) {
        consumed[start + offset] = true;
      }
      matches.push({ term, index: start, length: words.length });
    }
  }

  return matches.sort((a, b) => a.index - b.index);
}
