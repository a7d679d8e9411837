/**
 * Suppression factor for a keyword match based on the nearest negation
 * word within `window` tokens on either side.
 *
 * Returns 1 when no negation is in range. Otherwise the negation strength
 * is (window - distance + 1) / window and the factor is 1 - strength, so a
 * negation right next to the match yields 0.
 */
export function checkNegation(
  tokens: readonly string[],
  matchIndex: number,
  window: number,
  negativeWords: ReadonlySet<string>,
  matchLength: number = 1
): number {
  if (window <= 0 || negativeWords.size === 0 || tokens.length === 0) {
    return 1;
  }

  const matchEnd = matchIndex + Math.max(1, matchLength) - 1;
  const from = Math.max(0, matchIndex - window);
  const to = Math.min(tokens.length - 1, matchEnd + window);

  let nearest = Number.POSITIVE_INFINITY;
  for (let i = from; i <= to; i++) {
    if (i >= matchIndex && i <= matchEnd) continue;
    if (!isNegationToken(tokens[i], negativeWords)) continue;

    const distance = i < matchIndex ? matchIndex - i : i - matchEnd;
    nearest = Math.min(nearest, distance);
  }

  if (!Number.isFinite(nearest)) {
    return 1;
  }

  const strength = (window - nearest + 1) / window;
  return Math.min(1, Math.max(0, 1 - strength));
}

// Contractions such as "isn't" count as "not" when "not" is a negation term
export function isNegationToken(token: string, negativeWords: ReadonlySet<string>): boolean {
  if (negativeWords.has(token)) return true;
  return token.endsWith("n't") && negativeWords.has('not');
}
