const NON_WORD = /[^\p{L}\p{N}_]+/u;

/**
 * Lower-cased word tokens with punctuation stripped.
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(NON_WORD)
    .filter((token) => token.length > 0);
}

export function tokenSet(text: string): Set<string> {
  return new Set(tokenize(text));
}

/**
 * Lower-case and collapse whitespace. Both sides of a phrase match go through
 * this, so a phrase matches across line and paragraph breaks.
 */
export function toPhrase(text: string): string {
  return text.toLowerCase().replace(/\s+/g, " ").trim();
}
