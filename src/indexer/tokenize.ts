/**
 * Tokenization for the reverse index.
 *
 * @module indexer/tokenize
 */

/**
 * Tokens of this length or shorter are not indexed.
 */
export const MIN_TOKEN_LENGTH_EXCLUSIVE = 2;

/**
 * Split text into index terms: strip non-alphanumerics, split on whitespace,
 * lower-case, and drop tokens of length ≤ 2.
 *
 * @example
 * ```typescript
 * tokenize("Goa's Beach, Sun & Sand!") // ['goas', 'beach', 'sun', 'sand']
 * tokenize('A hill at 2000m') // ['hill', '2000m']
 * ```
 */
export function tokenize(text: string): string[] {
  return text
    .replace(/[^a-zA-Z0-9\s]/g, '')
    .toLowerCase()
    .split(/\s+/)
    .filter((token) => token.length > MIN_TOKEN_LENGTH_EXCLUSIVE);
}

/**
 * Unique terms of a destination's indexed text, in first-seen order.
 */
export function uniqueTerms(text: string): string[] {
  return [...new Set(tokenize(text))];
}
