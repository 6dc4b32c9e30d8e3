/**
 * Query Vocabulary
 *
 * Word lists used by the constraint extractor and the ranker's location
 * filter. The lists live in `vocabulary.json` and are validated once, when
 * this module loads.
 *
 * @module query/vocabulary
 */

import { z } from 'zod';
import rawVocabulary from './vocabulary.json';

const lowerCaseWord = z.string().min(1).regex(/^[a-z ]+$/, 'Vocabulary words must be lower-case letters');

export const VocabularySchema = z.object({
  stopWords: z.array(lowerCaseWord),
  /** Ordered [alias, canonical name] pairs; first hit wins */
  placeAliases: z.array(z.tuple([lowerCaseWord, z.string().min(1)])),
  moodKeywords: z.record(lowerCaseWord, z.array(lowerCaseWord).min(1)),
  /** Month names in calendar order */
  months: z.array(lowerCaseWord).length(12),
  seasons: z.record(lowerCaseWord, z.array(lowerCaseWord).min(1)),
  /** Location/type word → words that satisfy it in a destination's text */
  typeKeywords: z.record(lowerCaseWord, z.array(lowerCaseWord).min(1)),
  affordableKeywords: z.array(lowerCaseWord).min(1),
});

export type Vocabulary = z.infer<typeof VocabularySchema>;

/**
 * Validated vocabulary.
 */
export const VOCABULARY: Vocabulary = VocabularySchema.parse(rawVocabulary);

/**
 * Budget ceiling applied when the query only says "cheap", "budget", ...
 */
export const AFFORDABLE_BUDGET_CEILING = 3500;

const STOP_WORDS: ReadonlySet<string> = new Set(VOCABULARY.stopWords);

/**
 * Whether a (lower-case) token is a stop word.
 */
export function isStopWord(token: string): boolean {
  return STOP_WORDS.has(token);
}

/**
 * Escape a literal for use inside a RegExp.
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Singular candidates for a search term: the term itself, then the term
 * without a trailing "s" or "es".
 *
 * @example
 * ```typescript
 * termVariants('beaches')   // ['beaches', 'beache', 'beach']
 * termVariants('mountains') // ['mountains', 'mountain']
 * termVariants('goa')       // ['goa']
 * ```
 */
export function termVariants(term: string): string[] {
  const variants = [term];
  if (term.length > 3 && term.endsWith('s')) {
    variants.push(term.slice(0, -1));
    if (term.endsWith('es')) {
      variants.push(term.slice(0, -2));
    }
  }
  return variants;
}

/**
 * Resolve a search term to its location/type group, if it names one.
 *
 * @example
 * ```typescript
 * findTypeGroup('hills')    // 'mountain'
 * findTypeGroup('beaches')  // 'beach'
 * findTypeGroup('culture')  // undefined
 * ```
 */
export function findTypeGroup(term: string): string | undefined {
  const variants = termVariants(term);
  for (const [group, members] of Object.entries(VOCABULARY.typeKeywords)) {
    if (variants.some((variant) => variant === group || members.includes(variant))) {
      return group;
    }
  }
  return undefined;
}
