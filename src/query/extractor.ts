/**
 * Constraint Extractor
 *
 * Turns free query text into a `ConstraintRecord` with keyword and regex
 * heuristics. Rule families run in a fixed priority:
 *
 * 1. search terms
 * 2. place name
 * 3. budget (ranges, then single values, then affordability keywords)
 * 4. moods
 * 5. months / seasons
 * 6. duration
 * 7. distance
 *
 * Within a first-match family the rule lists below are evaluated in order and
 * the first pattern that matches decides the field. Reordering them changes
 * what queries mean.
 *
 * Place aliases and mood keywords match anywhere in the query by default, so
 * "party" also carries the cultural keyword "art". The `word` match mode
 * limits aliases to whole words and mood keywords to word starts.
 *
 * @module query/extractor
 */

import { createEmptyConstraints, type ConstraintRecord } from '../schemas/constraints.js';
import { AFFORDABLE_BUDGET_CEILING, VOCABULARY, escapeRegExp, isStopWord } from './vocabulary.js';

// ============================================================================
// Types
// ============================================================================

/**
 * How place aliases and mood keywords are found in the query text.
 */
export type KeywordMatchMode = 'substring' | 'word';

export interface ExtractOptions {
  /** Defaults to `substring` */
  keywordMatch?: KeywordMatchMode;
}

/**
 * A named pattern and the fields it writes when it matches.
 */
export interface ExtractionRule {
  /** Stable identifier, used in tests and debug output */
  name: string;
  pattern: RegExp;
  apply: (match: RegExpExecArray) => Partial<ConstraintRecord>;
}

// ============================================================================
// Patterns
// ============================================================================

/**
 * A number followed by one of these units is a duration or a distance,
 * never a budget.
 */
const UNIT = String.raw`(?:days?|d|nights?|kms?|kilomet(?:er|re)s?)\b`;

const NOT_A_UNIT = String.raw`(?!\d)(?!\s*${UNIT})`;

/**
 * Also rules out the first number of a unit range such as "3 to 5 days".
 */
const NOT_A_UNIT_RANGE = String.raw`(?!\s*(?:-|to)\s*\d+\s*${UNIT})`;

const CURRENCY_PREFIX = String.raw`(?:rs\.?\s*|₹\s*)?`;

function toInt(value: string | undefined): number {
  return Number.parseInt(value ?? '', 10);
}

function budgetRange(match: RegExpExecArray): Partial<ConstraintRecord> {
  const first = toInt(match[1]);
  const second = toInt(match[2]);
  return { budgetMin: Math.min(first, second), budgetMax: Math.max(first, second) };
}

function budgetCeiling(match: RegExpExecArray): Partial<ConstraintRecord> {
  return { budgetMax: toInt(match[1]) };
}

/**
 * Budget rules: ranges first, then single values, then keyword defaults.
 */
export const BUDGET_RULES: readonly ExtractionRule[] = [
  {
    name: 'range-dash',
    pattern: new RegExp(String.raw`${CURRENCY_PREFIX}(\d+)\s*-\s*${CURRENCY_PREFIX}(\d+)${NOT_A_UNIT}`),
    apply: budgetRange,
  },
  {
    name: 'range-to',
    pattern: new RegExp(String.raw`${CURRENCY_PREFIX}(\d+)\s+to\s+${CURRENCY_PREFIX}(\d+)${NOT_A_UNIT}`),
    apply: budgetRange,
  },
  {
    name: 'range-between',
    pattern: new RegExp(
      String.raw`\bbetween\s+${CURRENCY_PREFIX}(\d+)\s+and\s+${CURRENCY_PREFIX}(\d+)${NOT_A_UNIT}`
    ),
    apply: budgetRange,
  },
  {
    name: 'labelled-amount',
    pattern: new RegExp(
      String.raw`(?:\b(?:budget|rupees|rs|inr)\b\.?|₹)[\s:]*(?:of\s+|is\s+)?(\d+)${NOT_A_UNIT}`
    ),
    apply: budgetCeiling,
  },
  {
    name: 'amount-currency',
    pattern: /(\d+)\s*(?:rupees|rupee|rs|inr|₹)(?![a-z])/,
    apply: budgetCeiling,
  },
  {
    name: 'ceiling-amount',
    pattern: new RegExp(
      String.raw`\b(?:upto|up to|under|below|within|max|maximum|less than)\s+${CURRENCY_PREFIX}(\d+)${NOT_A_UNIT}`
    ),
    apply: budgetCeiling,
  },
  {
    name: 'bare-amount',
    pattern: new RegExp(String.raw`(?<![\d.])(\d+)${NOT_A_UNIT}${NOT_A_UNIT_RANGE}`),
    apply: budgetCeiling,
  },
  {
    name: 'affordable-keyword',
    pattern: new RegExp(String.raw`\b(?:${VOCABULARY.affordableKeywords.map(escapeRegExp).join('|')})`),
    apply: () => ({ budgetMax: AFFORDABLE_BUDGET_CEILING }),
  },
];

/**
 * Duration rules.
 */
export const DURATION_RULES: readonly ExtractionRule[] = [
  {
    name: 'days-suffix',
    pattern: /(?<![\d.])(\d+)\s*(?:days?|d)\b/,
    apply: (match) => ({ durationDays: toInt(match[1]) }),
  },
  {
    name: 'for-duration',
    pattern: /\b(?:for|duration)[\s:]+(\d{1,2})(?!\d)(?!\s*(?:kms?|rupees|rs|inr|nights?)\b)/,
    apply: (match) => ({ durationDays: toInt(match[1]) }),
  },
];

const KM = String.raw`(?:kms?|kilomet(?:er|re)s?)\b`;

/**
 * Distance rules.
 */
export const DISTANCE_RULES: readonly ExtractionRule[] = [
  {
    name: 'ceiling-km',
    pattern: new RegExp(String.raw`\b(?:within|upto|up to|max|maximum|under)[\s:]*(\d+)\s*${KM}`),
    apply: (match) => ({ distanceKm: toInt(match[1]) }),
  },
  {
    name: 'km',
    pattern: new RegExp(String.raw`(\d+)\s*${KM}`),
    apply: (match) => ({ distanceKm: toInt(match[1]) }),
  },
];

function placeRules(mode: KeywordMatchMode): ExtractionRule[] {
  return VOCABULARY.placeAliases.map(([alias, placeName]) => ({
    name: `place:${alias}`,
    pattern: new RegExp(mode === 'word' ? String.raw`\b${escapeRegExp(alias)}\b` : escapeRegExp(alias)),
    apply: () => ({ placeName }),
  }));
}

function moodPatterns(mode: KeywordMatchMode): Array<readonly [string, RegExp[]]> {
  return Object.entries(VOCABULARY.moodKeywords).map(
    ([mood, keywords]) =>
      [
        mood,
        keywords.map(
          (keyword) => new RegExp(mode === 'word' ? String.raw`\b${escapeRegExp(keyword)}` : escapeRegExp(keyword))
        ),
      ] as const
  );
}

/**
 * Place rules, one per alias, in alias-table order.
 */
export const PLACE_RULES: Readonly<Record<KeywordMatchMode, readonly ExtractionRule[]>> = {
  substring: placeRules('substring'),
  word: placeRules('word'),
};

const MOOD_PATTERNS: Readonly<Record<KeywordMatchMode, ReadonlyArray<readonly [string, RegExp[]]>>> = {
  substring: moodPatterns('substring'),
  word: moodPatterns('word'),
};

const MONTH_ORDER: ReadonlyMap<string, number> = new Map(
  VOCABULARY.months.map((month, index) => [month, index])
);

// ============================================================================
// Rule Helpers
// ============================================================================

/**
 * Evaluate rules in order and return the first match's fields together with
 * the rule that produced them.
 *
 * @example
 * ```typescript
 * applyFirstMatch(DURATION_RULES, 'for 4 days')
 * // { rule: 'days-suffix', fields: { durationDays: 4 } }
 * ```
 */
export function applyFirstMatch(
  rules: readonly ExtractionRule[],
  text: string
): { rule: string; fields: Partial<ConstraintRecord> } | undefined {
  for (const rule of rules) {
    const match = rule.pattern.exec(text);
    if (match) {
      return { rule: rule.name, fields: rule.apply(match) };
    }
  }
  return undefined;
}

/**
 * Month and season names are consumed by the month rules, not searched for.
 */
const CALENDAR_WORDS: ReadonlySet<string> = new Set([
  ...VOCABULARY.months,
  ...Object.keys(VOCABULARY.seasons),
]);

/**
 * Free-text search terms: whitespace tokens with non-alphanumerics stripped,
 * minus stop words, calendar words, tokens of two characters or fewer and
 * numerals (including numbers glued to a unit, like "1000km").
 * Duplicates are dropped, first occurrence kept.
 */
export function extractSearchTerms(text: string): string[] {
  const terms = text
    .split(/\s+/)
    .map((token) => token.replace(/[^a-z0-9]/g, ''))
    .filter(
      (token) =>
        token.length > 2 && !/^\d/.test(token) && !isStopWord(token) && !CALENDAR_WORDS.has(token)
    );
  return [...new Set(terms)];
}

/**
 * Mood categories with at least one keyword in the text, in mood-table
 * order. Categories are independent; one word can hit several.
 */
export function extractMoods(text: string, mode: KeywordMatchMode = 'substring'): string[] {
  return MOOD_PATTERNS[mode]
    .filter(([, patterns]) => patterns.some((pattern) => pattern.test(text)))
    .map(([mood]) => mood);
}

/**
 * Months named directly or through a season, deduplicated, calendar order.
 */
export function extractMonths(text: string): string[] {
  const found = new Set<string>();

  for (const month of VOCABULARY.months) {
    if (new RegExp(String.raw`\b${month}\b`).test(text)) {
      found.add(month);
    }
  }
  for (const [season, months] of Object.entries(VOCABULARY.seasons)) {
    if (new RegExp(String.raw`\b${season}\b`).test(text)) {
      months.forEach((month) => found.add(month));
    }
  }

  return [...found].sort((a, b) => (MONTH_ORDER.get(a) ?? 0) - (MONTH_ORDER.get(b) ?? 0));
}

// ============================================================================
// Main Function
// ============================================================================

/**
 * Parse a free-text query into a constraint record.
 *
 * Fields no rule matched stay unset, which the ranker reads as
 * "unconstrained". String input never makes this throw.
 *
 * @param query - Raw query text
 * @param options - Keyword match mode
 * @returns A new constraint record
 * @throws TypeError if `query` is not a string
 *
 * @example
 * ```typescript
 * extractConstraints('Budget 5000, adventure, 4 days');
 * // {
 * //   budgetMax: 5000,
 * //   moods: ['adventure'],
 * //   durationDays: 4,
 * //   bestMonths: [],
 * //   searchTerms: ['adventure'],
 * // }
 * ```
 */
export function extractConstraints(query: unknown, options: ExtractOptions = {}): ConstraintRecord {
  if (typeof query !== 'string') {
    throw new TypeError(`Query must be a string, received ${query === null ? 'null' : typeof query}`);
  }

  const mode = options.keywordMatch ?? 'substring';
  const text = query.toLowerCase().trim();
  const record = createEmptyConstraints();

  // 1. Search terms
  record.searchTerms = extractSearchTerms(text);

  // 2. Place name
  const place = applyFirstMatch(PLACE_RULES[mode], text);
  if (place?.fields.placeName !== undefined) {
    record.placeName = place.fields.placeName;
  }

  // 3. Budget
  const budget = applyFirstMatch(BUDGET_RULES, text);
  if (budget) {
    if (budget.fields.budgetMin !== undefined) {
      record.budgetMin = budget.fields.budgetMin;
    }
    if (budget.fields.budgetMax !== undefined) {
      record.budgetMax = budget.fields.budgetMax;
    }
  }

  // 4. Moods
  record.moods = extractMoods(text, mode);

  // 5. Months and seasons
  record.bestMonths = extractMonths(text);

  // 6. Duration
  const duration = applyFirstMatch(DURATION_RULES, text);
  if (duration?.fields.durationDays !== undefined) {
    record.durationDays = duration.fields.durationDays;
  }

  // 7. Distance
  const distance = applyFirstMatch(DISTANCE_RULES, text);
  if (distance?.fields.distanceKm !== undefined) {
    record.distanceKm = distance.fields.distanceKm;
  }

  return record;
}
