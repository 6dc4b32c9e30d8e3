/**
 * Offline Evaluation
 *
 * Precision, recall and F1 at k for labelled queries. Ground truth is
 * computed from a relevance rule per query over the whole served catalog,
 * independently of the ranker.
 *
 * @module evaluation/metrics
 */

import { z } from 'zod';
import { DataFormatError } from '../errors/index.js';
import type { Recommender } from '../recommender/recommender.js';
import type { Destination } from '../schemas/destination.js';
import { readJson } from '../storage/atomic.js';

// ============================================================================
// Schemas
// ============================================================================

const query = z.string().trim().min(1);
const term = z.string().trim().min(1).toLowerCase();

/**
 * A labelled query and the rule that decides which destinations are relevant.
 */
export const EvaluationQuerySchema = z.discriminatedUnion('type', [
  /** Term appears in name, description or moods */
  z.object({ query, type: z.literal('keyword'), term }),
  /** Destination carries the mood */
  z.object({ query, type: z.literal('mood'), term }),
  /** Entry price within `max` */
  z.object({ query, type: z.literal('budget'), max: z.number().nonnegative() }),
  /** Term appears in the name */
  z.object({ query, type: z.literal('name'), term }),
  /** Mood and budget rules both hold */
  z.object({ query, type: z.literal('mixed'), mood: term, budget: z.number().nonnegative() }),
]);

export type EvaluationQuery = z.infer<typeof EvaluationQuerySchema>;

export const EvaluationQueriesFileSchema = z.object({
  queries: z.array(EvaluationQuerySchema).min(1),
});

// ============================================================================
// Types
// ============================================================================

/**
 * The destination fields relevance rules look at.
 */
export type JudgedDestination = Pick<Destination, 'id' | 'name' | 'moods' | 'description' | 'budgetMin'>;

export interface QueryMetrics {
  query: string;
  /** Retrieved ids, in rank order */
  retrieved: number[];
  /** Relevant ids in the catalog, ascending */
  relevant: number[];
  precision: number;
  recall: number;
  f1: number;
}

export interface EvaluationReport {
  k: number;
  results: QueryMetrics[];
  /** Macro averages over all queries */
  averages: {
    precision: number;
    recall: number;
    f1: number;
  };
}

// ============================================================================
// Relevance
// ============================================================================

/**
 * Terms that count as each other for keyword relevance.
 */
const KEYWORD_SYNONYMS: Readonly<Record<string, readonly string[]>> = {
  mountain: ['hill'],
  hill: ['mountain'],
};

function hasMood(destination: JudgedDestination, mood: string): boolean {
  return destination.moods.some((own) => own.toLowerCase() === mood);
}

/**
 * Apply a query's relevance rule to one destination.
 */
export function isRelevant(destination: JudgedDestination, labelled: EvaluationQuery): boolean {
  switch (labelled.type) {
    case 'keyword': {
      const text = [destination.name, destination.description, ...destination.moods].join(' ').toLowerCase();
      const accepted = [labelled.term, ...(KEYWORD_SYNONYMS[labelled.term] ?? [])];
      return accepted.some((candidate) => text.includes(candidate));
    }
    case 'mood':
      return hasMood(destination, labelled.term);
    case 'budget':
      return destination.budgetMin <= labelled.max;
    case 'name':
      return destination.name.toLowerCase().includes(labelled.term);
    case 'mixed':
      return hasMood(destination, labelled.mood) && destination.budgetMin <= labelled.budget;
  }
}

// ============================================================================
// Metrics
// ============================================================================

/**
 * Precision over what was retrieved (0 when nothing was), recall over
 * everything relevant (0 when nothing is), and their harmonic mean.
 */
export function computeMetrics(
  retrieved: readonly number[],
  relevant: ReadonlySet<number>
): Pick<QueryMetrics, 'precision' | 'recall' | 'f1'> {
  const hits = retrieved.filter((id) => relevant.has(id)).length;
  const precision = retrieved.length > 0 ? hits / retrieved.length : 0;
  const recall = relevant.size > 0 ? hits / relevant.size : 0;
  const f1 = precision + recall > 0 ? (2 * precision * recall) / (precision + recall) : 0;
  return { precision, recall, f1 };
}

/**
 * Run one labelled query and score its top-k.
 */
export function evaluateQuery(recommender: Recommender, labelled: EvaluationQuery, k: number): QueryMetrics {
  const retrieved = recommender
    .recommend(labelled.query, k)
    .recommendations.map((entry) => entry.spotId);

  const relevant = recommender
    .listDestinations()
    .filter((destination) => isRelevant(destination, labelled))
    .map((destination) => destination.id)
    .sort((a, b) => a - b);

  return { query: labelled.query, retrieved, relevant, ...computeMetrics(retrieved, new Set(relevant)) };
}

/**
 * Evaluate every labelled query at k and macro-average the results.
 *
 * @throws RangeError if `k` is not an integer ≥ 1
 */
export function evaluate(
  recommender: Recommender,
  queries: readonly EvaluationQuery[],
  k: number
): EvaluationReport {
  if (!Number.isInteger(k) || k < 1) {
    throw new RangeError(`k must be an integer >= 1, received ${k}`);
  }

  const results = queries.map((labelled) => evaluateQuery(recommender, labelled, k));
  const mean = (pick: (metrics: QueryMetrics) => number): number =>
    results.length > 0 ? results.reduce((sum, metrics) => sum + pick(metrics), 0) / results.length : 0;

  return {
    k,
    results,
    averages: {
      precision: mean((metrics) => metrics.precision),
      recall: mean((metrics) => metrics.recall),
      f1: mean((metrics) => metrics.f1),
    },
  };
}

/**
 * Load labelled queries from a JSON file (`{ "queries": [...] }`).
 *
 * @throws DataFormatError if the file is missing or invalid
 */
export async function loadEvaluationQueries(filePath: string): Promise<EvaluationQuery[]> {
  const data = await readJson(filePath);
  const parsed = EvaluationQueriesFileSchema.safeParse(data);
  if (!parsed.success) {
    throw DataFormatError.fromZodError(parsed.error, filePath, 'evaluation queries');
  }
  return parsed.data.queries;
}
