/**
 * Recommendation Formatting
 *
 * Converts ranked destinations and catalog entries into the payload shapes
 * returned to callers.
 *
 * @module recommender/format
 */

import type { Destination } from '../schemas/destination.js';
import type {
  DestinationListing,
  RankedDestination,
  RecommendationEntry,
  ScoreExplanation,
} from '../schemas/results.js';

/**
 * Relevance scores are reported with this many decimals.
 */
export const SCORE_DECIMALS = 4;

/**
 * Round to `SCORE_DECIMALS`.
 */
export function roundScore(score: number): number {
  const factor = 10 ** SCORE_DECIMALS;
  return Math.round(score * factor) / factor;
}

/**
 * @example
 * ```typescript
 * formatBudgetRange(1000, 3000); // '₹1000-3000'
 * ```
 */
export function formatBudgetRange(min: number, max: number): string {
  return `₹${min}-${max}`;
}

export function formatDuration(days: number): string {
  return `${days} ${days === 1 ? 'day' : 'days'}`;
}

export function formatDistance(km: number): string {
  return `${km} km`;
}

/**
 * Build a payload entry for one ranked destination.
 *
 * @param ranked - Ranker output
 * @param rank - 1-based position
 * @param explanation - Attached when the caller asked for explanations
 */
export function toRecommendationEntry(
  ranked: RankedDestination,
  rank: number,
  explanation?: ScoreExplanation
): RecommendationEntry {
  const { destination } = ranked;
  const entry: RecommendationEntry = {
    rank,
    spotId: destination.id,
    name: destination.name,
    relevanceScore: roundScore(ranked.score),
    moods: [...destination.moods],
    budgetRange: formatBudgetRange(destination.budgetMin, destination.budgetMax),
    budgetMin: destination.budgetMin,
    budgetMax: destination.budgetMax,
    durationDays: destination.durationDays,
    distanceKm: destination.distanceKm,
    rating: destination.rating,
    bestMonths: [...destination.bestMonths],
    description: destination.description,
  };
  if (explanation !== undefined) {
    entry.explanation = explanation;
  }
  return entry;
}

/**
 * Build a catalog listing entry with display strings.
 */
export function toListing(destination: Destination): DestinationListing {
  return {
    id: destination.id,
    name: destination.name,
    moods: [...destination.moods],
    budget: formatBudgetRange(destination.budgetMin, destination.budgetMax),
    budgetMin: destination.budgetMin,
    budgetMax: destination.budgetMax,
    duration: formatDuration(destination.durationDays),
    durationDays: destination.durationDays,
    distance: formatDistance(destination.distanceKm),
    distanceKm: destination.distanceKm,
    rating: destination.rating,
    bestMonths: [...destination.bestMonths],
    description: destination.description,
  };
}
