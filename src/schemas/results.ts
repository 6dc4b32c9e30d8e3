/**
 * Ranking and Recommendation Result Types
 *
 * @module schemas/results
 */

import type { ConstraintRecord } from './constraints.js';
import type { Destination } from './destination.js';

// ============================================================================
// Ranking
// ============================================================================

/**
 * Scoring factors, in the order they are reported.
 */
export const SCORE_FACTORS = [
  'budget',
  'mood',
  'duration',
  'text',
  'category',
  'months',
  'distance',
] as const;

export type ScoreFactor = (typeof SCORE_FACTORS)[number];

/**
 * A destination that passed the hard-reject gates and the relevance threshold.
 */
export interface RankedDestination {
  id: number;
  score: number;
  destination: Destination;
}

/**
 * One factor's weighted contribution and the reason behind it.
 */
export interface ScoreComponent {
  /** Weighted contribution, rounded to 3 decimals */
  score: number;
  reason: string;
}

/**
 * Per-factor breakdown of a destination's score for a constraint record.
 */
export interface ScoreExplanation {
  destinationId: number;
  name: string;
  /** Total score, rounded to 4 decimals (0 when rejected) */
  total: number;
  /** Present when a hard-reject gate removed the destination */
  rejected?: string;
  components: Record<ScoreFactor, ScoreComponent>;
}

// ============================================================================
// Recommendation Payload
// ============================================================================

/**
 * A single entry in the recommendation payload.
 */
export interface RecommendationEntry {
  /** 1-based position */
  rank: number;
  spotId: number;
  name: string;
  /** Rounded to 4 decimals */
  relevanceScore: number;
  moods: string[];
  /** e.g. "₹1000-3000" */
  budgetRange: string;
  budgetMin: number;
  budgetMax: number;
  durationDays: number;
  distanceKm: number;
  rating: number;
  bestMonths: string[];
  description: string;
  explanation?: ScoreExplanation;
}

/**
 * Full recommendation response.
 */
export interface RecommendationResult {
  query: string;
  recommendations: RecommendationEntry[];
  totalResults: number;
  parsedConstraints: ConstraintRecord;
}

/**
 * Catalog listing entry with display strings.
 */
export interface DestinationListing {
  id: number;
  name: string;
  moods: string[];
  budget: string;
  budgetMin: number;
  budgetMax: number;
  duration: string;
  durationDays: number;
  distance: string;
  distanceKm: number;
  rating: number;
  bestMonths: string[];
  description: string;
}
