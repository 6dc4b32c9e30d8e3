/**
 * Scoring Configuration
 *
 * Weights, tier boundaries and thresholds for the ranker. The defaults pin
 * the behaviour the recommender has always had; none of the tier boundaries
 * (500/1000 budget deficit, 0.4 relevance cutoff) has a derivation beyond
 * "it ranked the catalog sensibly", so treat them as tunables.
 *
 * @module config/scoring
 */

import { z } from 'zod';

// ============================================================================
// Schemas
// ============================================================================

const unitInterval = z.number().min(0).max(1);

/**
 * Per-factor weights. Must sum to 1.0.
 */
export const ScoringWeightsSchema = z
  .object({
    budget: unitInterval,
    mood: unitInterval,
    duration: unitInterval,
    text: unitInterval,
    category: unitInterval,
    months: unitInterval,
    distance: unitInterval,
  })
  .refine(
    (weights) => Math.abs(Object.values(weights).reduce((sum, w) => sum + w, 0) - 1) < 1e-6,
    { message: 'Scoring weights must sum to 1.0' }
  );

export type ScoringWeights = z.infer<typeof ScoringWeightsSchema>;

/**
 * A score awarded when a measured gap is at most `upTo`.
 */
const TierSchema = z.object({
  upTo: z.number().nonnegative(),
  score: unitInterval,
});

export type ScoreTier = z.infer<typeof TierSchema>;

/**
 * Keywords matched against a destination name and the score they award.
 */
const KeywordTierSchema = z.object({
  keywords: z.array(z.string().min(1)).min(1),
  score: unitInterval,
});

export type KeywordTier = z.infer<typeof KeywordTierSchema>;

export const ScoringConfigSchema = z.object({
  weights: ScoringWeightsSchema,

  /** Duration weight used instead of `weights.duration` when no duration is requested */
  unspecifiedDurationWeight: unitInterval,

  /** Sub-score for any factor the query leaves unconstrained */
  neutralScore: unitInterval,

  /** Results scoring below this are dropped */
  relevanceThreshold: z.number().nonnegative(),

  budget: z.object({
    /** Maximum bonus above 1.0 for a destination whose entry price is zero */
    affordabilityBonus: z.number().nonnegative(),
    /**
     * What happens when a destination's minimum price exceeds the ceiling:
     * `reject` removes it, `graduated` gives partial credit by deficit tier.
     */
    overrunPolicy: z.enum(['reject', 'graduated']),
    /** Graduated credit by deficit, ascending by `upTo` */
    deficitTiers: z.array(TierSchema),
    /** Largest fractional penalty beyond the last tier */
    maxDeficitPenalty: unitInterval,
    deficitFloor: unitInterval,
  }),

  duration: z.object({
    /** Score by absolute day difference, ascending by `upTo` */
    tiers: z.array(TierSchema),
    /** Score lost per day of difference beyond the last tier */
    decayPerDay: z.number().nonnegative(),
    floor: unitInterval,
  }),

  distance: z.object({
    /** Score lost at exactly the limit, scaled linearly from 0 km */
    proximityPenalty: unitInterval,
    /** Further score lost per limit-length beyond the limit */
    overLimitSlope: z.number().nonnegative(),
    floor: unitInterval,
  }),

  /** Name keyword tiers, checked in order; first hit wins */
  categoryTiers: z.array(KeywordTierSchema),

  /**
   * Name > moods > description credit per matched search term. The text
   * score is the credit sum divided by `name × terms`.
   */
  textMatchCredit: z.object({
    name: z.number().positive(),
    mood: z.number().nonnegative(),
    description: z.number().nonnegative(),
  }),
});

export type ScoringConfig = z.infer<typeof ScoringConfigSchema>;

// ============================================================================
// Defaults
// ============================================================================

/**
 * Default factor weights.
 */
export const SCORING_WEIGHTS: ScoringWeights = {
  budget: 0.25,
  mood: 0.2,
  duration: 0.2,
  text: 0.15,
  category: 0.12,
  months: 0.05,
  distance: 0.03,
};

/**
 * Default ranking configuration.
 */
export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  weights: SCORING_WEIGHTS,
  unspecifiedDurationWeight: 0.05,
  neutralScore: 0.5,
  relevanceThreshold: 0.4,
  budget: {
    affordabilityBonus: 0.1,
    overrunPolicy: 'reject',
    deficitTiers: [
      { upTo: 500, score: 0.85 },
      { upTo: 1000, score: 0.75 },
    ],
    maxDeficitPenalty: 0.7,
    deficitFloor: 0.3,
  },
  duration: {
    tiers: [
      { upTo: 0, score: 1.0 },
      { upTo: 1, score: 0.9 },
      { upTo: 2, score: 0.7 },
    ],
    decayPerDay: 0.1,
    floor: 0.4,
  },
  distance: {
    proximityPenalty: 0.3,
    overLimitSlope: 0.4,
    floor: 0.3,
  },
  categoryTiers: [
    { keywords: ['beach', 'backwater', 'spiritual', 'devotion'], score: 0.9 },
    { keywords: ['hill', 'mountain', 'snow', 'leh', 'ladakh', 'yoga'], score: 0.85 },
    { keywords: ['night', 'life', 'city', 'tour'], score: 0.75 },
  ],
  textMatchCredit: {
    name: 3,
    mood: 2,
    description: 1,
  },
};

/**
 * Partial override accepted by `resolveScoringConfig`. Nested objects merge
 * one level deep; arrays replace the default wholesale.
 */
export type ScoringConfigOverrides = {
  [K in keyof ScoringConfig]?: ScoringConfig[K] extends unknown[]
    ? ScoringConfig[K]
    : ScoringConfig[K] extends object
      ? Partial<ScoringConfig[K]>
      : ScoringConfig[K];
};

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @param overrides - Partial configuration
 * @returns Validated configuration
 * @throws ZodError if the merged configuration is invalid (e.g. weights not summing to 1)
 *
 * @example
 * ```typescript
 * const config = resolveScoringConfig({ relevanceThreshold: 0.3 });
 * config.weights.budget; // 0.25
 * ```
 */
export function resolveScoringConfig(overrides: ScoringConfigOverrides = {}): ScoringConfig {
  const merged = {
    ...DEFAULT_SCORING_CONFIG,
    ...overrides,
    weights: { ...DEFAULT_SCORING_CONFIG.weights, ...overrides.weights },
    budget: { ...DEFAULT_SCORING_CONFIG.budget, ...overrides.budget },
    duration: { ...DEFAULT_SCORING_CONFIG.duration, ...overrides.duration },
    distance: { ...DEFAULT_SCORING_CONFIG.distance, ...overrides.distance },
    textMatchCredit: { ...DEFAULT_SCORING_CONFIG.textMatchCredit, ...overrides.textMatchCredit },
  };
  return ScoringConfigSchema.parse(merged);
}
