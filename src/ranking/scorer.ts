/**
 * Destination Sub-Scores
 *
 * One function per ranking factor. Each returns a raw sub-score (roughly
 * 0-1; budget can reach 1 + affordability bonus) or, for the gated factors,
 * a rejection. `evaluateDestination` applies the hard-reject gates and
 * combines the factors with the configured weights.
 *
 * @module ranking/scorer
 */

import type { ScoringConfig, ScoreTier } from '../config/scoring.js';
import type { ConstraintRecord } from '../schemas/constraints.js';
import type { Destination } from '../schemas/destination.js';
import type { ScoreFactor } from '../schemas/results.js';
import { VOCABULARY, escapeRegExp, findTypeGroup, termVariants } from '../query/vocabulary.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A factor's raw sub-score and a short human-readable reason.
 */
export interface FactorScore {
  value: number;
  reason: string;
}

/**
 * Result of a gated factor: a score, or a hard rejection.
 */
export type GatedScore = ({ rejected: false } & FactorScore) | { rejected: true; reason: string };

/**
 * One factor of a destination evaluation.
 */
export interface FactorEvaluation extends FactorScore {
  weight: number;
}

/**
 * Full evaluation of one destination against one constraint record.
 */
export interface DestinationEvaluation {
  /** Weighted sum of all factors; meaningless when `rejection` is set */
  total: number;
  rejection?: string;
  factors: Record<ScoreFactor, FactorEvaluation>;
}

// ============================================================================
// Helpers
// ============================================================================

function tierScore(tiers: readonly ScoreTier[], gap: number): number | undefined {
  return tiers.find((tier) => gap <= tier.upTo)?.score;
}

function formatMoney(amount: number): string {
  return Number.isFinite(amount) ? `₹${amount}` : 'any';
}

/**
 * Whole word, optionally pluralised.
 */
function wordPattern(word: string): RegExp {
  return new RegExp(String.raw`\b${escapeRegExp(word)}(?:s|es)?\b`);
}

// ============================================================================
// Factors
// ============================================================================

/**
 * Budget factor.
 *
 * - Range (`budgetMin` set): any overlap scores 1.0, no overlap rejects.
 *   A range without `budgetMax` is open-ended.
 * - Ceiling (`budgetMax` only): entry price within the ceiling scores
 *   `1 + bonus × (1 − price/ceiling)`. Over the ceiling the destination is
 *   rejected, or with the `graduated` policy given partial credit by deficit.
 * - Neither: neutral.
 */
export function scoreBudget(
  destination: Destination,
  record: ConstraintRecord,
  config: ScoringConfig
): GatedScore {
  const { budgetMin, budgetMax } = record;

  if (budgetMin !== undefined) {
    const upper = budgetMax ?? Number.POSITIVE_INFINITY;
    const requested = `${formatMoney(budgetMin)}-${formatMoney(upper)}`;
    if (destination.budgetMin <= upper && destination.budgetMax >= budgetMin) {
      return { rejected: false, value: 1, reason: `price range overlaps ${requested}` };
    }
    return { rejected: true, reason: `price range outside ${requested}` };
  }

  if (budgetMax === undefined) {
    return { rejected: false, value: config.neutralScore, reason: 'no budget given' };
  }

  const budget = config.budget;
  if (destination.budgetMin <= budgetMax) {
    const bonus = budgetMax > 0 ? budget.affordabilityBonus * (1 - destination.budgetMin / budgetMax) : 0;
    return {
      rejected: false,
      value: 1 + bonus,
      reason: `from ${formatMoney(destination.budgetMin)}, within ${formatMoney(budgetMax)}`,
    };
  }

  const deficit = destination.budgetMin - budgetMax;
  if (budget.overrunPolicy === 'reject') {
    return { rejected: true, reason: `from ${formatMoney(destination.budgetMin)}, over ${formatMoney(budgetMax)}` };
  }

  const value =
    tierScore(budget.deficitTiers, deficit) ??
    Math.max(budget.deficitFloor, 1 - Math.min(deficit / destination.budgetMin, budget.maxDeficitPenalty));
  return { rejected: false, value, reason: `${formatMoney(deficit)} over budget` };
}

/**
 * Fraction of requested moods the destination carries.
 *
 * An empty request is trivially satisfied (1.0) here; `evaluateDestination`
 * never asks, it scores an unrequested mood as `neutralScore` instead.
 */
export function scoreMood(destination: Destination, moods: readonly string[]): number {
  if (moods.length === 0) {
    return 1;
  }
  return matchedMoods(destination, moods).length / moods.length;
}

/**
 * Requested moods the destination is tagged with (case-insensitive).
 */
export function matchedMoods(destination: Destination, moods: readonly string[]): string[] {
  const own = new Set(destination.moods.map((mood) => mood.toLowerCase()));
  return moods.filter((mood) => own.has(mood.toLowerCase()));
}

/**
 * Duration closeness: exact 1.0, tiered for small gaps, then linear decay to
 * a floor.
 */
export function scoreDuration(requestedDays: number, actualDays: number, config: ScoringConfig): number {
  const diff = Math.abs(requestedDays - actualDays);
  const { tiers, decayPerDay, floor } = config.duration;
  return tierScore(tiers, diff) ?? Math.max(floor, 1 - decayPerDay * diff);
}

/**
 * Free-text match. Each term earns the best of name, mood-tag or description
 * credit; the sum is normalised by the name credit per term and capped at 1.
 */
export function scoreText(destination: Destination, terms: readonly string[], config: ScoringConfig): number {
  if (terms.length === 0) {
    return 0;
  }

  const credit = config.textMatchCredit;
  const name = destination.name.toLowerCase();
  const moods = destination.moods.map((mood) => mood.toLowerCase());
  const description = destination.description.toLowerCase();

  let sum = 0;
  for (const term of terms) {
    const variants = termVariants(term.toLowerCase());
    if (variants.some((variant) => name.includes(variant))) {
      sum += credit.name;
    } else if (variants.some((variant) => moods.some((mood) => mood.includes(variant)))) {
      sum += credit.mood;
    } else if (variants.some((variant) => description.includes(variant))) {
      sum += credit.description;
    }
  }

  return Math.min(sum / (credit.name * terms.length), 1);
}

/**
 * Category prior from the destination name. A name equal to the requested
 * place scores 1.0; otherwise the first keyword tier found in the name.
 */
export function scoreCategory(
  destination: Destination,
  placeName: string | undefined,
  config: ScoringConfig
): FactorScore {
  const name = destination.name.toLowerCase();

  if (placeName !== undefined && name === placeName.toLowerCase()) {
    return { value: 1, reason: 'requested place' };
  }

  for (const tier of config.categoryTiers) {
    const keyword = tier.keywords.find((candidate) => name.includes(candidate));
    if (keyword !== undefined) {
      return { value: tier.score, reason: `${keyword} destination` };
    }
  }

  return { value: config.neutralScore, reason: 'general destination' };
}

/**
 * Fraction of requested months among the destination's best months.
 * Neutral when either side is empty.
 */
export function scoreMonths(destination: Destination, months: readonly string[], config: ScoringConfig): number {
  if (months.length === 0 || destination.bestMonths.length === 0) {
    return config.neutralScore;
  }
  const best = new Set(destination.bestMonths.map((month) => month.toLowerCase()));
  return months.filter((month) => best.has(month.toLowerCase())).length / months.length;
}

/**
 * Proximity: linear falloff inside the limit, steeper falloff to a floor
 * beyond it.
 */
export function scoreDistance(distanceKm: number, limitKm: number, config: ScoringConfig): number {
  const { proximityPenalty, overLimitSlope, floor } = config.distance;

  if (limitKm <= 0) {
    return distanceKm === 0 ? 1 : floor;
  }
  if (distanceKm <= limitKm) {
    return 1 - proximityPenalty * (distanceKm / limitKm);
  }
  const excess = distanceKm - limitKm;
  return Math.max(floor, 1 - proximityPenalty - overLimitSlope * (excess / limitKm));
}

// ============================================================================
// Gates
// ============================================================================

/**
 * Location/type gate. When a search term names a type group ("beaches",
 * "hills"), the destination must mention one of the group's words in its
 * name, moods or description.
 *
 * @returns Rejection reason, or undefined when the destination passes
 */
export function checkTypeKeywords(destination: Destination, terms: readonly string[]): string | undefined {
  const haystack = [destination.name, ...destination.moods, destination.description].join(' ').toLowerCase();

  for (const term of terms) {
    const group = findTypeGroup(term.toLowerCase());
    if (group === undefined) {
      continue;
    }
    const members = [group, ...(VOCABULARY.typeKeywords[group] ?? [])];
    if (!members.some((member) => wordPattern(member).test(haystack))) {
      return `no ${group} features`;
    }
  }

  return undefined;
}

// ============================================================================
// Combination
// ============================================================================

/**
 * Score every factor for one destination and apply the hard-reject gates.
 *
 * Unconstrained factors score `neutralScore`. The category factor is always
 * evaluated. Duration uses `unspecifiedDurationWeight` when the record has no
 * duration.
 */
export function evaluateDestination(
  destination: Destination,
  record: ConstraintRecord,
  config: ScoringConfig
): DestinationEvaluation {
  const { weights, neutralScore } = config;
  const neutral = (reason: string): FactorScore => ({ value: neutralScore, reason });

  const typeRejection = checkTypeKeywords(destination, record.searchTerms);
  const budget = scoreBudget(destination, record, config);

  const factors: Record<ScoreFactor, FactorEvaluation> = {
    budget: budget.rejected
      ? { weight: weights.budget, value: 0, reason: budget.reason }
      : { weight: weights.budget, value: budget.value, reason: budget.reason },

    mood:
      record.moods.length === 0
        ? { weight: weights.mood, ...neutral('no mood given') }
        : {
            weight: weights.mood,
            value: scoreMood(destination, record.moods),
            reason: `matches ${matchedMoods(destination, record.moods).length}/${record.moods.length} moods`,
          },

    duration:
      record.durationDays === undefined
        ? { weight: config.unspecifiedDurationWeight, ...neutral('no duration given') }
        : {
            weight: weights.duration,
            value: scoreDuration(record.durationDays, destination.durationDays, config),
            reason: `${destination.durationDays} days vs ${record.durationDays} requested`,
          },

    text:
      record.searchTerms.length === 0
        ? { weight: weights.text, ...neutral('no search terms') }
        : {
            weight: weights.text,
            value: scoreText(destination, record.searchTerms, config),
            reason: `terms: ${record.searchTerms.join(', ')}`,
          },

    category: { weight: weights.category, ...scoreCategory(destination, record.placeName, config) },

    months:
      record.bestMonths.length === 0
        ? { weight: weights.months, ...neutral('no months given') }
        : {
            weight: weights.months,
            value: scoreMonths(destination, record.bestMonths, config),
            reason:
              destination.bestMonths.length === 0
                ? 'no best months listed'
                : `best in ${destination.bestMonths.join(', ')}`,
          },

    distance:
      record.distanceKm === undefined
        ? { weight: weights.distance, ...neutral('no distance given') }
        : {
            weight: weights.distance,
            value: scoreDistance(destination.distanceKm, record.distanceKm, config),
            reason: `${destination.distanceKm} km vs ${record.distanceKm} km limit`,
          },
  };

  const total = Object.values(factors).reduce((sum, factor) => sum + factor.weight * factor.value, 0);
  const rejection = typeRejection ?? (budget.rejected ? budget.reason : undefined);

  return rejection === undefined ? { total, factors } : { total, rejection, factors };
}
