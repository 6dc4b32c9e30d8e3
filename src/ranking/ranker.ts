/**
 * Ranker
 *
 * Scores every indexed destination against a constraint record, drops the
 * hard-rejected ones, orders the rest and cuts at the relevance threshold.
 *
 * @module ranking/ranker
 */

import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from '../config/scoring.js';
import type { DestinationIndexer } from '../indexer/indexer.js';
import { silentLogger, type Logger } from '../logging/index.js';
import type { ConstraintRecord } from '../schemas/constraints.js';
import type {
  RankedDestination,
  ScoreComponent,
  ScoreExplanation,
  ScoreFactor,
} from '../schemas/results.js';
import { evaluateDestination } from './scorer.js';

// ============================================================================
// Types
// ============================================================================

export interface RankerOptions {
  config?: ScoringConfig;
  logger?: Logger;
}

// ============================================================================
// Helpers
// ============================================================================

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Score descending, then rating descending, then id ascending.
 */
export function compareRanked(a: RankedDestination, b: RankedDestination): number {
  return b.score - a.score || b.destination.rating - a.destination.rating || a.id - b.id;
}

// ============================================================================
// Ranker
// ============================================================================

/**
 * Ranks the destinations of one indexer.
 *
 * @example
 * ```typescript
 * const ranker = new Ranker(indexer);
 * ranker.rank(extractConstraints('beach under 5000'), 5);
 * ```
 */
export class Ranker {
  private readonly config: ScoringConfig;
  private readonly logger: Logger;

  constructor(
    private readonly indexer: DestinationIndexer,
    options: RankerOptions = {}
  ) {
    this.config = options.config ?? DEFAULT_SCORING_CONFIG;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Rank destinations for a constraint record.
   *
   * The result holds at most `hintK` entries, all at or above the relevance
   * threshold. It is never padded.
   *
   * @param record - Parsed constraints
   * @param hintK - Maximum number of results
   * @throws RangeError if `hintK` is not an integer ≥ 1
   * @throws IndexStateError if the index has not been built
   */
  rank(record: ConstraintRecord, hintK: number): RankedDestination[] {
    if (!Number.isInteger(hintK) || hintK < 1) {
      throw new RangeError(`hintK must be an integer >= 1, received ${hintK}`);
    }

    const snapshot = this.indexer.currentSnapshot();
    const scored: RankedDestination[] = [];
    let rejected = 0;

    for (const destination of snapshot.metadata.values()) {
      const evaluation = evaluateDestination(destination, record, this.config);
      if (evaluation.rejection !== undefined) {
        rejected++;
        continue;
      }
      scored.push({ id: destination.id, score: evaluation.total, destination });
    }

    scored.sort(compareRanked);

    const results: RankedDestination[] = [];
    for (const entry of scored) {
      if (entry.score < this.config.relevanceThreshold || results.length >= hintK) {
        break;
      }
      results.push(entry);
    }

    this.logger.debug(
      `Ranked ${snapshot.totalDestinations} destinations: ${rejected} rejected, ` +
        `${scored.length - results.length} cut, ${results.length} returned`
    );

    return results;
  }

  /**
   * Per-factor breakdown of one destination's score.
   *
   * @returns The explanation, or undefined for an unknown id
   */
  explainScore(id: number, record: ConstraintRecord): ScoreExplanation | undefined {
    const destination = this.indexer.getById(id);
    if (destination === undefined) {
      return undefined;
    }

    const evaluation = evaluateDestination(destination, record, this.config);
    const component = (factor: ScoreFactor): ScoreComponent => {
      const { weight, value, reason } = evaluation.factors[factor];
      return { score: round(weight * value, 3), reason };
    };
    const components: Record<ScoreFactor, ScoreComponent> = {
      budget: component('budget'),
      mood: component('mood'),
      duration: component('duration'),
      text: component('text'),
      category: component('category'),
      months: component('months'),
      distance: component('distance'),
    };

    const explanation: ScoreExplanation = {
      destinationId: destination.id,
      name: destination.name,
      total: evaluation.rejection === undefined ? round(evaluation.total, 4) : 0,
      components,
    };
    if (evaluation.rejection !== undefined) {
      explanation.rejected = evaluation.rejection;
    }
    return explanation;
  }
}
