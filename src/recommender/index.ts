/**
 * Recommender Module Exports
 *
 * @module recommender
 */

export {
  Recommender,
  DEFAULT_TOP_K,
  type RecommenderOptions,
  type RecommendOptions,
} from './recommender.js';

export {
  SCORE_DECIMALS,
  roundScore,
  formatBudgetRange,
  formatDuration,
  formatDistance,
  toRecommendationEntry,
  toListing,
} from './format.js';
