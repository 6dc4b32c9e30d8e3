/**
 * spotfinder
 *
 * Library entry point: build a recommender over a catalog and query it.
 *
 * @example
 * ```typescript
 * import { Recommender, getCatalogPath } from 'spotfinder';
 *
 * const recommender = await Recommender.fromCatalogFile(getCatalogPath());
 * const { recommendations } = recommender.recommend('quiet beach for 3 days', 5);
 * ```
 *
 * @module spotfinder
 */

export * from './errors/index.js';
export * from './logging/index.js';
export * from './schemas/index.js';
export * from './indexer/index.js';
export * from './query/index.js';
export * from './ranking/index.js';
export * from './recommender/index.js';
export * from './storage/index.js';
export * from './evaluation/index.js';
export {
  DEFAULT_SCORING_CONFIG,
  SCORING_WEIGHTS,
  ScoringConfigSchema,
  ScoringWeightsSchema,
  resolveScoringConfig,
  type ScoringConfig,
  type ScoringConfigOverrides,
  type ScoringWeights,
  type ScoreTier,
  type KeywordTier,
} from './config/scoring.js';
