/**
 * Ranking Module Exports
 *
 * @module ranking
 */

export { Ranker, compareRanked, type RankerOptions } from './ranker.js';

export {
  evaluateDestination,
  checkTypeKeywords,
  scoreBudget,
  scoreMood,
  matchedMoods,
  scoreDuration,
  scoreText,
  scoreCategory,
  scoreMonths,
  scoreDistance,
  type FactorScore,
  type GatedScore,
  type FactorEvaluation,
  type DestinationEvaluation,
} from './scorer.js';
