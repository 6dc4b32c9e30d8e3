/**
 * Evaluation Module Exports
 *
 * @module evaluation
 */

export {
  EvaluationQuerySchema,
  EvaluationQueriesFileSchema,
  isRelevant,
  computeMetrics,
  evaluateQuery,
  evaluate,
  loadEvaluationQueries,
  type EvaluationQuery,
  type EvaluationReport,
  type QueryMetrics,
  type JudgedDestination,
} from './metrics.js';
