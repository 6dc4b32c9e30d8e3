/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

export {
  formatConstraints,
  formatEvaluationReport,
  formatExplanation,
  formatListingTable,
  formatRecommendations,
  padRight,
  truncate,
} from './results.js';
