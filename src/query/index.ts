/**
 * Query Module Exports
 *
 * @module query
 */

export {
  extractConstraints,
  extractSearchTerms,
  extractMoods,
  extractMonths,
  applyFirstMatch,
  BUDGET_RULES,
  DURATION_RULES,
  DISTANCE_RULES,
  PLACE_RULES,
  type ExtractionRule,
  type ExtractOptions,
  type KeywordMatchMode,
} from './extractor.js';

export {
  VOCABULARY,
  VocabularySchema,
  AFFORDABLE_BUDGET_CEILING,
  findTypeGroup,
  termVariants,
  isStopWord,
  escapeRegExp,
  type Vocabulary,
} from './vocabulary.js';
