/**
 * Zod Schemas and Data Types
 *
 * Central export point for the catalog, constraint and result types.
 *
 * @module schemas
 */

// ============================================================================
// Catalog
// ============================================================================

export {
  DestinationRecordSchema,
  CatalogSchema,
  NewDestinationSchema,
  toDestination,
  type DestinationRecord,
  type Catalog,
  type NewDestination,
  type Destination,
} from './destination.js';

// ============================================================================
// Query Constraints
// ============================================================================

export {
  ConstraintRecordSchema,
  createEmptyConstraints,
  isUnconstrained,
  type ConstraintRecord,
} from './constraints.js';

// ============================================================================
// Results
// ============================================================================

export {
  SCORE_FACTORS,
  type ScoreFactor,
  type RankedDestination,
  type ScoreComponent,
  type ScoreExplanation,
  type RecommendationEntry,
  type RecommendationResult,
  type DestinationListing,
} from './results.js';
