/**
 * Recommender
 *
 * Coordinates query extraction, the destination index and the ranker, and
 * shapes their output into recommendation payloads.
 *
 * The indexer and the ranker that reads it are held together in one
 * serving state. `reload()` builds a complete new state off to the side and
 * swaps the single reference, so a query that started before a reload
 * finishes against the index it started with.
 *
 * @module recommender/recommender
 */

import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from '../config/scoring.js';
import { IndexStateError } from '../errors/index.js';
import { DestinationIndexer } from '../indexer/indexer.js';
import { silentLogger, type Logger } from '../logging/index.js';
import { extractConstraints, type KeywordMatchMode } from '../query/extractor.js';
import { Ranker } from '../ranking/ranker.js';
import type { DestinationRecord, NewDestination } from '../schemas/destination.js';
import type { DestinationListing, RecommendationResult } from '../schemas/results.js';
import * as catalogStore from '../storage/catalog.js';
import { toListing, toRecommendationEntry } from './format.js';

// ============================================================================
// Types
// ============================================================================

export interface RecommenderOptions {
  config?: ScoringConfig;
  logger?: Logger;
  /** Catalog file that `addDestination` / `removeDestination` write to */
  catalogPath?: string;
  /** How queries match place aliases and mood keywords; `substring` by default */
  keywordMatch?: KeywordMatchMode;
}

export interface RecommendOptions {
  /** Attach a per-factor score explanation to every entry */
  explain?: boolean;
}

/**
 * Default number of recommendations.
 */
export const DEFAULT_TOP_K = 10;

interface ServingState {
  readonly indexer: DestinationIndexer;
  readonly ranker: Ranker;
}

// ============================================================================
// Recommender
// ============================================================================

/**
 * @example
 * ```typescript
 * const recommender = await Recommender.fromCatalogFile(getCatalogPath());
 * const result = recommender.recommend('beach trip under 5000', 5);
 * result.recommendations[0].name; // 'Goa Beach'
 * ```
 */
export class Recommender {
  private state: ServingState;
  private readonly config: ScoringConfig;
  private readonly logger: Logger;
  private readonly catalogPath: string | undefined;
  private readonly keywordMatch: KeywordMatchMode;

  /**
   * Build a recommender over an in-memory catalog.
   *
   * @param data - Catalog document (`{ travel_spots: [...] }`)
   * @throws DataFormatError if the catalog is invalid
   */
  constructor(data: unknown, options: RecommenderOptions = {}) {
    this.config = options.config ?? DEFAULT_SCORING_CONFIG;
    this.logger = options.logger ?? silentLogger;
    this.catalogPath = options.catalogPath;
    this.keywordMatch = options.keywordMatch ?? 'substring';
    this.state = this.createState(data);
  }

  /**
   * Read a catalog file and build a recommender over it. Mutations write
   * back to the same file.
   *
   * @throws DataFormatError for a missing, malformed or invalid catalog file
   */
  static async fromCatalogFile(
    catalogPath: string,
    options: Omit<RecommenderOptions, 'catalogPath'> = {}
  ): Promise<Recommender> {
    const catalog = await catalogStore.readCatalog(catalogPath);
    return new Recommender(catalog, { ...options, catalogPath });
  }

  /**
   * Number of destinations currently served.
   */
  get size(): number {
    return this.state.indexer.size;
  }

  /**
   * Recommend destinations for a free-text query.
   *
   * @param query - Free text, e.g. "adventure under 5000 for 4 days"
   * @param topK - Maximum number of results
   * @throws TypeError if `query` is not a non-empty string
   * @throws RangeError if `topK` is not an integer ≥ 1
   */
  recommend(query: unknown, topK: number = DEFAULT_TOP_K, options: RecommendOptions = {}): RecommendationResult {
    if (typeof query !== 'string') {
      throw new TypeError(`Query must be a string, received ${query === null ? 'null' : typeof query}`);
    }
    if (query.trim() === '') {
      throw new TypeError('Query must not be empty');
    }
    if (!Number.isInteger(topK) || topK < 1) {
      throw new RangeError(`topK must be an integer >= 1, received ${topK}`);
    }

    const { ranker } = this.state;
    const constraints = extractConstraints(query, { keywordMatch: this.keywordMatch });
    this.logger.debug(`Parsed constraints: ${JSON.stringify(constraints)}`);

    const ranked = ranker.rank(constraints, topK);
    const recommendations = ranked.map((entry, index) =>
      toRecommendationEntry(
        entry,
        index + 1,
        options.explain ? ranker.explainScore(entry.id, constraints) : undefined
      )
    );

    return {
      query,
      recommendations,
      totalResults: recommendations.length,
      parsedConstraints: constraints,
    };
  }

  /**
   * Every served destination, in catalog order, with display strings.
   */
  listDestinations(): DestinationListing[] {
    return this.state.indexer.destinations().map(toListing);
  }

  /**
   * Replace the served catalog. The new index is fully built before it
   * becomes visible; on failure the current one keeps serving.
   *
   * @throws DataFormatError if the catalog is invalid
   */
  reload(data: unknown): void {
    this.state = this.createState(data);
    this.logger.info(`Catalog reloaded: ${this.state.indexer.size} destinations`);
  }

  /**
   * Persist a new destination, then reload from the catalog file.
   *
   * @returns The stored record with its assigned id
   * @throws DataFormatError if the input is invalid
   * @throws IndexStateError if this recommender has no catalog file
   */
  async addDestination(input: NewDestination): Promise<DestinationRecord> {
    const catalogPath = this.requireCatalogPath('addDestination');
    const record = await catalogStore.addDestination(catalogPath, input);
    this.reload(await catalogStore.readCatalog(catalogPath));
    return record;
  }

  /**
   * Remove a destination from the catalog file, then reload.
   *
   * @returns The removed record
   * @throws DestinationNotFoundError for an unknown id
   * @throws IndexStateError if this recommender has no catalog file
   */
  async removeDestination(id: number): Promise<DestinationRecord> {
    const catalogPath = this.requireCatalogPath('removeDestination');
    const removed = await catalogStore.removeDestination(catalogPath, id);
    this.reload(await catalogStore.readCatalog(catalogPath));
    return removed;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private createState(data: unknown): ServingState {
    const indexer = new DestinationIndexer(this.logger);
    indexer.load(data);
    indexer.build();
    return { indexer, ranker: new Ranker(indexer, { config: this.config, logger: this.logger }) };
  }

  private requireCatalogPath(operation: string): string {
    if (this.catalogPath === undefined) {
      throw new IndexStateError(
        `Recommender was built from in-memory data; ${operation}() needs a catalog file`,
        operation
      );
    }
    return this.catalogPath;
  }
}
