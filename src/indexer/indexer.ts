/**
 * Destination Indexer
 *
 * Owns the destination set and the structures derived from it:
 * - term → destination ids (reverse index over name + description)
 * - mood → destination ids
 * - term → document frequency, for IDF
 *
 * Every `build()` produces a new immutable `IndexSnapshot` and swaps it in
 * with a single assignment. Readers always see one complete snapshot, and the
 * IDF memo lives on the snapshot, so a rebuild can never serve IDF values
 * computed against the previous catalog.
 *
 * @module indexer/indexer
 */

import { CatalogSchema, toDestination, type Destination } from '../schemas/destination.js';
import { DataFormatError, IndexStateError } from '../errors/index.js';
import { silentLogger, type Logger } from '../logging/index.js';
import { uniqueTerms } from './tokenize.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Counts describing the current snapshot.
 */
export interface IndexStats {
  generation: number;
  destinations: number;
  terms: number;
  moods: number;
}

/**
 * Plain, sorted dump of a snapshot's content. Two builds over the same
 * catalog produce deep-equal dumps.
 */
export interface IndexContent {
  totalDestinations: number;
  terms: Record<string, number[]>;
  moods: Record<string, number[]>;
  documentFrequencies: Record<string, number>;
}

const EMPTY_SET: ReadonlySet<number> = new Set<number>();

// ============================================================================
// Snapshot
// ============================================================================

/**
 * One complete, immutable build of the index.
 */
export class IndexSnapshot {
  private readonly idfMemo = new Map<string, number>();

  private constructor(
    readonly generation: number,
    readonly totalDestinations: number,
    readonly metadata: ReadonlyMap<number, Destination>,
    readonly termIndex: ReadonlyMap<string, ReadonlySet<number>>,
    readonly moodIndex: ReadonlyMap<string, ReadonlySet<number>>,
    readonly documentFrequencies: ReadonlyMap<string, number>
  ) {}

  /**
   * Build a snapshot from a destination list.
   *
   * @param destinations - Destinations in catalog order
   * @param generation - Build counter value for this snapshot
   */
  static fromDestinations(destinations: readonly Destination[], generation: number): IndexSnapshot {
    const metadata = new Map<number, Destination>();
    const termIndex = new Map<string, Set<number>>();
    const moodIndex = new Map<string, Set<number>>();
    const documentFrequencies = new Map<string, number>();

    for (const destination of destinations) {
      metadata.set(destination.id, destination);

      for (const mood of destination.moods) {
        addToIndex(moodIndex, mood.toLowerCase(), destination.id);
      }

      // Each term counts once per destination, however often it repeats
      for (const term of uniqueTerms(`${destination.name} ${destination.description}`)) {
        addToIndex(termIndex, term, destination.id);
        documentFrequencies.set(term, (documentFrequencies.get(term) ?? 0) + 1);
      }
    }

    return new IndexSnapshot(
      generation,
      destinations.length,
      metadata,
      termIndex,
      moodIndex,
      documentFrequencies
    );
  }

  /**
   * Inverse document frequency: `ln(N / df(term))`, 0 for unseen terms or
   * an empty catalog.
   */
  idf(term: string): number {
    const key = term.toLowerCase();
    const cached = this.idfMemo.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const df = this.documentFrequencies.get(key) ?? 0;
    const value = df === 0 || this.totalDestinations === 0 ? 0 : Math.log(this.totalDestinations / df);

    this.idfMemo.set(key, value);
    return value;
  }

  /**
   * Number of memoised IDF entries (diagnostics and tests).
   */
  get memoizedTerms(): number {
    return this.idfMemo.size;
  }
}

function addToIndex(index: Map<string, Set<number>>, key: string, id: number): void {
  const ids = index.get(key);
  if (ids) {
    ids.add(id);
  } else {
    index.set(key, new Set([id]));
  }
}

function sortedRecord(index: ReadonlyMap<string, ReadonlySet<number>>): Record<string, number[]> {
  const record: Record<string, number[]> = {};
  for (const key of [...index.keys()].sort()) {
    record[key] = [...(index.get(key) ?? EMPTY_SET)].sort((a, b) => a - b);
  }
  return record;
}

// ============================================================================
// Indexer
// ============================================================================

/**
 * Loads a catalog and serves lookups over its latest build.
 *
 * @example
 * ```typescript
 * const indexer = new DestinationIndexer();
 * indexer.load(JSON.parse(await fs.readFile('travel_spots.json', 'utf-8')));
 * indexer.build();
 *
 * indexer.getByMood('Adventure'); // Set { 4, 6 }
 * indexer.idf('beach');           // ln(12 / 2)
 * ```
 */
export class DestinationIndexer {
  private loaded: readonly Destination[] | null = null;
  private snapshot: IndexSnapshot | null = null;
  private generationCounter = 0;

  constructor(private readonly logger: Logger = silentLogger) {}

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Validate and store a catalog. Must be called before `build()`.
   *
   * @param data - Parsed catalog JSON: `{ travel_spots: [...] }`
   * @throws DataFormatError if the shape is wrong, a field is missing or
   *   invalid, or two destinations share an id
   */
  load(data: unknown): void {
    const parsed = CatalogSchema.safeParse(data);
    if (!parsed.success) {
      throw DataFormatError.fromZodError(parsed.error);
    }

    const seen = new Set<number>();
    const duplicates = new Set<number>();
    for (const record of parsed.data.travel_spots) {
      if (seen.has(record.id)) {
        duplicates.add(record.id);
      }
      seen.add(record.id);
    }
    if (duplicates.size > 0) {
      const ids = [...duplicates].join(', ');
      throw new DataFormatError(`Duplicate destination id(s): ${ids}`, [`travel_spots: duplicate id(s) ${ids}`]);
    }

    this.loaded = Object.freeze(parsed.data.travel_spots.map(toDestination));
    this.logger.debug(`Loaded ${this.loaded.length} destinations`);
  }

  /**
   * Build a fresh snapshot from the loaded catalog and swap it in.
   *
   * @throws IndexStateError if `load()` has not been called
   */
  build(): void {
    if (this.loaded === null) {
      throw new IndexStateError('Data must be loaded first. Call load() before build().', 'build');
    }

    const next = IndexSnapshot.fromDestinations(this.loaded, this.generationCounter + 1);
    this.generationCounter = next.generation;
    this.snapshot = next;

    this.logger.debug(
      `Built index generation ${next.generation}: ${next.totalDestinations} destinations, ` +
        `${next.termIndex.size} terms, ${next.moodIndex.size} moods`
    );
  }

  /**
   * Whether a catalog has been loaded.
   */
  get isLoaded(): boolean {
    return this.loaded !== null;
  }

  /**
   * Whether at least one build has completed.
   */
  get isBuilt(): boolean {
    return this.snapshot !== null;
  }

  /**
   * Build counter; increments on every `build()`.
   */
  get generation(): number {
    return this.generationCounter;
  }

  /**
   * Number of destinations in the current build.
   */
  get size(): number {
    return this.current('size').totalDestinations;
  }

  // ==========================================================================
  // Lookups
  // ==========================================================================

  /**
   * The current snapshot. Callers that run several lookups for one query
   * should hold on to this so a concurrent rebuild cannot split their view.
   *
   * @throws IndexStateError before the first build
   */
  currentSnapshot(): IndexSnapshot {
    return this.current('currentSnapshot');
  }

  /**
   * Destination by id, or undefined when absent.
   */
  getById(id: number): Destination | undefined {
    return this.current('getById').metadata.get(id);
  }

  /**
   * Ids of destinations tagged with a mood (case-insensitive exact match).
   */
  getByMood(mood: string): ReadonlySet<number> {
    return this.current('getByMood').moodIndex.get(mood.toLowerCase()) ?? EMPTY_SET;
  }

  /**
   * Ids of destinations whose name or description contains the term.
   */
  getByTerm(term: string): ReadonlySet<number> {
    return this.current('getByTerm').termIndex.get(term.toLowerCase()) ?? EMPTY_SET;
  }

  /**
   * Number of destinations containing the term.
   */
  documentFrequency(term: string): number {
    return this.current('documentFrequency').documentFrequencies.get(term.toLowerCase()) ?? 0;
  }

  /**
   * Inverse document frequency of a term in the current build.
   */
  idf(term: string): number {
    return this.current('idf').idf(term);
  }

  /**
   * All indexed destinations in catalog order.
   */
  destinations(): Destination[] {
    return [...this.current('destinations').metadata.values()];
  }

  /**
   * Counts for the current build.
   */
  stats(): IndexStats {
    const snapshot = this.current('stats');
    return {
      generation: snapshot.generation,
      destinations: snapshot.totalDestinations,
      terms: snapshot.termIndex.size,
      moods: snapshot.moodIndex.size,
    };
  }

  /**
   * Sorted dump of the current build's structures.
   */
  exportContent(): IndexContent {
    const snapshot = this.current('exportContent');
    const documentFrequencies: Record<string, number> = {};
    for (const term of [...snapshot.documentFrequencies.keys()].sort()) {
      documentFrequencies[term] = snapshot.documentFrequencies.get(term) ?? 0;
    }

    return {
      totalDestinations: snapshot.totalDestinations,
      terms: sortedRecord(snapshot.termIndex),
      moods: sortedRecord(snapshot.moodIndex),
      documentFrequencies,
    };
  }

  private current(operation: string): IndexSnapshot {
    if (this.snapshot === null) {
      throw new IndexStateError(`Index has not been built. Call build() before ${operation}().`, operation);
    }
    return this.snapshot;
  }
}
