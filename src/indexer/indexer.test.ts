/**
 * Tests for the Destination Indexer
 *
 * Covers catalog validation, index construction, lookups, IDF and the
 * rebuild/snapshot contract.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { DestinationIndexer } from './indexer.js';
import { tokenize, uniqueTerms } from './tokenize.js';
import { DataFormatError, IndexStateError } from '../errors/index.js';
import type { DestinationRecord } from '../schemas/destination.js';

// ============================================================================
// Fixtures
// ============================================================================

function createRecords(): DestinationRecord[] {
  return [
    {
      id: 1,
      name: 'Goa Beach',
      mood: ['relaxing', 'party'],
      budget_min: 2500,
      budget_max: 6000,
      duration_days: 4,
      distance_km: 600,
      rating: 4.5,
      best_months: ['november', 'december', 'january'],
      description: 'Golden sand beaches with shacks and vibrant nightlife.',
    },
    {
      id: 2,
      name: 'Manali Hill Station',
      mood: ['Adventure', 'nature'],
      budget_min: 4000,
      budget_max: 9000,
      duration_days: 5,
      distance_km: 550,
      rating: 4.6,
      best_months: ['march', 'april', 'may', 'june'],
      description: 'Snow peaks, snow trails, river rafting and paragliding in the hills.',
    },
    {
      id: 3,
      name: 'Varanasi Spiritual',
      mood: ['spiritual', 'cultural', 'history'],
      budget_min: 1500,
      budget_max: 4000,
      duration_days: 3,
      distance_km: 800,
      rating: 4.4,
      best_months: [],
      description: 'Ancient ghats on the Ganges with evening aarti.',
    },
  ];
}

function createIndexer(records: DestinationRecord[] = createRecords()): DestinationIndexer {
  const indexer = new DestinationIndexer();
  indexer.load({ travel_spots: records });
  indexer.build();
  return indexer;
}

// ============================================================================
// Tokenizer
// ============================================================================

describe('tokenize', () => {
  it('strips punctuation, lower-cases and drops short tokens', () => {
    expect(tokenize("Goa's Beach, Sun & Sand!")).toEqual(['goas', 'beach', 'sun', 'sand']);
  });

  it('keeps alphanumeric tokens longer than two characters', () => {
    expect(tokenize('A hill at 2000m')).toEqual(['hill', '2000m']);
  });

  it('returns an empty list for blank text', () => {
    expect(tokenize('   ')).toEqual([]);
  });

  it('deduplicates in first-seen order', () => {
    expect(uniqueTerms('snow peaks snow trails')).toEqual(['snow', 'peaks', 'trails']);
  });
});

// ============================================================================
// load()
// ============================================================================

describe('DestinationIndexer.load', () => {
  let indexer: DestinationIndexer;

  beforeEach(() => {
    indexer = new DestinationIndexer();
  });

  it('rejects a top-level list', () => {
    expect(() => indexer.load(createRecords())).toThrow(DataFormatError);
  });

  it('rejects a record without travel_spots', () => {
    expect(() => indexer.load({ spots: createRecords() })).toThrow(DataFormatError);
  });

  it('rejects travel_spots that is not a list', () => {
    expect(() => indexer.load({ travel_spots: { id: 1 } })).toThrow(DataFormatError);
  });

  it('rejects a destination with a missing field and names the field', () => {
    const [first, ...rest] = createRecords();
    const { name: _name, ...withoutName } = first;

    try {
      indexer.load({ travel_spots: [withoutName, ...rest] });
      throw new Error('expected load to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(DataFormatError);
      if (error instanceof DataFormatError) {
        expect(error.issues).toEqual(['travel_spots.0.name: Required']);
      }
    }
  });

  it('rejects budget_min greater than budget_max', () => {
    const records = createRecords();
    records[0] = { ...records[0], budget_min: 7000, budget_max: 6000 };
    expect(() => indexer.load({ travel_spots: records })).toThrow(DataFormatError);
  });

  it('rejects a rating outside 0-5', () => {
    const records = createRecords();
    records[1] = { ...records[1], rating: 5.5 };
    expect(() => indexer.load({ travel_spots: records })).toThrow(DataFormatError);
  });

  it('rejects duplicate ids', () => {
    const records = createRecords();
    records[2] = { ...records[2], id: 1 };
    expect(() => indexer.load({ travel_spots: records })).toThrow('Duplicate destination id(s): 1');
  });

  it('defaults best_months to an empty list', () => {
    const { best_months: _months, ...withoutMonths } = createRecords()[0];
    indexer.load({ travel_spots: [withoutMonths] });
    indexer.build();
    expect(indexer.getById(1)?.bestMonths).toEqual([]);
  });

  it('accepts an empty catalog', () => {
    indexer.load({ travel_spots: [] });
    indexer.build();
    expect(indexer.size).toBe(0);
  });
});

// ============================================================================
// build() and lookups
// ============================================================================

describe('DestinationIndexer.build', () => {
  it('throws IndexStateError when called before load', () => {
    const indexer = new DestinationIndexer();
    expect(() => indexer.build()).toThrow(IndexStateError);
  });

  it('throws IndexStateError on reads before the first build', () => {
    const indexer = new DestinationIndexer();
    indexer.load({ travel_spots: createRecords() });
    expect(() => indexer.getById(1)).toThrow(IndexStateError);
    expect(() => indexer.idf('beach')).toThrow(IndexStateError);
  });

  it('stores metadata by id', () => {
    const indexer = createIndexer();
    const goa = indexer.getById(1);

    expect(goa?.name).toBe('Goa Beach');
    expect(goa?.budgetMin).toBe(2500);
    expect(goa?.bestMonths).toEqual(['november', 'december', 'january']);
  });

  it('returns undefined for an unknown id', () => {
    expect(createIndexer().getById(99)).toBeUndefined();
  });

  it('indexes moods case-insensitively', () => {
    const indexer = createIndexer();

    expect([...indexer.getByMood('adventure')]).toEqual([2]);
    expect([...indexer.getByMood('ADVENTURE')]).toEqual([2]);
    expect(indexer.getByMood('romantic').size).toBe(0);
  });

  it('indexes name and description terms', () => {
    const indexer = createIndexer();

    expect([...indexer.getByTerm('beach')]).toEqual([1]);
    expect([...indexer.getByTerm('with')].sort()).toEqual([1, 3]);
    expect(indexer.getByTerm('on').size).toBe(0);
  });

  it('counts a repeated term once per destination', () => {
    const indexer = createIndexer();
    expect(indexer.documentFrequency('snow')).toBe(1);
    expect(indexer.documentFrequency('the')).toBe(2);
  });

  it('reports stats for the current build', () => {
    const indexer = createIndexer();
    const stats = indexer.stats();

    expect(stats.generation).toBe(1);
    expect(stats.destinations).toBe(3);
    expect(stats.moods).toBe(7);
  });

  it('lists destinations in catalog order', () => {
    expect(createIndexer().destinations().map((d) => d.id)).toEqual([1, 2, 3]);
  });
});

// ============================================================================
// IDF
// ============================================================================

describe('DestinationIndexer.idf', () => {
  it('computes ln(N / df)', () => {
    const indexer = createIndexer();

    expect(indexer.idf('beach')).toBeCloseTo(Math.log(3), 10);
    expect(indexer.idf('with')).toBeCloseTo(Math.log(3 / 2), 10);
  });

  it('is case-insensitive', () => {
    const indexer = createIndexer();
    expect(indexer.idf('BEACH')).toBe(indexer.idf('beach'));
  });

  it('returns 0 for unseen terms', () => {
    expect(createIndexer().idf('desert')).toBe(0);
  });

  it('returns 0 for an empty catalog', () => {
    expect(createIndexer([]).idf('beach')).toBe(0);
  });

  it('memoises per build', () => {
    const indexer = createIndexer();
    indexer.idf('beach');
    indexer.idf('beach');
    expect(indexer.currentSnapshot().memoizedTerms).toBe(1);
  });

  it('never serves a value from the previous build', () => {
    const indexer = createIndexer();
    expect(indexer.idf('beach')).toBeCloseTo(Math.log(3), 10);

    const gokarna: DestinationRecord = {
      id: 4,
      name: 'Gokarna Beach',
      mood: ['relaxing'],
      budget_min: 2000,
      budget_max: 4000,
      duration_days: 3,
      distance_km: 500,
      rating: 4.3,
      best_months: [],
      description: 'Quiet coves and temple town.',
    };
    indexer.load({ travel_spots: [...createRecords(), gokarna] });
    indexer.build();

    expect(indexer.idf('beach')).toBeCloseTo(Math.log(4 / 2), 10);
  });
});

// ============================================================================
// Rebuild contract
// ============================================================================

describe('rebuild', () => {
  it('produces equal content when rebuilt with the same catalog', () => {
    const indexer = createIndexer();
    const before = indexer.exportContent();
    const idfBefore = indexer.idf('ganges');

    indexer.build();

    expect(indexer.exportContent()).toEqual(before);
    expect(indexer.idf('ganges')).toBe(idfBefore);
    expect(indexer.generation).toBe(2);
  });

  it('keeps serving the previous build between load and build', () => {
    const indexer = createIndexer();
    indexer.load({ travel_spots: createRecords().slice(0, 1) });

    expect(indexer.size).toBe(3);
    indexer.build();
    expect(indexer.size).toBe(1);
  });

  it('leaves a held snapshot untouched by a later rebuild', () => {
    const indexer = createIndexer();
    const held = indexer.currentSnapshot();

    indexer.load({ travel_spots: createRecords().slice(0, 2) });
    indexer.build();

    expect(held.totalDestinations).toBe(3);
    expect(held.metadata.has(3)).toBe(true);
    expect(indexer.getById(3)).toBeUndefined();
  });
});
