/**
 * Tests for the Constraint Extractor
 */

import { describe, it, expect } from '@jest/globals';
import {
  extractConstraints,
  extractSearchTerms,
  extractMoods,
  extractMonths,
  applyFirstMatch,
  BUDGET_RULES,
  DURATION_RULES,
  DISTANCE_RULES,
} from './extractor.js';
import { findTypeGroup, termVariants } from './vocabulary.js';
import { isUnconstrained } from '../schemas/constraints.js';

describe('extractConstraints', () => {
  it('parses budget, mood, duration and distance from one query', () => {
    expect(extractConstraints('Budget 5000, want adventure for 4 days within 1000km')).toEqual({
      searchTerms: ['adventure'],
      budgetMax: 5000,
      moods: ['adventure'],
      bestMonths: [],
      durationDays: 4,
      distanceKm: 1000,
    });
  });

  it('returns an unconstrained record for an empty query', () => {
    const record = extractConstraints('');
    expect(record).toEqual({ moods: [], bestMonths: [], searchTerms: [] });
    expect(isUnconstrained(record)).toBe(true);
  });

  it('is deterministic', () => {
    const query = 'cheap beaches in goa for 3 days in winter';
    expect(extractConstraints(query)).toEqual(extractConstraints(query));
  });

  it('throws TypeError for non-string input', () => {
    expect(() => extractConstraints(42)).toThrow(TypeError);
    expect(() => extractConstraints(42)).toThrow('Query must be a string, received number');
    expect(() => extractConstraints(null)).toThrow('Query must be a string, received null');
  });

  it('ignores case and surrounding whitespace', () => {
    expect(extractConstraints('  GOA  ')).toEqual(extractConstraints('goa'));
  });
});

// ============================================================================
// Budget
// ============================================================================

describe('budget rules', () => {
  it('maps affordability keywords to a 3500 ceiling', () => {
    const record = extractConstraints('cheap beaches');
    expect(record.budgetMax).toBe(3500);
    expect(record.budgetMin).toBeUndefined();
  });

  it('orders a reversed dash range', () => {
    const record = extractConstraints('2000-1000 hills');
    expect(record.budgetMin).toBe(1000);
    expect(record.budgetMax).toBe(2000);
  });

  it('reads "between X and Y"', () => {
    const record = extractConstraints('between 1000 and 2000');
    expect(record.budgetMin).toBe(1000);
    expect(record.budgetMax).toBe(2000);
  });

  it('reads an amount followed by a currency word', () => {
    expect(extractConstraints('I have 5000 rupees').budgetMax).toBe(5000);
  });

  it('reads a currency symbol prefix', () => {
    expect(extractConstraints('₹2500 please').budgetMax).toBe(2500);
  });

  it('reads a ceiling phrase', () => {
    expect(extractConstraints('under 10000').budgetMax).toBe(10000);
  });

  it('never reads a distance as a budget', () => {
    const record = extractConstraints('within 1000 km');
    expect(record.budgetMax).toBeUndefined();
    expect(record.distanceKm).toBe(1000);
    expect(record.searchTerms).toEqual([]);
  });

  it('never reads a day range as a budget', () => {
    const record = extractConstraints('3 to 5 days in manali');
    expect(record.budgetMin).toBeUndefined();
    expect(record.budgetMax).toBeUndefined();
    expect(record.durationDays).toBe(5);
    expect(record.placeName).toBe('Manali Hill Station');
  });

  it('reads any bare numeral as a ceiling', () => {
    const record = extractConstraints('top 10 beaches');
    expect(record.budgetMax).toBe(10);
    expect(record.durationDays).toBeUndefined();
  });

  it('prefers a labelled amount over an earlier bare numeral', () => {
    expect(applyFirstMatch(BUDGET_RULES, '2 people budget 8000')).toEqual({
      rule: 'labelled-amount',
      fields: { budgetMax: 8000 },
    });
  });

  it('evaluates rules in a fixed order', () => {
    expect(BUDGET_RULES.map((rule) => rule.name)).toEqual([
      'range-dash',
      'range-to',
      'range-between',
      'labelled-amount',
      'amount-currency',
      'ceiling-amount',
      'bare-amount',
      'affordable-keyword',
    ]);
  });

  it('lets a numeric budget win over an affordability keyword', () => {
    const match = applyFirstMatch(BUDGET_RULES, 'budget 8000');
    expect(match).toEqual({ rule: 'labelled-amount', fields: { budgetMax: 8000 } });
  });
});

// ============================================================================
// Place, mood and months
// ============================================================================

describe('place rules', () => {
  it('uses alias-table order, not query order', () => {
    expect(extractConstraints('kerala or goa').placeName).toBe('Goa Beach');
  });

  it('maps several aliases to one place', () => {
    expect(extractConstraints('backwaters near kochi').placeName).toBe('Kerala Backwaters');
  });

  it('finds an alias anywhere in the text', () => {
    expect(extractConstraints('lehenga shopping').placeName).toBe('Leh Ladakh Mountain');
  });

  it('matches whole words only in word mode', () => {
    expect(extractConstraints('lehenga shopping', { keywordMatch: 'word' }).placeName).toBeUndefined();
    expect(extractConstraints('trek in leh', { keywordMatch: 'word' }).placeName).toBe('Leh Ladakh Mountain');
  });
});

describe('extractMoods', () => {
  it('lists moods in mood-table order', () => {
    expect(extractMoods('romantic snow trek')).toEqual(['adventure', 'nature', 'romantic']);
  });

  it('matches keywords anywhere in the text', () => {
    expect(extractMoods('beach party')).toEqual(['relaxing', 'party', 'cultural']);
    expect(extractConstraints('party').moods).toEqual(['party', 'cultural']);
  });

  it('matches keywords at the start of a word only in word mode', () => {
    expect(extractMoods('beach party', 'word')).toEqual(['relaxing', 'party']);
    expect(extractConstraints('party', { keywordMatch: 'word' }).moods).toEqual(['party']);
  });

  it('returns an empty list when nothing matches', () => {
    expect(extractMoods('somewhere new')).toEqual([]);
  });
});

describe('extractMonths', () => {
  it('expands a season in calendar order', () => {
    expect(extractMonths('winter trip')).toEqual(['january', 'february', 'december']);
  });

  it('deduplicates overlapping seasons', () => {
    expect(extractMonths('monsoon or summer')).toEqual([
      'march',
      'april',
      'may',
      'june',
      'july',
      'august',
      'september',
    ]);
  });

  it('combines named months with seasons', () => {
    expect(extractMonths('october or winter')).toEqual([
      'january',
      'february',
      'october',
      'december',
    ]);
  });
});

// ============================================================================
// Duration and distance
// ============================================================================

describe('duration and distance rules', () => {
  it('prefers a day suffix', () => {
    expect(applyFirstMatch(DURATION_RULES, 'for 4 days')).toEqual({
      rule: 'days-suffix',
      fields: { durationDays: 4 },
    });
  });

  it('falls back to "duration: N"', () => {
    expect(applyFirstMatch(DURATION_RULES, 'duration: 6')).toEqual({
      rule: 'for-duration',
      fields: { durationDays: 6 },
    });
  });

  it('reads a bare kilometre figure', () => {
    expect(applyFirstMatch(DISTANCE_RULES, '300 kms away')).toEqual({
      rule: 'km',
      fields: { distanceKm: 300 },
    });
  });
});

// ============================================================================
// Search terms and vocabulary helpers
// ============================================================================

describe('extractSearchTerms', () => {
  it('strips punctuation and deduplicates', () => {
    expect(extractSearchTerms('beaches, beaches & hills!')).toEqual(['beaches', 'hills']);
  });

  it('drops stop words, calendar words and numerals', () => {
    expect(extractSearchTerms('i want a trip in winter under 5000 near 200km')).toEqual([]);
  });
});

describe('vocabulary helpers', () => {
  it('derives singular variants', () => {
    expect(termVariants('beaches')).toEqual(['beaches', 'beache', 'beach']);
    expect(termVariants('gas')).toEqual(['gas']);
  });

  it('resolves type keywords to their group', () => {
    expect(findTypeGroup('hills')).toBe('mountain');
    expect(findTypeGroup('beaches')).toBe('beach');
    expect(findTypeGroup('culture')).toBeUndefined();
  });
});
