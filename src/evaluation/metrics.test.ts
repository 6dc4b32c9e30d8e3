/**
 * Tests for Offline Evaluation
 */

import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  computeMetrics,
  evaluate,
  evaluateQuery,
  isRelevant,
  loadEvaluationQueries,
  type JudgedDestination,
} from './metrics.js';
import { DataFormatError } from '../errors/index.js';
import { Recommender } from '../recommender/recommender.js';
import type { DestinationRecord } from '../schemas/destination.js';

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
      mood: ['adventure', 'nature'],
      budget_min: 4000,
      budget_max: 9000,
      duration_days: 5,
      distance_km: 550,
      rating: 4.6,
      best_months: ['march', 'april', 'may', 'june'],
      description: 'Snow peaks, river rafting and paragliding.',
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
      best_months: ['october', 'november', 'february'],
      description: 'Ancient ghats on the Ganges with evening aarti.',
    },
    {
      id: 4,
      name: 'Jaipur City Tour',
      mood: ['cultural', 'history'],
      budget_min: 3000,
      budget_max: 7000,
      duration_days: 3,
      distance_km: 270,
      rating: 4.3,
      best_months: ['november', 'december', 'january', 'february'],
      description: 'Forts, palaces and bazaars of the pink city.',
    },
  ];
}

function createMockDestination(overrides: Partial<JudgedDestination> = {}): JudgedDestination {
  return {
    id: 1,
    name: 'Test Place',
    moods: ['Nature'],
    description: 'Quiet mountain lake.',
    budgetMin: 2000,
    ...overrides,
  };
}

describe('isRelevant', () => {
  it('matches keywords in name, description or moods', () => {
    const place = createMockDestination();
    expect(isRelevant(place, { query: 'lakes', type: 'keyword', term: 'lake' })).toBe(true);
    expect(isRelevant(place, { query: 'nature', type: 'keyword', term: 'nature' })).toBe(true);
    expect(isRelevant(place, { query: 'beach', type: 'keyword', term: 'beach' })).toBe(false);
  });

  it('treats mountain and hill as synonyms', () => {
    const hill = createMockDestination({ name: 'Ooty Hill Station', description: 'Tea gardens.' });
    expect(isRelevant(hill, { query: 'mountains', type: 'keyword', term: 'mountain' })).toBe(true);
    expect(isRelevant(createMockDestination(), { query: 'hills', type: 'keyword', term: 'hill' })).toBe(true);
  });

  it('compares moods case-insensitively', () => {
    expect(isRelevant(createMockDestination(), { query: 'nature', type: 'mood', term: 'nature' })).toBe(true);
  });

  it('applies budget, name and mixed rules', () => {
    const place = createMockDestination();
    expect(isRelevant(place, { query: 'budget 2000', type: 'budget', max: 2000 })).toBe(true);
    expect(isRelevant(place, { query: 'budget 1000', type: 'budget', max: 1000 })).toBe(false);
    expect(isRelevant(place, { query: 'test', type: 'name', term: 'test' })).toBe(true);
    expect(isRelevant(place, { query: 'x', type: 'mixed', mood: 'nature', budget: 1000 })).toBe(false);
    expect(isRelevant(place, { query: 'x', type: 'mixed', mood: 'nature', budget: 3000 })).toBe(true);
  });
});

describe('computeMetrics', () => {
  it('computes precision, recall and F1', () => {
    const metrics = computeMetrics([1, 2, 3, 4], new Set([2, 9]));
    expect(metrics.precision).toBe(0.25);
    expect(metrics.recall).toBe(0.5);
    expect(metrics.f1).toBeCloseTo(1 / 3, 10);
  });

  it('is all zeros when nothing is retrieved', () => {
    expect(computeMetrics([], new Set([1]))).toEqual({ precision: 0, recall: 0, f1: 0 });
  });
});

describe('evaluate', () => {
  const recommender = new Recommender({ travel_spots: createRecords() });

  it('scores a perfect single-answer query', () => {
    expect(evaluateQuery(recommender, { query: 'beaches', type: 'keyword', term: 'beach' }, 5)).toEqual({
      query: 'beaches',
      retrieved: [1],
      relevant: [1],
      precision: 1,
      recall: 1,
      f1: 1,
    });
  });

  it('limits retrieval to k', () => {
    const metrics = evaluateQuery(recommender, { query: 'cultural', type: 'mood', term: 'cultural' }, 1);

    expect(metrics.retrieved).toEqual([3]);
    expect(metrics.relevant).toEqual([3, 4]);
    expect(metrics.recall).toBe(0.5);
    expect(metrics.f1).toBeCloseTo(2 / 3, 10);
  });

  it('macro-averages over queries', () => {
    const report = evaluate(
      recommender,
      [
        { query: 'budget 5000', type: 'mixed', mood: 'adventure', budget: 5000 },
        { query: 'goa', type: 'name', term: 'goa' },
      ],
      5
    );

    expect(report.results[0].retrieved).toEqual([3, 1, 2, 4]);
    expect(report.results[0].precision).toBe(0.25);
    expect(report.results[1].retrieved).toEqual([1]);
    expect(report.averages.precision).toBe(0.625);
    expect(report.averages.recall).toBe(1);
    expect(report.averages.f1).toBeCloseTo(0.7, 10);
  });

  it('rejects k below 1', () => {
    expect(() => evaluate(recommender, [], 0)).toThrow(RangeError);
  });
});

describe('loadEvaluationQueries', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'evaluation-test-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('loads and normalises queries', async () => {
    const filePath = path.join(tempDir, 'queries.json');
    await fs.writeFile(
      filePath,
      JSON.stringify({ queries: [{ query: 'Temples', type: 'keyword', term: 'Temple' }] })
    );

    expect(await loadEvaluationQueries(filePath)).toEqual([
      { query: 'Temples', type: 'keyword', term: 'temple' },
    ]);
  });

  it('rejects an unknown rule type', async () => {
    const filePath = path.join(tempDir, 'bad.json');
    await fs.writeFile(filePath, JSON.stringify({ queries: [{ query: 'x', type: 'vibes' }] }));

    await expect(loadEvaluationQueries(filePath)).rejects.toThrow(DataFormatError);
  });

  it('loads the bundled query set', async () => {
    const queries = await loadEvaluationQueries(path.resolve(__dirname, '..', '..', 'data', 'evaluation-queries.json'));
    expect(queries.length).toBeGreaterThan(0);
  });
});
