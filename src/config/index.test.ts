/**
 * Tests for configuration module
 *
 * @module config/index.test
 */

import { describe, it, expect } from '@jest/globals';
import { ZodError } from 'zod';
import {
  buildConfig,
  config,
  envSchema,
  DEFAULT_SCORING_CONFIG,
  ScoringConfigSchema,
  resolveScoringConfig,
} from './index.js';

describe('envSchema', () => {
  it('applies defaults', () => {
    expect(envSchema.parse({})).toEqual({
      SPOTFINDER_LOG_LEVEL: 'info',
      SPOTFINDER_KEYWORD_MATCH: 'substring',
      NODE_ENV: 'development',
    });
  });

  it('keeps path overrides', () => {
    const env = envSchema.parse({ SPOTFINDER_DATA_DIR: '/srv/spots', SPOTFINDER_CATALOG_PATH: '/srv/x.json' });
    expect(env.SPOTFINDER_DATA_DIR).toBe('/srv/spots');
    expect(env.SPOTFINDER_CATALOG_PATH).toBe('/srv/x.json');
  });

  it('rejects an unknown log level', () => {
    expect(envSchema.safeParse({ SPOTFINDER_LOG_LEVEL: 'loud' }).success).toBe(false);
  });

  it('accepts only known keyword match modes', () => {
    expect(envSchema.parse({ SPOTFINDER_KEYWORD_MATCH: 'word' }).SPOTFINDER_KEYWORD_MATCH).toBe('word');
    expect(envSchema.safeParse({ SPOTFINDER_KEYWORD_MATCH: 'fuzzy' }).success).toBe(false);
  });

  it('ignores unrelated variables', () => {
    expect(envSchema.parse({ HOME: '/root', NODE_ENV: 'test' })).toEqual({
      SPOTFINDER_LOG_LEVEL: 'info',
      SPOTFINDER_KEYWORD_MATCH: 'substring',
      NODE_ENV: 'test',
    });
  });
});

describe('buildConfig', () => {
  it('derives environment flags', () => {
    const built = buildConfig({
      SPOTFINDER_LOG_LEVEL: 'debug',
      SPOTFINDER_KEYWORD_MATCH: 'word',
      NODE_ENV: 'production',
    });

    expect(built).toEqual({
      nodeEnv: 'production',
      isProduction: true,
      isDevelopment: false,
      isTest: false,
      logLevel: 'debug',
      keywordMatch: 'word',
    });
  });

  it('loads the singleton under the test environment', () => {
    expect(config.isTest).toBe(true);
  });
});

describe('scoring configuration', () => {
  it('ships valid defaults whose weights sum to 1', () => {
    expect(() => ScoringConfigSchema.parse(DEFAULT_SCORING_CONFIG)).not.toThrow();
    const sum = Object.values(DEFAULT_SCORING_CONFIG.weights).reduce((total, weight) => total + weight, 0);
    expect(sum).toBeCloseTo(1, 10);
  });

  it('defaults to rejecting over-budget destinations', () => {
    expect(DEFAULT_SCORING_CONFIG.budget.overrunPolicy).toBe('reject');
  });

  it('merges nested overrides one level deep', () => {
    const resolved = resolveScoringConfig({ relevanceThreshold: 0.3, budget: { overrunPolicy: 'graduated' } });

    expect(resolved.relevanceThreshold).toBe(0.3);
    expect(resolved.budget.overrunPolicy).toBe('graduated');
    expect(resolved.budget.deficitTiers).toEqual(DEFAULT_SCORING_CONFIG.budget.deficitTiers);
    expect(resolved.weights).toEqual(DEFAULT_SCORING_CONFIG.weights);
  });

  it('rejects weights that do not sum to 1', () => {
    expect(() => resolveScoringConfig({ weights: { budget: 0.9 } })).toThrow(ZodError);
  });

  it('replaces category tiers wholesale', () => {
    const resolved = resolveScoringConfig({ categoryTiers: [{ keywords: ['fort'], score: 0.8 }] });
    expect(resolved.categoryTiers).toEqual([{ keywords: ['fort'], score: 0.8 }]);
  });
});
