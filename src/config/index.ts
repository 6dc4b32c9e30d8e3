/**
 * Configuration Module
 *
 * Loads and validates environment variables for spotfinder.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';

/**
 * Environment schema with optional values and defaults.
 */
export const envSchema = z.object({
  // Data directory holding travel_spots.json
  SPOTFINDER_DATA_DIR: z.string().optional(),

  // Explicit catalog file (overrides the data directory)
  SPOTFINDER_CATALOG_PATH: z.string().optional(),

  // Log verbosity for library logging
  SPOTFINDER_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // Query keyword matching: anywhere in the text, or whole words only
  SPOTFINDER_KEYWORD_MATCH: z.enum(['substring', 'word']).default('substring'),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Derive the application configuration from a validated environment.
 */
export function buildConfig(env: Env) {
  return {
    // Environment
    nodeEnv: env.NODE_ENV,
    isProduction: env.NODE_ENV === 'production',
    isDevelopment: env.NODE_ENV === 'development',
    isTest: env.NODE_ENV === 'test',

    // Logging
    logLevel: env.SPOTFINDER_LOG_LEVEL,

    // Query parsing
    keywordMatch: env.SPOTFINDER_KEYWORD_MATCH,
  } as const;
}

// Parse environment
const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment variables:');
  console.error(parseResult.error.format());
  process.exit(1);
}

/**
 * Application configuration singleton
 */
export const config = buildConfig(parseResult.data);

export type Config = ReturnType<typeof buildConfig>;

// Re-export scoring configuration
export * from './scoring.js';
