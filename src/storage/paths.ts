/**
 * Path Resolution Utilities
 *
 * Directory Structure:
 * ```
 * data/                         # Default data directory (bundled)
 * ├── travel_spots.json         # Destination catalog
 * └── evaluation-queries.json   # Labelled queries for `spotfinder evaluate`
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';

/**
 * File name of the destination catalog inside the data directory.
 */
export const CATALOG_FILE_NAME = 'travel_spots.json';

/**
 * File name of the labelled evaluation queries inside the data directory.
 */
export const EVALUATION_QUERIES_FILE_NAME = 'evaluation-queries.json';

function expandHome(dir: string): string {
  if (dir.startsWith('~')) {
    return path.join(os.homedir(), dir.slice(1));
  }
  return path.resolve(dir);
}

/**
 * Gets the root data directory for the application.
 *
 * Uses the `SPOTFINDER_DATA_DIR` environment variable if set,
 * otherwise the `data/` directory shipped with the package.
 *
 * @returns Absolute path to the data directory
 * @example
 * ```typescript
 * process.env.SPOTFINDER_DATA_DIR = '~/spots';
 * getDataDir(); // '/home/me/spots'
 * ```
 */
export function getDataDir(): string {
  const envDir = process.env.SPOTFINDER_DATA_DIR;

  if (envDir) {
    return expandHome(envDir);
  }

  // src/storage or dist/storage -> package root
  return path.resolve(__dirname, '..', '..', 'data');
}

/**
 * Gets the catalog file path.
 *
 * `SPOTFINDER_CATALOG_PATH` wins over the data directory.
 */
export function getCatalogPath(): string {
  const envPath = process.env.SPOTFINDER_CATALOG_PATH;
  if (envPath) {
    return expandHome(envPath);
  }
  return path.join(getDataDir(), CATALOG_FILE_NAME);
}

/**
 * Gets the labelled evaluation queries file path.
 */
export function getEvaluationQueriesPath(): string {
  return path.join(getDataDir(), EVALUATION_QUERIES_FILE_NAME);
}
