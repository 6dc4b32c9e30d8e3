/**
 * Storage Layer
 *
 * File-based persistence for the destination catalog.
 * All write operations use atomic temp file + rename pattern.
 *
 * @module storage
 */

// Path utilities
export {
  CATALOG_FILE_NAME,
  EVALUATION_QUERIES_FILE_NAME,
  getDataDir,
  getCatalogPath,
  getEvaluationQueriesPath,
} from './paths.js';

// Atomic operations
export { atomicWriteJson, readJson } from './atomic.js';

// Catalog operations
export {
  readCatalog,
  writeCatalog,
  addDestination,
  removeDestination,
  nextDestinationId,
} from './catalog.js';
