/**
 * Indexer Module Exports
 *
 * @module indexer
 */

export {
  DestinationIndexer,
  IndexSnapshot,
  type IndexStats,
  type IndexContent,
} from './indexer.js';

export { tokenize, uniqueTerms, MIN_TOKEN_LENGTH_EXCLUSIVE } from './tokenize.js';
