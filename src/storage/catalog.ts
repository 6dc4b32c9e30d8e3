/**
 * Catalog Storage
 *
 * Reads and writes the destination catalog file. Every write validates the
 * whole catalog first and goes through `atomicWriteJson`.
 *
 * @module storage/catalog
 */

import {
  CatalogSchema,
  NewDestinationSchema,
  type Catalog,
  type DestinationRecord,
  type NewDestination,
} from '../schemas/destination.js';
import { DataFormatError, DestinationNotFoundError } from '../errors/index.js';
import { atomicWriteJson, readJson } from './atomic.js';

/**
 * Load and validate a catalog file.
 *
 * @param filePath - Path to the catalog JSON
 * @returns The validated catalog
 * @throws DataFormatError for a missing file, malformed JSON or schema failures
 */
export async function readCatalog(filePath: string): Promise<Catalog> {
  const data = await readJson(filePath);
  const parsed = CatalogSchema.safeParse(data);
  if (!parsed.success) {
    throw DataFormatError.fromZodError(parsed.error, filePath);
  }
  return parsed.data;
}

/**
 * Validate and atomically write a catalog file.
 *
 * @throws DataFormatError if the catalog is invalid; nothing is written
 */
export async function writeCatalog(filePath: string, catalog: Catalog): Promise<void> {
  const parsed = CatalogSchema.safeParse(catalog);
  if (!parsed.success) {
    throw DataFormatError.fromZodError(parsed.error, filePath);
  }
  await atomicWriteJson(filePath, parsed.data);
}

/**
 * Next free id: one more than the largest id in the catalog.
 */
export function nextDestinationId(catalog: Catalog): number {
  return catalog.travel_spots.reduce((max, record) => Math.max(max, record.id), 0) + 1;
}

/**
 * Append a destination to the catalog file.
 *
 * @param filePath - Catalog file
 * @param input - New destination fields; the id is assigned here
 * @returns The stored record
 * @throws DataFormatError if `input` is invalid or the catalog cannot be read
 */
export async function addDestination(filePath: string, input: NewDestination): Promise<DestinationRecord> {
  const parsed = NewDestinationSchema.safeParse(input);
  if (!parsed.success) {
    throw DataFormatError.fromZodError(parsed.error, undefined, 'destination');
  }

  const catalog = await readCatalog(filePath);
  const record: DestinationRecord = { id: nextDestinationId(catalog), ...parsed.data };

  await writeCatalog(filePath, { travel_spots: [...catalog.travel_spots, record] });
  return record;
}

/**
 * Remove a destination from the catalog file.
 *
 * @returns The removed record
 * @throws DestinationNotFoundError if no destination has this id
 */
export async function removeDestination(filePath: string, id: number): Promise<DestinationRecord> {
  const catalog = await readCatalog(filePath);
  const removed = catalog.travel_spots.find((record) => record.id === id);
  if (removed === undefined) {
    throw new DestinationNotFoundError(id);
  }

  await writeCatalog(filePath, {
    travel_spots: catalog.travel_spots.filter((record) => record.id !== id),
  });
  return removed;
}
