/**
 * Atomic File Operations for Storage Layer
 *
 * Provides atomic write operations using temp file + rename pattern,
 * plus complementary read operations.
 *
 * @module storage/atomic
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { DataFormatError } from '../errors/index.js';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Write JSON atomically: write a temp file beside the target, then rename it
 * over the target. Readers see either the old file or the new one.
 *
 * @param filePath - Destination path
 * @param data - Value to serialise (2-space indentation)
 * @throws Error naming the file if the write or rename fails
 *
 * @example
 * ```typescript
 * await atomicWriteJson('/path/to/travel_spots.json', { travel_spots: [] });
 * ```
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  const tempPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;
  const json = JSON.stringify(data, null, 2);

  let tempWritten = false;
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, json, 'utf-8');
    tempWritten = true;
    await fs.rename(tempPath, filePath);
  } catch (error) {
    if (tempWritten) {
      await fs.rm(tempPath, { force: true });
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Atomic write failed for ${filePath}: ${message}`, { cause: error });
  }
}

/**
 * Read and parse a JSON file.
 *
 * @param filePath - Path to the JSON file
 * @returns Parsed JSON data, unvalidated
 * @throws DataFormatError if the file doesn't exist or the JSON is invalid
 */
export async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new DataFormatError(`File not found: ${filePath}`, [], filePath);
    }
    throw error;
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DataFormatError(`Invalid JSON in file: ${filePath}`, [reason], filePath);
  }
}
