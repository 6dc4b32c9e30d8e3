/**
 * Constraint Record Schema
 *
 * Structured output of query parsing. Every field defaults to
 * "unconstrained": optional numbers are absent and lists are empty.
 *
 * @module schemas/constraints
 */

import { z } from 'zod';

export const ConstraintRecordSchema = z
  .object({
    /** Lower budget bound; only set by range queries */
    budgetMin: z.number().int().nonnegative().optional(),
    /** Budget ceiling */
    budgetMax: z.number().int().nonnegative().optional(),
    /** Requested mood categories (set semantics) */
    moods: z.array(z.string()).default([]),
    durationDays: z.number().int().nonnegative().optional(),
    distanceKm: z.number().int().nonnegative().optional(),
    /** Canonical destination name resolved from an alias */
    placeName: z.string().optional(),
    /** Preferred travel months, lower-case, calendar order */
    bestMonths: z.array(z.string()).default([]),
    /** Free-text terms left after stop-word removal */
    searchTerms: z.array(z.string()).default([]),
  })
  .refine(
    (record) =>
      record.budgetMin === undefined ||
      record.budgetMax === undefined ||
      record.budgetMin <= record.budgetMax,
    { message: 'budgetMin must not exceed budgetMax', path: ['budgetMin'] }
  );

export type ConstraintRecord = z.infer<typeof ConstraintRecordSchema>;

/**
 * A record with every field unconstrained.
 */
export function createEmptyConstraints(): ConstraintRecord {
  return {
    moods: [],
    bestMonths: [],
    searchTerms: [],
  };
}

/**
 * True when the record constrains nothing at all.
 */
export function isUnconstrained(record: ConstraintRecord): boolean {
  return (
    record.budgetMin === undefined &&
    record.budgetMax === undefined &&
    record.durationDays === undefined &&
    record.distanceKm === undefined &&
    record.placeName === undefined &&
    record.moods.length === 0 &&
    record.bestMonths.length === 0 &&
    record.searchTerms.length === 0
  );
}
