/**
 * Destination Schemas
 *
 * The catalog file stores destinations with snake_case fields (`budget_min`,
 * `best_months`, ...). Inside the code every destination is the camelCase
 * `Destination` shape; `toDestination` is the one place that translates
 * between the two.
 *
 * @module schemas/destination
 */

import { z } from 'zod';

// ============================================
// Catalog Record (on-disk shape)
// ============================================

/**
 * A single destination as written in `travel_spots.json`.
 */
export const DestinationRecordSchema = z
  .object({
    id: z.number().int(),
    name: z.string().min(1),
    mood: z.array(z.string()),
    budget_min: z.number().int().nonnegative(),
    budget_max: z.number().int().nonnegative(),
    duration_days: z.number().int().nonnegative(),
    distance_km: z.number().int().nonnegative(),
    rating: z.number().min(0).max(5),
    description: z.string(),
    best_months: z.array(z.string()).default([]),
  })
  .refine((record) => record.budget_min <= record.budget_max, {
    message: 'budget_min must be less than or equal to budget_max',
    path: ['budget_max'],
  });

export type DestinationRecord = z.infer<typeof DestinationRecordSchema>;

/**
 * Top-level catalog: a record containing the destination list.
 */
export const CatalogSchema = z.object({
  travel_spots: z.array(DestinationRecordSchema),
});

export type Catalog = z.infer<typeof CatalogSchema>;

/**
 * Fields a caller supplies when adding a destination; the id is assigned by
 * the catalog store.
 */
export const NewDestinationSchema = z
  .object({
    name: z.string().trim().min(1, 'name is required'),
    mood: z.array(z.string().trim().min(1)).min(1, 'at least one mood is required'),
    budget_min: z.number().int().nonnegative(),
    budget_max: z.number().int().nonnegative(),
    duration_days: z.number().int().nonnegative(),
    distance_km: z.number().int().nonnegative(),
    rating: z.number().min(0, 'rating must be between 0 and 5').max(5, 'rating must be between 0 and 5'),
    description: z.string().trim().min(1, 'description is required'),
    best_months: z.array(z.string().trim().toLowerCase()).default([]),
  })
  .refine((input) => input.budget_min <= input.budget_max, {
    message: 'budget_min cannot be greater than budget_max',
    path: ['budget_min'],
  });

export type NewDestination = z.input<typeof NewDestinationSchema>;

// ============================================
// Destination (in-memory shape)
// ============================================

/**
 * Immutable destination as held by the index.
 */
export interface Destination {
  readonly id: number;
  readonly name: string;
  /** Mood tags as written in the catalog */
  readonly moods: readonly string[];
  readonly budgetMin: number;
  readonly budgetMax: number;
  readonly durationDays: number;
  readonly distanceKm: number;
  /** 0-5 */
  readonly rating: number;
  /** Month names in catalog order, may be empty */
  readonly bestMonths: readonly string[];
  readonly description: string;
}

/**
 * Convert a validated catalog record into the in-memory shape.
 */
export function toDestination(record: DestinationRecord): Destination {
  return Object.freeze({
    id: record.id,
    name: record.name,
    moods: Object.freeze([...record.mood]),
    budgetMin: record.budget_min,
    budgetMax: record.budget_max,
    durationDays: record.duration_days,
    distanceKm: record.distance_km,
    rating: record.rating,
    bestMonths: Object.freeze([...record.best_months]),
    description: record.description,
  });
}
