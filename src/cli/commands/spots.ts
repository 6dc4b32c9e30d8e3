/**
 * Spots Commands
 *
 * Catalog management: list, add and remove destinations.
 * Add and remove write the catalog file atomically.
 *
 * @module cli/commands/spots
 */

import { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { formatListingTable } from '../formatters/index.js';
import { Recommender } from '../../recommender/recommender.js';
import type { DestinationListing } from '../../schemas/results.js';
import { OUTPUT_FORMATS, type OutputFormat } from './recommend.js';
import { parseChoice, parseList, parseNonNegativeInt, parseRating } from './parsers.js';

// ============================================================================
// Types
// ============================================================================

export const LISTING_SORTS = ['price_low', 'price_high', 'rating', 'name'] as const;

export type ListingSort = (typeof LISTING_SORTS)[number];

export interface ListSpotsOptions {
  /** Only destinations tagged with this mood */
  mood?: string;
  sort?: ListingSort;
  format: OutputFormat;
}

export interface AddSpotOptions {
  name: string;
  mood: string[];
  budgetMin: number;
  budgetMax: number;
  duration: number;
  distance: number;
  rating: number;
  months?: string[];
  description: string;
}

// ============================================================================
// Listing Helpers
// ============================================================================

/**
 * Keep destinations tagged with `mood` (case-insensitive).
 */
export function filterByMood(listings: DestinationListing[], mood: string): DestinationListing[] {
  const wanted = mood.trim().toLowerCase();
  return listings.filter((listing) => listing.moods.some((tag) => tag.toLowerCase() === wanted));
}

/**
 * Sort a listing; ties keep catalog order.
 *
 * - `price_low` / `price_high`: by starting price
 * - `rating`: best first
 * - `name`: alphabetical
 */
export function sortListings(listings: DestinationListing[], sort: ListingSort): DestinationListing[] {
  const sorted = [...listings];
  switch (sort) {
    case 'price_low':
      return sorted.sort((a, b) => a.budgetMin - b.budgetMin);
    case 'price_high':
      return sorted.sort((a, b) => b.budgetMin - a.budgetMin);
    case 'rating':
      return sorted.sort((a, b) => b.rating - a.rating);
    case 'name':
      return sorted.sort((a, b) => a.name.localeCompare(b.name));
  }
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the spots command group.
 */
export function registerSpotsCommands(program: Command): void {
  const spots = program.command('spots').description('Manage the destination catalog');

  spots
    .command('list')
    .description('List catalog destinations')
    .option('-m, --mood <mood>', 'Only destinations with this mood')
    .option('-s, --sort <order>', `Sort order: ${LISTING_SORTS.join(', ')}`, parseChoice(LISTING_SORTS))
    .option('-f, --format <type>', 'Output format: table, json', parseChoice(OUTPUT_FORMATS), 'table')
    .action(async (options: ListSpotsOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      try {
        await handleListSpots(options, base);
      } catch (error) {
        base.fatal(error);
      }
    });

  spots
    .command('add')
    .description('Add a destination to the catalog')
    .requiredOption('--name <name>', 'Destination name')
    .requiredOption('--mood <list>', 'Comma-separated moods, e.g. "nature,adventure"', parseList)
    .requiredOption('--budget-min <rupees>', 'Lowest trip cost', parseNonNegativeInt)
    .requiredOption('--budget-max <rupees>', 'Highest trip cost', parseNonNegativeInt)
    .requiredOption('--duration <days>', 'Typical trip length in days', parseNonNegativeInt)
    .requiredOption('--distance <km>', 'Distance in kilometres', parseNonNegativeInt)
    .requiredOption('--rating <stars>', 'Rating between 0 and 5', parseRating)
    .option('--months <list>', 'Comma-separated best months', parseList)
    .requiredOption('--description <text>', 'Short description')
    .action(async (options: AddSpotOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      try {
        await handleAddSpot(options, base);
      } catch (error) {
        base.fatal(error);
      }
    });

  spots
    .command('remove')
    .description('Remove a destination by id')
    .argument('<id>', 'Destination id', parseNonNegativeInt)
    .action(async (id: number, _options: Record<string, never>, cmd: Command) => {
      const base = getBaseCommand(cmd);
      try {
        await handleRemoveSpot(id, base);
      } catch (error) {
        base.fatal(error);
      }
    });
}

// ============================================================================
// Handlers
// ============================================================================

async function openRecommender(base: BaseCommand): Promise<Recommender> {
  return Recommender.fromCatalogFile(base.catalogPath, { logger: base.createLogger('catalog') });
}

/**
 * Handle spots list.
 */
export async function handleListSpots(options: ListSpotsOptions, base: BaseCommand): Promise<void> {
  const recommender = await openRecommender(base);

  let listings = recommender.listDestinations();
  if (options.mood !== undefined) {
    listings = filterByMood(listings, options.mood);
  }
  if (options.sort !== undefined) {
    listings = sortListings(listings, options.sort);
  }

  if (options.format === 'json') {
    base.json(listings);
    return;
  }

  if (listings.length === 0) {
    base.info('No destinations found.');
    return;
  }

  base.section('Destinations');
  base.lines(formatListingTable(listings));
  base.info(`Total: ${listings.length} destination${listings.length === 1 ? '' : 's'}`);
}

/**
 * Handle spots add.
 */
export async function handleAddSpot(options: AddSpotOptions, base: BaseCommand): Promise<void> {
  const recommender = await openRecommender(base);

  const record = await recommender.addDestination({
    name: options.name,
    mood: options.mood,
    budget_min: options.budgetMin,
    budget_max: options.budgetMax,
    duration_days: options.duration,
    distance_km: options.distance,
    rating: options.rating,
    best_months: options.months ?? [],
    description: options.description,
  });

  base.success(`Added "${record.name}" with ID ${record.id}`);
}

/**
 * Handle spots remove.
 */
export async function handleRemoveSpot(id: number, base: BaseCommand): Promise<void> {
  const recommender = await openRecommender(base);
  const removed = await recommender.removeDestination(id);
  base.success(`Removed "${removed.name}" (ID ${removed.id})`);
}
