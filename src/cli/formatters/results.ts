/**
 * Result Formatters
 *
 * Turn recommendation results, catalog listings and evaluation reports into
 * printable lines. Every function returns lines rather than printing, so
 * commands decide where they go and tests can assert them.
 *
 * @module cli/formatters/results
 */

import chalk from 'chalk';
import type { EvaluationReport } from '../../evaluation/metrics.js';
import { formatDuration } from '../../recommender/format.js';
import type { ConstraintRecord } from '../../schemas/constraints.js';
import {
  SCORE_FACTORS,
  type DestinationListing,
  type RecommendationResult,
  type ScoreExplanation,
} from '../../schemas/results.js';

// ============================================================================
// Table Helpers
// ============================================================================

/**
 * Truncate a string to a maximum length.
 */
export function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + '...';
}

/**
 * Pad a string to a fixed width, ignoring ANSI colour codes.
 */
export function padRight(str: string, width: number): string {
  const visibleLength = str.replace(/\x1b\[[0-9;]*m/g, '').length;
  const padding = Math.max(0, width - visibleLength);
  return str + ' '.repeat(padding);
}

// ============================================================================
// Constraints
// ============================================================================

/**
 * One-line summary of what the extractor understood.
 *
 * @example
 * ```typescript
 * formatConstraints({ budgetMax: 5000, moods: ['adventure'], durationDays: 4, ... });
 * // 'budget up to ₹5000 | moods: adventure | 4 days'
 * ```
 */
export function formatConstraints(record: ConstraintRecord): string {
  const parts: string[] = [];

  if (record.budgetMin !== undefined && record.budgetMax !== undefined) {
    parts.push(`budget ₹${record.budgetMin}-${record.budgetMax}`);
  } else if (record.budgetMax !== undefined) {
    parts.push(`budget up to ₹${record.budgetMax}`);
  }
  if (record.moods.length > 0) parts.push(`moods: ${record.moods.join(', ')}`);
  if (record.durationDays !== undefined) parts.push(formatDuration(record.durationDays));
  if (record.distanceKm !== undefined) parts.push(`within ${record.distanceKm} km`);
  if (record.placeName !== undefined) parts.push(`place: ${record.placeName}`);
  if (record.bestMonths.length > 0) parts.push(`months: ${record.bestMonths.join(', ')}`);
  if (record.searchTerms.length > 0) parts.push(`terms: ${record.searchTerms.join(', ')}`);

  return parts.length > 0 ? parts.join(' | ') : 'no constraints';
}

// ============================================================================
// Recommendations
// ============================================================================

/**
 * Per-factor breakdown lines, indented under a recommendation.
 */
export function formatExplanation(explanation: ScoreExplanation): string[] {
  const lines = SCORE_FACTORS.map((factor) => {
    const component = explanation.components[factor];
    return `     ${padRight(factor, 10)}${component.score.toFixed(3)}  ${chalk.dim(component.reason)}`;
  });
  if (explanation.rejected !== undefined) {
    lines.push(`     ${chalk.red(`rejected: ${explanation.rejected}`)}`);
  }
  return lines;
}

/**
 * Numbered recommendation list with one detail block per destination.
 */
export function formatRecommendations(result: RecommendationResult): string[] {
  if (result.recommendations.length === 0) {
    return [`No destinations matched "${result.query}".`];
  }

  const lines: string[] = [];
  for (const entry of result.recommendations) {
    lines.push(
      `${entry.rank}. ${chalk.bold(entry.name)} ${chalk.dim(`(score ${entry.relevanceScore.toFixed(4)})`)}`
    );
    lines.push(
      `   ${entry.budgetRange} | ${formatDuration(entry.durationDays)} | ${entry.distanceKm} km | rating ${entry.rating}`
    );
    lines.push(`   moods: ${entry.moods.join(', ')}`);
    lines.push(`   ${entry.description}`);
    if (entry.explanation !== undefined) {
      lines.push(...formatExplanation(entry.explanation));
    }
  }
  return lines;
}

// ============================================================================
// Catalog Listing
// ============================================================================

const LISTING_COLUMNS = [
  ['ID', 5],
  ['NAME', 26],
  ['MOODS', 30],
  ['BUDGET', 14],
  ['DAYS', 9],
  ['RATING', 6],
] as const;

const LISTING_WIDTH = LISTING_COLUMNS.reduce((sum, [, width]) => sum + width, 0);

/**
 * Fixed-width catalog table with header and dividers.
 */
export function formatListingTable(listings: DestinationListing[]): string[] {
  const header = LISTING_COLUMNS.map(([label, width]) => padRight(label, width)).join('');
  const divider = chalk.dim('-'.repeat(LISTING_WIDTH));

  const rows = listings.map((listing) =>
    [
      padRight(String(listing.id), 5),
      padRight(truncate(listing.name, 24), 26),
      padRight(truncate(listing.moods.join(', '), 28), 30),
      padRight(listing.budget, 14),
      padRight(listing.duration, 9),
      listing.rating.toFixed(1),
    ].join('')
  );

  return [chalk.bold(header.trimEnd()), divider, ...rows, divider];
}

// ============================================================================
// Evaluation
// ============================================================================

/**
 * Per-query precision/recall/F1 table followed by the macro averages.
 */
export function formatEvaluationReport(report: EvaluationReport): string[] {
  const { k } = report;
  const header = `${padRight('QUERY', 36)}${padRight(`P@${k}`, 8)}${padRight(`R@${k}`, 8)}F1`;
  const divider = chalk.dim('-'.repeat(54));

  const row = (label: string, precision: number, recall: number, f1: number): string =>
    `${padRight(truncate(label, 34), 36)}${padRight(precision.toFixed(3), 8)}${padRight(recall.toFixed(3), 8)}${f1.toFixed(3)}`;

  return [
    chalk.bold(header),
    divider,
    ...report.results.map((result) => row(result.query, result.precision, result.recall, result.f1)),
    divider,
    chalk.bold(row('average', report.averages.precision, report.averages.recall, report.averages.f1)),
  ];
}
