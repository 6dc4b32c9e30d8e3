/**
 * Recommend Command
 *
 * Runs a free-text query against the catalog and prints the ranked
 * destinations.
 *
 * @module cli/commands/recommend
 */

import { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { formatConstraints, formatRecommendations } from '../formatters/index.js';
import { config } from '../../config/index.js';
import { DEFAULT_TOP_K, Recommender } from '../../recommender/recommender.js';
import { parseChoice, parsePositiveInt } from './parsers.js';

// ============================================================================
// Types
// ============================================================================

export const OUTPUT_FORMATS = ['table', 'json'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Options for the recommend command.
 */
export interface RecommendCommandOptions {
  /** Maximum number of results */
  topK: number;
  /** Show a per-factor score breakdown */
  explain?: boolean;
  format: OutputFormat;
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the recommend command.
 */
export function registerRecommendCommand(program: Command): void {
  program
    .command('recommend <query...>')
    .description('Recommend destinations for a free-text query')
    .option('-k, --top-k <n>', 'Maximum number of results', parsePositiveInt, DEFAULT_TOP_K)
    .option('--explain', 'Show how each score was built')
    .option('-f, --format <type>', 'Output format: table, json', parseChoice(OUTPUT_FORMATS), 'table')
    .action(async (words: string[], options: RecommendCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);

      try {
        await handleRecommend(words.join(' '), options, base);
      } catch (error) {
        base.fatal(error);
      }
    });
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Handle the recommend command.
 *
 * @param query - Query text (the joined positional words)
 * @param options - Command options
 * @param base - Base command for output
 */
export async function handleRecommend(
  query: string,
  options: RecommendCommandOptions,
  base: BaseCommand
): Promise<void> {
  base.debug(`Catalog: ${base.catalogPath}`);

  const recommender = await Recommender.fromCatalogFile(base.catalogPath, {
    logger: base.createLogger('recommender'),
    keywordMatch: config.keywordMatch,
  });
  const result = recommender.recommend(query, options.topK, { explain: options.explain === true });

  if (options.format === 'json') {
    base.json(result);
    return;
  }

  base.info(`Understood: ${formatConstraints(result.parsedConstraints)}`);
  base.blank();
  base.lines(formatRecommendations(result));
  base.blank();
  base.info(`${result.totalResults} of ${recommender.size} destinations matched`);
}
