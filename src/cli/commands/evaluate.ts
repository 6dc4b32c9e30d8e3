/**
 * Evaluate Command
 *
 * Runs the labelled query set against the catalog and reports
 * precision, recall and F1 at k.
 *
 * @module cli/commands/evaluate
 */

import { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { formatEvaluationReport } from '../formatters/index.js';
import { config } from '../../config/index.js';
import { evaluate, loadEvaluationQueries } from '../../evaluation/metrics.js';
import { Recommender } from '../../recommender/recommender.js';
import { getEvaluationQueriesPath } from '../../storage/paths.js';
import { OUTPUT_FORMATS, type OutputFormat } from './recommend.js';
import { parseChoice, parsePositiveInt } from './parsers.js';

export const DEFAULT_EVALUATION_K = 5;

export interface EvaluateCommandOptions {
  k: number;
  /** Labelled query file (default: bundled evaluation-queries.json) */
  queries?: string;
  format: OutputFormat;
}

/**
 * Register the evaluate command.
 */
export function registerEvaluateCommand(program: Command): void {
  program
    .command('evaluate')
    .description('Measure precision, recall and F1 on labelled queries')
    .option('-k <n>', 'Results considered per query', parsePositiveInt, DEFAULT_EVALUATION_K)
    .option('--queries <path>', 'Labelled query file')
    .option('-f, --format <type>', 'Output format: table, json', parseChoice(OUTPUT_FORMATS), 'table')
    .action(async (options: EvaluateCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      try {
        await handleEvaluate(options, base);
      } catch (error) {
        base.fatal(error);
      }
    });
}

/**
 * Handle the evaluate command.
 */
export async function handleEvaluate(options: EvaluateCommandOptions, base: BaseCommand): Promise<void> {
  const queriesPath = options.queries ?? getEvaluationQueriesPath();
  base.debug(`Queries: ${queriesPath}`);

  const queries = await loadEvaluationQueries(queriesPath);
  const recommender = await Recommender.fromCatalogFile(base.catalogPath, {
    logger: base.createLogger('evaluate'),
    keywordMatch: config.keywordMatch,
  });
  const report = evaluate(recommender, queries, options.k);

  if (options.format === 'json') {
    base.json(report);
    return;
  }

  base.section(`Evaluation at k=${report.k} (${report.results.length} queries)`);
  base.lines(formatEvaluationReport(report));
}
