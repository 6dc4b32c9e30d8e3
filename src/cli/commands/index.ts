/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerEvaluateCommand } from './evaluate.js';
import { registerRecommendCommand } from './recommend.js';
import { registerSpotsCommands } from './spots.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerRecommendCommand(program);
  registerSpotsCommands(program);
  registerEvaluateCommand(program);
}

/**
 * Get help text for all available commands.
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'recommend <query...>', description: 'Recommend destinations for a free-text query' },
    { name: 'spots list', description: 'List catalog destinations' },
    { name: 'spots add', description: 'Add a destination to the catalog' },
    { name: 'spots remove <id>', description: 'Remove a destination by id' },
    { name: 'evaluate', description: 'Measure precision, recall and F1 on labelled queries' },
  ];
}
