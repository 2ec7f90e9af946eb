/**
 * CLI Commands Registry
 *
 * Available commands:
 * - detect: Find duplicate listings in a feed
 * - diff: Compare the two sites' versions of shared properties
 * - generate: Write a mock feed
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerDetectCommand } from './detect.js';
import { registerDiffCommand } from './diff.js';
import { registerGenerateCommand } from './generate.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerDetectCommand(program);
  registerDiffCommand(program);
  registerGenerateCommand(program);
}

/**
 * Get help text for all available commands.
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'detect <input>', description: 'Find listings that describe the same property' },
    { name: 'diff <input>', description: 'Compare SeLoger and LeBoncoin listings of the same properties' },
    { name: 'generate', description: 'Write a mock SeLoger/LeBoncoin feed with known duplicates' },
  ];
}
