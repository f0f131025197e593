/**
 * CLI Commands Index
 *
 * Central registry of all CLI commands.
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerBuildCommand } from './build/index.js';
import { registerInspectCommand } from './inspect/index.js';

export { executeBuild, parseAges, resolveFormat } from './build/index.js';
export type { BuildCommandOptions, BuildContext, BuildOutcome } from './build/index.js';
export { inspectExtract, formatInspection } from './inspect/index.js';
export type { InspectResult } from './inspect/index.js';

/**
 * Register every command on the program
 */
export function registerCommands(program: Command): void {
  registerBuildCommand(program);
  registerInspectCommand(program);
}
