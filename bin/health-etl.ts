#!/usr/bin/env node
/**
 * Health ETL CLI Entry Point
 *
 * Merges the physical-activity and overweight/obesity survey extracts into a
 * validated curated table and publishes it locally or to an object store.
 *
 * @module health-etl-cli
 */

import { Command } from 'commander';
import { config as loadEnv } from 'dotenv';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { initializeContext, peekGlobalContext } from '../src/cli/context.js';
import type { GlobalOptions } from '../src/cli/context.js';
import { registerCommands } from '../src/cli/commands/index.js';
import { EXIT_CODES, errorMessage, isPipelineError } from '../src/core/errors.js';

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // Source layout: bin/ → package root; build layout: dist/bin/ → package root
  const candidates = [join(here, '..', 'package.json'), join(here, '..', '..', 'package.json')];

  for (const packageJsonPath of candidates) {
    if (!existsSync(packageJsonPath)) continue;
    try {
      const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
      if (
        typeof packageJson === 'object' &&
        packageJson !== null &&
        'version' in packageJson &&
        typeof packageJson.version === 'string'
      ) {
        return packageJson.version;
      }
    } catch (error) {
      console.warn(`Cannot read ${packageJsonPath}: ${errorMessage(error)}`);
    }
  }
  return '0.0.0';
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('health-etl')
    .description('Merge-and-validate pipeline for adolescent activity and obesity survey extracts')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .health-etlrc)')
    .hook('preAction', (thisCommand) => {
      const options: GlobalOptions = thisCommand.opts();
      initializeContext(options);
    });

  registerCommands(program);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  loadEnv();
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const context = peekGlobalContext();
    if (context) {
      context.logger.error('Command failed', {
        error: errorMessage(error),
        duration_ms: Date.now() - context.startTime,
      });
    }

    if (isPipelineError(error)) {
      console.error(error.getSummary());
      process.exit(error.exitCode);
    }

    console.error(`Error: ${errorMessage(error)}`);
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
