#!/usr/bin/env tsx
/**
 * Scene Batch CLI Entry Point
 *
 * Reconciles a catalog of RGB-D dataset scenes against a local download
 * directory: downloads what is missing, repairs what is broken, subsamples
 * frames, and prunes scenes that cannot be made whole.
 *
 * @module scene-batch-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { registerCommands } from '../src/cli/commands/index.js';
import { EXIT_CODES, initializeContext, type GlobalContext } from '../src/cli/lib/context.js';
import { ConfigError } from '../src/core/errors.js';

let context: GlobalContext | null = null;

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return typeof packageJson.version === 'string' ? packageJson.version : '0.0.0';
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('scene-batch')
    .description('Batch download, repair and subsampling of dataset scenes')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .scene-batchrc)')
    .hook('preAction', async (thisCommand) => {
      const options = thisCommand.opts<{ verbose?: boolean; json?: boolean; config?: string }>();
      try {
        context = await initializeContext(options);
      } catch (error) {
        console.error(
          `Configuration error: ${error instanceof Error ? error.message : String(error)}`
        );
        process.exit(error instanceof ConfigError ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.FAILURE);
      }
    });

  registerCommands(program);

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (context) {
      context.logger.error('Command failed', {
        error: error instanceof Error ? error.message : String(error),
        duration_ms: Date.now() - context.startTime,
      });
    } else {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exit(EXIT_CODES.FAILURE);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.FAILURE);
});
