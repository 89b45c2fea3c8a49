/**
 * Inspect Command
 *
 * Report the frame-level integrity of one scene directory.
 *
 * Usage:
 *   scene-batch inspect <scenePath> [--assets <names...>] [--json]
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type { Command } from 'commander';

import { verifySceneIntegrity } from '../../scene/scene-files.js';
import { inspectScene, validateScene } from '../../scene/scene-inspector.js';
import { EXIT_CODES, getGlobalContext, type ExitCode } from '../lib/context.js';
import type { CLIConfig } from '../lib/config.js';
import { formatJson, formatTable, printError } from '../lib/output.js';

interface InspectOptions {
  readonly assets?: string[];
}

const UNMATCHED_SAMPLE = 10;

export function registerInspectCommand(program: Command): void {
  program
    .command('inspect <scenePath>')
    .description('Check one scene directory for missing, unmatched or corrupt files')
    .option('--assets <names...>', 'Assets to check')
    .action(async (scenePathArg: string, options: InspectOptions) => {
      const exitCode = await executeInspect(scenePathArg, options);
      if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
    });
}

export async function executeInspect(
  scenePathArg: string,
  options: InspectOptions,
  config: CLIConfig = getGlobalContext().config
): Promise<ExitCode> {
  const scenePath = resolve(scenePathArg);
  if (!existsSync(scenePath)) {
    printError(`Scene directory not found: ${scenePath}`);
    return EXIT_CODES.INPUT_NOT_FOUND;
  }

  const assets = options.assets ?? config.defaults.assets;
  const integrity = await verifySceneIntegrity(scenePath, assets);
  const validation = validateScene(await inspectScene(scenePath, assets), config.thresholds);
  const valid = integrity.valid && validation.status === 'complete';

  if (config.json) {
    console.log(formatJson({ ...integrity, status: validation.status, corrupted: validation.corrupted, valid }));
    return valid ? EXIT_CODES.SUCCESS : EXIT_CODES.FAILURE;
  }

  console.log(`Scene: ${scenePath}`);
  console.log(`Status: ${validation.status}`);
  console.log('');
  console.log(
    formatTable(Object.entries(integrity.counts), [
      { header: 'Directory', value: ([asset]) => asset },
      { header: 'Frames', value: ([, count]) => count, align: 'right' },
    ])
  );
  console.log('');
  console.log(`Matched frames: ${integrity.matchedFrames}`);

  if (integrity.missingDirectories.length > 0) {
    console.log(`Missing directories: ${integrity.missingDirectories.join(', ')}`);
  }
  if (validation.corrupted.length > 0) {
    console.log(`Corrupt archives: ${validation.corrupted.join(', ')}`);
  }
  if (integrity.unmatchedFrames.length > 0) {
    const sample = integrity.unmatchedFrames.slice(0, UNMATCHED_SAMPLE).join(', ');
    const more = integrity.unmatchedFrames.length - UNMATCHED_SAMPLE;
    console.log(
      `Unmatched frames (${integrity.unmatchedFrames.length}): ${sample}${more > 0 ? `, ... and ${more} more` : ''}`
    );
  }

  return valid ? EXIT_CODES.SUCCESS : EXIT_CODES.FAILURE;
}
