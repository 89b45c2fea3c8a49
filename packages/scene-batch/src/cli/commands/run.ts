/**
 * Run Command
 *
 * Reconcile a slice of the scene catalog against the download directory.
 *
 * Usage:
 *   scene-batch run [options]
 *
 * Options:
 *   --subsample <n>          Keep every Nth frame (default from config: 10)
 *   --download-dir <path>    Local dataset root
 *   --split <name>           Training or Validation (default: both)
 *   --start <n>              Offset into the scene list
 *   --count <n>              Number of scenes
 *   --skip-download          Do not download in the main wave
 *   --execute                Prune and subsample frames (dry run otherwise)
 *   --force-reprocess        Ignore classification
 *   --validate-only          Classify and report, change nothing
 *   --workers <n>            Scenes in flight
 *   --update-interval <s>    Seconds between status redraws
 *   --log-file <path>        Durable log location
 *   --assets <names...>      Assets to download and validate
 *   --scene-list <path>      Scene list CSV
 */

import { join, resolve } from 'node:path';
import { InvalidArgumentError, type Command } from 'commander';

import { CatalogError } from '../../core/errors.js';
import { DIRECTORY_ASSETS } from '../../core/assets.js';
import { errorMessage, isSplit, type SceneKey, type Split } from '../../core/types.js';
import {
  HighResEligibilityIndex,
  loadSceneList,
  selectScenes,
} from '../../catalog/scene-catalog.js';
import { SceneClassifier } from '../../scene/scene-classifier.js';
import { SceneFiles } from '../../scene/scene-files.js';
import { CommandAssetDownloader } from '../../services/download-runner.js';
import { TaskExecutor } from '../../services/task-executor.js';
import { resolveWorkerCount } from '../../services/worker-pool.js';
import { ShutdownController } from '../../services/shutdown-controller.js';
import {
  ProgressTracker,
  detectProgressMode,
  formatSummary,
  type ProgressMode,
} from '../../services/progress-tracker.js';
import { WaveOrchestrator } from '../../services/wave-orchestrator.js';
import { findWave, type RunReport } from '../../services/wave-orchestrator.types.js';
import { resolvePath, type CLIConfig } from '../lib/config.js';
import { EXIT_CODES, getGlobalContext, type ExitCode } from '../lib/context.js';
import { createCLILogger, logFileTimestamp, type CLILogger } from '../lib/logger.js';

/**
 * Run options from CLI
 */
export interface RunCommandOptions {
  readonly subsample?: number;
  readonly downloadDir?: string;
  readonly split?: Split;
  readonly start: number;
  readonly count?: number;
  readonly skipDownload?: boolean;
  readonly execute?: boolean;
  readonly forceReprocess?: boolean;
  readonly validateOnly?: boolean;
  readonly workers?: number;
  readonly updateInterval?: number;
  readonly logFile?: string;
  readonly assets?: string[];
  readonly sceneList?: string;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`Expected a non-negative integer, got '${value}'`);
  }
  return parsed;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got '${value}'`);
  }
  return parsed;
}

export function parsePositiveSeconds(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive number of seconds, got '${value}'`);
  }
  return parsed;
}

export function parseSplit(value: string): Split {
  if (!isSplit(value)) {
    throw new InvalidArgumentError(`Split must be Training or Validation, got '${value}'`);
  }
  return value;
}

/**
 * Register the run command
 */
export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Download, repair, subsample and prune scenes')
    .option('--subsample <n>', 'Keep every Nth frame', parsePositiveInt)
    .option('--download-dir <path>', 'Local dataset root')
    .option('--split <name>', 'Training or Validation (default: both)', parseSplit)
    .option('--start <n>', 'Offset into the scene list', parseNonNegativeInt, 0)
    .option('--count <n>', 'Number of scenes to process', parsePositiveInt)
    .option('--skip-download', 'Do not download in the main wave')
    .option('--execute', 'Prune and subsample frames (dry run otherwise)')
    .option('--force-reprocess', 'Reprocess scenes even if complete')
    .option('--validate-only', 'Only classify scenes and report')
    .option('--workers <n>', 'Scenes processed in parallel (default: all cores)', parsePositiveInt)
    .option('--update-interval <seconds>', 'Seconds between status redraws', parsePositiveSeconds)
    .option('--log-file <path>', 'Write the run log here')
    .option('--assets <names...>', 'Assets to download and validate')
    .option('--scene-list <path>', 'Scene list CSV (video_id, fold)')
    .action(async (options: RunCommandOptions) => {
      const exitCode = await executeRun(options);
      if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
    });
}

/**
 * Execute the run command
 */
export async function executeRun(
  options: RunCommandOptions,
  config: CLIConfig = getGlobalContext().config,
  mode: ProgressMode = detectProgressMode()
): Promise<ExitCode> {
  const validateOnly = options.validateOnly ?? false;
  const skipDownload = validateOnly || (options.skipDownload ?? false);
  const execute = !validateOnly && (options.execute ?? false);
  const downloadDir = resolve(options.downloadDir ?? resolvePath(config, 'downloadDir'));
  const assets = options.assets ?? [...config.defaults.assets];
  const subsampleN = options.subsample ?? config.defaults.subsample;
  const workers = resolveWorkerCount(options.workers ?? config.defaults.workers ?? undefined);
  const quiet = !config.verbose;

  const logFile =
    options.logFile ?? join(resolvePath(config, 'logDir'), `scene_batch_${logFileTimestamp()}.log`);
  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
    console: mode === 'interactive' || config.verbose,
    filePath: logFile,
  });

  logger.commandStart('run', {
    downloadDir,
    assets,
    subsample: subsampleN,
    workers,
    execute,
    skipDownload,
    forceReprocess: options.forceReprocess ?? false,
    validateOnly,
    quiet,
    mode,
    logFile,
  });

  if (!execute) {
    logger.warn('Dry run: frames will not be pruned or subsampled (pass --execute to apply)');
  }
  for (const asset of assets) {
    if (!DIRECTORY_ASSETS[asset]) {
      logger.warn(`Asset '${asset}' will be downloaded but has no known directory layout`);
    }
  }

  let scenes: readonly SceneKey[];
  try {
    const sceneListPath =
      options.sceneList !== undefined ? resolve(options.sceneList) : resolvePath(config, 'sceneList');
    scenes = selectScenes(await loadSceneList(sceneListPath), {
      split: options.split,
      start: options.start,
      count: options.count,
    });
  } catch (error) {
    logger.error(errorMessage(error));
    logger.commandEnd(false);
    return error instanceof CatalogError ? EXIT_CODES.INPUT_NOT_FOUND : EXIT_CODES.FAILURE;
  }

  if (scenes.length === 0) {
    logger.warn('No scenes selected');
    logger.commandEnd(true, { scenes: 0 });
    return EXIT_CODES.SUCCESS;
  }

  const eligibility = await HighResEligibilityIndex.load(downloadDir);
  if (eligibility.source === 'assume-eligible') {
    logger.warn('No high-resolution metadata found: treating every scene as eligible');
  } else if (eligibility.source === 'unreadable') {
    logger.warn('High-resolution metadata unreadable: treating every scene as ineligible', {
      problem: eligibility.problem,
    });
  } else {
    logger.info('Loaded high-resolution metadata', { eligible: eligibility.eligibleCount });
  }

  const shutdown = new ShutdownController({ logger });
  const uninstall = shutdown.install();

  try {
    const files = new SceneFiles(logger);
    const executor = new TaskExecutor({
      classifier: new SceneClassifier(eligibility, config.thresholds),
      downloader: new CommandAssetDownloader(config.downloader, logger),
      files,
      logger,
      thresholds: config.thresholds,
      maxConcurrentAssetDownloads: config.downloader.maxConcurrentAssets,
    });

    const orchestrator = new WaveOrchestrator({
      executor,
      files,
      token: shutdown,
      logger,
      createTracker: (label, total) =>
        new ProgressTracker({
          label,
          total,
          mode,
          logger,
          console: logger,
          updateIntervalMs:
            options.updateInterval !== undefined
              ? options.updateInterval * 1000
              : config.progress.updateIntervalMs,
          logIntervalMs: config.progress.logIntervalMs,
          failureListLimit: config.progress.failureListLimit,
        }),
    });

    const report = await orchestrator.run(scenes, {
      downloadDir,
      assets,
      subsampleN,
      execute,
      skipDownload,
      forceReprocess: options.forceReprocess ?? false,
      validateOnly,
      quiet,
      workers,
    });

    printReport(report, validateOnly, logger);
    logger.commandEnd(true, { interrupted: report.interrupted, removals: report.removals.length });

    return report.interrupted ? EXIT_CODES.INTERRUPTED : EXIT_CODES.SUCCESS;
  } finally {
    uninstall();
  }
}

/**
 * Log the main wave summary and what the repair waves did
 */
function printReport(report: RunReport, validateOnly: boolean, logger: CLILogger): void {
  const main = findWave(report, 'main');
  if (main) {
    for (const line of formatSummary(main.summary)) {
      logger.info(line);
    }
  }

  for (const wave of report.waves) {
    if (wave.wave === 'main') continue;
    logger.info(
      `${wave.summary.label}: ${wave.summary.succeeded} repaired, ` +
        `${wave.summary.failedDownloadCount + wave.summary.failedProcessingCount} failed ` +
        `of ${wave.scenes.length}`
    );
  }

  if (report.removals.length > 0) {
    logger.warn(`Removed ${report.removals.length} scenes that could not be repaired`, {
      scenes: report.removals.map((r) => `${r.scene.videoId} (${r.phase})`),
    });
  }

  if (validateOnly && main) {
    const complete = main.summary.succeeded + main.summary.skipped;
    const incomplete = main.summary.failedDownloadCount + main.summary.failedProcessingCount;
    logger.info(`Validation summary: Complete: ${complete}, Incomplete: ${incomplete}`);
  }

  if (report.interrupted) {
    logger.warn('Interrupted: re-run the same command to resume');
  }
}
