/**
 * Wave Orchestrator
 *
 * Reconciles a list of scenes in up to four waves:
 *
 * 1. main: every scene, as classified
 * 2. download retry: scenes whose download failed in the main wave, forced;
 *    scenes that fail again are deleted
 * 3. intrinsics repair: scenes flagged with still-missing intrinsics
 * 4. empty directory repair: successful scenes that turn out to hold an
 *    empty asset directory, forced; scenes that stay broken are deleted
 *
 * Each wave takes its input from the results of earlier waves only, has
 * its own tracker, and is skipped when its input is empty or a shutdown
 * was requested.
 *
 * @module services/wave-orchestrator
 */

import { scenePath } from '../core/assets.js';
import {
  createSceneResult,
  sceneId,
  type SceneKey,
  type SceneResult,
  type TaskSpec,
} from '../core/types.js';
import type { SceneFileOperations } from '../scene/scene-files.js';
import { createSilentLogger, type Logger } from '../cli/lib/logger.js';
import { ProgressTracker } from './progress-tracker.js';
import type { SceneTaskRunner } from './task-executor.js';
import { NEVER_CANCELLED, WorkerPool, type CancellationToken } from './worker-pool.js';
import {
  WAVE_LABELS,
  type RunOptions,
  type RunReport,
  type WaveName,
  type WaveOutcome,
} from './wave-orchestrator.types.js';

// ============================================================================
// Types
// ============================================================================

export interface WaveOrchestratorDeps {
  readonly executor: SceneTaskRunner;
  readonly files: SceneFileOperations;
  readonly token?: CancellationToken;
  readonly logger?: Logger;
  /** Build the tracker of one wave; unattended and silent by default */
  readonly createTracker?: (label: string, total: number) => ProgressTracker;
}

/**
 * Task flags that differ between waves
 */
interface WaveTaskFlags {
  readonly skipDownload: boolean;
  readonly forceReprocess: boolean;
  readonly redownloadAttempt: number;
}

function uniqueScenes(scenes: Iterable<SceneKey>): SceneKey[] {
  const seen = new Map<string, SceneKey>();
  for (const scene of scenes) {
    const id = sceneId(scene);
    if (!seen.has(id)) seen.set(id, scene);
  }
  return [...seen.values()];
}

// ============================================================================
// Orchestrator
// ============================================================================

/**
 * @example
 * ```typescript
 * const shutdown = new ShutdownController();
 * const orchestrator = new WaveOrchestrator({ executor, files, token: shutdown });
 *
 * const report = await orchestrator.run(scenes, {
 *   downloadDir: './data',
 *   assets: DEFAULT_ASSETS,
 *   subsampleN: 10,
 *   execute: true,
 *   skipDownload: false,
 *   forceReprocess: false,
 *   validateOnly: false,
 *   quiet: true,
 *   workers: 8,
 * });
 * ```
 */
export class WaveOrchestrator {
  private readonly executor: SceneTaskRunner;
  private readonly files: SceneFileOperations;
  private readonly token: CancellationToken;
  private readonly logger: Logger;
  private readonly createTracker: (label: string, total: number) => ProgressTracker;

  constructor(deps: WaveOrchestratorDeps) {
    this.executor = deps.executor;
    this.files = deps.files;
    this.token = deps.token ?? NEVER_CANCELLED;
    this.logger = deps.logger ?? createSilentLogger();
    this.createTracker =
      deps.createTracker ??
      ((label, total) => new ProgressTracker({ label, total, mode: 'unattended', logger: this.logger }));
  }

  /**
   * Run every applicable wave over the scenes
   */
  async run(scenes: readonly SceneKey[], options: RunOptions): Promise<RunReport> {
    const startTime = Date.now();
    const waves: WaveOutcome[] = [];
    const removals: SceneResult[] = [];
    const emptyDirectoryScenes: SceneKey[] = [];

    // Wave 1: everything
    waves.push(
      await this.runWave('main', scenes, options, {
        skipDownload: options.skipDownload,
        forceReprocess: options.forceReprocess,
        redownloadAttempt: 0,
      })
    );

    // Wave 2: failed downloads, once more
    const retryScenes = waves
      .flatMap((w) => w.results)
      .filter((r) => r.phase === 'download')
      .map((r) => r.scene);

    if (this.shouldRun(retryScenes)) {
      const retry = await this.runWave('download_retry', retryScenes, options, {
        skipDownload: false,
        forceReprocess: true,
        redownloadAttempt: 1,
      });
      waves.push(retry);

      const permanentlyFailed = retry.results.filter((r) => !r.success).map((r) => r.scene);
      removals.push(...(await this.removeScenes(permanentlyFailed, options, 'Failed again after download retry')));
    }

    // Wave 3: intrinsics that a re-download did not bring back
    const intrinsicsScenes = uniqueScenes(
      waves
        .flatMap((w) => w.results)
        .filter((r) => r.phase === 'removed_missing_intrinsics')
        .map((r) => r.scene)
    );

    if (this.shouldRun(intrinsicsScenes)) {
      waves.push(
        await this.runWave('intrinsics_repair', intrinsicsScenes, options, {
          skipDownload: false,
          forceReprocess: options.forceReprocess,
          redownloadAttempt: 1,
        })
      );
    }

    // Wave 4: successful scenes hiding empty asset directories
    if (!options.validateOnly && !this.token.cancelled) {
      const candidates = uniqueScenes(waves.flatMap((w) => w.stats.successfulScenes));
      for (const scene of candidates) {
        const empty = await this.files.findEmptyAssetDirectories(
          scenePath(options.downloadDir, scene),
          options.assets
        );
        if (empty.length > 0) {
          this.logger.warn('Empty asset directories found', { scene: sceneId(scene), directories: empty });
          emptyDirectoryScenes.push(scene);
        }
      }

      if (this.shouldRun(emptyDirectoryScenes)) {
        const repair = await this.runWave('empty_directory_repair', emptyDirectoryScenes, options, {
          skipDownload: false,
          forceReprocess: true,
          redownloadAttempt: 2,
        });
        waves.push(repair);

        const repaired = new Set(repair.stats.successfulScenes.map(sceneId));
        const attempted = new Set(repair.results.map((r) => sceneId(r.scene)));
        const stillBroken: SceneKey[] = [];
        for (const scene of emptyDirectoryScenes) {
          if (!attempted.has(sceneId(scene))) continue;
          const stillEmpty = await this.files.findEmptyAssetDirectories(
            scenePath(options.downloadDir, scene),
            options.assets
          );
          if (!repaired.has(sceneId(scene)) || stillEmpty.length > 0) {
            stillBroken.push(scene);
          }
        }
        removals.push(...(await this.removeScenes(stillBroken, options, 'Empty directories persisted after repair')));
      }
    }

    const interrupted = this.token.cancelled;
    if (interrupted) {
      this.logger.warn('Run stopped early after shutdown request');
    }

    return {
      waves,
      removals,
      emptyDirectoryScenes,
      interrupted,
      durationMs: Date.now() - startTime,
    };
  }

  private shouldRun(scenes: readonly SceneKey[]): boolean {
    return scenes.length > 0 && !this.token.cancelled;
  }

  /**
   * Run one wave through a fresh pool and tracker
   */
  private async runWave(
    wave: WaveName,
    scenes: readonly SceneKey[],
    options: RunOptions,
    flags: WaveTaskFlags
  ): Promise<WaveOutcome> {
    const label = WAVE_LABELS[wave];
    this.logger.info(`${label} wave starting`, { scenes: scenes.length, workers: options.workers });

    const tasks: TaskSpec[] = scenes.map((scene) => ({
      scene,
      downloadDir: options.downloadDir,
      assets: options.assets,
      subsampleN: options.subsampleN,
      execute: options.execute,
      quiet: options.quiet,
      ...flags,
    }));

    const tracker = this.createTracker(label, tasks.length);
    tracker.start();

    const pool = new WorkerPool((task: TaskSpec) => this.executor.execute(task), {
      workers: options.workers,
      token: this.token,
    });

    const results: SceneResult[] = [];
    for await (const completion of pool.run(tasks)) {
      const result =
        completion.status === 'fulfilled'
          ? completion.value
          : createSceneResult(completion.task.scene, 'exception', { error: completion.reason.message });
      results.push(result);
      tracker.record(result, completion.task.scene.split);
    }

    const { cancelled } = pool.stats();
    if (cancelled > 0) {
      this.logger.warn(`${label} wave: cancelled ${cancelled} pending scenes`);
    }

    const summary = tracker.finalize(this.token.cancelled);
    this.logger.info(`${label} wave finished`, {
      completed: summary.completed,
      succeeded: summary.succeeded,
      skipped: summary.skipped,
      failedDownloads: summary.failedDownloadCount,
      failedProcessing: summary.failedProcessingCount,
    });

    return {
      wave,
      scenes,
      results,
      stats: tracker.snapshot(),
      summary,
      cancelledTasks: cancelled,
    };
  }

  /**
   * Delete scene directories that could not be repaired
   */
  private async removeScenes(
    scenes: readonly SceneKey[],
    options: RunOptions,
    reason: string
  ): Promise<SceneResult[]> {
    const results: SceneResult[] = [];
    for (const scene of scenes) {
      const removed = await this.files.removeScene(scenePath(options.downloadDir, scene), {
        quiet: options.quiet,
      });
      results.push(
        removed
          ? createSceneResult(scene, 'removed', { reason })
          : createSceneResult(scene, 'removal_failed', { reason, error: 'Could not remove scene directory' })
      );
    }
    if (results.length > 0) {
      this.logger.warn(reason, { scenes: scenes.map((s) => s.videoId) });
    }
    return results;
  }
}
