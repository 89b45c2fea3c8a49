/**
 * Scene Task Executor
 *
 * Runs one TaskSpec to completion: classify, download, post-download
 * check, clean-and-match, subsample. Every path ends in a SceneResult;
 * nothing thrown inside a task escapes to the pool.
 *
 * @module services/task-executor
 */

import { DEFAULT_THRESHOLDS, scenePath, type SceneThresholds } from '../core/assets.js';
import {
  createSceneResult,
  errorMessage,
  sceneId,
  type SceneResult,
  type TaskSpec,
} from '../core/types.js';
import type { SceneClassification } from '../scene/scene-classifier.js';
import type { SceneFileOperations } from '../scene/scene-files.js';
import { inspectScene, validateScene } from '../scene/scene-inspector.js';
import { createSilentLogger, type Logger } from '../cli/lib/logger.js';
import { downloadSceneAssets, type AssetDownloader } from './download-runner.js';

/**
 * Anything that turns a task into a result
 */
export interface SceneTaskRunner {
  execute(task: TaskSpec): Promise<SceneResult>;
}

export interface TaskExecutorDeps {
  readonly classifier: SceneClassification;
  readonly downloader: AssetDownloader;
  readonly files: SceneFileOperations;
  readonly logger?: Logger;
  readonly thresholds?: SceneThresholds;
  /** Upper bound on concurrent asset downloads within one scene */
  readonly maxConcurrentAssetDownloads?: number;
}

export const DEFAULT_MAX_CONCURRENT_ASSET_DOWNLOADS = 4;

export class TaskExecutor implements SceneTaskRunner {
  private readonly classifier: SceneClassification;
  private readonly downloader: AssetDownloader;
  private readonly files: SceneFileOperations;
  private readonly logger: Logger;
  private readonly thresholds: SceneThresholds;
  private readonly maxConcurrentAssetDownloads: number;

  constructor(deps: TaskExecutorDeps) {
    this.classifier = deps.classifier;
    this.downloader = deps.downloader;
    this.files = deps.files;
    this.logger = deps.logger ?? createSilentLogger();
    this.thresholds = deps.thresholds ?? DEFAULT_THRESHOLDS;
    this.maxConcurrentAssetDownloads =
      deps.maxConcurrentAssetDownloads ?? DEFAULT_MAX_CONCURRENT_ASSET_DOWNLOADS;
  }

  /**
   * Execute one scene task; never rejects
   */
  async execute(task: TaskSpec): Promise<SceneResult> {
    try {
      return await this.run(task);
    } catch (error) {
      this.logger.error('Scene task raised', { scene: sceneId(task.scene), error: errorMessage(error) });
      return createSceneResult(task.scene, 'exception', { error: errorMessage(error) });
    }
  }

  private async run(task: TaskSpec): Promise<SceneResult> {
    const { scene } = task;
    const path = scenePath(task.downloadDir, scene);
    const fileOptions = { execute: task.execute, quiet: task.quiet };
    let reason: string | undefined;

    if (!task.forceReprocess && task.redownloadAttempt === 0) {
      const classification = await this.classifier.classify(
        scene,
        task.downloadDir,
        task.assets,
        task.subsampleN
      );
      reason = classification.reason;

      switch (classification.action) {
        case 'skip':
          return createSceneResult(scene, 'skipped', { reason });
        case 'skip_no_highres':
          return createSceneResult(scene, 'skipped_no_highres', { reason });
        case 'remove': {
          const removed = await this.files.removeScene(path, fileOptions);
          return removed
            ? createSceneResult(scene, 'removed_no_highres', { reason })
            : createSceneResult(scene, 'removal_failed', {
                reason,
                error: `Could not remove ${path}`,
              });
        }
        case 'redownload':
        case 'process':
          this.logger.debug('Processing scene', { scene: sceneId(scene), reason });
          break;
      }
    }

    if (!(task.skipDownload && task.redownloadAttempt === 0)) {
      const outcomes = await downloadSceneAssets(this.downloader, scene, task.downloadDir, task.assets, {
        maxConcurrent: this.maxConcurrentAssetDownloads,
        quiet: task.quiet,
      });
      const failed = outcomes.filter((o) => !o.success).map((o) => o.asset);

      if (failed.length > 0) {
        return createSceneResult(scene, task.redownloadAttempt === 0 ? 'download' : 'redownload_failed', {
          reason,
          error: `Download failed for: ${failed.join(', ')}`,
        });
      }

      if (task.redownloadAttempt > 0) {
        const validation = validateScene(await inspectScene(path, task.assets), this.thresholds);
        if (validation.status === 'missing_intrinsics') {
          return createSceneResult(scene, 'removed_missing_intrinsics', {
            reason,
            error: 'Intrinsics still missing after re-download',
          });
        }
      }
    }

    const cleaned = await this.files.cleanAndMatch(path, task.assets, fileOptions);
    const subsampled =
      cleaned && task.subsampleN > 1
        ? await this.files.subsample(path, task.assets, task.subsampleN, fileOptions)
        : cleaned;

    if (!subsampled) {
      return createSceneResult(scene, 'processing', { reason, error: 'Processing failed' });
    }

    return createSceneResult(scene, 'completed', { reason });
  }
}
