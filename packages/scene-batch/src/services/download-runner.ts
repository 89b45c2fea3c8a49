/**
 * Asset Download Runner
 *
 * Fetching one asset of one scene is delegated to an external download
 * command (the dataset's own download script by default). This module
 * spawns that command with a per-asset timeout and fans the assets of a
 * scene out through a bulkhead.
 *
 * @module services/download-runner
 */

import { spawn } from 'node:child_process';

import type { AssetSet, SceneKey } from '../core/types.js';
import { errorMessage } from '../core/types.js';
import { createBatchBulkhead } from '../resilience/bulkhead.js';
import { createSilentLogger, type Logger } from '../cli/lib/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface AssetDownloadRequest {
  readonly scene: SceneKey;
  readonly downloadDir: string;
  readonly asset: string;
  readonly quiet: boolean;
}

/**
 * Fetches one asset of one scene into the download directory
 *
 * Resolves true on success. Implementations should resolve false rather
 * than reject; a rejection is treated as a failed download.
 */
export interface AssetDownloader {
  downloadAsset(request: AssetDownloadRequest): Promise<boolean>;
}

/**
 * External download command
 *
 * Arguments may contain the placeholders `{split}`, `{videoId}`,
 * `{downloadDir}` and `{asset}`.
 */
export interface DownloadCommandConfig {
  readonly command: string;
  readonly args: readonly string[];
  /** Per-asset timeout; the process is killed when it expires */
  readonly timeoutMs: number;
  readonly cwd?: string;
}

export const DEFAULT_DOWNLOAD_COMMAND: DownloadCommandConfig = {
  command: 'python3',
  args: [
    'download_data.py',
    '--split',
    '{split}',
    '--video_id',
    '{videoId}',
    '--download_dir',
    '{downloadDir}',
    '--raw_dataset_assets',
    '{asset}',
  ],
  timeoutMs: 900_000,
};

export interface AssetOutcome {
  readonly asset: string;
  readonly success: boolean;
  readonly error?: string;
}

// ============================================================================
// Command Downloader
// ============================================================================

/**
 * Substitute request fields into argument placeholders
 */
export function renderDownloadArgs(
  args: readonly string[],
  request: AssetDownloadRequest
): string[] {
  const values: Record<string, string> = {
    split: request.scene.split,
    videoId: request.scene.videoId,
    downloadDir: request.downloadDir,
    asset: request.asset,
  };
  return args.map((arg) =>
    arg.replace(/\{(split|videoId|downloadDir|asset)\}/g, (match, key: string) => values[key] ?? match)
  );
}

/**
 * Downloader that runs the configured command once per asset
 */
export class CommandAssetDownloader implements AssetDownloader {
  constructor(
    private readonly config: DownloadCommandConfig = DEFAULT_DOWNLOAD_COMMAND,
    private readonly logger: Logger = createSilentLogger()
  ) {}

  downloadAsset(request: AssetDownloadRequest): Promise<boolean> {
    const args = renderDownloadArgs(this.config.args, request);

    return new Promise<boolean>((resolve) => {
      const child = spawn(this.config.command, args, {
        cwd: this.config.cwd,
        stdio: request.quiet ? 'ignore' : 'inherit',
        timeout: this.config.timeoutMs,
        killSignal: 'SIGKILL',
      });

      child.once('error', (error) => {
        this.logger.warn('Download command could not start', {
          videoId: request.scene.videoId,
          asset: request.asset,
          error: error.message,
        });
        resolve(false);
      });

      child.once('close', (code, signal) => {
        if (code === 0) {
          resolve(true);
          return;
        }
        this.logger.warn('Download command failed', {
          videoId: request.scene.videoId,
          asset: request.asset,
          ...(signal ? { signal } : { exitCode: code }),
        });
        resolve(false);
      });
    });
  }
}

// ============================================================================
// Scene Fan-Out
// ============================================================================

/**
 * Download every asset of a scene, at most `maxConcurrent` at a time
 *
 * Waits for every asset, even after a failure, so no download process
 * outlives the scene task.
 */
export async function downloadSceneAssets(
  downloader: AssetDownloader,
  scene: SceneKey,
  downloadDir: string,
  assets: AssetSet,
  options: { readonly maxConcurrent: number; readonly quiet: boolean }
): Promise<readonly AssetOutcome[]> {
  const bulkhead = createBatchBulkhead(
    `assets:${scene.videoId}`,
    assets.length,
    options.maxConcurrent
  );

  return Promise.all(
    assets.map(async (asset): Promise<AssetOutcome> => {
      try {
        const success = await bulkhead.execute(() =>
          downloader.downloadAsset({ scene, downloadDir, asset, quiet: options.quiet })
        );
        return { asset, success };
      } catch (error) {
        return { asset, success: false, error: errorMessage(error) };
      }
    })
  );
}
