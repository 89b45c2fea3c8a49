/**
 * Test fixtures: temporary dataset trees and a fake downloader
 */

import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { DIRECTORY_ASSETS, scenePath } from '../../core/assets.js';
import type { SceneKey } from '../../core/types.js';
import type { LogLevel, LogMetadata, Logger } from '../../cli/lib/logger.js';
import type { AssetDownloadRequest, AssetDownloader } from '../../services/download-runner.js';

/**
 * Fresh directory under the OS temp dir
 */
export function createTempDir(prefix: string): string {
  const dir = join(tmpdir(), `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Frame file name for index i, e.g. `41000001_10003.png`
 */
export function frameName(videoId: string, index: number, extension: string): string {
  return `${videoId}_${10000 + index}${extension}`;
}

/**
 * Write `count` frames into dir, indices 0..count-1
 */
export function writeFrames(dir: string, videoId: string, count: number, extension: string): void {
  mkdirSync(dir, { recursive: true });
  for (let i = 0; i < count; i++) {
    writeFileSync(join(dir, frameName(videoId, i, extension)), `frame ${i}`);
  }
}

/**
 * Frames per asset directory; 0 creates an empty directory
 */
export type SceneLayout = Readonly<Record<string, number>>;

/**
 * Create a scene directory with the given asset directories
 */
export function buildScene(downloadDir: string, scene: SceneKey, layout: SceneLayout): string {
  const path = scenePath(downloadDir, scene);
  mkdirSync(path, { recursive: true });
  for (const [asset, count] of Object.entries(layout)) {
    const spec = DIRECTORY_ASSETS[asset];
    writeFrames(join(path, asset), scene.videoId, count, spec ? spec.extension : '.png');
  }
  return path;
}

/**
 * Full default layout with `frames` per directory
 */
export function completeLayout(frames: number): SceneLayout {
  return { highres_depth: frames, ultrawide: frames, ultrawide_intrinsics: frames };
}

/**
 * Write a metadata CSV marking the listed scenes eligible or not
 */
export function writeEligibility(downloadDir: string, flags: Readonly<Record<string, boolean>>): void {
  const lines = ['video_id,visit_id,is_in_upsampling'];
  for (const [videoId, eligible] of Object.entries(flags)) {
    lines.push(`${videoId},1,${eligible ? 'True' : 'False'}`);
  }
  mkdirSync(join(downloadDir, 'raw'), { recursive: true });
  writeFileSync(join(downloadDir, 'raw', 'metadata.csv'), `${lines.join('\n')}\n`);
}

/**
 * What the fake downloader does with one request
 *
 * - `ok`: write `frames` frame files into the asset directory
 * - `fail`: write nothing, report failure
 * - `empty`: create the asset directory with no files, report success
 * - `noop`: write nothing, report success
 */
export type FakeDownloadBehavior = 'ok' | 'fail' | 'empty' | 'noop';

export interface FakeDownloaderOptions {
  readonly frames?: number;
  /** Decide per request; `attempt` counts earlier requests for the same scene and asset */
  readonly behavior?: (request: AssetDownloadRequest, attempt: number) => FakeDownloadBehavior;
}

/**
 * Downloader that materialises frames on disk instead of fetching them
 */
export class FakeDownloader implements AssetDownloader {
  readonly requests: AssetDownloadRequest[] = [];
  private readonly attempts = new Map<string, number>();
  private readonly frames: number;
  private readonly behavior: (request: AssetDownloadRequest, attempt: number) => FakeDownloadBehavior;

  constructor(options: FakeDownloaderOptions = {}) {
    this.frames = options.frames ?? 30;
    this.behavior = options.behavior ?? (() => 'ok');
  }

  async downloadAsset(request: AssetDownloadRequest): Promise<boolean> {
    this.requests.push(request);
    const key = `${request.scene.videoId}/${request.asset}`;
    const attempt = this.attempts.get(key) ?? 0;
    this.attempts.set(key, attempt + 1);

    const dir = join(scenePath(request.downloadDir, request.scene), request.asset);
    const spec = DIRECTORY_ASSETS[request.asset];

    switch (this.behavior(request, attempt)) {
      case 'fail':
        return false;
      case 'noop':
        return true;
      case 'empty':
        mkdirSync(dir, { recursive: true });
        return true;
      case 'ok':
        writeFrames(dir, request.scene.videoId, this.frames, spec ? spec.extension : '.png');
        return true;
    }
  }

  /**
   * Scenes that were asked for at least once, in first-request order
   */
  requestedScenes(): string[] {
    return [...new Set(this.requests.map((r) => r.scene.videoId))];
  }
}

export interface RecordedLogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly metadata?: LogMetadata;
}

/**
 * Logger that keeps every entry for assertions
 */
export class RecordingLogger implements Logger {
  readonly entries: RecordedLogEntry[] = [];

  debug(message: string, metadata?: LogMetadata): void {
    this.entries.push({ level: 'debug', message, metadata });
  }

  info(message: string, metadata?: LogMetadata): void {
    this.entries.push({ level: 'info', message, metadata });
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.entries.push({ level: 'warn', message, metadata });
  }

  error(message: string, metadata?: LogMetadata): void {
    this.entries.push({ level: 'error', message, metadata });
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message);
  }
}
