/**
 * Scene File Operations
 *
 * Destructive operations on a scene directory: removal, pruning
 * unmatched frames, and subsampling. Pruning and subsampling honour
 * `execute`; with `execute: false` they log what they would delete and
 * change nothing. Removing a scene the run has given up on always deletes.
 *
 * @module scene/scene-files
 */

import { existsSync } from 'node:fs';
import { readdir, rm } from 'node:fs/promises';
import { extname, join, parse } from 'node:path';

import { requiredDirectories, type AssetSpec } from '../core/assets.js';
import type { AssetSet } from '../core/types.js';
import { createSilentLogger, type Logger } from '../cli/lib/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface FileOperationOptions {
  readonly execute: boolean;
  readonly quiet: boolean;
}

export type RemovalOptions = Pick<FileOperationOptions, 'quiet'>;

/**
 * Operations the executor and orchestrator perform on scene directories
 */
export interface SceneFileOperations {
  removeScene(scenePath: string, options: RemovalOptions): Promise<boolean>;
  cleanAndMatch(scenePath: string, assets: AssetSet, options: FileOperationOptions): Promise<boolean>;
  subsample(
    scenePath: string,
    assets: AssetSet,
    factor: number,
    options: FileOperationOptions
  ): Promise<boolean>;
  findEmptyAssetDirectories(scenePath: string, assets: AssetSet): Promise<readonly string[]>;
}

/**
 * Frame-level integrity of one scene
 */
export interface SceneIntegrityReport {
  readonly scenePath: string;
  readonly valid: boolean;
  readonly counts: Readonly<Record<string, number>>;
  readonly missingDirectories: readonly string[];
  /** Frames present in every required directory */
  readonly matchedFrames: number;
  /** Frame stems missing from at least one directory, sorted */
  readonly unmatchedFrames: readonly string[];
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * File name without its last extension
 */
export function fileStem(fileName: string): string {
  return parse(fileName).name;
}

/**
 * Frame timestamp: the part of the stem after its last underscore
 */
export function frameTimestamp(fileName: string): string {
  const stem = fileStem(fileName);
  const index = stem.lastIndexOf('_');
  return index === -1 ? stem : stem.slice(index + 1);
}

async function listFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries.filter((e) => e.isFile()).map((e) => e.name);
}

async function listFrames(dir: string, spec: AssetSpec): Promise<string[]> {
  return (await listFiles(dir)).filter((name) => extname(name) === spec.extension).sort();
}

// ============================================================================
// Implementation
// ============================================================================

/**
 * Filesystem-backed scene operations
 */
export class SceneFiles implements SceneFileOperations {
  constructor(private readonly logger: Logger = createSilentLogger()) {}

  private note(options: RemovalOptions, message: string, metadata?: Record<string, unknown>): void {
    if (options.quiet) {
      this.logger.debug(message, metadata);
    } else {
      this.logger.info(message, metadata);
    }
  }

  /**
   * Remove a scene directory and everything under it
   *
   * Removing a scene that is already gone succeeds. A dry run still
   * removes: the scene is reported as gone and must not linger.
   */
  async removeScene(scenePath: string, options: RemovalOptions): Promise<boolean> {
    if (!existsSync(scenePath)) {
      return true;
    }

    try {
      await rm(scenePath, { recursive: true, force: true });
      this.note(options, 'Removed scene directory', { scenePath });
      return true;
    } catch (error) {
      this.logger.error('Failed to remove scene directory', {
        scenePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * Drop unrequested directories, then frames without a counterpart
   *
   * A frame survives only when a file with the same stem exists in every
   * required directory. Fails when a required directory is absent.
   */
  async cleanAndMatch(
    scenePath: string,
    assets: AssetSet,
    options: FileOperationOptions
  ): Promise<boolean> {
    if (!existsSync(scenePath)) {
      this.logger.warn('Scene directory missing before cleanup', { scenePath });
      return false;
    }

    const required = requiredDirectories(assets);
    const keep = new Set(required.map((spec) => spec.name));

    const entries = await readdir(scenePath, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.isDirectory() && !keep.has(entry.name)) {
        const dir = join(scenePath, entry.name);
        if (options.execute) {
          await rm(dir, { recursive: true, force: true });
          this.note(options, 'Removed unrequested directory', { dir });
        } else {
          this.note(options, 'Would remove unrequested directory', { dir });
        }
      }
    }

    const filesByDir = new Map<string, string[]>();
    for (const spec of required) {
      const dir = join(scenePath, spec.name);
      if (!existsSync(dir)) {
        this.logger.warn('Required directory missing', { scenePath, asset: spec.name });
        return false;
      }
      filesByDir.set(spec.name, await listFiles(dir));
    }

    let common: Set<string> | null = null;
    for (const files of filesByDir.values()) {
      const stems = new Set(files.map(fileStem));
      common = common === null ? stems : new Set([...common].filter((s: string) => stems.has(s)));
    }
    const matched = common ?? new Set<string>();

    for (const [asset, files] of filesByDir) {
      const unmatched = files.filter((name) => !matched.has(fileStem(name)));
      if (unmatched.length === 0) continue;

      if (options.execute) {
        await Promise.all(unmatched.map((name) => rm(join(scenePath, asset, name), { force: true })));
        this.note(options, 'Removed unmatched frames', { asset, count: unmatched.length });
      } else {
        this.note(options, 'Would remove unmatched frames', { asset, count: unmatched.length });
      }
    }

    return true;
  }

  /**
   * Keep every Nth frame of every required directory
   *
   * Frames are sorted by name and kept at indices 0, N, 2N, ..., so M
   * frames become ceil(M / N). Directories hold matching stems after
   * cleanAndMatch, so intrinsics keep exactly the frames the images keep.
   */
  async subsample(
    scenePath: string,
    assets: AssetSet,
    factor: number,
    options: FileOperationOptions
  ): Promise<boolean> {
    if (factor <= 1) {
      return true;
    }

    for (const spec of requiredDirectories(assets)) {
      const dir = join(scenePath, spec.name);
      if (!existsSync(dir)) {
        this.logger.warn('Cannot subsample missing directory', { scenePath, asset: spec.name });
        return false;
      }

      const frames = await listFrames(dir, spec);
      const dropped = frames.filter((_, index) => index % factor !== 0);

      if (options.execute) {
        await Promise.all(dropped.map((name) => rm(join(dir, name), { force: true })));
        this.note(options, 'Subsampled directory', {
          asset: spec.name,
          before: frames.length,
          after: frames.length - dropped.length,
        });
      } else {
        this.note(options, 'Would subsample directory', {
          asset: spec.name,
          before: frames.length,
          after: frames.length - dropped.length,
        });
      }
    }

    return true;
  }

  /**
   * Required directories that exist but hold no entries at all
   */
  async findEmptyAssetDirectories(scenePath: string, assets: AssetSet): Promise<readonly string[]> {
    const empty: string[] = [];
    for (const spec of requiredDirectories(assets)) {
      const dir = join(scenePath, spec.name);
      if (existsSync(dir) && (await readdir(dir)).length === 0) {
        empty.push(spec.name);
      }
    }
    return empty;
  }
}

/**
 * Compare frames across the required directories of a scene
 *
 * Frames pair up by timestamp, so files of different extensions (images
 * against intrinsics) match when their timestamps agree.
 */
export async function verifySceneIntegrity(
  scenePath: string,
  assets: AssetSet
): Promise<SceneIntegrityReport> {
  const counts: Record<string, number> = {};
  const missingDirectories: string[] = [];
  const timestampsByDir: Set<string>[] = [];

  for (const spec of requiredDirectories(assets)) {
    const dir = join(scenePath, spec.name);
    if (!existsSync(dir)) {
      missingDirectories.push(spec.name);
      counts[spec.name] = 0;
      continue;
    }
    const frames = await listFrames(dir, spec);
    counts[spec.name] = frames.length;
    timestampsByDir.push(new Set(frames.map(frameTimestamp)));
  }

  const all = new Set<string>();
  for (const stamps of timestampsByDir) {
    for (const stamp of stamps) all.add(stamp);
  }

  let matchedFrames = 0;
  const unmatchedFrames: string[] = [];
  for (const stamp of all) {
    if (timestampsByDir.every((stamps) => stamps.has(stamp))) {
      matchedFrames++;
    } else {
      unmatchedFrames.push(stamp);
    }
  }
  unmatchedFrames.sort();

  return {
    scenePath,
    valid: missingDirectories.length === 0 && unmatchedFrames.length === 0,
    counts,
    missingDirectories,
    matchedFrames,
    unmatchedFrames,
  };
}
