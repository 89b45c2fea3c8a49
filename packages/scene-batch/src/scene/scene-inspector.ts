/**
 * Scene Path Inspection
 *
 * Derives the on-disk state of one scene: which required asset
 * directories exist, how many frame files each holds, and which zip
 * archives fail their integrity check. Nothing here is cached; every
 * call reads the filesystem again.
 *
 * @module scene/scene-inspector
 */

import { existsSync } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import StreamZip from 'node-stream-zip';

import {
  DEPTH_ASSET,
  INTRINSICS_ASSET,
  WIDE_ASSET,
  requiredDirectories,
  type AssetSpec,
  type SceneThresholds,
} from '../core/assets.js';
import type { AssetSet } from '../core/types.js';

// ============================================================================
// Types
// ============================================================================

export interface AssetDirectoryState {
  readonly asset: string;
  readonly extension: AssetSpec['extension'];
  readonly present: boolean;
  /** Files carrying the asset's frame extension */
  readonly fileCount: number;
  /** Every entry, whatever its kind */
  readonly entryCount: number;
}

export interface ScenePathState {
  readonly scenePath: string;
  readonly exists: boolean;
  readonly directories: readonly AssetDirectoryState[];
  /** File names of zip archives that failed to decompress */
  readonly corruptArchives: readonly string[];
}

export type SceneValidationStatus =
  | 'complete'
  | 'missing_intrinsics'
  | 'missing_other'
  | 'corrupted';

export interface MissingAsset {
  readonly asset: string;
  readonly reason: 'absent' | 'underfilled';
  readonly fileCount: number;
}

export interface SceneValidation {
  readonly status: SceneValidationStatus;
  readonly missing: readonly MissingAsset[];
  readonly corrupted: readonly string[];
}

// ============================================================================
// Inspection
// ============================================================================

/**
 * Read the state of a scene directory
 */
export async function inspectScene(
  scenePath: string,
  assets: AssetSet
): Promise<ScenePathState> {
  if (!existsSync(scenePath)) {
    return { scenePath, exists: false, directories: [], corruptArchives: [] };
  }

  const directories = await Promise.all(
    requiredDirectories(assets).map((spec) => inspectAssetDirectory(scenePath, spec))
  );

  return {
    scenePath,
    exists: true,
    directories,
    corruptArchives: await findCorruptArchives(scenePath),
  };
}

async function inspectAssetDirectory(
  scenePath: string,
  spec: AssetSpec
): Promise<AssetDirectoryState> {
  const dir = join(scenePath, spec.name);
  const absent: AssetDirectoryState = {
    asset: spec.name,
    extension: spec.extension,
    present: false,
    fileCount: 0,
    entryCount: 0,
  };

  if (!existsSync(dir) || !(await stat(dir)).isDirectory()) {
    return absent;
  }

  const entries = await readdir(dir, { withFileTypes: true });
  const fileCount = entries.filter(
    (entry) => entry.isFile() && extname(entry.name) === spec.extension
  ).length;

  return { ...absent, present: true, fileCount, entryCount: entries.length };
}

/**
 * Decompress every entry of every top-level zip archive
 *
 * Entries are streamed from disk one at a time, and node-stream-zip
 * checks each entry's CRC and size as its stream ends, so a truncated or
 * bit-flipped archive rejects without the archive ever being buffered.
 */
export async function findCorruptArchives(scenePath: string): Promise<readonly string[]> {
  const entries = await readdir(scenePath, { withFileTypes: true });
  const corrupt: string[] = [];

  for (const entry of entries) {
    if (!entry.isFile() || extname(entry.name).toLowerCase() !== '.zip') {
      continue;
    }
    if (!(await isArchiveIntact(join(scenePath, entry.name)))) {
      corrupt.push(entry.name);
    }
  }

  return corrupt.sort();
}

function discard(): Writable {
  return new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });
}

/**
 * True when every entry of the archive inflates cleanly
 */
export async function isArchiveIntact(archivePath: string): Promise<boolean> {
  const zip = new StreamZip.async({ file: archivePath });
  try {
    const entries = await zip.entries();
    for (const zipEntry of Object.values(entries)) {
      if (!zipEntry.isDirectory) {
        await pipeline(await zip.stream(zipEntry), discard());
      }
    }
    return true;
  } catch {
    return false;
  } finally {
    // close rejects again when the archive never opened; that is already reported
    await zip.close().catch(() => undefined);
  }
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Reduce an inspected scene to a validation status
 *
 * Corrupt archives win over missing directories. A scene counts as
 * missing only its intrinsics when that is the sole problem, the
 * intrinsics directory is absent, and both image directories exist.
 */
export function validateScene(
  state: ScenePathState,
  thresholds: SceneThresholds
): SceneValidation {
  const missing: MissingAsset[] = [];

  for (const dir of state.directories) {
    if (!dir.present) {
      missing.push({ asset: dir.asset, reason: 'absent', fileCount: 0 });
    } else if (dir.fileCount < thresholds.minFilesPerDirectory) {
      missing.push({ asset: dir.asset, reason: 'underfilled', fileCount: dir.fileCount });
    }
  }

  if (state.corruptArchives.length > 0) {
    return { status: 'corrupted', missing, corrupted: state.corruptArchives };
  }
  if (missing.length === 0) {
    return { status: 'complete', missing, corrupted: [] };
  }

  const only = missing.length === 1 ? missing[0] : undefined;
  if (
    only !== undefined &&
    only.asset === INTRINSICS_ASSET &&
    only.reason === 'absent' &&
    isPresent(state, DEPTH_ASSET) &&
    isPresent(state, WIDE_ASSET)
  ) {
    return { status: 'missing_intrinsics', missing, corrupted: [] };
  }

  return { status: 'missing_other', missing, corrupted: [] };
}

/**
 * Whether a directory of the scene exists, requested or not
 */
export function isPresent(state: ScenePathState, asset: string): boolean {
  const dir = state.directories.find((d) => d.asset === asset);
  if (dir) {
    return dir.present;
  }
  return state.exists && existsSync(join(state.scenePath, asset));
}

/**
 * Human-readable list of missing directories
 */
export function describeMissing(missing: readonly MissingAsset[]): string {
  return missing
    .map((m) => (m.reason === 'absent' ? m.asset : `${m.asset} (${m.fileCount} files)`))
    .join(', ');
}
