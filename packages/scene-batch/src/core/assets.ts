/**
 * Scene Asset Layout
 *
 * Every asset of a scene lives in a directory named after the asset,
 * directly under `<downloadDir>/raw/<split>/<videoId>`. Image assets
 * hold one `.png` per frame, intrinsics assets one `.pincam` per frame,
 * and frames are paired across directories by file name.
 *
 * @module core/assets
 */

import { join } from 'node:path';

import type { AssetSet, SceneKey } from './types.js';

/**
 * What an asset directory contributes to a scene
 */
export type AssetRole = 'depth' | 'wide' | 'intrinsics' | 'auxiliary';

export interface AssetSpec {
  readonly name: string;
  readonly role: AssetRole;
  /** Extension of per-frame files, including the dot */
  readonly extension: '.png' | '.pincam';
}

export const DEPTH_ASSET = 'highres_depth';
export const WIDE_ASSET = 'ultrawide';
export const INTRINSICS_ASSET = 'ultrawide_intrinsics';

/**
 * Assets that unpack into a per-frame directory
 */
export const DIRECTORY_ASSETS: Readonly<Record<string, AssetSpec>> = {
  [DEPTH_ASSET]: { name: DEPTH_ASSET, role: 'depth', extension: '.png' },
  [WIDE_ASSET]: { name: WIDE_ASSET, role: 'wide', extension: '.png' },
  [INTRINSICS_ASSET]: { name: INTRINSICS_ASSET, role: 'intrinsics', extension: '.pincam' },
  confidence: { name: 'confidence', role: 'auxiliary', extension: '.png' },
  vga_wide: { name: 'vga_wide', role: 'auxiliary', extension: '.png' },
  vga_wide_intrinsics: { name: 'vga_wide_intrinsics', role: 'auxiliary', extension: '.pincam' },
};

export const DEFAULT_ASSETS: AssetSet = [DEPTH_ASSET, WIDE_ASSET, INTRINSICS_ASSET];

/**
 * Thresholds that decide whether a directory counts as filled or oversized
 */
export interface SceneThresholds {
  /** Directories with fewer frame files are treated as missing */
  readonly minFilesPerDirectory: number;
  /** Directories with more frame files have not been subsampled */
  readonly subsampleDetectionThreshold: number;
}

export const DEFAULT_THRESHOLDS: SceneThresholds = {
  minFilesPerDirectory: 10,
  subsampleDetectionThreshold: 1000,
};

/**
 * Directory-backed assets of a requested set, in request order
 */
export function requiredDirectories(assets: AssetSet): readonly AssetSpec[] {
  const specs: AssetSpec[] = [];
  for (const asset of assets) {
    const spec = DIRECTORY_ASSETS[asset];
    if (spec && !specs.includes(spec)) {
      specs.push(spec);
    }
  }
  return specs;
}

/**
 * Local directory of a scene
 */
export function scenePath(downloadDir: string, scene: SceneKey): string {
  return join(downloadDir, 'raw', scene.split, scene.videoId);
}
