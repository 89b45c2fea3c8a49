/**
 * Scene Classifier
 *
 * Decides what to do with one scene from its local state alone. The rules
 * are ordered and the first match wins, so a scene that is both
 * ineligible and corrupt is removed rather than reprocessed.
 *
 * Classification only reads the filesystem and is safe to call
 * repeatedly and concurrently; a re-run after an interrupted batch
 * reaches the same decisions for every scene nobody touched since.
 *
 * @module scene/scene-classifier
 */

import { existsSync } from 'node:fs';

import {
  DEFAULT_THRESHOLDS,
  DEPTH_ASSET,
  scenePath,
  type SceneThresholds,
} from '../core/assets.js';
import type { AssetSet, Classification, SceneKey } from '../core/types.js';
import type { HighResEligibility } from '../catalog/scene-catalog.js';
import { describeMissing, inspectScene, isPresent, validateScene } from './scene-inspector.js';

/**
 * Something that can classify a scene
 */
export interface SceneClassification {
  classify(
    scene: SceneKey,
    downloadDir: string,
    assets: AssetSet,
    subsampleN: number
  ): Promise<Classification>;
}

/**
 * Rule-ordered classifier over disk state and eligibility metadata
 *
 * @example
 * ```typescript
 * const classifier = new SceneClassifier(await HighResEligibilityIndex.load('./data'));
 * const { action, reason } = await classifier.classify(
 *   sceneKey('41069025', 'Training'),
 *   './data',
 *   DEFAULT_ASSETS,
 *   10
 * );
 * ```
 */
export class SceneClassifier implements SceneClassification {
  constructor(
    private readonly eligibility: HighResEligibility,
    private readonly thresholds: SceneThresholds = DEFAULT_THRESHOLDS
  ) {}

  async classify(
    scene: SceneKey,
    downloadDir: string,
    assets: AssetSet,
    subsampleN: number
  ): Promise<Classification> {
    const path = scenePath(downloadDir, scene);

    if (assets.includes(DEPTH_ASSET) && !this.eligibility.isHighResEligible(scene.videoId)) {
      return existsSync(path)
        ? { action: 'remove', reason: 'Scene has no high-resolution depth capture' }
        : { action: 'skip_no_highres', reason: 'No high-resolution depth capture available' };
    }

    const state = await inspectScene(path, assets);
    if (!state.exists) {
      return { action: 'process', reason: "Scene directory doesn't exist" };
    }

    const validation = validateScene(state, this.thresholds);

    switch (validation.status) {
      case 'corrupted':
        return {
          action: 'process',
          reason: `Corrupted files: ${validation.corrupted.join(', ')}`,
        };

      case 'missing_intrinsics':
        return {
          action: 'redownload',
          reason: 'Missing intrinsics with images present',
        };

      case 'missing_other':
        if (assets.includes(DEPTH_ASSET) && !isPresent(state, DEPTH_ASSET)) {
          return { action: 'remove', reason: 'Missing high-resolution depth directory' };
        }
        return { action: 'process', reason: `Missing: ${describeMissing(validation.missing)}` };

      case 'complete': {
        if (subsampleN > 1) {
          const oversized = state.directories.find(
            (d) => d.present && d.fileCount > this.thresholds.subsampleDetectionThreshold
          );
          if (oversized) {
            return {
              action: 'process',
              reason: `Subsampling not applied to ${oversized.asset} (${oversized.fileCount} files)`,
            };
          }
        }
        return { action: 'skip', reason: 'Scene is complete' };
      }
    }
  }
}
