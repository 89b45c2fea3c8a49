/**
 * Scene Catalog
 *
 * Reads the two catalog CSVs a run depends on:
 *
 * - the scene list (`video_id`, `fold`), which names every scene of both
 *   splits;
 * - the high-resolution metadata (`video_id`, `is_in_upsampling`), which
 *   says which scenes have a high-resolution depth capture at all.
 *
 * @module catalog/scene-catalog
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { CatalogError } from '../core/errors.js';
import { SPLITS, errorMessage, isSplit, sceneKey, type SceneKey, type Split } from '../core/types.js';
import { parseCsv } from './csv.js';

// ============================================================================
// Scene List
// ============================================================================

/**
 * Default scene list location, relative to the working directory
 */
export const DEFAULT_SCENE_LIST = join('raw', 'raw_train_val_splits.csv');

/**
 * Which slice of the catalog a run works on
 */
export interface SceneSelection {
  /** Restrict to one split; both splits (Training first) otherwise */
  readonly split?: Split;
  /** Offset into the ordered list */
  readonly start?: number;
  /** Maximum scenes after the offset */
  readonly count?: number;
}

/**
 * Load every scene named by a scene list CSV
 *
 * Rows whose fold is not a known split are ignored.
 *
 * @throws CatalogError if the file is missing or lacks the expected columns
 */
export async function loadSceneList(csvPath: string): Promise<readonly SceneKey[]> {
  if (!existsSync(csvPath)) {
    throw new CatalogError(`Scene list not found: ${csvPath}`, csvPath);
  }

  const { headers, rows } = parseCsv(await readFile(csvPath, 'utf-8'));
  for (const column of ['video_id', 'fold']) {
    if (!headers.includes(column)) {
      throw new CatalogError(`Scene list is missing column '${column}'`, csvPath, 1);
    }
  }

  const scenes: SceneKey[] = [];
  for (const row of rows) {
    const videoId = row['video_id'] ?? '';
    const fold = row['fold'] ?? '';
    if (videoId && isSplit(fold)) {
      scenes.push(sceneKey(videoId, fold));
    }
  }
  return scenes;
}

/**
 * Order scenes by split, then apply the start/count window
 */
export function selectScenes(
  scenes: readonly SceneKey[],
  selection: SceneSelection = {}
): readonly SceneKey[] {
  const splits = selection.split ? [selection.split] : SPLITS;
  const ordered = splits.flatMap((split) => scenes.filter((s) => s.split === split));

  const start = Math.max(0, selection.start ?? 0);
  const end = selection.count !== undefined ? start + Math.max(0, selection.count) : undefined;
  return ordered.slice(start, end);
}

// ============================================================================
// High-Resolution Eligibility
// ============================================================================

/**
 * Answers whether a scene has a high-resolution depth capture
 */
export interface HighResEligibility {
  isHighResEligible(videoId: string): boolean;
}

/**
 * How the eligibility index was built
 *
 * - `assume-eligible`: no metadata file, every scene is eligible
 * - `indexed`: metadata parsed, unlisted scenes are ineligible
 * - `unreadable`: metadata present but broken, no scene is eligible
 */
export type EligibilitySource = 'assume-eligible' | 'indexed' | 'unreadable';

/**
 * Eligibility lookup built from `raw/metadata.csv`
 */
export class HighResEligibilityIndex implements HighResEligibility {
  private constructor(
    readonly source: EligibilitySource,
    private readonly eligible: ReadonlyMap<string, boolean>,
    readonly problem?: string
  ) {}

  /**
   * Index that treats every scene as eligible
   */
  static assumeEligible(): HighResEligibilityIndex {
    return new HighResEligibilityIndex('assume-eligible', new Map());
  }

  /**
   * Index over explicit per-scene flags
   */
  static fromEntries(entries: Iterable<readonly [string, boolean]>): HighResEligibilityIndex {
    return new HighResEligibilityIndex('indexed', new Map(entries));
  }

  /**
   * Load the index from a download directory
   */
  static async load(downloadDir: string): Promise<HighResEligibilityIndex> {
    const metadataPath = metadataPathFor(downloadDir);
    if (!existsSync(metadataPath)) {
      return HighResEligibilityIndex.assumeEligible();
    }

    try {
      const { headers, rows } = parseCsv(await readFile(metadataPath, 'utf-8'));
      if (!headers.includes('video_id') || !headers.includes('is_in_upsampling')) {
        return new HighResEligibilityIndex(
          'unreadable',
          new Map(),
          `missing video_id or is_in_upsampling column in ${metadataPath}`
        );
      }

      const entries = new Map<string, boolean>();
      for (const row of rows) {
        const videoId = row['video_id'];
        if (videoId) {
          entries.set(videoId, (row['is_in_upsampling'] ?? '').toLowerCase() === 'true');
        }
      }
      return new HighResEligibilityIndex('indexed', entries);
    } catch (error) {
      return new HighResEligibilityIndex('unreadable', new Map(), errorMessage(error));
    }
  }

  isHighResEligible(videoId: string): boolean {
    switch (this.source) {
      case 'assume-eligible':
        return true;
      case 'unreadable':
        return false;
      case 'indexed':
        return this.eligible.get(videoId) ?? false;
    }
  }

  /**
   * Number of scenes flagged eligible
   */
  get eligibleCount(): number {
    let count = 0;
    for (const flag of this.eligible.values()) {
      if (flag) count++;
    }
    return count;
  }
}

/**
 * Location of the eligibility metadata inside a download directory
 */
export function metadataPathFor(downloadDir: string): string {
  return join(downloadDir, 'raw', 'metadata.csv');
}
