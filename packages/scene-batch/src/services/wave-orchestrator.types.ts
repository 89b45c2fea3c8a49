/**
 * Wave Orchestrator Types
 *
 * Type definitions for multi-wave scene reconciliation runs.
 */

import type { AssetSet, SceneKey, SceneResult } from '../core/types.js';
import type { AggregateStats, ProgressSummary } from './progress-tracker.js';

/**
 * Waves in the order they run
 */
export type WaveName =
  | 'main'
  | 'download_retry'
  | 'intrinsics_repair'
  | 'empty_directory_repair';

export const WAVE_LABELS: Readonly<Record<WaveName, string>> = {
  main: 'Main',
  download_retry: 'Download retry',
  intrinsics_repair: 'Intrinsics repair',
  empty_directory_repair: 'Empty directory repair',
};

/**
 * Options of a whole run
 */
export interface RunOptions {
  readonly downloadDir: string;
  readonly assets: AssetSet;
  readonly subsampleN: number;
  readonly execute: boolean;
  readonly skipDownload: boolean;
  readonly forceReprocess: boolean;
  /** Classify only: no downloads, no destructive work, no empty-dir repair */
  readonly validateOnly: boolean;
  /** Suppress per-scene output from workers */
  readonly quiet: boolean;
  /** Tasks in flight per wave */
  readonly workers: number;
}

/**
 * What one wave did
 */
export interface WaveOutcome {
  readonly wave: WaveName;
  readonly scenes: readonly SceneKey[];
  readonly results: readonly SceneResult[];
  readonly stats: AggregateStats;
  readonly summary: ProgressSummary;
  /** Scenes never started because shutdown was requested */
  readonly cancelledTasks: number;
}

/**
 * What a whole run did
 */
export interface RunReport {
  readonly waves: readonly WaveOutcome[];
  /** Directories deleted after failing a repair wave, phase `removed` */
  readonly removals: readonly SceneResult[];
  /** Scenes found with present-but-empty asset directories */
  readonly emptyDirectoryScenes: readonly SceneKey[];
  readonly interrupted: boolean;
  readonly durationMs: number;
}

/**
 * Outcome of a wave by name, if it ran
 */
export function findWave(report: RunReport, wave: WaveName): WaveOutcome | undefined {
  return report.waves.find((w) => w.wave === wave);
}
