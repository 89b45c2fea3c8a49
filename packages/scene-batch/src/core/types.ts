/**
 * Scene Batch Core Types
 *
 * Domain types shared by the classifier, executor, pool, tracker and
 * orchestrator. Everything here is immutable once constructed; results
 * cross async boundaries as frozen values.
 *
 * @module core/types
 */

// ============================================================================
// Scene Identity
// ============================================================================

/**
 * Dataset partition a scene belongs to
 */
export type Split = 'Training' | 'Validation';

/**
 * Splits in catalog order
 */
export const SPLITS: readonly Split[] = ['Training', 'Validation'];

/**
 * Identity of one capture session
 */
export interface SceneKey {
  readonly videoId: string;
  readonly split: Split;
}

/**
 * Ordered list of asset names to download and validate
 */
export type AssetSet = readonly string[];

/**
 * Narrow an arbitrary string to a split name
 */
export function isSplit(value: string): value is Split {
  return value === 'Training' || value === 'Validation';
}

/**
 * Create a frozen scene key
 */
export function sceneKey(videoId: string, split: Split): SceneKey {
  return Object.freeze({ videoId, split });
}

/**
 * Stable display id, e.g. `Training/41069025`
 */
export function sceneId(key: SceneKey): string {
  return `${key.split}/${key.videoId}`;
}

// ============================================================================
// Classification
// ============================================================================

/**
 * Decision the classifier reaches for a scene
 */
export type SceneAction =
  | 'skip'
  | 'skip_no_highres'
  | 'redownload'
  | 'remove'
  | 'process';

export interface Classification {
  readonly action: SceneAction;
  readonly reason: string;
}

// ============================================================================
// Tasks
// ============================================================================

/**
 * One unit of work handed to the worker pool
 */
export interface TaskSpec {
  readonly scene: SceneKey;
  readonly downloadDir: string;
  readonly assets: AssetSet;
  /** Keep every Nth frame; 1 disables subsampling */
  readonly subsampleN: number;
  /** Dry run when false: frame pruning and subsampling only report */
  readonly execute: boolean;
  readonly skipDownload: boolean;
  readonly forceReprocess: boolean;
  /** Suppress subprocess output and per-scene chatter */
  readonly quiet: boolean;
  /** 0 for the main wave, > 0 for repair waves */
  readonly redownloadAttempt: number;
}

// ============================================================================
// Results
// ============================================================================

/**
 * Terminal phase of one scene task
 */
export type ScenePhase =
  | 'skipped'
  | 'skipped_no_highres'
  | 'removed_no_highres'
  | 'removal_failed'
  | 'download'
  | 'redownload_failed'
  | 'removed_missing_intrinsics'
  | 'removed'
  | 'processing'
  | 'exception'
  | 'completed';

/**
 * Success flag carried by each phase
 */
export const PHASE_SUCCESS: Readonly<Record<ScenePhase, boolean>> = {
  skipped: true,
  skipped_no_highres: true,
  removed_no_highres: true,
  removal_failed: false,
  download: false,
  redownload_failed: false,
  removed_missing_intrinsics: false,
  removed: false,
  processing: false,
  exception: false,
  completed: true,
};

/**
 * Outcome of one scene task
 */
export interface SceneResult {
  readonly scene: SceneKey;
  readonly phase: ScenePhase;
  readonly success: boolean;
  readonly error?: string;
  readonly reason?: string;
}

/**
 * Build a frozen result whose success flag agrees with its phase
 */
export function createSceneResult(
  scene: SceneKey,
  phase: ScenePhase,
  details: { readonly error?: string; readonly reason?: string } = {}
): SceneResult {
  return Object.freeze({
    scene,
    phase,
    success: PHASE_SUCCESS[phase],
    ...(details.error !== undefined && { error: details.error }),
    ...(details.reason !== undefined && { reason: details.reason }),
  });
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
