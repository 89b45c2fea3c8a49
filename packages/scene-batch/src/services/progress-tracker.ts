/**
 * Progress Tracker
 *
 * Owns the aggregate statistics of one wave. `record` is the only way to
 * change them and runs synchronously, so with a single event loop each
 * record is atomic with respect to every reader.
 *
 * Two cadences:
 * - interactive: a status line redrawn in place every few seconds
 * - unattended: a status line written to the log every few minutes, plus
 *   one warning per failure as it happens
 *
 * @module services/progress-tracker
 */

import { TrackerFinalizedError } from '../core/errors.js';
import type { SceneKey, ScenePhase, SceneResult, Split } from '../core/types.js';
import { createSilentLogger, formatDuration, type Logger } from '../cli/lib/logger.js';

// ============================================================================
// Types
// ============================================================================

export type OutcomeBucket = 'skipped' | 'succeeded' | 'failed_download' | 'failed_processing';

export type ProgressMode = 'interactive' | 'unattended';

export interface FailedProcessingEntry {
  readonly scene: SceneKey;
  readonly phase: ScenePhase;
  readonly error?: string;
  /** `videoId` or `videoId (phase)` for the phases worth naming */
  readonly descriptor: string;
}

export interface AggregateStats {
  readonly completed: number;
  readonly succeeded: number;
  readonly skipped: number;
  readonly failedDownloads: readonly SceneKey[];
  readonly failedProcessing: readonly FailedProcessingEntry[];
  readonly successfulScenes: readonly SceneKey[];
}

export interface Throughput {
  readonly ratePerMinute: number;
  /** Minutes to finish the wave; null until a rate is known */
  readonly etaMinutes: number | null;
}

export interface ProgressSummary {
  readonly label: string;
  readonly total: number;
  readonly completed: number;
  readonly succeeded: number;
  readonly skipped: number;
  readonly failedDownloadCount: number;
  readonly failedProcessingCount: number;
  readonly elapsedMs: number;
  readonly ratePerMinute: number;
  /** Percentage of completed scenes that succeeded or were skipped */
  readonly successRate: number;
  /** Seconds per scene that was not skipped */
  readonly avgSecondsPerScene: number;
  readonly failedDownloadSample: readonly string[];
  readonly failedDownloadOverflow: number;
  readonly failedProcessingSample: readonly string[];
  readonly failedProcessingOverflow: number;
  readonly interrupted: boolean;
}

/**
 * Where the interactive status line is drawn
 */
export interface StatusOutput {
  write(chunk: string): unknown;
}

/**
 * Console that hands its lines to the tracker while the status line is live
 */
export interface ConsoleRedirect {
  redirectConsole(write: ((line: string) => void) | null): void;
}

export interface ProgressTrackerOptions {
  readonly total: number;
  readonly label: string;
  readonly mode: ProgressMode;
  readonly logger?: Logger;
  readonly output?: StatusOutput;
  /** Interactive mode prints this console's lines above the status line */
  readonly console?: ConsoleRedirect;
  /** Redraw interval in interactive mode */
  readonly updateIntervalMs?: number;
  /** Status log interval in unattended mode */
  readonly logIntervalMs?: number;
  /** Failure descriptors listed in a summary before truncating */
  readonly failureListLimit?: number;
  readonly clock?: () => number;
}

export const DEFAULT_UPDATE_INTERVAL_MS = 2_000;
export const DEFAULT_LOG_INTERVAL_MS = 300_000;
export const DEFAULT_FAILURE_LIST_LIMIT = 10;

const RATE_WINDOW_MS = 60_000;

const NAMED_FAILURE_PHASES: ReadonlySet<ScenePhase> = new Set<ScenePhase>([
  'removed',
  'removed_missing_intrinsics',
  'redownload_failed',
  'removal_failed',
]);

/**
 * Which counter a result increments
 */
export function bucketForResult(result: SceneResult): OutcomeBucket {
  switch (result.phase) {
    case 'skipped':
    case 'skipped_no_highres':
    case 'removed_no_highres':
      return 'skipped';
    case 'download':
      return 'failed_download';
    default:
      return result.success ? 'succeeded' : 'failed_processing';
  }
}

/**
 * Interactive when stdout is a terminal and the process is not under nohup
 */
export function detectProgressMode(
  stream: { readonly isTTY?: boolean } = process.stdout,
  env: NodeJS.ProcessEnv = process.env
): ProgressMode {
  return stream.isTTY === true && env['NOHUP'] === undefined ? 'interactive' : 'unattended';
}

// ============================================================================
// Tracker
// ============================================================================

export class ProgressTracker {
  readonly label: string;
  readonly total: number;
  readonly mode: ProgressMode;

  private readonly logger: Logger;
  private readonly output: StatusOutput;
  private readonly console: ConsoleRedirect | undefined;
  private readonly updateIntervalMs: number;
  private readonly logIntervalMs: number;
  private readonly failureListLimit: number;
  private readonly clock: () => number;
  private readonly startedAt: number;

  private completed = 0;
  private succeeded = 0;
  private skipped = 0;
  private readonly failedDownloads: SceneKey[] = [];
  private readonly failedProcessing: FailedProcessingEntry[] = [];
  private readonly successfulScenes: SceneKey[] = [];
  private recentCompletions: number[] = [];

  private timer: ReturnType<typeof setInterval> | null = null;
  private finalized = false;

  constructor(options: ProgressTrackerOptions) {
    this.label = options.label;
    this.total = options.total;
    this.mode = options.mode;
    this.logger = options.logger ?? createSilentLogger();
    this.output = options.output ?? process.stdout;
    this.console = options.console;
    this.updateIntervalMs = options.updateIntervalMs ?? DEFAULT_UPDATE_INTERVAL_MS;
    this.logIntervalMs = options.logIntervalMs ?? DEFAULT_LOG_INTERVAL_MS;
    this.failureListLimit = options.failureListLimit ?? DEFAULT_FAILURE_LIST_LIMIT;
    this.clock = options.clock ?? Date.now;
    this.startedAt = this.clock();
  }

  /**
   * Begin the periodic status cadence
   */
  start(): void {
    if (this.timer || this.finalized) return;

    if (this.mode === 'interactive') {
      this.console?.redirectConsole((line) => this.printAbove(line));
      this.timer = setInterval(() => this.redraw(), this.updateIntervalMs);
    } else {
      this.logger.info(`${this.label}: starting`, { total: this.total });
      this.timer = setInterval(() => {
        this.logger.info(this.statusLine());
      }, this.logIntervalMs);
    }
    this.timer.unref();
  }

  /**
   * Fold one result into the statistics
   *
   * @param splitHint - split to record for a successful scene, when it
   *   differs from the result's own
   * @throws TrackerFinalizedError after finalize
   */
  record(result: SceneResult, splitHint?: Split): void {
    if (this.finalized) {
      throw new TrackerFinalizedError(this.label);
    }

    const now = this.clock();
    this.completed++;
    this.recentCompletions.push(now);
    this.recentCompletions = this.recentCompletions.filter((t) => now - t <= RATE_WINDOW_MS);

    switch (bucketForResult(result)) {
      case 'skipped':
        this.skipped++;
        break;
      case 'succeeded':
        this.succeeded++;
        this.successfulScenes.push(
          splitHint && splitHint !== result.scene.split
            ? { videoId: result.scene.videoId, split: splitHint }
            : result.scene
        );
        break;
      case 'failed_download':
        this.failedDownloads.push(result.scene);
        this.reportFailure(result, result.scene.videoId);
        break;
      case 'failed_processing': {
        const descriptor = NAMED_FAILURE_PHASES.has(result.phase)
          ? `${result.scene.videoId} (${result.phase})`
          : result.scene.videoId;
        this.failedProcessing.push({
          scene: result.scene,
          phase: result.phase,
          descriptor,
          ...(result.error !== undefined && { error: result.error }),
        });
        this.reportFailure(result, descriptor);
        break;
      }
    }
  }

  private reportFailure(result: SceneResult, descriptor: string): void {
    if (this.mode !== 'unattended') return;
    this.logger.warn(`${this.label}: scene failed: ${descriptor}`, {
      phase: result.phase,
      ...(result.error !== undefined && { error: result.error }),
    });
  }

  /**
   * Copy of the current statistics
   */
  snapshot(): AggregateStats {
    return {
      completed: this.completed,
      succeeded: this.succeeded,
      skipped: this.skipped,
      failedDownloads: [...this.failedDownloads],
      failedProcessing: [...this.failedProcessing],
      successfulScenes: [...this.successfulScenes],
    };
  }

  /**
   * Rate over the trailing minute, falling back to the whole wave
   */
  throughput(): Throughput {
    const now = this.clock();
    const window = this.recentCompletions.filter((t) => now - t <= RATE_WINDOW_MS);

    let ratePerMinute = 0;
    const first = window[0];
    const last = window[window.length - 1];
    if (window.length >= 2 && first !== undefined && last !== undefined && last > first) {
      ratePerMinute = (window.length - 1) / ((last - first) / 60_000);
    } else {
      const elapsed = now - this.startedAt;
      if (elapsed > 0 && this.completed > 0) {
        ratePerMinute = this.completed / (elapsed / 60_000);
      }
    }

    const remaining = Math.max(0, this.total - this.completed);
    return {
      ratePerMinute,
      etaMinutes: ratePerMinute > 0 ? remaining / ratePerMinute : null,
    };
  }

  /**
   * One-line status, e.g. `Main [=====     ] 50.0% 5/10 | ok 3 skip 1 fail 1 | 2.0/min | ETA 2.5m`
   */
  statusLine(): string {
    const percent = this.total > 0 ? (this.completed / this.total) * 100 : 0;
    const barWidth = 30;
    const filled = Math.min(barWidth, Math.round((percent / 100) * barWidth));
    const bar = `[${'='.repeat(filled)}${' '.repeat(barWidth - filled)}]`;
    const failed = this.failedDownloads.length + this.failedProcessing.length;
    const { ratePerMinute, etaMinutes } = this.throughput();
    const eta = etaMinutes === null ? '--' : `${etaMinutes.toFixed(1)}m`;

    return (
      `${this.label} ${bar} ${percent.toFixed(1)}% ${this.completed}/${this.total}` +
      ` | ok ${this.succeeded} skip ${this.skipped} fail ${failed}` +
      ` | ${ratePerMinute.toFixed(1)}/min | ETA ${eta}`
    );
  }

  private redraw(): void {
    this.output.write(`\r\x1b[K${this.statusLine()}`);
  }

  /**
   * Print a line above the status line, then redraw it
   */
  printAbove(line: string): void {
    this.output.write(`\r\x1b[K${line}\n`);
    if (this.timer) {
      this.redraw();
    }
  }

  /**
   * Stop the cadence and produce the wave summary; callable once
   *
   * @throws TrackerFinalizedError on a second call
   */
  finalize(interrupted = false): ProgressSummary {
    if (this.finalized) {
      throw new TrackerFinalizedError(this.label);
    }
    this.finalized = true;

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      if (this.mode === 'interactive') {
        this.redraw();
        this.output.write('\n');
        this.console?.redirectConsole(null);
      }
    }

    const elapsedMs = this.clock() - this.startedAt;
    const processed = this.completed - this.skipped;
    const failedDownloadIds = this.failedDownloads.map((s) => s.videoId);
    const failedProcessingIds = this.failedProcessing.map((f) => f.descriptor);

    return Object.freeze({
      label: this.label,
      total: this.total,
      completed: this.completed,
      succeeded: this.succeeded,
      skipped: this.skipped,
      failedDownloadCount: this.failedDownloads.length,
      failedProcessingCount: this.failedProcessing.length,
      elapsedMs,
      ratePerMinute: elapsedMs > 0 ? this.completed / (elapsedMs / 60_000) : 0,
      successRate:
        this.completed > 0 ? ((this.succeeded + this.skipped) / this.completed) * 100 : 0,
      avgSecondsPerScene: processed > 0 ? elapsedMs / 1000 / processed : 0,
      failedDownloadSample: failedDownloadIds.slice(0, this.failureListLimit),
      failedDownloadOverflow: Math.max(0, failedDownloadIds.length - this.failureListLimit),
      failedProcessingSample: failedProcessingIds.slice(0, this.failureListLimit),
      failedProcessingOverflow: Math.max(0, failedProcessingIds.length - this.failureListLimit),
      interrupted,
    });
  }
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Summary report lines for a finalized wave
 */
export function formatSummary(summary: ProgressSummary): string[] {
  const rule = '='.repeat(80);
  const lines = [
    rule,
    `${summary.label}: ${summary.interrupted ? 'INTERRUPTED' : 'COMPLETE'}`,
    rule,
    `Total time: ${formatDuration(summary.elapsedMs)}`,
    `Scenes processed: ${summary.completed}/${summary.total}`,
    `Successful: ${summary.succeeded}`,
    `Skipped (already complete): ${summary.skipped}`,
    `Failed downloads: ${summary.failedDownloadCount}`,
    `Failed processing: ${summary.failedProcessingCount}`,
    `Success rate: ${summary.successRate.toFixed(1)}%`,
  ];

  if (summary.avgSecondsPerScene > 0) {
    lines.push(`Average time per scene: ${summary.avgSecondsPerScene.toFixed(1)}s`);
  }

  if (summary.failedDownloadSample.length > 0) {
    lines.push(`Failed downloads: ${summary.failedDownloadSample.join(', ')}`);
    if (summary.failedDownloadOverflow > 0) {
      lines.push(`   ... and ${summary.failedDownloadOverflow} more`);
    }
  }

  if (summary.failedProcessingSample.length > 0) {
    lines.push(`Failed processing: ${summary.failedProcessingSample.join(', ')}`);
    if (summary.failedProcessingOverflow > 0) {
      lines.push(`   ... and ${summary.failedProcessingOverflow} more`);
    }
  }

  return lines;
}
