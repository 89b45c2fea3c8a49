/**
 * Progress Tracker Tests
 *
 * A manual clock drives every time-dependent value.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';

import { TrackerFinalizedError } from '../../../core/errors.js';
import { createSceneResult, sceneKey, type ScenePhase, type SceneResult } from '../../../core/types.js';
import {
  ProgressTracker,
  bucketForResult,
  detectProgressMode,
  formatSummary,
  type ProgressMode,
} from '../../../services/progress-tracker.js';
import { RecordingLogger } from '../../utils/fixtures.js';

class ManualClock {
  now = 0;
  readonly read = (): number => this.now;
}

function result(videoId: string, phase: ScenePhase, error?: string): SceneResult {
  return createSceneResult(sceneKey(videoId, 'Training'), phase, error === undefined ? {} : { error });
}

interface TrackerOverrides {
  readonly total?: number;
  readonly mode?: ProgressMode;
  readonly logger?: RecordingLogger;
  readonly failureListLimit?: number;
  readonly writes?: string[];
}

function tracker(clock: ManualClock, overrides: TrackerOverrides = {}): ProgressTracker {
  const writes = overrides.writes ?? [];
  return new ProgressTracker({
    label: 'Main',
    total: overrides.total ?? 10,
    mode: overrides.mode ?? 'interactive',
    clock: clock.read,
    output: { write: (chunk: string) => writes.push(chunk) },
    ...(overrides.logger !== undefined && { logger: overrides.logger }),
    ...(overrides.failureListLimit !== undefined && { failureListLimit: overrides.failureListLimit }),
  });
}

describe('bucketForResult', () => {
  it.each<[ScenePhase, string]>([
    ['skipped', 'skipped'],
    ['skipped_no_highres', 'skipped'],
    ['removed_no_highres', 'skipped'],
    ['completed', 'succeeded'],
    ['download', 'failed_download'],
    ['redownload_failed', 'failed_processing'],
    ['removed_missing_intrinsics', 'failed_processing'],
    ['removed', 'failed_processing'],
    ['removal_failed', 'failed_processing'],
    ['processing', 'failed_processing'],
    ['exception', 'failed_processing'],
  ])('maps %s to %s', (phase, bucket) => {
    expect(bucketForResult(result('1', phase))).toBe(bucket);
  });
});

describe('detectProgressMode', () => {
  it('is interactive only on a terminal outside nohup', () => {
    expect(detectProgressMode({ isTTY: true }, {})).toBe('interactive');
    expect(detectProgressMode({ isTTY: true }, { NOHUP: '1' })).toBe('unattended');
    expect(detectProgressMode({ isTTY: false }, {})).toBe('unattended');
    expect(detectProgressMode({}, {})).toBe('unattended');
  });
});

describe('ProgressTracker', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('counts each result in exactly one bucket', () => {
    const clock = new ManualClock();
    const t = tracker(clock);

    t.record(result('a', 'completed'));
    t.record(result('b', 'skipped'));
    t.record(result('c', 'download', 'Download failed for: ultrawide'));
    t.record(result('d', 'removed'));
    t.record(result('e', 'processing', 'Processing failed'));

    const stats = t.snapshot();
    expect(stats.completed).toBe(5);
    expect(stats.succeeded).toBe(1);
    expect(stats.skipped).toBe(1);
    expect(stats.failedDownloads.map((s) => s.videoId)).toEqual(['c']);
    expect(stats.failedProcessing.map((f) => f.descriptor)).toEqual(['d (removed)', 'e']);
    expect(stats.failedProcessing[1]).toMatchObject({ phase: 'processing', error: 'Processing failed' });
    expect(stats.successfulScenes).toEqual([sceneKey('a', 'Training')]);
  });

  it('records a successful scene under the split hint', () => {
    const t = tracker(new ManualClock());
    t.record(result('a', 'completed'), 'Validation');

    expect(t.snapshot().successfulScenes).toEqual([{ videoId: 'a', split: 'Validation' }]);
  });

  describe('throughput', () => {
    it('uses completions inside the trailing minute', () => {
      const clock = new ManualClock();
      const t = tracker(clock);

      for (const at of [10_000, 20_000, 30_000]) {
        clock.now = at;
        t.record(result(String(at), 'completed'));
      }

      const { ratePerMinute, etaMinutes } = t.throughput();
      expect(ratePerMinute).toBeCloseTo(6);
      expect(etaMinutes).toBeCloseTo(7 / 6);
    });

    it('falls back to the whole run with a single recent completion', () => {
      const clock = new ManualClock();
      const t = tracker(clock);

      clock.now = 30_000;
      t.record(result('a', 'completed'));

      expect(t.throughput().ratePerMinute).toBe(2);
    });

    it('falls back once the window has emptied', () => {
      const clock = new ManualClock();
      const t = tracker(clock);

      clock.now = 10_000;
      t.record(result('a', 'completed'));
      clock.now = 20_000;
      t.record(result('b', 'completed'));
      clock.now = 100_000;

      expect(t.throughput().ratePerMinute).toBeCloseTo(1.2);
    });

    it('has no ETA before anything completes', () => {
      expect(tracker(new ManualClock()).throughput()).toEqual({ ratePerMinute: 0, etaMinutes: null });
    });
  });

  it('renders a status line', () => {
    const clock = new ManualClock();
    const t = tracker(clock, { total: 4 });

    clock.now = 10_000;
    t.record(result('a', 'completed'));
    clock.now = 20_000;
    t.record(result('b', 'skipped'));

    const bar = `[${'='.repeat(15)}${' '.repeat(15)}]`;
    expect(t.statusLine()).toBe(`Main ${bar} 50.0% 2/4 | ok 1 skip 1 fail 0 | 6.0/min | ETA 0.3m`);
  });

  it('redraws the status line in place while interactive', () => {
    vi.useFakeTimers();
    const clock = new ManualClock();
    const writes: string[] = [];
    const t = tracker(clock, { total: 0, writes });

    t.start();
    vi.advanceTimersByTime(2_000);
    const line = `Main [${' '.repeat(30)}] 0.0% 0/0 | ok 0 skip 0 fail 0 | 0.0/min | ETA --`;
    expect(writes).toEqual([`\r\x1b[K${line}`]);

    t.finalize();
    expect(writes).toEqual([`\r\x1b[K${line}`, `\r\x1b[K${line}`, '\n']);
  });

  it('prints console lines above the status line while interactive', () => {
    vi.useFakeTimers();
    const clock = new ManualClock();
    const writes: string[] = [];
    const redirect: { write: ((line: string) => void) | null } = { write: null };
    const t = new ProgressTracker({
      label: 'Main',
      total: 0,
      mode: 'interactive',
      clock: clock.read,
      output: { write: (chunk: string) => writes.push(chunk) },
      console: {
        redirectConsole: (next) => {
          redirect.write = next;
        },
      },
    });

    t.start();
    expect(redirect.write).not.toBeNull();
    redirect.write?.('Download command failed');

    const line = `Main [${' '.repeat(30)}] 0.0% 0/0 | ok 0 skip 0 fail 0 | 0.0/min | ETA --`;
    expect(writes).toEqual(['\r\x1b[KDownload command failed\n', `\r\x1b[K${line}`]);

    t.finalize();
    expect(redirect.write).toBeNull();
  });

  it('logs failures and periodic status while unattended', () => {
    vi.useFakeTimers();
    const clock = new ManualClock();
    const logger = new RecordingLogger();
    const t = tracker(clock, { mode: 'unattended', logger, total: 2 });

    t.start();
    t.record(result('a', 'redownload_failed', 'Download failed for: ultrawide'));
    vi.advanceTimersByTime(300_000);
    t.finalize();

    expect(logger.messages('warn')).toEqual(['Main: scene failed: a (redownload_failed)']);
    expect(logger.messages('info')).toHaveLength(2);
    expect(logger.messages('info')[0]).toBe('Main: starting');
  });

  it('stays quiet about failures while interactive', () => {
    const logger = new RecordingLogger();
    const t = tracker(new ManualClock(), { logger });

    t.record(result('a', 'exception', 'boom'));
    expect(logger.entries).toEqual([]);
  });

  describe('finalize', () => {
    it('computes the summary once', () => {
      const clock = new ManualClock();
      const t = tracker(clock, { total: 6 });

      t.record(result('a', 'completed'));
      t.record(result('b', 'completed'));
      t.record(result('c', 'skipped'));
      t.record(result('d', 'download'));
      t.record(result('e', 'processing'));
      clock.now = 50_000;

      const summary = t.finalize();
      expect(summary).toMatchObject({
        label: 'Main',
        total: 6,
        completed: 5,
        succeeded: 2,
        skipped: 1,
        failedDownloadCount: 1,
        failedProcessingCount: 1,
        elapsedMs: 50_000,
        avgSecondsPerScene: 12.5,
        interrupted: false,
      });
      expect(summary.ratePerMinute).toBeCloseTo(6);
      expect(summary.successRate).toBeCloseTo(60);
      expect(Object.isFrozen(summary)).toBe(true);

      expect(() => t.finalize()).toThrow(TrackerFinalizedError);
      expect(() => t.record(result('f', 'completed'))).toThrow(TrackerFinalizedError);
    });

    it('reports zero rates for an empty wave', () => {
      const summary = tracker(new ManualClock(), { total: 0 }).finalize(true);
      expect(summary).toMatchObject({ successRate: 0, avgSecondsPerScene: 0, ratePerMinute: 0, interrupted: true });
    });
  });
});

describe('formatSummary', () => {
  it('lists failures up to the limit and counts the rest', () => {
    const clock = new ManualClock();
    const t = tracker(clock, { total: 5, failureListLimit: 2 });

    t.record(result('d1', 'download'));
    t.record(result('d2', 'download'));
    t.record(result('d3', 'download'));
    t.record(result('p1', 'removed_missing_intrinsics'));
    t.record(result('ok', 'completed'));
    clock.now = 50_000;

    const rule = '='.repeat(80);
    expect(formatSummary(t.finalize())).toEqual([
      rule,
      'Main: COMPLETE',
      rule,
      'Total time: 50.00s',
      'Scenes processed: 5/5',
      'Successful: 1',
      'Skipped (already complete): 0',
      'Failed downloads: 3',
      'Failed processing: 1',
      'Success rate: 20.0%',
      'Average time per scene: 10.0s',
      'Failed downloads: d1, d2',
      '   ... and 1 more',
      'Failed processing: p1 (removed_missing_intrinsics)',
    ]);
  });

  it('marks an interrupted wave and omits the average when nothing was processed', () => {
    const lines = formatSummary(tracker(new ManualClock(), { total: 3 }).finalize(true));

    expect(lines[1]).toBe('Main: INTERRUPTED');
    expect(lines).toHaveLength(10);
    expect(lines[9]).toBe('Success rate: 0.0%');
  });
});
