/**
 * Download Runner Tests
 *
 * The command downloader is covered through its argument rendering; the
 * fan-out is exercised with in-process downloaders.
 */

import { describe, it, expect } from 'vitest';

import { sceneKey } from '../../../core/types.js';
import {
  DEFAULT_DOWNLOAD_COMMAND,
  downloadSceneAssets,
  renderDownloadArgs,
  type AssetDownloadRequest,
  type AssetDownloader,
} from '../../../services/download-runner.js';

const scene = sceneKey('41000005', 'Training');

class ConcurrencyRecorder implements AssetDownloader {
  active = 0;
  peak = 0;
  readonly seen: string[] = [];

  constructor(private readonly fail: ReadonlySet<string> = new Set()) {}

  async downloadAsset(request: AssetDownloadRequest): Promise<boolean> {
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    this.seen.push(request.asset);
    await new Promise((r) => setTimeout(r, 5));
    this.active--;
    if (request.asset === 'explodes') {
      throw new Error('spawn failed');
    }
    return !this.fail.has(request.asset);
  }
}

describe('renderDownloadArgs', () => {
  it('fills every placeholder of the default command', () => {
    const args = renderDownloadArgs(DEFAULT_DOWNLOAD_COMMAND.args, {
      scene,
      downloadDir: '/data',
      asset: 'ultrawide',
      quiet: true,
    });

    expect(args).toEqual([
      'download_data.py',
      '--split',
      'Training',
      '--video_id',
      '41000005',
      '--download_dir',
      '/data',
      '--raw_dataset_assets',
      'ultrawide',
    ]);
  });

  it('leaves unknown placeholders untouched', () => {
    expect(
      renderDownloadArgs(['{asset}-{other}'], { scene, downloadDir: '/d', asset: 'confidence', quiet: false })
    ).toEqual(['confidence-{other}']);
  });
});

describe('downloadSceneAssets', () => {
  const assets = ['a1', 'a2', 'a3', 'a4', 'a5', 'a6'];

  it('runs at most maxConcurrent downloads per scene', async () => {
    const downloader = new ConcurrencyRecorder();
    const outcomes = await downloadSceneAssets(downloader, scene, '/data', assets, { maxConcurrent: 4, quiet: true });

    expect(downloader.peak).toBe(4);
    expect(downloader.seen.sort()).toEqual(assets);
    expect(outcomes.every((o) => o.success)).toBe(true);
  });

  it('reports each failed asset and still waits for the rest', async () => {
    const downloader = new ConcurrencyRecorder(new Set(['a2']));
    const outcomes = await downloadSceneAssets(downloader, scene, '/data', [...assets, 'explodes'], {
      maxConcurrent: 2,
      quiet: true,
    });

    expect(downloader.seen).toHaveLength(7);
    expect(outcomes.filter((o) => !o.success)).toEqual([
      { asset: 'a2', success: false },
      { asset: 'explodes', success: false, error: 'spawn failed' },
    ]);
  });
});
