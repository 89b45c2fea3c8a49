/**
 * Configuration Loading Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { DEFAULT_CONFIG, loadConfig, resolvePath } from '../../../cli/lib/config.js';
import { ConfigError } from '../../../core/errors.js';
import { createTempDir, removeTempDir } from '../../utils/fixtures.js';

const ENV_NAMES = [
  'DOWNLOAD_DIR',
  'SCENE_LIST',
  'LOG_DIR',
  'SUBSAMPLE',
  'WORKERS',
  'DOWNLOAD_TIMEOUT',
  'VERBOSE',
  'JSON',
  'CONFIG',
];

describe('loadConfig', () => {
  let dir: string;

  const writeConfig = (content: string, name = '.scene-batchrc.yaml'): string => {
    const path = join(dir, name);
    writeFileSync(path, content);
    return path;
  };

  beforeEach(() => {
    dir = createTempDir('config');
    // Empty values count as unset
    for (const name of ENV_NAMES) {
      vi.stubEnv(`SCENE_BATCH_${name}`, '');
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    removeTempDir(dir);
  });

  it('falls back to defaults without a config file', async () => {
    const config = await loadConfig({ configPath: writeConfig('', 'empty.yaml') });

    expect(config.paths).toEqual({
      downloadDir: './data',
      sceneList: 'raw/raw_train_val_splits.csv',
      logDir: './logs',
    });
    expect(config.defaults).toEqual({
      subsample: 10,
      workers: null,
      assets: ['highres_depth', 'ultrawide', 'ultrawide_intrinsics'],
    });
    expect(config.downloader.timeoutMs).toBe(900_000);
    expect(config.downloader.maxConcurrentAssets).toBe(4);
    expect(config.verbose).toBe(false);
  });

  it('finds the config file from a nested directory', async () => {
    const path = writeConfig(
      [
        'paths:',
        '  downloadDir: /mnt/scenes',
        'defaults:',
        '  subsample: 5',
        '  workers: 4',
        '  assets: [highres_depth, ultrawide]',
        'thresholds:',
        '  minFilesPerDirectory: 20',
      ].join('\n')
    );
    const nested = join(dir, 'a', 'b');
    mkdirSync(nested, { recursive: true });

    const config = await loadConfig({ cwd: nested });

    expect(config.configPath).toBe(path);
    expect(config.paths.downloadDir).toBe('/mnt/scenes');
    expect(config.defaults).toEqual({ subsample: 5, workers: 4, assets: ['highres_depth', 'ultrawide'] });
    expect(config.thresholds).toEqual({ minFilesPerDirectory: 20, subsampleDetectionThreshold: 1000 });
  });

  it('applies flags over environment over file', async () => {
    const path = writeConfig('paths:\n  downloadDir: /from-file\ndefaults:\n  subsample: 5\n  workers: 2\n');
    vi.stubEnv('SCENE_BATCH_DOWNLOAD_DIR', '/from-env');
    vi.stubEnv('SCENE_BATCH_SUBSAMPLE', '3');
    vi.stubEnv('SCENE_BATCH_VERBOSE', 'true');

    const config = await loadConfig({ configPath: path, overrides: { downloadDir: '/from-flag', workers: 6 } });

    expect(config.paths.downloadDir).toBe('/from-flag');
    expect(config.defaults.subsample).toBe(3);
    expect(config.defaults.workers).toBe(6);
    expect(config.verbose).toBe(true);
  });

  it('reads the config path from the environment', async () => {
    const path = writeConfig('defaults:\n  subsample: 7\n', 'custom.yml');
    vi.stubEnv('SCENE_BATCH_CONFIG', path);

    const config = await loadConfig({ cwd: dir });

    expect(config.configPath).toBe(path);
    expect(config.defaults.subsample).toBe(7);
  });

  it('resolves relative paths against the config file directory', async () => {
    const path = writeConfig('paths:\n  downloadDir: data\n');
    const config = await loadConfig({ configPath: path });

    expect(resolvePath(config, 'downloadDir')).toBe(join(dir, 'data'));
  });

  describe('errors', () => {
    it('rejects an explicit path that does not exist', async () => {
      const missing = join(dir, 'nope.yaml');
      await expect(loadConfig({ configPath: missing })).rejects.toThrow(`Config file not found: ${missing}`);
    });

    it('rejects a value of the wrong type', async () => {
      const path = writeConfig('defaults:\n  subsample: five\n');
      await expect(loadConfig({ configPath: path })).rejects.toThrow('config.defaults.subsample must be a number');
    });

    it('rejects a section that is not a mapping', async () => {
      const path = writeConfig('downloader: python3\n');
      await expect(loadConfig({ configPath: path })).rejects.toThrow('config.downloader must be a mapping');
    });

    it('rejects a list holding something other than strings', async () => {
      const path = writeConfig('downloader:\n  args: [download_data.py, 3]\n');
      await expect(loadConfig({ configPath: path })).rejects.toThrow(
        'config.downloader.args must be a list of strings'
      );
    });

    it('reports every invalid key', async () => {
      const path = writeConfig('paths:\n  logDir: 5\nprogress:\n  logIntervalMs: .inf\n');
      await expect(loadConfig({ configPath: path })).rejects.toThrow(
        'config.paths.logDir must be a string; config.progress.logIntervalMs must be a number'
      );
    });

    it('treats null values as absent', async () => {
      const path = writeConfig('paths:\ndefaults:\n  subsample: ~\n  workers: ~\n');
      const config = await loadConfig({ configPath: path });

      expect(config.paths).toEqual(DEFAULT_CONFIG.paths);
      expect(config.defaults.subsample).toBe(DEFAULT_CONFIG.defaults.subsample);
      expect(config.defaults.workers).toBeNull();
    });

    it('rejects a file that is not a mapping', async () => {
      const path = writeConfig('- one\n- two\n');
      await expect(loadConfig({ configPath: path })).rejects.toThrow('Config file must contain a mapping');
    });

    it('rejects a subsample factor below one', async () => {
      const path = writeConfig('defaults:\n  subsample: 0\n');
      const error = await loadConfig({ configPath: path }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ message: 'Subsample factor must be a positive integer', configPath: path });
    });

    it('rejects malformed asset names', async () => {
      const path = writeConfig('defaults:\n  assets: [highres_depth, Bad-Asset]\n');
      await expect(loadConfig({ configPath: path })).rejects.toThrow(
        'Invalid asset list: highres_depth, Bad-Asset'
      );
    });
  });
});
