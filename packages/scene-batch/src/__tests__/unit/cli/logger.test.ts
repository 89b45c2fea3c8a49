/**
 * CLI Logger Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';

import { createCLILogger, formatDuration, logFileTimestamp } from '../../../cli/lib/logger.js';
import { createTempDir, removeTempDir } from '../../utils/fixtures.js';

describe('CLILogger file sink', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir('logger');
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  const lines = (path: string): string[] => readFileSync(path, 'utf-8').trimEnd().split('\n');

  it('appends structured entries at or above the level', () => {
    const filePath = join(dir, 'nested', 'run.log');
    const logger = createCLILogger({ console: false, json: true, level: 'info', filePath, command: 'run' });

    logger.debug('hidden');
    logger.info('Scene done', { scene: 'Training/41000001', count: 3 });
    logger.warn('Slow scene', { wave: 'main' });

    const entries = lines(filePath).map((line): unknown => JSON.parse(line));
    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({
      level: 'info',
      message: 'Scene done',
      service: 'scene-batch',
      command: 'run',
      scene: 'Training/41000001',
      count: 3,
    });
    expect(entries[1]).toMatchObject({ level: 'warn', message: 'Slow scene', wave: 'main' });
  });

  it('writes uncoloured human-readable lines', () => {
    const filePath = join(dir, 'run.log');
    const logger = createCLILogger({ console: false, filePath });

    logger.error('Removal failed', { scene: 'Validation/41000002' });

    const [line] = lines(filePath);
    expect(line).toMatch(/^\d{4}-\d{2}-\d{2}T\S+Z ERROR Removal failed \(scene=Validation\/41000002\)$/);
  });
});

describe('CLILogger console redirect', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('hands console lines to the redirect until it is cleared', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const redirected: string[] = [];
    const logger = createCLILogger({ console: true, json: true });

    logger.redirectConsole((line) => redirected.push(line));
    logger.info('Scene done');
    logger.redirectConsole(null);
    logger.info('Wave finished');

    expect(redirected.map((line): unknown => JSON.parse(line))).toEqual([
      expect.objectContaining({ level: 'info', message: 'Scene done' }),
    ]);
    expect(info).toHaveBeenCalledTimes(1);
    expect(String(info.mock.calls[0]?.[0])).toContain('"message":"Wave finished"');
  });
});

describe('formatDuration', () => {
  it('picks a unit by magnitude', () => {
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(1_500)).toBe('1.50s');
    expect(formatDuration(90_500)).toBe('1m 30.5s');
  });
});

describe('logFileTimestamp', () => {
  it('renders local time as YYYYMMDD_HHMMSS', () => {
    expect(logFileTimestamp(new Date(2026, 0, 2, 3, 4, 5))).toBe('20260102_030405');
  });
});
