/**
 * Core Type Helper Tests
 */

import { describe, it, expect } from 'vitest';

import { scenePath, requiredDirectories } from '../../../core/assets.js';
import {
  PHASE_SUCCESS,
  createSceneResult,
  errorMessage,
  isSplit,
  sceneId,
  sceneKey,
} from '../../../core/types.js';

describe('scene identity', () => {
  it('formats a display id and narrows split names', () => {
    expect(sceneId(sceneKey('41000001', 'Validation'))).toBe('Validation/41000001');
    expect(isSplit('Training')).toBe(true);
    expect(isSplit('training')).toBe(false);
  });

  it('places a scene under raw/<split>/<videoId>', () => {
    expect(scenePath('/data', sceneKey('41000001', 'Training'))).toBe('/data/raw/Training/41000001');
  });

  it('treats only per-frame assets as required directories', () => {
    expect(requiredDirectories(['highres_depth', 'mesh', 'ultrawide_intrinsics']).map((s) => s.name)).toEqual([
      'highres_depth',
      'ultrawide_intrinsics',
    ]);
  });
});

describe('createSceneResult', () => {
  const scene = sceneKey('41000001', 'Training');

  it('derives success from the phase and freezes the result', () => {
    const result = createSceneResult(scene, 'redownload_failed', { error: 'Download failed for: ultrawide' });

    expect(result).toEqual({
      scene,
      phase: 'redownload_failed',
      success: false,
      error: 'Download failed for: ultrawide',
    });
    expect(Object.isFrozen(result)).toBe(true);
  });

  it('leaves out absent details', () => {
    expect(Object.keys(createSceneResult(scene, 'completed'))).toEqual(['scene', 'phase', 'success']);
  });

  it('counts only skips, high-resolution removals and completions as success', () => {
    const successes = Object.entries(PHASE_SUCCESS)
      .filter(([, success]) => success)
      .map(([phase]) => phase);
    expect(successes).toEqual(['skipped', 'skipped_no_highres', 'removed_no_highres', 'completed']);
  });
});

describe('errorMessage', () => {
  it('reads the message of errors and stringifies anything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
