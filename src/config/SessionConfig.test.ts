import path from 'path';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger } from '../utils/Logger';
import {
  DEFAULT_SESSION_CONFIG,
  ReformatMode,
  ThumbnailFrameMode,
  sanitizeSessionConfig,
} from './index';

describe('sanitizeSessionConfig', () => {
  afterEach(() => {
    Logger.setSink(null);
  });

  it('CFG-001: returns defaults for missing options', () => {
    const config = sanitizeSessionConfig(undefined, '/work');
    expect(config).toEqual({ ...DEFAULT_SESSION_CONFIG, baseDir: path.resolve('/work') });
    expect(config.thumbEnabled).toBe(true);
    expect(config.thumbReformat).toBe(ReformatMode.FILL);
    expect(config.changeRange).toBe(true);
    expect(config.setMissing).toBe(false);
    expect(config.thumbFrameMode).toBe(ThumbnailFrameMode.MIDDLE);
  });

  it('CFG-002: accepts valid snake_case options', () => {
    const sortKey = (): number => 0;
    const config = sanitizeSessionConfig(
      {
        thumb_enabled: false,
        thumb_reformat: 'fit',
        change_range: false,
        node_sort_key_fct: sortKey,
        set_missing: true,
        thumb_frame_mode: 'Custom',
        thumb_custom_frame: 1012,
        thumb_width: 320,
        thumb_height: 180,
        thumb_cache_capacity: 8,
        thumb_workers: 2,
        thumb_timeout_ms: 500,
        base_dir: 'shots',
      },
      '/work'
    );

    expect(config).toEqual({
      thumbEnabled: false,
      thumbReformat: 'FIT',
      changeRange: false,
      nodeSortKey: sortKey,
      setMissing: true,
      thumbFrameMode: 'custom',
      thumbCustomFrame: 1012,
      thumbWidth: 320,
      thumbHeight: 180,
      thumbCacheCapacity: 8,
      thumbWorkers: 2,
      thumbTimeoutMs: 500,
      baseDir: path.resolve('/work', 'shots'),
    });
  });

  it('CFG-003: falls back to defaults for invalid values and warns', () => {
    const sink = vi.fn();
    Logger.setSink(sink);

    const config = sanitizeSessionConfig(
      {
        thumb_enabled: 'yes',
        thumb_reformat: 'STRETCH',
        thumb_width: 0,
        thumb_workers: 1.5,
        thumb_timeout_ms: -1,
        node_sort_key_fct: 'byName',
        base_dir: '',
      },
      '/work'
    );

    expect(config.thumbEnabled).toBe(true);
    expect(config.thumbReformat).toBe('FILL');
    expect(config.thumbWidth).toBe(200);
    expect(config.thumbWorkers).toBe(4);
    expect(config.thumbTimeoutMs).toBe(0);
    expect(config.nodeSortKey).toBeNull();
    expect(config.baseDir).toBe(path.resolve('/work'));
    expect(sink).toHaveBeenCalledTimes(7);
  });

  it('CFG-004: warns about unknown options without failing', () => {
    const sink = vi.fn();
    Logger.setSink(sink);
    const config = sanitizeSessionConfig({ thumb_colour: 'red' }, '/work');
    expect(config.thumbEnabled).toBe(true);
    expect(sink).toHaveBeenCalledWith(
      expect.anything(),
      '[SessionConfig]',
      'Ignoring unknown session option "thumb_colour"'
    );
  });

  it('CFG-005: non-object options yield defaults', () => {
    Logger.setSink(() => {});
    expect(sanitizeSessionConfig(42, '/work').thumbWorkers).toBe(4);
    expect(sanitizeSessionConfig(['x'], '/work').changeRange).toBe(true);
  });

  it('CFG-006: absolute base_dir is kept as is', () => {
    const config = sanitizeSessionConfig({ base_dir: '/projects/show' }, '/work');
    expect(config.baseDir).toBe(path.resolve('/projects/show'));
  });
});
