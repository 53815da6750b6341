/**
 * Session options as received from the host (snake_case, untrusted) and
 * their sanitized form.
 *
 * Every invalid value falls back to its default with a logged warning;
 * sanitizing never throws.
 */

import path from 'path';
import type { NodeSortKeyFn } from '../nodes/NodeSortKeyEvaluator';
import { Logger } from '../utils/Logger';
import {
  DEFAULT_THUMB_CACHE_CAPACITY,
  DEFAULT_THUMB_HEIGHT,
  DEFAULT_THUMB_WIDTH,
  DEFAULT_THUMB_WORKERS,
  MAX_THUMB_DIMENSION,
  MAX_THUMB_WORKERS,
} from './ThumbnailConfig';

const log = new Logger('SessionConfig');

export const ReformatMode = {
  FIT: 'FIT',
  FILL: 'FILL',
  DISTORT: 'DISTORT',
  EXPANDING: 'EXPANDING',
} as const;
export type ReformatMode = (typeof ReformatMode)[keyof typeof ReformatMode];

/** Which frame of a sequence the thumbnail shows. */
export const ThumbnailFrameMode = {
  FIRST: 'first',
  MIDDLE: 'middle',
  LAST: 'last',
  CUSTOM: 'custom',
} as const;
export type ThumbnailFrameMode = (typeof ThumbnailFrameMode)[keyof typeof ThumbnailFrameMode];

/** Raw options object handed over by the host. */
export interface SessionOptions {
  thumb_enabled?: unknown;
  thumb_reformat?: unknown;
  change_range?: unknown;
  node_sort_key_fct?: unknown;
  set_missing?: unknown;
  thumb_frame_mode?: unknown;
  thumb_custom_frame?: unknown;
  thumb_width?: unknown;
  thumb_height?: unknown;
  thumb_cache_capacity?: unknown;
  thumb_workers?: unknown;
  thumb_timeout_ms?: unknown;
  base_dir?: unknown;
}

export interface SessionConfig {
  thumbEnabled: boolean;
  thumbReformat: ReformatMode;
  changeRange: boolean;
  nodeSortKey: NodeSortKeyFn | null;
  setMissing: boolean;
  thumbFrameMode: ThumbnailFrameMode;
  thumbCustomFrame: number;
  thumbWidth: number;
  thumbHeight: number;
  thumbCacheCapacity: number;
  thumbWorkers: number;
  /** 0 disables the per-generation timeout. */
  thumbTimeoutMs: number;
  /** Absolute directory that relative node paths are resolved against. */
  baseDir: string;
}

export const DEFAULT_SESSION_CONFIG: Readonly<Omit<SessionConfig, 'baseDir'>> = {
  thumbEnabled: true,
  thumbReformat: ReformatMode.FILL,
  changeRange: true,
  nodeSortKey: null,
  setMissing: false,
  thumbFrameMode: ThumbnailFrameMode.MIDDLE,
  thumbCustomFrame: 1,
  thumbWidth: DEFAULT_THUMB_WIDTH,
  thumbHeight: DEFAULT_THUMB_HEIGHT,
  thumbCacheCapacity: DEFAULT_THUMB_CACHE_CAPACITY,
  thumbWorkers: DEFAULT_THUMB_WORKERS,
  thumbTimeoutMs: 0,
};

const KNOWN_OPTIONS: ReadonlySet<string> = new Set([
  'thumb_enabled',
  'thumb_reformat',
  'change_range',
  'node_sort_key_fct',
  'set_missing',
  'thumb_frame_mode',
  'thumb_custom_frame',
  'thumb_width',
  'thumb_height',
  'thumb_cache_capacity',
  'thumb_workers',
  'thumb_timeout_ms',
  'base_dir',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isReformatMode(value: string): value is ReformatMode {
  return Object.values<string>(ReformatMode).includes(value);
}

function isFrameMode(value: string): value is ThumbnailFrameMode {
  return Object.values<string>(ThumbnailFrameMode).includes(value);
}

function isSortKeyFn(value: unknown): value is NodeSortKeyFn {
  return typeof value === 'function';
}

function rejected(option: string, value: unknown, fallback: unknown): void {
  log.warn(`Invalid value for "${option}": ${String(value)}; using ${String(fallback)}`);
}

function readBoolean(raw: Record<string, unknown>, option: string, fallback: boolean): boolean {
  const value = raw[option];
  if (value === undefined) return fallback;
  if (typeof value === 'boolean') return value;
  rejected(option, value, fallback);
  return fallback;
}

function readInteger(
  raw: Record<string, unknown>,
  option: string,
  fallback: number,
  min: number,
  max: number = Number.MAX_SAFE_INTEGER
): number {
  const value = raw[option];
  if (value === undefined) return fallback;
  if (typeof value === 'number' && Number.isInteger(value) && value >= min && value <= max) {
    return value;
  }
  rejected(option, value, fallback);
  return fallback;
}

/**
 * Turn the host's raw options into a complete SessionConfig.
 * `cwd` is the default base directory for relative paths.
 */
export function sanitizeSessionConfig(raw: unknown, cwd: string = process.cwd()): SessionConfig {
  const out: SessionConfig = { ...DEFAULT_SESSION_CONFIG, baseDir: path.resolve(cwd) };
  if (raw === undefined || raw === null) return out;
  if (!isRecord(raw)) {
    log.warn('Session options must be an object; using defaults');
    return out;
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_OPTIONS.has(key)) log.warn(`Ignoring unknown session option "${key}"`);
  }

  out.thumbEnabled = readBoolean(raw, 'thumb_enabled', out.thumbEnabled);
  out.changeRange = readBoolean(raw, 'change_range', out.changeRange);
  out.setMissing = readBoolean(raw, 'set_missing', out.setMissing);

  const reformat = raw.thumb_reformat;
  if (reformat !== undefined) {
    const normalized = typeof reformat === 'string' ? reformat.trim().toUpperCase() : '';
    if (isReformatMode(normalized)) out.thumbReformat = normalized;
    else rejected('thumb_reformat', reformat, out.thumbReformat);
  }

  const frameMode = raw.thumb_frame_mode;
  if (frameMode !== undefined) {
    const normalized = typeof frameMode === 'string' ? frameMode.trim().toLowerCase() : '';
    if (isFrameMode(normalized)) out.thumbFrameMode = normalized;
    else rejected('thumb_frame_mode', frameMode, out.thumbFrameMode);
  }

  const sortKey = raw.node_sort_key_fct;
  if (sortKey !== undefined && sortKey !== null) {
    if (isSortKeyFn(sortKey)) out.nodeSortKey = sortKey;
    else rejected('node_sort_key_fct', sortKey, 'selection order');
  }

  out.thumbCustomFrame = readInteger(raw, 'thumb_custom_frame', out.thumbCustomFrame, Number.MIN_SAFE_INTEGER);
  out.thumbWidth = readInteger(raw, 'thumb_width', out.thumbWidth, 1, MAX_THUMB_DIMENSION);
  out.thumbHeight = readInteger(raw, 'thumb_height', out.thumbHeight, 1, MAX_THUMB_DIMENSION);
  out.thumbCacheCapacity = readInteger(raw, 'thumb_cache_capacity', out.thumbCacheCapacity, 1);
  out.thumbWorkers = readInteger(raw, 'thumb_workers', out.thumbWorkers, 1, MAX_THUMB_WORKERS);
  out.thumbTimeoutMs = readInteger(raw, 'thumb_timeout_ms', out.thumbTimeoutMs, 0);

  const baseDir = raw.base_dir;
  if (baseDir !== undefined) {
    if (typeof baseDir === 'string' && baseDir.trim() !== '') out.baseDir = path.resolve(cwd, baseDir);
    else rejected('base_dir', baseDir, out.baseDir);
  }

  return out;
}
