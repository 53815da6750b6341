/**
 * Thumbnail generation constants.
 */

/** Preview canvas size used when the session options give none. */
export const DEFAULT_THUMB_WIDTH = 200;
export const DEFAULT_THUMB_HEIGHT = 112;

/** Upper bound for either side of the preview canvas. */
export const MAX_THUMB_DIMENSION = 4096;

export const DEFAULT_THUMB_CACHE_CAPACITY = 256;
export const DEFAULT_THUMB_WORKERS = 4;
export const MAX_THUMB_WORKERS = 64;

/** RGBA fill for the letterbox area in FIT mode. */
export const THUMB_BACKGROUND_RGBA: readonly [number, number, number, number] = [0, 0, 0, 255];

/**
 * Limits applied to decoded source images before any pixel buffer is allocated.
 */
export const IMAGE_LIMITS = {
  /** Maximum value for image width or height */
  MAX_DIMENSION: 65536,
  /** Maximum total pixel count (256 megapixels) */
  MAX_PIXELS: 268435456,
} as const;
