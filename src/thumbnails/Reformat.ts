/**
 * Reformat geometry: how a source image lands on the preview canvas.
 *
 * - FIT: uniform scale to fit inside the canvas, centered, background around it
 * - FILL: uniform scale to cover the canvas, centered, overflow cropped
 * - DISTORT: independent scales so the source covers the canvas exactly
 * - EXPANDING: uniform scale to the canvas height; output width follows the aspect
 */

import { ReformatMode } from '../config/SessionConfig';
import { ValidationError } from '../core/errors';
import type { DecodedImage } from './shared';

export interface ReformatRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ReformatLayout {
  /** Output image size. */
  width: number;
  height: number;
  /** Where the scaled source is drawn in output coordinates; may extend past the edges. */
  rect: ReformatRect;
}

/** 8-bit RGBA image, row-major, top row first. */
export interface RGBAImage {
  width: number;
  height: number;
  data: Uint8ClampedArray;
}

function assertPositive(label: string, ...values: number[]): void {
  for (const v of values) {
    if (!Number.isFinite(v) || v <= 0) {
      throw new ValidationError(`${label} must be positive, got ${values.join('x')}`);
    }
  }
}

export function computeReformatLayout(
  sourceWidth: number,
  sourceHeight: number,
  canvasWidth: number,
  canvasHeight: number,
  mode: ReformatMode
): ReformatLayout {
  assertPositive('Source size', sourceWidth, sourceHeight);
  assertPositive('Canvas size', canvasWidth, canvasHeight);

  switch (mode) {
    case ReformatMode.DISTORT:
      return {
        width: canvasWidth,
        height: canvasHeight,
        rect: { x: 0, y: 0, width: canvasWidth, height: canvasHeight },
      };

    case ReformatMode.EXPANDING: {
      const width = Math.max(1, Math.round((sourceWidth * canvasHeight) / sourceHeight));
      return { width, height: canvasHeight, rect: { x: 0, y: 0, width, height: canvasHeight } };
    }

    case ReformatMode.FIT:
    case ReformatMode.FILL: {
      const sx = canvasWidth / sourceWidth;
      const sy = canvasHeight / sourceHeight;
      const scale = mode === ReformatMode.FIT ? Math.min(sx, sy) : Math.max(sx, sy);
      const width = Math.max(1, Math.round(sourceWidth * scale));
      const height = Math.max(1, Math.round(sourceHeight * scale));
      return {
        width: canvasWidth,
        height: canvasHeight,
        rect: {
          x: Math.floor((canvasWidth - width) / 2),
          y: Math.floor((canvasHeight - height) / 2),
          width,
          height,
        },
      };
    }
  }
}

/**
 * Resample `source` into the layout with nearest-neighbour sampling and
 * convert to 8-bit. Pixels outside the drawn rect get `background`.
 */
export function reformatImage(
  source: DecodedImage,
  layout: ReformatLayout,
  background: readonly [number, number, number, number]
): RGBAImage {
  const { width, height, rect } = layout;
  const out = new Uint8ClampedArray(width * height * 4);

  for (let y = 0; y < height; y++) {
    const ry = y - rect.y;
    const insideY = ry >= 0 && ry < rect.height;
    const sy = Math.min(source.height - 1, Math.floor(((ry + 0.5) * source.height) / rect.height));

    for (let x = 0; x < width; x++) {
      const dst = (y * width + x) * 4;
      const rx = x - rect.x;
      if (!insideY || rx < 0 || rx >= rect.width) {
        out[dst] = background[0];
        out[dst + 1] = background[1];
        out[dst + 2] = background[2];
        out[dst + 3] = background[3];
        continue;
      }
      const sx = Math.min(source.width - 1, Math.floor(((rx + 0.5) * source.width) / rect.width));
      const src = (sy * source.width + sx) * 4;
      out[dst] = (source.data[src] ?? 0) * 255;
      out[dst + 1] = (source.data[src + 1] ?? 0) * 255;
      out[dst + 2] = (source.data[src + 2] ?? 0) * 255;
      out[dst + 3] = (source.data[src + 3] ?? 1) * 255;
    }
  }

  return { width, height, data: out };
}
