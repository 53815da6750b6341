/**
 * Types and helpers shared by image decoders.
 */

import { IMAGE_LIMITS } from '../config/ThumbnailConfig';
import { DecoderError } from '../core/errors';

/** Decoded image: RGBA, normalized to [0, 1]. */
export interface DecodedImage {
  width: number;
  height: number;
  data: Float32Array;
}

export interface ImageDecoder {
  formatName: string;
  canDecode(bytes: Uint8Array): boolean;
  decode(bytes: Uint8Array): Promise<DecodedImage>;
}

/**
 * Validate image dimensions against safe maximums.
 * @throws DecoderError for non-positive or oversized images
 */
export function validateImageDimensions(
  width: number,
  height: number,
  formatName: string,
  maxDimension: number = IMAGE_LIMITS.MAX_DIMENSION,
  maxPixels: number = IMAGE_LIMITS.MAX_PIXELS
): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new DecoderError(formatName, `Invalid dimensions: ${width}x${height}`);
  }
  if (width > maxDimension || height > maxDimension) {
    throw new DecoderError(formatName, `Dimensions ${width}x${height} exceed maximum of ${maxDimension}x${maxDimension}`);
  }
  if (width * height > maxPixels) {
    throw new DecoderError(formatName, `Image has ${width * height} pixels, exceeding maximum of ${maxPixels}`);
  }
}

/**
 * Expand 1- or 3-channel samples to RGBA with opaque alpha.
 */
export function toRGBA(data: Float32Array, width: number, height: number, channels: number): Float32Array {
  if (channels === 4) return data;

  const pixels = width * height;
  const out = new Float32Array(pixels * 4);
  for (let i = 0; i < pixels; i++) {
    const src = i * channels;
    const dst = i * 4;
    if (channels === 1) {
      const v = data[src] ?? 0;
      out[dst] = v;
      out[dst + 1] = v;
      out[dst + 2] = v;
    } else {
      out[dst] = data[src] ?? 0;
      out[dst + 1] = data[src + 1] ?? 0;
      out[dst + 2] = data[src + 2] ?? 0;
    }
    out[dst + 3] = 1;
  }
  return out;
}
