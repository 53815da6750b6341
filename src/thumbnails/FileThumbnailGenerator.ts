/**
 * FileThumbnailGenerator - reads one frame of a file sequence from disk,
 * decodes it and reformats it onto the preview canvas.
 */

import { readFile } from 'fs/promises';
import { ThumbnailFrameMode, type ReformatMode } from '../config/SessionConfig';
import { THUMB_BACKGROUND_RGBA } from '../config/ThumbnailConfig';
import { setFrame } from '../scanner/PathTemplate';
import type { FrameRange } from '../scanner/FrameRangeScanner';
import { ImageDecoderRegistry } from './ImageDecoderRegistry';
import { computeReformatLayout, reformatImage, type RGBAImage } from './Reformat';

export interface ThumbnailKey {
  /** Absolute path; may carry frame padding. */
  path: string;
  /** Frame substituted into the padding, or null for single files. */
  frame: number | null;
  mode: ReformatMode;
}

export type ThumbnailGenerator = (key: ThumbnailKey) => Promise<RGBAImage>;

export interface FileThumbnailGeneratorOptions {
  width: number;
  height: number;
  registry?: ImageDecoderRegistry;
  readFile?: (path: string) => Promise<Uint8Array>;
  background?: readonly [number, number, number, number];
}

/**
 * Frame shown for a sequence: the first, middle or last frame of the scanned
 * range, or a fixed custom frame. null when the range is empty.
 */
export function pickThumbnailFrame(
  range: Pick<FrameRange, 'first' | 'last'>,
  mode: ThumbnailFrameMode,
  customFrame: number
): number | null {
  if (mode === ThumbnailFrameMode.CUSTOM) return customFrame;
  if (range.first === null || range.last === null) return null;
  switch (mode) {
    case ThumbnailFrameMode.FIRST:
      return range.first;
    case ThumbnailFrameMode.LAST:
      return range.last;
    case ThumbnailFrameMode.MIDDLE:
      return range.first + Math.trunc((range.last - range.first) / 2);
  }
}

/** Concrete file of a thumbnail key. */
export function thumbnailSourceFile(key: ThumbnailKey): string {
  return key.frame === null ? key.path : setFrame(key.path, key.frame);
}

export class FileThumbnailGenerator {
  private readonly registry: ImageDecoderRegistry;
  private readonly read: (path: string) => Promise<Uint8Array>;
  private readonly background: readonly [number, number, number, number];

  constructor(private readonly options: FileThumbnailGeneratorOptions) {
    this.registry = options.registry ?? new ImageDecoderRegistry();
    this.read = options.readFile ?? readFile;
    this.background = options.background ?? THUMB_BACKGROUND_RGBA;
  }

  get decoders(): ImageDecoderRegistry {
    return this.registry;
  }

  readonly generate: ThumbnailGenerator = async (key) => {
    const file = thumbnailSourceFile(key);
    const bytes = await this.read(file);
    const image = await this.registry.decode(bytes, file);
    const layout = computeReformatLayout(image.width, image.height, this.options.width, this.options.height, key.mode);
    return reformatImage(image, layout, this.background);
  };
}
