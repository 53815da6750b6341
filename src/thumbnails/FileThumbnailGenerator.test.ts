import { describe, it, expect, vi, afterEach } from 'vitest';
import { ReformatMode, ThumbnailFrameMode } from '../config/SessionConfig';
import { createPPM, createTempTree, type TempTree } from '../../test/utils';
import { FileThumbnailGenerator, pickThumbnailFrame, thumbnailSourceFile } from './FileThumbnailGenerator';

const RED = [255, 0, 0] as const;
const GREEN = [0, 255, 0] as const;
const BLUE = [0, 0, 255] as const;
const WHITE = [255, 255, 255] as const;

/** 2x2 quadrants: red, green / blue, white. */
function quadrants(): Uint8Array {
  return createPPM(2, 2, (x, y) => (y === 0 ? (x === 0 ? RED : GREEN) : x === 0 ? BLUE : WHITE));
}

describe('pickThumbnailFrame', () => {
  const range = { first: 1001, last: 1010 };

  it('THG-001: picks the first, middle or last frame of the range', () => {
    expect(pickThumbnailFrame(range, ThumbnailFrameMode.FIRST, 1)).toBe(1001);
    expect(pickThumbnailFrame(range, ThumbnailFrameMode.MIDDLE, 1)).toBe(1005);
    expect(pickThumbnailFrame(range, ThumbnailFrameMode.LAST, 1)).toBe(1010);
  });

  it('THG-002: custom frame ignores the range', () => {
    expect(pickThumbnailFrame(range, ThumbnailFrameMode.CUSTOM, 42)).toBe(42);
    expect(pickThumbnailFrame({ first: null, last: null }, ThumbnailFrameMode.CUSTOM, 42)).toBe(42);
  });

  it('THG-003: empty range has no frame', () => {
    expect(pickThumbnailFrame({ first: null, last: null }, ThumbnailFrameMode.MIDDLE, 1)).toBeNull();
  });
});

describe('thumbnailSourceFile', () => {
  it('THG-010: substitutes the frame into the padding', () => {
    expect(thumbnailSourceFile({ path: '/s/a.%04d.ppm', frame: 7, mode: ReformatMode.FIT })).toBe('/s/a.0007.ppm');
    expect(thumbnailSourceFile({ path: '/s/a.####.ppm', frame: 12345, mode: ReformatMode.FIT })).toBe('/s/a.12345.ppm');
    expect(thumbnailSourceFile({ path: '/s/a.ppm', frame: null, mode: ReformatMode.FIT })).toBe('/s/a.ppm');
  });
});

describe('FileThumbnailGenerator', () => {
  let tree: TempTree | null = null;

  afterEach(() => {
    tree?.remove();
    tree = null;
  });

  it('THG-020: reads, decodes and reformats a frame from disk', async () => {
    tree = createTempTree();
    tree.write('plate_v001/plate.1001.ppm', quadrants());
    const generator = new FileThumbnailGenerator({ width: 4, height: 4 });

    const image = await generator.generate({
      path: tree.resolve('plate_v001/plate.%04d.ppm'),
      frame: 1001,
      mode: ReformatMode.DISTORT,
    });

    expect(image.width).toBe(4);
    expect(image.height).toBe(4);
    const at = (x: number, y: number): number[] => Array.from(image.data.slice((y * 4 + x) * 4, (y * 4 + x) * 4 + 4));
    expect(at(0, 0)).toEqual([255, 0, 0, 255]);
    expect(at(3, 0)).toEqual([0, 255, 0, 255]);
    expect(at(1, 3)).toEqual([0, 0, 255, 255]);
    expect(at(2, 2)).toEqual([255, 255, 255, 255]);
  });

  it('THG-021: uses the configured background outside the image', async () => {
    const readFile = vi.fn(async (_path: string) => createPPM(4, 1, () => WHITE));
    const generator = new FileThumbnailGenerator({ width: 4, height: 4, readFile, background: [10, 20, 30, 40] });

    const image = await generator.generate({ path: '/virtual/slate.ppm', frame: null, mode: ReformatMode.FIT });

    expect(readFile).toHaveBeenCalledWith('/virtual/slate.ppm');
    // 4x1 fitted into 4x4: one row at y = 1
    expect(Array.from(image.data.slice(0, 4))).toEqual([10, 20, 30, 40]);
    expect(Array.from(image.data.slice(16, 20))).toEqual([255, 255, 255, 255]);
    expect(Array.from(image.data.slice(32, 36))).toEqual([10, 20, 30, 40]);
  });

  it('THG-022: EXPANDING output width follows the source aspect', async () => {
    const readFile = async (_path: string): Promise<Uint8Array> => createPPM(4, 2, () => RED);
    const generator = new FileThumbnailGenerator({ width: 2, height: 3, readFile });

    const image = await generator.generate({ path: '/virtual/wide.ppm', frame: null, mode: ReformatMode.EXPANDING });
    expect(image.width).toBe(6);
    expect(image.height).toBe(3);
  });

  it('THG-023: rejects when the frame is missing on disk', async () => {
    tree = createTempTree();
    const generator = new FileThumbnailGenerator({ width: 4, height: 4 });

    await expect(
      generator.generate({ path: tree.resolve('plate.%04d.ppm'), frame: 1, mode: ReformatMode.FIT })
    ).rejects.toThrow('ENOENT');
  });

  it('THG-024: rejects undecodable files', async () => {
    const generator = new FileThumbnailGenerator({
      width: 4,
      height: 4,
      readFile: async () => new TextEncoder().encode('not an image'),
    });

    await expect(
      generator.generate({ path: '/virtual/notes.txt', frame: null, mode: ReformatMode.FIT })
    ).rejects.toThrow('[unknown] No decoder for /virtual/notes.txt');
  });
});
