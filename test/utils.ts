/**
 * Test utilities and helpers
 */

import fs from 'fs';
import os from 'os';
import path from 'path';

export interface TempTree {
  root: string;
  /** Absolute path inside the tree. */
  resolve(...parts: string[]): string;
  /** Create empty (or given) files; parent directories are created as needed. */
  touch(...relativePaths: string[]): void;
  write(relativePath: string, content: Uint8Array | string): void;
  mkdir(relativePath: string): void;
  /** Symlink at `relativePath` pointing to `target` (absolute, or relative to the link). */
  symlink(target: string, relativePath: string): void;
  remove(): void;
}

/**
 * Create a throwaway directory tree under the OS temp directory.
 */
export function createTempTree(prefix: string = 'version-switcher-'): TempTree {
  const root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));

  const resolve = (...parts: string[]): string => path.join(root, ...parts);

  const write = (relativePath: string, content: Uint8Array | string): void => {
    const target = resolve(relativePath);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  };

  return {
    root,
    resolve,
    touch: (...relativePaths) => {
      for (const p of relativePaths) write(p, '');
    },
    write,
    mkdir: (relativePath) => {
      fs.mkdirSync(resolve(relativePath), { recursive: true });
    },
    symlink: (target, relativePath) => {
      const link = resolve(relativePath);
      fs.mkdirSync(path.dirname(link), { recursive: true });
      fs.symlinkSync(target, link);
    },
    remove: () => {
      fs.rmSync(root, { recursive: true, force: true });
    },
  };
}

/** `frameList(1001, 1004, [1003])` → `[1001, 1002, 1004]` */
export function frameList(first: number, last: number, skip: readonly number[] = []): number[] {
  const out: number[] = [];
  for (let f = first; f <= last; f++) {
    if (!skip.includes(f)) out.push(f);
  }
  return out;
}

/**
 * Binary PPM (P6) image. `pixel(x, y)` returns 8-bit RGB.
 */
export function createPPM(
  width: number,
  height: number,
  pixel: (x: number, y: number) => readonly [number, number, number]
): Uint8Array {
  const header = new TextEncoder().encode(`P6\n${width} ${height}\n255\n`);
  const out = new Uint8Array(header.length + width * height * 3);
  out.set(header, 0);
  let offset = header.length;
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const [r, g, b] = pixel(x, y);
      out[offset++] = r;
      out[offset++] = g;
      out[offset++] = b;
    }
  }
  return out;
}

/**
 * Binary PGM (P5) image with an 8-bit or 16-bit maxval.
 */
export function createPGM(
  width: number,
  height: number,
  value: (x: number, y: number) => number,
  maxval: number = 255
): Uint8Array {
  const header = new TextEncoder().encode(`P5 ${width} ${height} ${maxval}\n`);
  const bytesPerSample = maxval > 255 ? 2 : 1;
  const out = new Uint8Array(header.length + width * height * bytesPerSample);
  out.set(header, 0);
  let offset = header.length;
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const v = value(x, y);
      if (bytesPerSample === 2) {
        out[offset++] = (v >> 8) & 0xff;
        out[offset++] = v & 0xff;
      } else {
        out[offset++] = v;
      }
    }
  }
  return out;
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

/** Promise settled from the outside. */
export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: Error) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
