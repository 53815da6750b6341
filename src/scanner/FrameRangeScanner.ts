/**
 * FrameRangeScanner - frame range of a padded sequence path, from the
 * files present in its directory.
 */

import path from 'path';
import { DirectoryListingCache } from './DirectoryListingCache';
import { escapeRegExp, findFrameField } from './PathTemplate';
import { isFrameDigits } from './VersionSetResolver';

export interface FrameRange {
  /** null when no frame was found */
  first: number | null;
  last: number | null;
  /** Present frames, ascending. */
  frames: number[];
  /** Frames absent between first and last, ascending. */
  missing: number[];
}

export function emptyFrameRange(): FrameRange {
  return { first: null, last: null, frames: [], missing: [] };
}

/**
 * Detect gaps in a sorted frame list.
 */
export function detectMissingFrames(frames: readonly number[]): number[] {
  const missing: number[] = [];
  for (let i = 1; i < frames.length; i++) {
    const prev = frames[i - 1];
    const curr = frames[i];
    if (prev === undefined || curr === undefined) continue;
    for (let f = prev + 1; f < curr; f++) {
      missing.push(f);
    }
  }
  return missing;
}

export class FrameRangeScanner {
  private readonly baseDir: string;

  constructor(
    private readonly listings: DirectoryListingCache = new DirectoryListingCache(),
    baseDir: string = process.cwd()
  ) {
    this.baseDir = path.resolve(baseDir);
  }

  /**
   * Scan the directory of `p` for frames of its padded sequence.
   * Paths without frame padding, or whose directory cannot be listed,
   * give an empty range.
   */
  scan(p: string): FrameRange {
    const field = findFrameField(p);
    if (!field) return emptyFrameRange();

    const fileStart = p.lastIndexOf('/') + 1;
    const prefix = p.slice(fileStart, field.start);
    const suffix = p.slice(field.end);
    const directory = path.dirname(path.resolve(this.baseDir, p));

    const entries = this.listings.list(directory);
    if (!entries) return emptyFrameRange();

    const re = new RegExp(`^${escapeRegExp(prefix)}(\\d+)${escapeRegExp(suffix)}$`);
    const found = new Set<number>();
    for (const entry of entries) {
      if (entry.isDirectory) continue;
      const digits = re.exec(entry.name)?.[1];
      if (digits === undefined || !isFrameDigits(digits, field.width)) continue;
      found.add(Number(digits));
    }

    const frames = [...found].sort((a, b) => a - b);
    if (frames.length === 0) return emptyFrameRange();

    return {
      first: frames[0] ?? null,
      last: frames[frames.length - 1] ?? null,
      frames,
      missing: detectMissingFrames(frames),
    };
  }
}
