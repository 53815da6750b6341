/**
 * Text helpers for frame lists and sequence strings.
 */

const SEQUENCE_RANGE_RE = /\s(\d+)-(\d+)$/;

export interface SequenceString {
  path: string;
  first: number | null;
  last: number | null;
}

/**
 * Compact a sorted frame list into ranges: `[1001, 1002, 1003, 1005]` → `1001-1003 1005`.
 * Only contiguous runs are compacted; steps are not detected.
 */
export function formatFrames(frames: readonly number[], sep: string = ' '): string {
  const parts: string[] = [];
  let start: number | null = null;
  let end: number | null = null;

  const flush = (): void => {
    if (start === null || end === null) return;
    parts.push(start === end ? String(start) : `${start}-${end}`);
  };

  for (const frame of frames) {
    if (end !== null && frame === end + 1) {
      end = frame;
      continue;
    }
    flush();
    start = frame;
    end = frame;
  }
  flush();

  return parts.join(sep);
}

/** `name.####.exr 1001-1010` → `{ path: 'name.####.exr', first: 1001, last: 1010 }` */
export function stripSequenceRange(value: string): SequenceString {
  const match = SEQUENCE_RANGE_RE.exec(value);
  if (!match) return { path: value, first: null, last: null };
  return {
    path: value.slice(0, match.index),
    first: Number(match[1]),
    last: Number(match[2]),
  };
}

export function formatSequenceString(path: string, first: number, last: number): string {
  return `${path} ${first}-${last}`;
}

/**
 * Fit text to `width` characters, replacing the middle with ` ... ` when too long
 * and right-padding with spaces when shorter.
 */
export function elideMiddle(text: string, width: number): string {
  if (text.length <= width) return text.padEnd(width);
  if (width < 6) return text.slice(0, Math.max(0, width));
  const head = Math.floor(width / 2) - 3;
  const tail = Math.ceil(width / 2) - 2;
  return `${text.slice(0, head)} ... ${text.slice(text.length - tail)}`;
}
