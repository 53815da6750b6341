/**
 * PathTemplate - locates the version marker and frame padding in a file path
 * and rebuilds the path for another version or frame.
 *
 * Version marker: `v` or `V` followed by digits, not preceded by a letter.
 * The last marker in the path is the designated one; every earlier marker with
 * the same text (`render_v003/shot_v003.exr`) is linked and substituted with it.
 *
 * Frame padding lives in the filename only: `%04d` takes priority over `####`
 * (two or more hashes). The last occurrence wins.
 *
 * Paths use `/` as separator, as node path values do on every platform.
 */

import path from 'path';
import { NoVersionTokenError, ValidationError } from '../core/errors';

const VERSION_RE = /(?<![A-Za-z])[vV](\d+)/g;
const PRINTF_FRAME_RE = /%0(\d+)d/g;
const HASH_FRAME_RE = /#{2,}/g;
const DIGITS_RE = /^\d+$/;

export interface VersionField {
  /** Index of the first digit in the source path. */
  start: number;
  /** Index one past the last digit. */
  end: number;
  /** Digit count as written. */
  width: number;
  value: number;
  /** Digits as written, e.g. `003`. */
  digits: string;
  /** Whole marker, e.g. `v003`. */
  text: string;
}

export type FrameNotation = 'printf' | 'hash';

export interface FrameField {
  start: number;
  end: number;
  width: number;
  notation: FrameNotation;
  /** Padding token as written, e.g. `%04d` or `####`. */
  text: string;
}

export interface PathTemplate {
  /** Path as the node holds it. */
  source: string;
  baseDir: string;
  absolutePath: string;
  version: VersionField;
  /** Earlier markers with the same text, in path order. */
  linked: VersionField[];
  /** Literal text before the designated field's digits. */
  prefix: string;
  /** Literal text after the designated field's digits. */
  suffix: string;
  /** True when the designated marker sits in a directory name. */
  inDirectory: boolean;
  frame: FrameField | null;
}

export interface ParseOptions {
  /** Base for relative paths. Defaults to the process working directory. */
  baseDir?: string;
}

export type SegmentPart =
  | { kind: 'literal'; text: string }
  | { kind: 'version'; field: VersionField }
  | { kind: 'frame'; field: FrameField };

export interface TemplateSegment {
  text: string;
  parts: SegmentPart[];
  hasVersion: boolean;
}

/** Zero-pad an integer to `width` characters, sign included (`-5` at width 4 gives `-005`). */
export function zeroPad(value: number, width: number): string {
  const digits = String(Math.abs(Math.trunc(value)));
  if (value < 0) return `-${digits.padStart(Math.max(0, width - 1), '0')}`;
  return digits.padStart(width, '0');
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function filenameStart(p: string): number {
  return p.lastIndexOf('/') + 1;
}

function lastMatch(re: RegExp, text: string, from: number): RegExpExecArray | null {
  re.lastIndex = 0;
  let found: RegExpExecArray | null = null;
  for (let m = re.exec(text); m !== null; m = re.exec(text)) {
    if (m.index >= from) found = m;
  }
  return found;
}

/**
 * Find the frame padding token in the filename part of `p`.
 */
export function findFrameField(p: string): FrameField | null {
  const from = filenameStart(p);

  const hash = lastMatch(HASH_FRAME_RE, p, from);
  if (hash) {
    return {
      start: hash.index,
      end: hash.index + hash[0].length,
      width: hash[0].length,
      notation: 'hash',
      text: hash[0],
    };
  }

  const printf = lastMatch(PRINTF_FRAME_RE, p, from);
  if (printf) {
    return {
      start: printf.index,
      end: printf.index + printf[0].length,
      width: Number(printf[1]),
      notation: 'printf',
      text: printf[0],
    };
  }

  return null;
}

/**
 * Replace the frame padding with a concrete frame number.
 * Paths without padding are returned unchanged.
 */
export function setFrame(p: string, frame: number): string {
  const field = findFrameField(p);
  if (!field) return p;
  return p.slice(0, field.start) + zeroPad(frame, field.width) + p.slice(field.end);
}

function findVersionFields(p: string): VersionField[] {
  const fields: VersionField[] = [];
  VERSION_RE.lastIndex = 0;
  for (let m = VERSION_RE.exec(p); m !== null; m = VERSION_RE.exec(p)) {
    const digits = m[1] ?? '';
    const start = m.index + 1;
    fields.push({
      start,
      end: start + digits.length,
      width: digits.length,
      value: Number(digits),
      digits,
      text: m[0],
    });
  }
  return fields;
}

/**
 * Parse a node path into a template.
 * @throws NoVersionTokenError when the path carries no version marker
 */
export function parsePathTemplate(source: string, options: ParseOptions = {}): PathTemplate {
  const fields = findVersionFields(source);
  const version = fields[fields.length - 1];
  if (!version) {
    throw new NoVersionTokenError(source);
  }

  const baseDir = path.resolve(options.baseDir ?? process.cwd());
  const linked = fields.slice(0, -1).filter((f) => f.text === version.text);

  return {
    source,
    baseDir,
    absolutePath: path.resolve(baseDir, source),
    version,
    linked,
    prefix: source.slice(0, version.start),
    suffix: source.slice(version.end),
    inDirectory: source.indexOf('/', version.end) !== -1,
    frame: findFrameField(source),
  };
}

/** All version fields that get substituted, in path order. */
export function substitutedFields(template: PathTemplate): VersionField[] {
  return [...template.linked, template.version];
}

function versionDigits(template: PathTemplate, version: number | string): string {
  if (typeof version === 'number') {
    if (!Number.isInteger(version) || version < 0) {
      throw new ValidationError(`Version must be a non-negative integer, got ${version}`);
    }
    return zeroPad(version, template.version.width);
  }
  if (!DIGITS_RE.test(version)) {
    throw new ValidationError(`Version text must be digits only, got "${version}"`);
  }
  return version;
}

/**
 * Substitute a version into the template's source path. Numbers are padded to
 * the template's width (wider when they need it); digit strings are used as is.
 */
export function buildPath(template: PathTemplate, version: number | string): string {
  const digits = versionDigits(template, version);
  let out = template.source;
  const fields = substitutedFields(template);
  for (let i = fields.length - 1; i >= 0; i--) {
    const field = fields[i];
    if (!field) continue;
    out = out.slice(0, field.start) + digits + out.slice(field.end);
  }
  return out;
}

/** Absolute form of a path string, relative to the template's base directory. */
export function resolveTemplatePath(template: PathTemplate, sourcePath: string): string {
  return path.resolve(template.baseDir, sourcePath);
}

interface SegmentMarker {
  start: number;
  end: number;
  part: SegmentPart;
}

/**
 * Split the template's source path on `/`, attaching the version and frame
 * fields to the segment they fall in.
 */
export function templateSegments(template: PathTemplate): TemplateSegment[] {
  const markers = substitutedFields(template).map(
    (field): SegmentMarker => ({ start: field.start, end: field.end, part: { kind: 'version', field } })
  );
  if (template.frame) {
    markers.push({ start: template.frame.start, end: template.frame.end, part: { kind: 'frame', field: template.frame } });
  }
  markers.sort((a, b) => a.start - b.start);

  const segments: TemplateSegment[] = [];
  let offset = 0;
  for (const text of template.source.split('/')) {
    const segStart = offset;
    const segEnd = offset + text.length;
    const parts: SegmentPart[] = [];
    let cursor = segStart;
    for (const marker of markers) {
      if (marker.start < segStart || marker.end > segEnd) continue;
      if (marker.start > cursor) parts.push({ kind: 'literal', text: template.source.slice(cursor, marker.start) });
      parts.push(marker.part);
      cursor = marker.end;
    }
    if (cursor < segEnd) parts.push({ kind: 'literal', text: template.source.slice(cursor, segEnd) });

    segments.push({ text, parts, hasVersion: parts.some((p) => p.kind === 'version') });
    offset = segEnd + 1;
  }
  return segments;
}
