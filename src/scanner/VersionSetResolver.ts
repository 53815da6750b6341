/**
 * VersionSetResolver - enumerates the versions of a path template that exist
 * on disk, and steps through them.
 *
 * Resolution starts at the outermost path segment that carries a version
 * marker and walks down one segment at a time:
 * - segments with a version field match any digits, and every field along one
 *   candidate path must carry the same digits;
 * - fixed segments must exist;
 * - a filename with frame padding needs at least one frame on disk at the
 *   declared width or wider.
 */

import path from 'path';
import { Logger } from '../utils/Logger';
import { DirectoryListingCache } from './DirectoryListingCache';
import {
  buildPath,
  escapeRegExp,
  resolveTemplatePath,
  templateSegments,
  type PathTemplate,
  type TemplateSegment,
} from './PathTemplate';

const log = new Logger('VersionSetResolver');

export interface VersionEntry {
  version: number;
  /** Digits as spelled on disk, e.g. `003`. */
  versionText: string;
  /** Absolute path used for scanning and thumbnails. */
  path: string;
  /** Path as written back to nodes; keeps the relative form of the source. */
  sourcePath: string;
  exists: boolean;
}

export type NavigationDirection = 'next' | 'prev' | 'min' | 'max';

interface Candidate {
  dir: string;
  digits: string | null;
}

interface SegmentMatch {
  digits: string | null;
}

const PASS_THROUGH_SEGMENTS: ReadonlySet<string> = new Set(['', '.', '..']);

/**
 * True when `digits` can stand for a frame padded to `width`: at least that
 * many digits, and no leading zero once wider.
 */
export function isFrameDigits(digits: string, width: number): boolean {
  if (digits.length < width) return false;
  return digits.length === width || !digits.startsWith('0');
}

/**
 * Compile a matcher for one templated segment. Returns the shared version
 * digits of a matching name, or null when the name does not fit.
 */
function compileSegmentMatcher(segment: TemplateSegment): (name: string) => SegmentMatch | null {
  const groups: Array<{ kind: 'version' } | { kind: 'frame'; width: number }> = [];
  let source = '^';
  for (const part of segment.parts) {
    if (part.kind === 'literal') {
      source += escapeRegExp(part.text);
    } else if (part.kind === 'version') {
      source += '(\\d+)';
      groups.push({ kind: 'version' });
    } else {
      source += '(\\d+)';
      groups.push({ kind: 'frame', width: part.field.width });
    }
  }
  const re = new RegExp(`${source}$`);

  return (name) => {
    const m = re.exec(name);
    if (!m) return null;
    let digits: string | null = null;
    for (let g = 0; g < groups.length; g++) {
      const group = groups[g];
      const value = m[g + 1] ?? '';
      if (!group) continue;
      if (group.kind === 'frame') {
        if (!isFrameDigits(value, group.width)) return null;
      } else if (digits === null) {
        digits = value;
      } else if (digits !== value) {
        return null;
      }
    }
    return { digits };
  };
}

export class VersionSetResolver {
  constructor(private readonly listings: DirectoryListingCache = new DirectoryListingCache()) {}

  get cache(): DirectoryListingCache {
    return this.listings;
  }

  /**
   * Versions of `template` present on disk, ascending and unique by number.
   */
  resolve(template: PathTemplate): VersionEntry[] {
    const segments = templateSegments(template);
    const first = segments.findIndex((s) => s.hasVersion);
    if (first === -1) return [];

    const head = segments
      .slice(0, first)
      .map((s) => s.text)
      .join('/');
    const root = first === 0 ? template.baseDir : path.resolve(template.baseDir, head === '' ? '/' : head);

    let candidates: Candidate[] = [{ dir: root, digits: null }];
    for (let i = first; i < segments.length && candidates.length > 0; i++) {
      const segment = segments[i];
      if (!segment) break;
      candidates = this.step(candidates, segment, i === segments.length - 1);
    }

    const entries = this.collect(template, candidates);
    log.debug(`Resolved ${entries.length} version(s) for ${template.source}`);
    return entries;
  }

  /** Drop cached listings and warnings. */
  clear(): void {
    this.listings.clear();
  }

  private step(candidates: Candidate[], segment: TemplateSegment, isLast: boolean): Candidate[] {
    const next: Candidate[] = [];
    const templated = segment.parts.some((p) => p.kind !== 'literal');

    for (const candidate of candidates) {
      if (!templated && PASS_THROUGH_SEGMENTS.has(segment.text)) {
        next.push({ dir: path.join(candidate.dir, segment.text), digits: candidate.digits });
        continue;
      }

      const entries = this.listings.list(candidate.dir);
      if (!entries) continue;

      if (!templated) {
        const entry = entries.find((e) => e.name === segment.text);
        if (entry && (isLast || entry.isDirectory)) {
          next.push({ dir: path.join(candidate.dir, entry.name), digits: candidate.digits });
        }
        continue;
      }

      const match = compileSegmentMatcher(segment);
      const seen = new Set<string | null>();
      for (const entry of entries) {
        if (!isLast && !entry.isDirectory) continue;
        const result = match(entry.name);
        if (!result) continue;
        const digits = result.digits ?? candidate.digits;
        if (candidate.digits !== null && result.digits !== null && result.digits !== candidate.digits) continue;
        // Several frames of one version collapse into a single candidate
        if (isLast && seen.has(digits)) continue;
        seen.add(digits);
        next.push({ dir: path.join(candidate.dir, entry.name), digits });
      }
    }
    return next;
  }

  private collect(template: PathTemplate, candidates: Candidate[]): VersionEntry[] {
    const spellings = [...new Set(candidates.map((c) => c.digits).filter((d): d is string => d !== null))].sort();

    const byNumber = new Map<number, string>();
    for (const text of spellings) {
      const value = Number(text);
      const existing = byNumber.get(value);
      if (existing === undefined) {
        byNumber.set(value, text);
      } else if (existing.length !== template.version.width && text.length === template.version.width) {
        byNumber.set(value, text);
      }
    }

    return [...byNumber.entries()]
      .sort((a, b) => a[0] - b[0])
      .map(([version, versionText]) => {
        const sourcePath = buildPath(template, versionText);
        return {
          version,
          versionText,
          path: resolveTemplatePath(template, sourcePath),
          sourcePath,
          exists: true,
        };
      });
  }
}

/**
 * Entry for the template's own version: the listed one when present,
 * otherwise a placeholder flagged `exists: false`.
 */
export function entryFor(template: PathTemplate, entries: readonly VersionEntry[]): VersionEntry {
  const listed = entries.find((e) => e.version === template.version.value);
  if (listed) return listed;
  return {
    version: template.version.value,
    versionText: template.version.digits,
    path: template.absolutePath,
    sourcePath: template.source,
    exists: false,
  };
}

/**
 * Step from `current` through `entries` (ascending by version). Boundaries
 * clamp to `current`; an empty list always returns `current`. A current
 * version missing from the list moves to the nearest entry in the requested
 * direction.
 */
export function navigate(
  entries: readonly VersionEntry[],
  current: VersionEntry,
  direction: NavigationDirection
): VersionEntry {
  if (entries.length === 0) return current;

  switch (direction) {
    case 'min':
      return entries[0] ?? current;
    case 'max':
      return entries[entries.length - 1] ?? current;
    case 'next':
      return entries.find((e) => e.version > current.version) ?? current;
    case 'prev': {
      let found: VersionEntry | undefined;
      for (const entry of entries) {
        if (entry.version >= current.version) break;
        found = entry;
      }
      return found ?? current;
    }
  }
}
