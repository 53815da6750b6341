/**
 * DirectoryListingCache - per-session memo of synchronous directory reads.
 *
 * Successful listings are kept until clear(). Failed reads are not cached:
 * they are logged, recorded as a ScanWarning and reported as null.
 */

import fs from 'fs';
import path from 'path';
import { Logger } from '../utils/Logger';

const log = new Logger('DirectoryListingCache');

export interface DirectoryEntry {
  name: string;
  isDirectory: boolean;
}

export interface ScanWarning {
  directory: string;
  message: string;
  /** errno code such as ENOENT or EACCES, when known */
  code?: string;
}

/** Reads one directory. Throws when the directory cannot be listed. */
export type DirectoryReader = (directory: string) => DirectoryEntry[];

/** Whether a symlink resolves to a directory. Dangling links count as files. */
function linkTargetIsDirectory(linkPath: string): boolean {
  const stats = fs.statSync(linkPath, { throwIfNoEntry: false });
  return stats?.isDirectory() ?? false;
}

export const readDirectory: DirectoryReader = (directory) =>
  fs.readdirSync(directory, { withFileTypes: true }).map((entry) => ({
    name: entry.name,
    isDirectory:
      entry.isDirectory() || (entry.isSymbolicLink() && linkTargetIsDirectory(path.join(directory, entry.name))),
  }));

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export class DirectoryListingCache {
  private listings = new Map<string, readonly DirectoryEntry[]>();
  private _warnings: ScanWarning[] = [];
  private reads = 0;

  constructor(private readonly reader: DirectoryReader = readDirectory) {}

  /**
   * Entries of `directory`, sorted by name, or null when it cannot be listed.
   */
  list(directory: string): readonly DirectoryEntry[] | null {
    const key = path.resolve(directory);
    const cached = this.listings.get(key);
    if (cached) return cached;

    this.reads++;
    try {
      const entries = this.reader(key)
        .slice()
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
      this.listings.set(key, entries);
      return entries;
    } catch (err) {
      const code = errorCode(err);
      const message = err instanceof Error ? err.message : String(err);
      log.warn(`Cannot list ${key}: ${message}`);
      this._warnings.push({ directory: key, message, code });
      return null;
    }
  }

  /** Names in `directory`, or an empty list when it cannot be read. */
  names(directory: string): string[] {
    return (this.list(directory) ?? []).map((entry) => entry.name);
  }

  get warnings(): readonly ScanWarning[] {
    return this._warnings;
  }

  /** Number of reads that reached the underlying reader. */
  get readCount(): number {
    return this.reads;
  }

  clear(): void {
    this.listings.clear();
    this._warnings = [];
  }
}
