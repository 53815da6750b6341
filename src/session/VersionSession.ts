/**
 * VersionSession - opens a version-switching session on a host selection.
 *
 * openVersionSession() sanitizes the options, orders the selection, picks the
 * display node, resolves its versions and wires the state machine. It throws
 * NoDisplayableNodeError before any node is touched when no node qualifies.
 */

import { sanitizeSessionConfig, type SessionConfig } from '../config/SessionConfig';
import type { Disposable } from '../core/ManagerBase';
import { NodeVersionUpdater } from '../nodes/NodeVersionUpdater';
import { pickDisplayCandidate, sortNodes, type SelectedNode } from '../nodes/NodeSortKeyEvaluator';
import { DirectoryListingCache, type ScanWarning } from '../scanner/DirectoryListingCache';
import { FrameRangeScanner, type FrameRange } from '../scanner/FrameRangeScanner';
import { parsePathTemplate, type PathTemplate } from '../scanner/PathTemplate';
import { VersionSetResolver, entryFor, type VersionEntry } from '../scanner/VersionSetResolver';
import { FileThumbnailGenerator, type ThumbnailGenerator } from '../thumbnails/FileThumbnailGenerator';
import { ThumbnailCache } from '../thumbnails/ThumbnailCache';
import { elideMiddle, formatFrames, formatSequenceString, stripSequenceRange } from '../utils/frameFormat';
import { Logger } from '../utils/Logger';
import { KeyboardActionMap, type KeyCombination } from './KeyboardActionMap';
import { NavigationStateMachine } from './NavigationStateMachine';

const log = new Logger('VersionSession');

const DEFAULT_LABEL_WIDTH = 72;

export interface VersionSessionDeps {
  /** Shared listing cache; cleared when the session ends. */
  listings?: DirectoryListingCache;
  /** Shared thumbnail cache that outlives the session. */
  thumbnails?: ThumbnailCache;
  /** Generator for a session-owned thumbnail cache. */
  generate?: ThumbnailGenerator;
  keyMap?: KeyboardActionMap;
  /** Start with live preview off. */
  preview?: boolean;
}

export interface VersionListItem {
  entry: VersionEntry;
  current: boolean;
  /** Fixed-width label: node-facing path plus frame range. */
  label: string;
  /** Missing frames, compacted, or '' when complete. */
  missing: string;
}

export class VersionSession implements Disposable {
  private disposed = false;
  private readonly unsubscribe: () => void;

  constructor(
    readonly machine: NavigationStateMachine,
    readonly config: SessionConfig,
    readonly template: PathTemplate,
    readonly display: SelectedNode,
    readonly keyMap: KeyboardActionMap,
    private readonly listings: DirectoryListingCache,
    private readonly ownedThumbnails: ThumbnailCache | null
  ) {
    this.unsubscribe = machine.on('stateChanged', ({ to }) => {
      if (to === 'confirmed' || to === 'cancelled') this.dispose();
    });
  }

  get entries(): readonly VersionEntry[] {
    return this.machine.entries;
  }

  /** Listing failures seen while resolving, as recorded by the cache. */
  get warnings(): readonly ScanWarning[] {
    return this.listings.warnings;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** Dispatch the command bound to a key. false when unbound or rejected. */
  handleKey(key: string | KeyCombination): boolean {
    const command = this.keyMap.resolveCommand(key);
    if (!command) return false;
    return this.machine.dispatch(command);
  }

  /** Rows for a version list, lowest version first. */
  listItems(width: number = DEFAULT_LABEL_WIDTH): VersionListItem[] {
    const current = this.machine.current.version;
    return this.entries.map((entry) => {
      const range: FrameRange = this.machine.scan(entry);
      const text =
        range.first !== null && range.last !== null
          ? formatSequenceString(entry.sourcePath, range.first, range.last)
          : entry.sourcePath;
      return {
        entry,
        current: entry.version === current,
        label: elideMiddle(text, width),
        missing: formatFrames(range.missing),
      };
    });
  }

  /**
   * End the session without touching nodes: clears the listing cache and
   * stops a session-owned thumbnail cache. Runs by itself on confirm or cancel.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.unsubscribe();
    this.listings.clear();
    this.ownedThumbnails?.dispose();
    log.debug(`Session on ${this.template.source} ended`);
  }
}

/**
 * Open a session on the host selection.
 * @throws NoDisplayableNodeError when no selected node has a versioned path
 */
export function openVersionSession(
  selection: readonly SelectedNode[],
  rawOptions: unknown = {},
  deps: VersionSessionDeps = {}
): VersionSession {
  const config = sanitizeSessionConfig(rawOptions);
  const sorted = sortNodes(selection, config.nodeSortKey ?? undefined);

  const candidate = pickDisplayCandidate(sorted, (value) =>
    parsePathTemplate(stripSequenceRange(value).path, { baseDir: config.baseDir })
  );
  const template = candidate.parsed;

  const listings = deps.listings ?? new DirectoryListingCache();
  const resolver = new VersionSetResolver(listings);
  const scanner = new FrameRangeScanner(listings, config.baseDir);

  const entries = resolver.resolve(template);
  if (entries.length === 0) {
    log.warn(`No versions of ${template.source} found on disk`);
  }

  let ownedThumbnails: ThumbnailCache | null = null;
  let thumbnails: ThumbnailCache | null = null;
  if (config.thumbEnabled) {
    thumbnails = deps.thumbnails ?? null;
    if (!thumbnails) {
      ownedThumbnails = new ThumbnailCache({
        generate:
          deps.generate ?? new FileThumbnailGenerator({ width: config.thumbWidth, height: config.thumbHeight }).generate,
        capacity: config.thumbCacheCapacity,
        workers: config.thumbWorkers,
        timeoutMs: config.thumbTimeoutMs,
      });
      thumbnails = ownedThumbnails;
    }
  }

  let machine: NavigationStateMachine | null = null;
  const updater = new NodeVersionUpdater(sorted, config, resolver, scanner, (message) => {
    machine?.emit('warning', message);
  });

  machine = new NavigationStateMachine(
    {
      config,
      display: candidate.node,
      entries,
      initial: entryFor(template, entries),
      updater,
      scanner,
      thumbnails,
    },
    { preview: deps.preview ?? true }
  );

  log.info(`Opened session on ${template.source}: ${entries.length} version(s), ${updater.versionedCount} node(s)`);

  return new VersionSession(
    machine,
    config,
    template,
    candidate.node,
    deps.keyMap ?? new KeyboardActionMap(),
    listings,
    ownedThumbnails
  );
}
