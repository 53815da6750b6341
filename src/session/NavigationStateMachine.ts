/**
 * NavigationStateMachine - drives one version-switching session.
 *
 * States:
 *   idle ──navigate (preview on)──▶ previewing
 *   idle | previewing ──confirm──▶ confirmed   (terminal)
 *   idle | previewing ──cancel───▶ cancelled   (terminal)
 *   previewing ──preview off──▶ idle
 *
 * While previewing, every step pushes the new version to the selected nodes
 * and requests a thumbnail for it. Commands issued in a terminal state are
 * rejected.
 */

import path from 'path';
import type { SessionConfig } from '../config/SessionConfig';
import type { NodeUpdateResult, NodeVersionUpdater } from '../nodes/NodeVersionUpdater';
import type { SelectedNode } from '../nodes/NodeSortKeyEvaluator';
import type { FrameRange, FrameRangeScanner } from '../scanner/FrameRangeScanner';
import { findFrameField } from '../scanner/PathTemplate';
import { navigate, type NavigationDirection, type VersionEntry } from '../scanner/VersionSetResolver';
import { pickThumbnailFrame, type ThumbnailKey } from '../thumbnails/FileThumbnailGenerator';
import type { ThumbnailCache, ThumbnailHandle } from '../thumbnails/ThumbnailCache';
import { EventEmitter, type EventMap } from '../utils/EventEmitter';
import { Logger } from '../utils/Logger';
import type { NavigationCommand } from './KeyboardActionMap';

const log = new Logger('NavigationStateMachine');

export type NavigationState = 'idle' | 'previewing' | 'confirmed' | 'cancelled';

export interface NavigationEvents extends EventMap {
  stateChanged: { from: NavigationState; to: NavigationState };
  versionChanged: { previous: VersionEntry; current: VersionEntry };
  /** A thumbnail of the current version finished generating. */
  thumbnailReady: ThumbnailHandle;
  warning: string;
}

export interface NavigationContext {
  config: SessionConfig;
  /** Node whose path drives navigation. */
  display: SelectedNode;
  entries: readonly VersionEntry[];
  initial: VersionEntry;
  updater: NodeVersionUpdater;
  scanner: FrameRangeScanner;
  /** null when thumbnails are off. */
  thumbnails: ThumbnailCache | null;
}

const DIRECTIONS: Readonly<Partial<Record<NavigationCommand, NavigationDirection>>> = {
  maxVersion: 'max',
  minVersion: 'min',
  nextVersion: 'next',
  prevVersion: 'prev',
};

// Preview requests for the current version jump ahead of list-item requests
const CURRENT_THUMB_PRIORITY = 0;
const LIST_THUMB_PRIORITY = 1;

export class NavigationStateMachine extends EventEmitter<NavigationEvents> {
  private _state: NavigationState = 'idle';
  private _current: VersionEntry;
  private _previewEnabled: boolean;
  private currentThumbKeyId: string | null = null;
  private stopWatchingThumbnail: (() => void) | null = null;
  private lastResults: NodeUpdateResult[] = [];

  constructor(
    private readonly context: NavigationContext,
    options: { preview?: boolean } = {}
  ) {
    super();
    this._current = context.initial;
    this._previewEnabled = options.preview ?? true;
  }

  get state(): NavigationState {
    return this._state;
  }

  get current(): VersionEntry {
    return this._current;
  }

  get entries(): readonly VersionEntry[] {
    return this.context.entries;
  }

  get previewEnabled(): boolean {
    return this._previewEnabled;
  }

  get isTerminal(): boolean {
    return this._state === 'confirmed' || this._state === 'cancelled';
  }

  /** Per-node results of the last push to the nodes. */
  get nodeResults(): readonly NodeUpdateResult[] {
    return this.lastResults;
  }

  /**
   * Apply a command. Returns false when it was rejected.
   */
  dispatch(command: NavigationCommand): boolean {
    if (this.rejectIfTerminal(command)) return false;

    const direction = DIRECTIONS[command];
    if (direction) {
      this.moveTo(navigate(this.context.entries, this._current, direction));
      return true;
    }

    switch (command) {
      case 'confirm':
        this.confirm();
        return true;
      case 'cancel':
        this.cancel();
        return true;
      case 'openFolder':
        this.openFolder();
        return true;
      default:
        return false;
    }
  }

  /**
   * Turn live preview on or off. Turning it off restores every node's
   * pre-session values; turning it on pushes the current version.
   */
  setPreviewEnabled(enabled: boolean): boolean {
    if (this.rejectIfTerminal(enabled ? 'previewOn' : 'previewOff')) return false;
    if (enabled === this._previewEnabled) return true;

    this._previewEnabled = enabled;
    if (enabled) {
      if (this._current.version !== this.context.initial.version) {
        this.preview();
      }
    } else {
      this.lastResults = this.context.updater.restore();
      this.unwatchThumbnail();
      this.transition('idle');
    }
    return true;
  }

  /** Jump straight to a listed version, e.g. a click in the version list. */
  selectVersion(version: number): boolean {
    if (this.rejectIfTerminal('selectVersion')) return false;
    const entry = this.context.entries.find((e) => e.version === version);
    if (!entry) {
      log.warn(`Version ${version} is not listed`);
      return false;
    }
    this.moveTo(entry);
    return true;
  }

  /**
   * Thumbnail for any listed version, at list-item priority. null when
   * thumbnails are off or the sequence has no frames on disk.
   */
  requestThumbnail(entry: VersionEntry, priority: number = LIST_THUMB_PRIORITY): ThumbnailHandle | null {
    const cache = this.context.thumbnails;
    if (!cache || !this.context.config.thumbEnabled) return null;
    const key = this.thumbnailKey(entry);
    return key ? cache.request(key, priority) : null;
  }

  /** Key the current version's thumbnail is stored under, or null. */
  thumbnailKey(entry: VersionEntry = this._current): ThumbnailKey | null {
    const { config } = this.context;
    let frame: number | null = null;
    if (findFrameField(entry.path)) {
      frame = pickThumbnailFrame(this.scan(entry), config.thumbFrameMode, config.thumbCustomFrame);
      if (frame === null) {
        log.debug(`No frames on disk for ${entry.path}`);
        return null;
      }
    }
    return { path: entry.path, frame, mode: config.thumbReformat };
  }

  /** Frame range of a version on disk. */
  scan(entry: VersionEntry = this._current): FrameRange {
    return this.context.scanner.scan(entry.path);
  }

  // ---- Commands ----

  private moveTo(next: VersionEntry): void {
    const previous = this._current;
    if (next.version === previous.version) {
      log.debug(`Already at version ${previous.versionText}`);
      // Nodes already hold this version while idle; only the state and thumbnail follow
      if (this._previewEnabled && this._state === 'idle') {
        this.transition('previewing');
        this.watchThumbnail();
      }
      return;
    }

    this._current = next;
    this.emit('versionChanged', { previous, current: next });

    if (this._previewEnabled) {
      this.preview();
    }
  }

  private preview(): void {
    this.transition('previewing');
    this.lastResults = this.context.updater.applyVersion(this._current.version);
    this.watchThumbnail();
  }

  private confirm(): void {
    this.lastResults = this.context.updater.applyVersion(this._current.version);
    const failed = this.lastResults.filter((r) => r.outcome === 'failed').length;
    log.info(`Committed version ${this._current.versionText}${failed > 0 ? ` (${failed} node(s) failed)` : ''}`);
    this.transition('confirmed');
  }

  private cancel(): void {
    this.lastResults = this.context.updater.restore();
    this.transition('cancelled');
  }

  private openFolder(): void {
    const { adapter } = this.context.display;
    const directory = path.dirname(this._current.path);
    try {
      adapter.revealInFileBrowser(directory);
    } catch (err) {
      this.warn(`Could not open ${directory}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  // ---- Helpers ----

  /** Request the current version's thumbnail, replacing any earlier subscription. */
  private watchThumbnail(): void {
    this.unwatchThumbnail();
    const handle = this.requestThumbnail(this._current, CURRENT_THUMB_PRIORITY);
    if (!handle) return;
    this.currentThumbKeyId = handle.keyId;
    this.stopWatchingThumbnail = handle.onSettled((settled) => this.onThumbnailSettled(settled));
  }

  private unwatchThumbnail(): void {
    this.stopWatchingThumbnail?.();
    this.stopWatchingThumbnail = null;
    this.currentThumbKeyId = null;
  }

  private onThumbnailSettled(handle: ThumbnailHandle): void {
    if (this.isTerminal || handle.keyId !== this.currentThumbKeyId) return;
    if (handle.state === 'ready') {
      this.emit('thumbnailReady', handle);
    } else {
      this.warn(`Thumbnail unavailable for ${handle.key.path}: ${handle.error ?? 'unknown error'}`);
    }
  }

  private transition(to: NavigationState): void {
    const from = this._state;
    if (from === to) return;
    this._state = to;
    log.debug(`${from} -> ${to}`);
    this.emit('stateChanged', { from, to });
  }

  private rejectIfTerminal(command: string): boolean {
    if (!this.isTerminal) return false;
    log.debug(`Ignoring ${command}: session is ${this._state}`);
    return true;
  }

  private warn(message: string): void {
    log.warn(message);
    this.emit('warning', message);
  }
}
