/**
 * NodeVersionUpdater - pushes a version number to every selected node.
 *
 * Each node is matched against its own path template, so nodes that point at
 * different shots or layers still move to the same version number. The values
 * a node had when the session opened are kept for restore().
 */

import { NoVersionTokenError } from '../core/errors';
import { FrameRangeScanner } from '../scanner/FrameRangeScanner';
import { buildPath, parsePathTemplate, type PathTemplate } from '../scanner/PathTemplate';
import { VersionSetResolver, type VersionEntry } from '../scanner/VersionSetResolver';
import { formatFrames, stripSequenceRange } from '../utils/frameFormat';
import { Logger } from '../utils/Logger';
import { describeNode, type NodeFrameRange } from './NodeAdapter';
import type { SelectedNode } from './NodeSortKeyEvaluator';

const log = new Logger('NodeVersionUpdater');

export interface NodeSnapshot {
  node: SelectedNode;
  label: string;
  /** Path value exactly as read when the session opened. */
  originalPath: string;
  originalRange: NodeFrameRange | null;
  /** null for nodes whose path has no version marker. */
  template: PathTemplate | null;
}

export interface NodeUpdateOptions {
  changeRange: boolean;
  setMissing: boolean;
  baseDir: string;
}

export type NodeUpdateOutcome = 'updated' | 'substituted' | 'kept' | 'skipped' | 'failed';

export interface NodeUpdateResult {
  label: string;
  outcome: NodeUpdateOutcome;
  path: string | null;
  range: NodeFrameRange | null;
  error?: string;
}

export type NodeWarningHandler = (message: string) => void;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class NodeVersionUpdater {
  private readonly snapshots: NodeSnapshot[];
  private readonly versionSets = new Map<NodeSnapshot, VersionEntry[]>();

  constructor(
    nodes: readonly SelectedNode[],
    private readonly options: NodeUpdateOptions,
    private readonly resolver: VersionSetResolver,
    private readonly scanner: FrameRangeScanner,
    private readonly onWarning: NodeWarningHandler = () => {}
  ) {
    this.snapshots = nodes.map((node) => this.snapshot(node));
  }

  get nodes(): readonly NodeSnapshot[] {
    return this.snapshots;
  }

  /** Nodes that carry a version marker. */
  get versionedCount(): number {
    return this.snapshots.filter((s) => s.template !== null).length;
  }

  /**
   * Move every versioned node to `version`.
   *
   * - Listed on disk: the node gets that version's path, and its scanned
   *   range when range changes are on and the node has a range.
   * - Not listed: the node gets its pre-session values back, or with
   *   `setMissing` the substituted path anyway.
   *
   * A node whose adapter throws is reported and the rest still update.
   */
  applyVersion(version: number): NodeUpdateResult[] {
    return this.snapshots.map((snapshot) => this.applyTo(snapshot, version));
  }

  /** Write back every node's pre-session path and frame range. */
  restore(): NodeUpdateResult[] {
    return this.snapshots.map((snapshot): NodeUpdateResult => {
      try {
        this.writeOriginal(snapshot);
        return { label: snapshot.label, outcome: 'kept', path: snapshot.originalPath, range: snapshot.originalRange };
      } catch (err) {
        return this.failure(snapshot, `Could not restore ${snapshot.label}`, err);
      }
    });
  }

  /** Versions available to one node, resolved once per session. */
  versionsFor(snapshot: NodeSnapshot): VersionEntry[] {
    if (!snapshot.template) return [];
    let entries = this.versionSets.get(snapshot);
    if (!entries) {
      entries = this.resolver.resolve(snapshot.template);
      this.versionSets.set(snapshot, entries);
    }
    return entries;
  }

  private snapshot(node: SelectedNode): NodeSnapshot {
    const label = describeNode(node.adapter, node.index);
    const originalPath = node.adapter.getPathValue();
    const originalRange = node.adapter.getFrameRange();
    const { path } = stripSequenceRange(originalPath);

    let template: PathTemplate | null = null;
    if (path.trim() !== '') {
      try {
        template = parsePathTemplate(path, { baseDir: this.options.baseDir });
      } catch (err) {
        if (!(err instanceof NoVersionTokenError)) throw err;
        log.debug(`${label} has no version marker and will not be updated`);
      }
    }

    return { node, label, originalPath, originalRange, template };
  }

  private applyTo(snapshot: NodeSnapshot, version: number): NodeUpdateResult {
    const { template, label } = snapshot;
    if (!template) {
      return { label, outcome: 'skipped', path: null, range: null };
    }

    try {
      const entry = this.versionsFor(snapshot).find((e) => e.version === version);
      if (entry) {
        return this.writeEntry(snapshot, entry);
      }

      if (this.options.setMissing) {
        const path = buildPath(template, version);
        snapshot.node.adapter.setPathValue(path);
        this.warn(`${label}: version ${version} not found on disk, path substituted anyway`);
        return { label, outcome: 'substituted', path, range: null };
      }

      this.writeOriginal(snapshot);
      this.warn(`${label}: version ${version} not found on disk, node left unchanged`);
      return { label, outcome: 'kept', path: snapshot.originalPath, range: snapshot.originalRange };
    } catch (err) {
      return this.failure(snapshot, `Could not update ${label} to version ${version}`, err);
    }
  }

  private writeEntry(snapshot: NodeSnapshot, entry: VersionEntry): NodeUpdateResult {
    const adapter = snapshot.node.adapter;
    adapter.setPathValue(entry.sourcePath);

    let range: NodeFrameRange | null = null;
    if (this.options.changeRange && snapshot.originalRange !== null) {
      const scanned = this.scanner.scan(entry.path);
      if (scanned.first !== null && scanned.last !== null) {
        range = { first: scanned.first, last: scanned.last };
        adapter.setFrameRange(range.first, range.last);
        if (scanned.missing.length > 0) {
          log.info(`${snapshot.label}: missing frames ${formatFrames(scanned.missing)}`);
        }
      }
    }

    return { label: snapshot.label, outcome: 'updated', path: entry.sourcePath, range };
  }

  private writeOriginal(snapshot: NodeSnapshot): void {
    const adapter = snapshot.node.adapter;
    adapter.setPathValue(snapshot.originalPath);
    if (snapshot.originalRange) {
      adapter.setFrameRange(snapshot.originalRange.first, snapshot.originalRange.last);
    }
  }

  private failure(snapshot: NodeSnapshot, context: string, err: unknown): NodeUpdateResult {
    const error = errorMessage(err);
    this.warn(`${context}: ${error}`);
    return { label: snapshot.label, outcome: 'failed', path: null, range: null, error };
  }

  private warn(message: string): void {
    log.warn(message);
    this.onWarning(message);
  }
}
