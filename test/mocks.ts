/**
 * Shared mock factories for tests.
 *
 * Each factory creates a fresh mock on every call so tests remain isolated.
 */

import { vi } from 'vitest';
import type { NodeAdapter, NodeFrameRange } from '../src/nodes/NodeAdapter';
import type { SelectedNode } from '../src/nodes/NodeSortKeyEvaluator';

// ---------------------------------------------------------------------------
// Host nodes
// ---------------------------------------------------------------------------

export interface MockNodeOptions {
  name?: string;
  path?: string;
  range?: NodeFrameRange | null;
  /** Make setPathValue throw, as a locked host node would. */
  failOnSetPath?: boolean;
}

/**
 * In-memory NodeAdapter. Writes are recorded on `paths` / `ranges` and the
 * adapter methods are spies.
 */
export class MockNodeAdapter implements NodeAdapter {
  readonly name: string | undefined;
  path: string;
  range: NodeFrameRange | null;
  readonly paths: string[] = [];
  readonly ranges: NodeFrameRange[] = [];
  readonly revealed: string[] = [];
  failOnSetPath: boolean;

  readonly getPathValue = vi.fn((): string => this.path);

  readonly setPathValue = vi.fn((path: string): void => {
    if (this.failOnSetPath) {
      throw new Error(`${this.name ?? 'node'} is locked`);
    }
    this.path = path;
    this.paths.push(path);
  });

  readonly getFrameRange = vi.fn((): NodeFrameRange | null => (this.range ? { ...this.range } : null));

  readonly setFrameRange = vi.fn((first: number, last: number): void => {
    this.range = { first, last };
    this.ranges.push({ first, last });
  });

  readonly revealInFileBrowser = vi.fn((path: string): void => {
    this.revealed.push(path);
  });

  constructor(options: MockNodeOptions = {}) {
    this.name = options.name;
    this.path = options.path ?? '';
    this.range = options.range ?? null;
    this.failOnSetPath = options.failOnSetPath ?? false;
  }
}

export function createMockNode(options: MockNodeOptions = {}): MockNodeAdapter {
  return new MockNodeAdapter(options);
}

/** Wrap adapters as a host selection, in order, at depth 0. */
export function selectionOf(...adapters: NodeAdapter[]): SelectedNode[] {
  return adapters.map((adapter, index) => ({ adapter, index, depth: 0 }));
}
