/**
 * NodeSortKeyEvaluator - orders the host selection and picks the node
 * whose path drives version navigation.
 */

import { NoDisplayableNodeError, NoVersionTokenError } from '../core/errors';
import { Logger } from '../utils/Logger';
import { describeNode, type NodeAdapter } from './NodeAdapter';

const log = new Logger('NodeSortKeyEvaluator');

export type SortKeyAtom = number | string;
export type SortKey = SortKeyAtom | readonly SortKeyAtom[];

/** Host-provided ordering function. `depth` is the node's nesting level in the host graph. */
export type NodeSortKeyFn = (node: NodeAdapter, index: number, depth: number) => SortKey;

export interface SelectedNode {
  adapter: NodeAdapter;
  /** Position in the host selection. */
  index: number;
  depth: number;
}

export interface DisplayCandidate<T> {
  node: SelectedNode;
  parsed: T;
}

export const defaultSortKey: NodeSortKeyFn = (_node, index) => [0, index];

function compareAtoms(a: SortKeyAtom, b: SortKeyAtom): number {
  if (typeof a === 'number' && typeof b === 'number') {
    if (Number.isNaN(a) || Number.isNaN(b)) {
      return Number.isNaN(a) === Number.isNaN(b) ? 0 : Number.isNaN(a) ? 1 : -1;
    }
    return a - b;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  // Mixed kinds: numbers sort before strings
  return typeof a === 'number' ? -1 : 1;
}

function toTuple(key: SortKey): readonly SortKeyAtom[] {
  return typeof key === 'number' || typeof key === 'string' ? [key] : key;
}

/**
 * Compare two sort keys. Scalars behave as one-element tuples; tuples
 * compare element-wise and a shorter tuple sorts first on a common prefix.
 */
export function compareSortKeys(a: SortKey, b: SortKey): number {
  const left = toTuple(a);
  const right = toTuple(b);
  for (let i = 0; i < left.length && i < right.length; i++) {
    const x = left[i];
    const y = right[i];
    if (x === undefined || y === undefined) break;
    const order = compareAtoms(x, y);
    if (order !== 0) return order;
  }
  return left.length - right.length;
}

/**
 * Stable ascending sort of the selection by `keyFn(node, index, depth)`.
 * Each key is computed once. A key function that throws falls back to the
 * default key for that node.
 */
export function sortNodes(nodes: readonly SelectedNode[], keyFn: NodeSortKeyFn = defaultSortKey): SelectedNode[] {
  const keyed = nodes.map((node, position) => {
    let key: SortKey;
    try {
      key = keyFn(node.adapter, node.index, node.depth);
    } catch (err) {
      log.warn(`Sort key failed for ${describeNode(node.adapter, node.index)}, using selection order`, err);
      key = defaultSortKey(node.adapter, node.index, node.depth);
    }
    return { node, key, position };
  });

  keyed.sort((a, b) => compareSortKeys(a.key, b.key) || a.position - b.position);
  return keyed.map((entry) => entry.node);
}

/**
 * First node, in sorted order, whose path is non-empty and parses.
 * `NoVersionTokenError` from `parse` skips the node; any other error propagates.
 */
export function pickDisplayCandidate<T>(
  sorted: readonly SelectedNode[],
  parse: (path: string) => T
): DisplayCandidate<T> {
  for (const node of sorted) {
    const path = node.adapter.getPathValue();
    if (path.trim() === '') continue;
    try {
      return { node, parsed: parse(path) };
    } catch (err) {
      if (err instanceof NoVersionTokenError) {
        log.debug(`Skipping ${describeNode(node.adapter, node.index)}: ${err.message}`);
        continue;
      }
      throw err;
    }
  }
  throw new NoDisplayableNodeError(sorted.length);
}
