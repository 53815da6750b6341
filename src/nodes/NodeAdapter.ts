/**
 * Host-side view of a compositing node that references a file sequence.
 *
 * The engine never talks to the host application directly: every read and
 * write of a node's path or frame range goes through this interface.
 */

export interface NodeFrameRange {
  first: number;
  last: number;
}

export interface NodeAdapter {
  /** Display name used in logs and warnings. */
  readonly name?: string;
  getPathValue(): string;
  setPathValue(path: string): void;
  /** null when the node has no frame range of its own. */
  getFrameRange(): NodeFrameRange | null;
  setFrameRange(first: number, last: number): void;
  /** Reveal a directory in the host's file browser. */
  revealInFileBrowser(path: string): void;
}

/** Label for log output: the node's name, or its selection index. */
export function describeNode(node: NodeAdapter, index: number): string {
  return node.name ?? `node #${index}`;
}
