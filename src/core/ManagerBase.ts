/**
 * Minimal contract for objects that hold resources requiring cleanup.
 */
export interface Disposable {
  /** Release all resources held by this object. Safe to call more than once. */
  dispose(): void;
}
