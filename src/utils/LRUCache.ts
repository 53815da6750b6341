/**
 * Generic least-recently-used cache built on Map insertion order.
 * get() refreshes an entry; set() evicts the oldest entries past capacity.
 * The optional onEvict callback runs for every entry that leaves the cache
 * other than through an explicit re-set of the same value.
 */
export class LRUCache<K, V> {
  private map = new Map<K, V>();
  private maxSize: number;

  constructor(
    maxSize: number,
    private readonly onEvict?: (key: K, value: V) => void
  ) {
    this.maxSize = Math.max(1, Math.floor(maxSize));
  }

  get(key: K): V | undefined {
    const value = this.map.get(key);
    if (value === undefined) return undefined;
    this.map.delete(key);
    this.map.set(key, value);
    return value;
  }

  /** Read without refreshing the recency order. */
  peek(key: K): V | undefined {
    return this.map.get(key);
  }

  set(key: K, value: V): void {
    if (this.map.has(key)) {
      const previous = this.map.get(key);
      this.map.delete(key);
      if (previous !== value && previous !== undefined) {
        this.onEvict?.(key, previous);
      }
    }
    this.map.set(key, value);
    this.trim();
  }

  has(key: K): boolean {
    return this.map.has(key);
  }

  delete(key: K): boolean {
    const value = this.map.get(key);
    if (value === undefined) return false;
    this.map.delete(key);
    this.onEvict?.(key, value);
    return true;
  }

  clear(): void {
    const entries = [...this.map];
    this.map.clear();
    if (this.onEvict) {
      for (const [key, value] of entries) this.onEvict(key, value);
    }
  }

  /** Keys from least to most recently used. */
  keys(): K[] {
    return [...this.map.keys()];
  }

  get size(): number {
    return this.map.size;
  }

  get capacity(): number {
    return this.maxSize;
  }

  setCapacity(newSize: number): void {
    this.maxSize = Math.max(1, Math.floor(newSize));
    this.trim();
  }

  private trim(): void {
    for (const [oldestKey, oldestValue] of this.map) {
      if (this.map.size <= this.maxSize) break;
      this.map.delete(oldestKey);
      this.onEvict?.(oldestKey, oldestValue);
    }
  }
}
