/**
 * ThumbnailCache - non-blocking, single-flight thumbnail store.
 *
 * Features:
 * - request() returns at once with a handle that is ready, pending or failed
 * - One generation per key; later requests attach to the pending record
 * - Generation runs on a bounded WorkerPool (priority queue, optional timeout)
 * - Settled records (ready or failed) live in an LRU; pending ones are held
 *   outside it and cannot be evicted
 *
 * Consumers only get a read-only view of the pixels.
 */

import { DEFAULT_THUMB_CACHE_CAPACITY, DEFAULT_THUMB_WORKERS } from '../config/ThumbnailConfig';
import { Logger } from '../utils/Logger';
import { LRUCache } from '../utils/LRUCache';
import { WorkerPool } from '../utils/WorkerPool';
import type { ThumbnailGenerator, ThumbnailKey } from './FileThumbnailGenerator';
import type { RGBAImage } from './Reformat';

const log = new Logger('ThumbnailCache');

export type ThumbnailState = 'pending' | 'ready' | 'failed';

/** Read-only pixel access to a cached thumbnail. */
export interface ThumbnailImage {
  readonly width: number;
  readonly height: number;
  getPixel(x: number, y: number): [number, number, number, number];
  /** A private copy of the RGBA bytes. */
  copyPixels(): Uint8ClampedArray;
}

export interface ThumbnailHandle {
  readonly key: ThumbnailKey;
  readonly keyId: string;
  readonly state: ThumbnailState;
  readonly image: ThumbnailImage | null;
  readonly error: string | null;
  readonly lastAccessedAt: number;
  /** Resolves (never rejects) once the record is ready or failed. */
  readonly settled: Promise<ThumbnailHandle>;
  /** Runs `callback` once settled; immediately when already settled. Returns an unsubscribe function. */
  onSettled(callback: (handle: ThumbnailHandle) => void): () => void;
}

export interface ThumbnailCacheOptions {
  generate: ThumbnailGenerator;
  capacity?: number;
  workers?: number;
  /** Per-generation timeout in ms; 0 disables it. */
  timeoutMs?: number;
  now?: () => number;
}

export interface ThumbnailCacheStats {
  cached: number;
  pending: number;
  generations: number;
  capacity: number;
}

export function thumbnailKeyId(key: ThumbnailKey): string {
  return `${key.path}|${key.frame ?? ''}|${key.mode}`;
}

class FrozenThumbnailImage implements ThumbnailImage {
  constructor(private readonly source: RGBAImage) {}

  get width(): number {
    return this.source.width;
  }

  get height(): number {
    return this.source.height;
  }

  getPixel(x: number, y: number): [number, number, number, number] {
    if (x < 0 || y < 0 || x >= this.source.width || y >= this.source.height) {
      throw new RangeError(`Pixel (${x}, ${y}) outside ${this.source.width}x${this.source.height}`);
    }
    const i = (y * this.source.width + x) * 4;
    const d = this.source.data;
    return [d[i] ?? 0, d[i + 1] ?? 0, d[i + 2] ?? 0, d[i + 3] ?? 0];
  }

  copyPixels(): Uint8ClampedArray {
    return this.source.data.slice();
  }
}

class ThumbnailRecord implements ThumbnailHandle {
  private _state: ThumbnailState = 'pending';
  private _image: ThumbnailImage | null = null;
  private _error: string | null = null;
  private _lastAccessedAt: number;
  private callbacks = new Set<(handle: ThumbnailHandle) => void>();
  private settle: (handle: ThumbnailHandle) => void = () => {};
  readonly settled: Promise<ThumbnailHandle>;

  constructor(
    readonly key: ThumbnailKey,
    readonly keyId: string,
    now: number
  ) {
    this._lastAccessedAt = now;
    this.settled = new Promise((resolve) => {
      this.settle = resolve;
    });
  }

  get state(): ThumbnailState {
    return this._state;
  }

  get image(): ThumbnailImage | null {
    return this._image;
  }

  get error(): string | null {
    return this._error;
  }

  get lastAccessedAt(): number {
    return this._lastAccessedAt;
  }

  touch(now: number): void {
    this._lastAccessedAt = now;
  }

  onSettled(callback: (handle: ThumbnailHandle) => void): () => void {
    if (this._state !== 'pending') {
      callback(this);
      return () => {};
    }
    this.callbacks.add(callback);
    return () => {
      this.callbacks.delete(callback);
    };
  }

  complete(image: RGBAImage): void {
    this._image = new FrozenThumbnailImage(image);
    this.finish('ready');
  }

  fail(message: string): void {
    this._error = message;
    this.finish('failed');
  }

  private finish(state: Exclude<ThumbnailState, 'pending'>): void {
    this._state = state;
    this.settle(this);
    const callbacks = [...this.callbacks];
    this.callbacks.clear();
    for (const callback of callbacks) {
      try {
        callback(this);
      } catch (err) {
        log.error(`Thumbnail callback for ${this.keyId} threw`, err);
      }
    }
  }
}

export class ThumbnailCache {
  private readonly generate: ThumbnailGenerator;
  private readonly pool: WorkerPool<ThumbnailKey, RGBAImage>;
  private readonly records: LRUCache<string, ThumbnailRecord>;
  private readonly inflight = new Map<string, ThumbnailRecord>();
  private readonly now: () => number;
  private generations = 0;

  constructor(options: ThumbnailCacheOptions) {
    this.generate = options.generate;
    this.now = options.now ?? Date.now;
    this.records = new LRUCache(options.capacity ?? DEFAULT_THUMB_CACHE_CAPACITY, (keyId) => {
      log.debug(`Evicted ${keyId}`);
    });
    this.pool = new WorkerPool({
      maxWorkers: options.workers ?? DEFAULT_THUMB_WORKERS,
      taskTimeout: options.timeoutMs ?? 0,
      execute: (key) => this.generate(key),
    });
  }

  /**
   * Look up or start generating the thumbnail for `key`. Never blocks and
   * never throws for generation failures. Lower `priority` runs first.
   */
  request(key: ThumbnailKey, priority: number = 0): ThumbnailHandle {
    const keyId = thumbnailKeyId(key);
    const now = this.now();

    const cached = this.records.get(keyId) ?? this.inflight.get(keyId);
    if (cached) {
      cached.touch(now);
      return cached;
    }

    const record = new ThumbnailRecord({ ...key }, keyId, now);
    this.inflight.set(keyId, record);
    this.generations++;

    void this.pool.submit(record.key, priority).then(
      (image) => {
        record.complete(image);
        this.store(record);
      },
      (err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        log.warn(`Thumbnail generation failed for ${keyId}: ${message}`);
        record.fail(message);
        this.store(record);
      }
    );

    return record;
  }

  /** Settled or pending handle for `key`, without starting a generation. */
  peek(key: ThumbnailKey): ThumbnailHandle | null {
    const keyId = thumbnailKeyId(key);
    return this.records.peek(keyId) ?? this.inflight.get(keyId) ?? null;
  }

  /** Forget a settled record so the next request regenerates it. */
  invalidate(key: ThumbnailKey): boolean {
    return this.records.delete(thumbnailKeyId(key));
  }

  getStats(): ThumbnailCacheStats {
    return {
      cached: this.records.size,
      pending: this.inflight.size,
      generations: this.generations,
      capacity: this.records.capacity,
    };
  }

  /** Settled keys, least recently accessed first. */
  cachedKeys(): string[] {
    return this.records.keys();
  }

  /**
   * Stop the pool. Pending records settle as failed; settled ones are dropped.
   */
  dispose(): void {
    this.pool.dispose();
    this.records.clear();
  }

  private store(record: ThumbnailRecord): void {
    this.inflight.delete(record.keyId);
    if (this.pool.isDisposed) return;
    this.records.set(record.keyId, record);
  }
}
