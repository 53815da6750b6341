/**
 * WorkerPool - bounded-concurrency executor for asynchronous jobs
 *
 * Features:
 * - Fixed number of concurrent slots
 * - Task queuing with priority support (lower number runs first, FIFO within a priority)
 * - Optional per-task timeout
 * - Graceful shutdown and cleanup
 *
 * The pool does not own threads; each slot awaits the executor's promise.
 * A timed-out job is rejected and its slot released, but the underlying
 * work is not interrupted.
 */

import { Logger } from './Logger';

const log = new Logger('WorkerPool');

export type TaskExecutor<TTask, TResult> = (task: TTask) => Promise<TResult>;

export interface WorkerPoolConfig<TTask, TResult> {
  maxWorkers: number;
  execute: TaskExecutor<TTask, TResult>;
  /** Task timeout in milliseconds. 0 or undefined disables the timeout. */
  taskTimeout?: number;
}

interface QueuedTask<TTask, TResult> {
  id: number;
  data: TTask;
  priority: number;
  resolve: (result: TResult) => void;
  reject: (error: Error) => void;
  timeoutHandle?: ReturnType<typeof setTimeout>;
  settled: boolean;
}

export interface WorkerPoolStats {
  totalWorkers: number;
  busyWorkers: number;
  queuedTasks: number;
  pendingTasks: number;
}

// Task IDs wrap before leaving the safe integer range
const MAX_TASK_ID = Number.MAX_SAFE_INTEGER - 1;

export class WorkerPool<TTask, TResult> {
  private readonly maxWorkers: number;
  private readonly taskTimeout: number;
  private readonly execute: TaskExecutor<TTask, TResult>;
  private taskQueue: QueuedTask<TTask, TResult>[] = [];
  private running = new Map<number, QueuedTask<TTask, TResult>>();
  private taskIdCounter = 0;
  private disposed = false;

  constructor(config: WorkerPoolConfig<TTask, TResult>) {
    this.maxWorkers = Math.max(1, Math.floor(config.maxWorkers));
    this.taskTimeout = config.taskTimeout && config.taskTimeout > 0 ? config.taskTimeout : 0;
    this.execute = config.execute;
  }

  private nextTaskId(): number {
    this.taskIdCounter++;
    if (this.taskIdCounter > MAX_TASK_ID) {
      this.taskIdCounter = 1;
    }
    return this.taskIdCounter;
  }

  /**
   * Queue a job. Resolves with the executor's result or rejects with its error,
   * a timeout, or pool disposal.
   */
  submit(data: TTask, priority: number = 0): Promise<TResult> {
    if (this.disposed) {
      return Promise.reject(new Error('WorkerPool has been disposed'));
    }

    return new Promise<TResult>((resolve, reject) => {
      const task: QueuedTask<TTask, TResult> = {
        id: this.nextTaskId(),
        data,
        priority,
        resolve,
        reject,
        settled: false,
      };

      const insertIndex = this.taskQueue.findIndex((t) => t.priority > priority);
      if (insertIndex === -1) {
        this.taskQueue.push(task);
      } else {
        this.taskQueue.splice(insertIndex, 0, task);
      }

      this.processQueue();
    });
  }

  private processQueue(): void {
    if (this.disposed) return;

    while (this.running.size < this.maxWorkers) {
      const task = this.taskQueue.shift();
      if (!task) break;
      this.run(task);
    }
  }

  private run(task: QueuedTask<TTask, TResult>): void {
    this.running.set(task.id, task);

    if (this.taskTimeout > 0) {
      task.timeoutHandle = setTimeout(() => {
        log.warn(`Task ${task.id} timed out after ${this.taskTimeout}ms`);
        this.finish(task, () => task.reject(new Error(`Task timed out after ${this.taskTimeout}ms`)));
      }, this.taskTimeout);
    }

    let pending: Promise<TResult>;
    try {
      pending = this.execute(task.data);
    } catch (error) {
      pending = Promise.reject(error);
    }

    pending.then(
      (result) => this.finish(task, () => task.resolve(result)),
      (error: unknown) =>
        this.finish(task, () => task.reject(error instanceof Error ? error : new Error(String(error))))
    );
  }

  private finish(task: QueuedTask<TTask, TResult>, settle: () => void): void {
    if (task.settled) return;
    task.settled = true;
    if (task.timeoutHandle) {
      clearTimeout(task.timeoutHandle);
    }
    this.running.delete(task.id);
    settle();
    this.processQueue();
  }

  getStats(): WorkerPoolStats {
    return {
      totalWorkers: this.maxWorkers,
      busyWorkers: this.running.size,
      queuedTasks: this.taskQueue.length,
      pendingTasks: this.running.size + this.taskQueue.length,
    };
  }

  /**
   * Reject every queued (not yet running) task.
   */
  clearQueue(): void {
    const queued = this.taskQueue;
    this.taskQueue = [];
    for (const task of queued) {
      task.settled = true;
      task.reject(new Error('Task cancelled'));
    }
  }

  /**
   * Reject queued and running tasks and refuse new submissions.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    const queued = this.taskQueue;
    this.taskQueue = [];
    for (const task of queued) {
      task.settled = true;
      task.reject(new Error('WorkerPool disposed'));
    }

    for (const task of [...this.running.values()]) {
      if (task.timeoutHandle) {
        clearTimeout(task.timeoutHandle);
      }
      task.settled = true;
      task.reject(new Error('WorkerPool disposed'));
    }
    this.running.clear();
  }

  get isDisposed(): boolean {
    return this.disposed;
  }
}
