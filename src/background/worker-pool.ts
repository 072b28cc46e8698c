// =============================================================================
// WorkerPool<T, R> — Fixed-size async pool with a priority queue
// =============================================================================

import { PriorityQueue } from './priority-queue.js';

// ── Types ────────────────────────────────────────────────────────────────────

export interface WorkerPoolConfig {
  size: number;
  taskTimeoutMs: number;
}

export interface WorkerPoolMetrics {
  activeWorkers: number;
  idleWorkers: number;
  queueDepth: number;
  totalCompleted: number;
  totalFailed: number;
}

export type WorkerPoolEvent<R> =
  | { type: 'task:started'; taskId: string; workerId: number }
  | { type: 'task:completed'; taskId: string; result: R; durationMs: number }
  | { type: 'task:failed'; taskId: string; error: Error; durationMs: number }
  | { type: 'task:timeout'; taskId: string; workerId: number }
  | { type: 'task:cancelled'; taskId: string; reason: string }
  | { type: 'pool:idle' }
  | { type: 'pool:drained' };

interface PoolTask<T, R> {
  readonly id: string;
  readonly input: T;
  readonly priority: number;
  /** Submission order; breaks priority ties first-in first-out */
  readonly seq: number;
  readonly abortController: AbortController;
}

type WorkerState = 'idle' | 'busy' | 'dead';

interface WorkerSlot<T, R> {
  state: WorkerState;
  currentTask: PoolTask<T, R> | null;
  wakeResolve: (() => void) | null;
}

// ── Defaults ─────────────────────────────────────────────────────────────────

const DEFAULT_POOL_CONFIG: WorkerPoolConfig = {
  size: 4,
  taskTimeoutMs: 60_000,
};

// ── Implementation ───────────────────────────────────────────────────────────

export class WorkerPool<T, R> {
  private readonly queue: PriorityQueue<PoolTask<T, R>>;
  private readonly workers = new Map<number, WorkerSlot<T, R>>();
  private readonly executor: (input: T, signal: AbortSignal) => Promise<R>;
  private readonly config: WorkerPoolConfig;
  private readonly onEvent?: (event: WorkerPoolEvent<R>) => void;
  private idleWaiters: Array<() => void> = [];

  private nextSeq = 0;
  /** Set on enqueue, cleared when `pool:idle` is emitted */
  private hadWork = false;
  private draining = false;
  private drainingResolve?: () => void;
  private totalCompleted = 0;
  private totalFailed = 0;

  constructor(
    executor: (input: T, signal: AbortSignal) => Promise<R>,
    config?: Partial<WorkerPoolConfig>,
    onEvent?: (event: WorkerPoolEvent<R>) => void,
  ) {
    this.executor = executor;
    this.config = { ...DEFAULT_POOL_CONFIG, ...config };
    if (!Number.isInteger(this.config.size) || this.config.size < 1) {
      throw new Error(`WorkerPool: size must be a positive integer, got ${this.config.size}`);
    }
    this.onEvent = onEvent;
    this.queue = new PriorityQueue<PoolTask<T, R>>(
      (a, b) => a.priority - b.priority || a.seq - b.seq,
    );

    for (let id = 0; id < this.config.size; id++) {
      this.spawnWorker(id);
    }
  }

  // ── Public API ─────────────────────────────────────────────────────────────

  /**
   * Queue a task. Lower priority numbers run first. Outcomes surface only as
   * events: `task:completed`, `task:failed`, `task:timeout`, `task:cancelled`.
   */
  dispatch(id: string, input: T, priority = 0): void {
    if (this.draining) throw new Error('Pool is draining, cannot dispatch');
    this.queue.enqueue({
      id,
      input,
      priority,
      seq: this.nextSeq++,
      abortController: new AbortController(),
    });
    this.hadWork = true;
    this.wakeOneIdleWorker();
  }

  /** Resolves once the queue is empty and no worker is busy. */
  whenIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop accepting work and wait for queued and running tasks. On timeout,
   * running tasks are aborted, queued ones are cancelled and the promise
   * rejects.
   */
  async drain(timeoutMs = 30_000): Promise<void> {
    this.draining = true;

    if (this.isIdle()) {
      this.cleanup();
      this.emit({ type: 'pool:drained' });
      return;
    }

    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        for (const slot of this.workers.values()) {
          slot.currentTask?.abortController.abort(new Error('Pool drain timeout'));
        }
        for (const task of this.queue.clear()) {
          this.cancel(task, 'drain timeout');
        }
        this.drainingResolve = undefined;
        this.cleanup();
        this.releaseIdleWaiters();
        reject(new Error(`Drain timeout after ${timeoutMs}ms`));
      }, timeoutMs);

      this.drainingResolve = () => {
        clearTimeout(timer);
        this.cleanup();
        this.emit({ type: 'pool:drained' });
        resolve();
      };
    });
  }

  getMetrics(): WorkerPoolMetrics {
    let active = 0;
    let idle = 0;
    for (const slot of this.workers.values()) {
      if (slot.state === 'busy') active++;
      else if (slot.state === 'idle') idle++;
    }
    return {
      activeWorkers: active,
      idleWorkers: idle,
      queueDepth: this.queue.size,
      totalCompleted: this.totalCompleted,
      totalFailed: this.totalFailed,
    };
  }

  // ── Worker lifecycle ───────────────────────────────────────────────────────

  private spawnWorker(id: number): void {
    const slot: WorkerSlot<T, R> = {
      state: 'idle',
      currentTask: null,
      wakeResolve: null,
    };
    this.workers.set(id, slot);
    void this.workerLoop(id, slot);
  }

  private async workerLoop(workerId: number, slot: WorkerSlot<T, R>): Promise<void> {
    while (slot.state !== 'dead') {
      const task = this.queue.dequeue();

      if (!task) {
        slot.state = 'idle';
        this.checkIdle();

        // Park until woken
        await new Promise<void>((resolve) => {
          slot.wakeResolve = resolve;
        });
        continue;
      }

      slot.state = 'busy';
      slot.currentTask = task;

      this.emit({ type: 'task:started', taskId: task.id, workerId });
      const startMs = Date.now();

      try {
        const result = await this.executeWithTimeout(task, workerId);
        this.totalCompleted++;
        this.emit({
          type: 'task:completed',
          taskId: task.id,
          result,
          durationMs: Date.now() - startMs,
        });
      } catch (error) {
        this.totalFailed++;
        const err = error instanceof Error ? error : new Error(String(error));
        this.emit({
          type: 'task:failed',
          taskId: task.id,
          error: err,
          durationMs: Date.now() - startMs,
        });
      } finally {
        slot.currentTask = null;
      }
    }
  }

  private executeWithTimeout(task: PoolTask<T, R>, workerId: number): Promise<R> {
    return new Promise<R>((resolve, reject) => {
      let settled = false;
      const timer = setTimeout(() => {
        if (!settled) {
          settled = true;
          task.abortController.abort(
            new Error(`Task timeout after ${this.config.taskTimeoutMs}ms`),
          );
          this.emit({ type: 'task:timeout', taskId: task.id, workerId });
          reject(new Error(`Task "${task.id}" timed out after ${this.config.taskTimeoutMs}ms`));
        }
      }, this.config.taskTimeoutMs);

      const finish = (outcome: () => void) => {
        if (!settled) {
          settled = true;
          clearTimeout(timer);
          outcome();
        }
      };

      let running: Promise<R>;
      try {
        running = this.executor(task.input, task.abortController.signal);
      } catch (error) {
        running = Promise.reject(error);
      }
      running.then(
        (result) => finish(() => resolve(result)),
        (error: unknown) =>
          finish(() => reject(error instanceof Error ? error : new Error(String(error)))),
      );
    });
  }

  // ── Helpers ────────────────────────────────────────────────────────────────

  private cancel(task: PoolTask<T, R>, reason: string): void {
    this.totalFailed++;
    this.emit({ type: 'task:cancelled', taskId: task.id, reason });
  }

  private wakeOneIdleWorker(): void {
    for (const slot of this.workers.values()) {
      if (slot.state === 'idle' && slot.wakeResolve) {
        const wake = slot.wakeResolve;
        slot.wakeResolve = null;
        // Claim the slot now so a second dispatch wakes a different worker
        slot.state = 'busy';
        wake();
        return;
      }
    }
  }

  private isIdle(): boolean {
    if (this.queue.size > 0) return false;
    for (const slot of this.workers.values()) {
      if (slot.state === 'busy') return false;
    }
    return true;
  }

  private checkIdle(): void {
    if (!this.isIdle()) return;
    if (this.hadWork) {
      this.hadWork = false;
      this.emit({ type: 'pool:idle' });
    }
    this.releaseIdleWaiters();
    if (this.draining) this.drainingResolve?.();
  }

  private releaseIdleWaiters(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private emit(event: WorkerPoolEvent<R>): void {
    this.onEvent?.(event);
  }

  private cleanup(): void {
    for (const slot of this.workers.values()) {
      slot.state = 'dead';
      if (slot.wakeResolve) {
        const wake = slot.wakeResolve;
        slot.wakeResolve = null;
        wake();
      }
    }
  }
}
