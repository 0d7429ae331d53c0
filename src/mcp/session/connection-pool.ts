import { runWithDeadline } from '../deadline.js';
import { ConfigurationError, ToolError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { PoolConfig } from '../types.js';

export interface PoolHooks<T> {
  create(): Promise<T>;
  destroy(resource: T): Promise<void>;
  /** Checked when an idle resource is handed out; false destroys it. */
  validate?(resource: T): boolean;
}

export interface PoolStats {
  size: number;
  idle: number;
  borrowed: number;
  pending: number;
  min: number;
  max: number;
}

interface IdleEntry<T> {
  resource: T;
  timer: ReturnType<typeof setTimeout> | null;
}

interface Waiter<T> {
  resolve(resource: T): void;
  reject(error: unknown): void;
  timer: ReturnType<typeof setTimeout>;
  signal?: AbortSignal;
  onAbort(): void;
}

/**
 * Bounded pool of reusable resources. Every state change happens
 * synchronously between awaits, so the event loop serializes acquire,
 * release and destroy. Never grows past `max`: callers queue and time out
 * with ResourceExhausted instead. Opening a resource is bounded by the same
 * `acquireTimeoutMs`.
 */
export class BoundedPool<T> {
  private readonly idle: Array<IdleEntry<T>> = [];
  private readonly waiters: Array<Waiter<T>> = [];
  private borrowed = 0;
  private creating = 0;
  private closed = false;

  constructor(
    private readonly hooks: PoolHooks<T>,
    private readonly options: PoolConfig
  ) {
    if (options.max < 1) {
      throw new ConfigurationError(`Pool max must be at least 1, got ${options.max}`);
    }
    if (options.min < 0 || options.min > options.max) {
      throw new ConfigurationError(`Pool min must be between 0 and ${options.max}, got ${options.min}`);
    }
  }

  get size(): number {
    return this.idle.length + this.borrowed + this.creating;
  }

  stats(): PoolStats {
    return {
      size: this.size,
      idle: this.idle.length,
      borrowed: this.borrowed,
      pending: this.waiters.length,
      min: this.options.min,
      max: this.options.max,
    };
  }

  async acquire(signal?: AbortSignal): Promise<T> {
    if (this.closed) {
      throw new ToolError('ResourceExhausted', 'Connection pool is closed');
    }
    if (signal?.aborted) {
      throw cancelledWhileWaiting();
    }

    const reused = this.takeIdle();
    if (reused !== undefined) {
      return reused.resource;
    }

    if (this.size < this.options.max) {
      return this.createBorrowed(signal);
    }

    return this.enqueue(signal);
  }

  async release(resource: T): Promise<void> {
    this.borrowed--;
    if (this.closed) {
      await this.destroyResource(resource);
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      detach(waiter);
      this.borrowed++;
      waiter.resolve(resource);
      return;
    }

    this.putIdle(resource);
  }

  /**
   * Removes a borrowed resource from the pool for good. Its slot frees up for
   * a fresh resource on the next acquire.
   */
  async destroy(resource: T): Promise<void> {
    this.borrowed--;
    await this.destroyResource(resource);
    this.serveWaiter();
  }

  /**
   * Opens resources until `min` are held.
   */
  async prime(): Promise<void> {
    const missing = this.options.min - this.size;
    const created = await Promise.allSettled(
      Array.from({ length: Math.max(0, missing) }, () => this.createBorrowed())
    );
    for (const outcome of created) {
      if (outcome.status === 'fulfilled') {
        await this.release(outcome.value);
      } else {
        logger.warn('Failed to open warm connection', { error: errorMessage(outcome.reason) });
      }
    }
  }

  async close(): Promise<void> {
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      detach(waiter);
      waiter.reject(new ToolError('ResourceExhausted', 'Connection pool is closed'));
    }

    const idle = this.idle.splice(0);
    await Promise.all(
      idle.map(entry => {
        if (entry.timer) clearTimeout(entry.timer);
        return this.destroyResource(entry.resource);
      })
    );
  }

  private takeIdle(): IdleEntry<T> | undefined {
    let entry = this.idle.pop();
    while (entry !== undefined) {
      if (entry.timer) clearTimeout(entry.timer);
      if (!this.hooks.validate || this.hooks.validate(entry.resource)) {
        this.borrowed++;
        return entry;
      }
      void this.destroyResource(entry.resource);
      entry = this.idle.pop();
    }
    return undefined;
  }

  private async createBorrowed(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      throw cancelledWhileWaiting();
    }
    this.creating++;
    let abandoned = false;
    const opening = this.hooks.create().then(resource => {
      if (abandoned) {
        logger.debug('Closing connection that opened after its acquire gave up');
        void this.destroyResource(resource);
      }
      return resource;
    });

    let resource: T;
    try {
      resource = await runWithDeadline(() => opening, {
        timeoutMs: this.options.acquireTimeoutMs,
        label: 'Opening a warehouse connection',
        signal,
      });
    } catch (error) {
      abandoned = true;
      this.creating--;
      this.serveWaiter();
      throw error;
    }
    this.creating--;
    this.borrowed++;
    return resource;
  }

  private enqueue(signal?: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const waiter: Waiter<T> = {
        resolve,
        reject,
        signal,
        timer: setTimeout(() => {
          this.removeWaiter(waiter);
          reject(
            new ToolError(
              'ResourceExhausted',
              `No warehouse connection available within ${this.options.acquireTimeoutMs}ms (pool max ${this.options.max})`,
              { acquireTimeoutMs: this.options.acquireTimeoutMs, max: this.options.max }
            )
          );
        }, this.options.acquireTimeoutMs),
        onAbort: () => {
          this.removeWaiter(waiter);
          reject(cancelledWhileWaiting());
        },
      };
      signal?.addEventListener('abort', waiter.onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private removeWaiter(waiter: Waiter<T>): void {
    const index = this.waiters.indexOf(waiter);
    if (index !== -1) {
      this.waiters.splice(index, 1);
    }
    detach(waiter);
  }

  // A slot freed up: the oldest waiter gets a freshly created resource.
  private serveWaiter(): void {
    if (this.closed || this.size >= this.options.max) {
      return;
    }
    const waiter = this.waiters.shift();
    if (!waiter) {
      return;
    }
    detach(waiter);
    this.createBorrowed(waiter.signal).then(waiter.resolve, waiter.reject);
  }

  private putIdle(resource: T): void {
    const entry: IdleEntry<T> = { resource, timer: null };
    if (this.options.idleTimeoutMs > 0) {
      entry.timer = setTimeout(() => this.evict(entry), this.options.idleTimeoutMs);
      entry.timer.unref();
    }
    this.idle.push(entry);
  }

  private evict(entry: IdleEntry<T>): void {
    const index = this.idle.indexOf(entry);
    if (index === -1) {
      return;
    }
    if (this.size <= this.options.min) {
      entry.timer = setTimeout(() => this.evict(entry), this.options.idleTimeoutMs);
      entry.timer.unref();
      return;
    }
    this.idle.splice(index, 1);
    void this.destroyResource(entry.resource);
  }

  private async destroyResource(resource: T): Promise<void> {
    try {
      await this.hooks.destroy(resource);
    } catch (error) {
      logger.warn('Failed to close pooled connection', { error: errorMessage(error) });
    }
  }
}

function detach<T>(waiter: Waiter<T>): void {
  clearTimeout(waiter.timer);
  waiter.signal?.removeEventListener('abort', waiter.onAbort);
}

function cancelledWhileWaiting(): ToolError {
  return new ToolError('BackendError', 'Invocation was cancelled while waiting for a warehouse connection', {
    reason: 'cancelled',
  });
}
