export type OverflowPolicy = 'drop_oldest' | 'reject';

export interface AsyncQueueOptions<T> {
  capacity: number;
  overflow?: OverflowPolicy;
  onDrop?: (item: T) => void;
}

interface Waiter<T> {
  resolve: (value: T | null) => void;
  cleanup: () => void;
}

/**
 * Bounded single-consumer queue linking pipeline stages.
 *
 * `push` never blocks: when full it either drops the oldest item (`drop_oldest`) or refuses
 * the new one (`reject`). `shift` suspends until an item arrives, the queue is closed
 * (resolves null once drained) or the given signal aborts (resolves null).
 */
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private readonly spaceWaiters: Array<() => void> = [];
  private readonly capacity: number;
  private readonly overflow: OverflowPolicy;
  private readonly onDrop?: (item: T) => void;
  private closed = false;
  private dropped = 0;

  constructor(options: AsyncQueueOptions<T>) {
    this.capacity = Math.max(1, Math.floor(options.capacity));
    this.overflow = options.overflow ?? 'drop_oldest';
    this.onDrop = options.onDrop;
  }

  get size(): number {
    return this.items.length;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Returns false when an item was dropped to make room, or the push was refused. */
  push(item: T): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.cleanup();
      waiter.resolve(item);
      return true;
    }

    if (this.items.length < this.capacity) {
      this.items.push(item);
      return true;
    }

    this.dropped += 1;
    if (this.overflow === 'reject') {
      this.onDrop?.(item);
      return false;
    }

    const oldest = this.items.shift();
    this.items.push(item);
    if (oldest !== undefined) {
      this.onDrop?.(oldest);
    }
    return false;
  }

  /** Takes the head item without suspending. */
  tryShift(): T | undefined {
    const next = this.takeNext();
    return next.found ? next.item : undefined;
  }

  shift(signal?: AbortSignal): Promise<T | null> {
    const next = this.takeNext();
    if (next.found) {
      return Promise.resolve(next.item);
    }
    if (this.closed || signal?.aborted) {
      return Promise.resolve(null);
    }

    return new Promise<T | null>((resolve) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        resolve(null);
      };
      const waiter: Waiter<T> = {
        resolve,
        cleanup: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** Resolves once the queue holds fewer than `threshold` items (or is closed/aborted). */
  whenBelow(threshold: number, signal?: AbortSignal): Promise<void> {
    if (this.items.length < threshold || this.closed || signal?.aborted) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const check = (): void => {
        if (this.items.length < threshold || this.closed || signal?.aborted) {
          const index = this.spaceWaiters.indexOf(check);
          if (index !== -1) {
            this.spaceWaiters.splice(index, 1);
          }
          signal?.removeEventListener('abort', check);
          resolve();
        }
      };
      signal?.addEventListener('abort', check, { once: true });
      this.spaceWaiters.push(check);
    });
  }

  /** Drops everything queued; returns how many items were discarded. */
  clear(): number {
    const count = this.items.length;
    this.items.length = 0;
    this.notifySpace();
    return count;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.cleanup();
      waiter.resolve(null);
    }
    this.notifySpace();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    while (true) {
      const item = await this.shift();
      if (item === null) {
        return;
      }
      yield item;
    }
  }

  private takeNext(): { found: true; item: T } | { found: false } {
    if (this.items.length === 0) {
      return { found: false };
    }
    const [item] = this.items.splice(0, 1);
    this.notifySpace();
    return { found: true, item };
  }

  private notifySpace(): void {
    for (const check of [...this.spaceWaiters]) {
      check();
    }
  }
}
