/**
 * Bounded async channel.
 *
 * `send` waits while the buffer is full; `tryReceive` never waits. Consumers
 * that need to wait on several channels at once combine `tryReceive` with
 * `watch()`, whose `ready` resolves (without consuming) as soon as the
 * channel has a value or is closed. A watch that lost a race must be
 * disposed, or its waiter stays registered until the channel next wakes.
 */
export type Received<T> = { ok: true; value: T } | { ok: false };

export type Watch = { ready: Promise<void>; dispose: () => void };

export class Channel<T> {
  private buffer: Array<{ value: T }> = [];
  private closed = false;
  private readyWaiters: Array<() => void> = [];
  private spaceWaiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (capacity < 1) throw new Error(`channel capacity must be at least 1, got ${capacity}`);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  /** Readers currently parked in `ready()` or `watch()`. */
  get waiting(): number {
    return this.readyWaiters.length;
  }

  /** True once the channel is closed and every buffered value was taken. */
  get isDrained(): boolean {
    return this.closed && this.buffer.length === 0;
  }

  /**
   * Resolves true once the value is buffered, false when the channel was
   * closed (or the signal aborted) before there was room for it.
   */
  async send(value: T, signal?: AbortSignal): Promise<boolean> {
    while (!this.closed && this.buffer.length >= this.capacity) {
      if (signal?.aborted) return false;
      await this.waitForSpace(signal);
    }
    if (this.closed || signal?.aborted) return false;
    this.buffer.push({ value });
    this.wakeReaders();
    return true;
  }

  trySend(value: T): boolean {
    if (this.closed || this.buffer.length >= this.capacity) return false;
    this.buffer.push({ value });
    this.wakeReaders();
    return true;
  }

  tryReceive(): Received<T> {
    const box = this.buffer.shift();
    if (!box) return { ok: false };
    this.wakeWriters();
    return { ok: true, value: box.value };
  }

  async receive(signal?: AbortSignal): Promise<Received<T>> {
    for (;;) {
      const got = this.tryReceive();
      if (got.ok) return got;
      if (this.closed || signal?.aborted) return { ok: false };
      await this.ready(signal);
    }
  }

  ready(signal?: AbortSignal): Promise<void> {
    return this.watch(signal).ready;
  }

  watch(signal?: AbortSignal): Watch {
    if (this.buffer.length > 0 || this.closed || signal?.aborted) {
      return { ready: Promise.resolve(), dispose: () => undefined };
    }
    let dispose: () => void = () => undefined;
    const ready = new Promise<void>((resolve) => {
      const done = () => {
        this.readyWaiters = this.readyWaiters.filter((w) => w !== done);
        signal?.removeEventListener('abort', done);
        resolve();
      };
      dispose = done;
      this.readyWaiters.push(done);
      signal?.addEventListener('abort', done, { once: true });
    });
    return { ready, dispose: () => dispose() };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.wakeReaders();
    this.wakeWriters();
  }

  private waitForSpace(signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve) => {
      const done = () => {
        signal?.removeEventListener('abort', done);
        resolve();
      };
      this.spaceWaiters.push(done);
      signal?.addEventListener('abort', done, { once: true });
    });
  }

  private wakeReaders(): void {
    const waiters = this.readyWaiters;
    this.readyWaiters = [];
    for (const w of waiters) w();
  }

  private wakeWriters(): void {
    const waiters = this.spaceWaiters;
    this.spaceWaiters = [];
    for (const w of waiters) w();
  }
}
