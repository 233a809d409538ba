import { Channel } from './channel';
import type { Command } from './command';
import { log } from '../services/logger';

export type Emit<T> = (value: T) => Promise<boolean>;

/**
 * Long-lived producer. It writes records through `emit` until its source is
 * exhausted, and returns. Throwing reports a stream error. It must stop
 * promptly once `signal` aborts.
 */
export type Producer<T> = (emit: Emit<T>, signal: AbortSignal) => Promise<void>;

export type SubscriptionOptions = {
  capacity?: number;
  signal?: AbortSignal;   // parent cancellation, e.g. the program's root signal
  label?: string;
};

export type NextResult<T> =
  | { kind: 'item'; value: T }
  | { kind: 'error'; error: Error };

let nextSubscriptionId = 1;

/**
 * Bridges a producer onto the event loop. The producer runs in the
 * background and feeds a bounded data channel plus a one-slot error channel.
 * Each `next()` takes exactly one result; the owner re-arms by calling
 * `next()` again after handling it.
 */
export class Subscription<T> {
  readonly id: number;
  readonly label: string;
  private readonly data: Channel<T>;
  private readonly errors = new Channel<Error>(1);
  private readonly controller = new AbortController();
  private readonly finished: Promise<void>;
  private readonly detachParent: () => void;

  constructor(producer: Producer<T>, options: SubscriptionOptions = {}) {
    this.id = nextSubscriptionId++;
    this.label = options.label ?? `subscription-${this.id}`;
    this.data = new Channel<T>(Math.max(1, options.capacity ?? 64));

    const parent = options.signal;
    const onParentAbort = () => this.cancel();
    if (parent?.aborted) {
      this.controller.abort();
    } else {
      parent?.addEventListener('abort', onParentAbort, { once: true });
    }
    this.detachParent = () => parent?.removeEventListener('abort', onParentAbort);

    const signal = this.controller.signal;
    const emit: Emit<T> = (value) => this.data.send(value, signal);

    this.finished = this.run(producer, emit, signal);
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Waits for one record or one error. Resolves null when the stream ended
   * cleanly with nothing left buffered, or once the subscription is cancelled.
   */
  async next(): Promise<NextResult<T> | null> {
    const signal = this.controller.signal;
    for (;;) {
      if (signal.aborted) return null;
      const item = this.data.tryReceive();
      if (item.ok) return { kind: 'item', value: item.value };
      const failure = this.errors.tryReceive();
      if (failure.ok) return { kind: 'error', error: failure.value };
      if (this.data.isDrained && this.errors.isDrained) return null;
      const data = this.data.watch(signal);
      const errors = this.errors.watch(signal);
      try {
        await Promise.race([data.ready, errors.ready]);
      } finally {
        data.dispose();
        errors.dispose();
      }
    }
  }

  /** Readers parked on either channel; zero whenever no `next()` is pending. */
  get waiting(): number {
    return this.data.waiting + this.errors.waiting;
  }

  /** Command form of `next()`; `map` turns the result into an event. */
  nextCommand<E>(map: (result: NextResult<T>) => E): Command<E> {
    return async () => {
      const result = await this.next();
      return result ? map(result) : null;
    };
  }

  cancel(): void {
    if (!this.controller.signal.aborted) this.controller.abort();
    this.detachParent();
    this.data.close();
    this.errors.close();
  }

  /** Resolves once the producer has returned. */
  done(): Promise<void> {
    return this.finished;
  }

  private async run(producer: Producer<T>, emit: Emit<T>, signal: AbortSignal): Promise<void> {
    try {
      await producer(emit, signal);
    } catch (error) {
      if (!signal.aborted) {
        const err = error instanceof Error ? error : new Error(String(error));
        log.warn('Stream producer failed', 'stream', { label: this.label, message: err.message });
        this.errors.trySend(err);
      }
    } finally {
      this.errors.close();
      this.data.close();
      this.detachParent();
    }
  }
}

export function openSubscription<T>(producer: Producer<T>, options?: SubscriptionOptions): Subscription<T> {
  return new Subscription(producer, options);
}
