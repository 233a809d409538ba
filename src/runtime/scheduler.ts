import type { Command, Reducer, Reduction } from './command';
import { log } from '../services/logger';

export type ProgramOptions<E> = {
  /** Event to feed back when a command throws instead of resolving. */
  onCommandError: (error: Error) => E;
  /** Parent signal; aborting it stops the program. */
  signal?: AbortSignal;
};

type Listener = () => void;

/**
 * Owns the state and the event queue. Events are reduced strictly one at a
 * time, in arrival order; commands returned by a reduction are started in the
 * order returned and feed their events back through `dispatch`.
 */
export class Program<S, E> {
  private state: S;
  private readonly queue: E[] = [];
  private draining = false;
  private inflight = 0;
  private readonly listeners = new Set<Listener>();
  private idleWaiters: Array<() => void> = [];
  private readonly controller = new AbortController();
  private stoppedResolve: (() => void) | null = null;
  private readonly stopped: Promise<void>;

  constructor(
    initialState: S,
    private readonly reducer: Reducer<S, E>,
    private readonly options: ProgramOptions<E>,
  ) {
    this.state = initialState;
    this.stopped = new Promise<void>((resolve) => {
      this.stoppedResolve = resolve;
    });
    options.signal?.addEventListener('abort', () => this.stop(), { once: true });
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  getState = (): S => this.state;

  subscribe = (listener: Listener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  dispatch = (event: E): void => {
    if (this.controller.signal.aborted) return;
    this.queue.push(event);
    if (this.draining) return;
    this.drain();
  };

  /** Schedule commands that were not produced by a reduction, e.g. at startup. */
  run(commands: Command<E>[]): void {
    for (const command of commands) this.schedule(command);
  }

  stop(): void {
    if (this.controller.signal.aborted) return;
    this.controller.abort();
    this.queue.length = 0;
    this.stoppedResolve?.();
    this.wakeIdle();
  }

  /** Resolves after `stop()`. */
  done(): Promise<void> {
    return this.stopped;
  }

  /** Resolves once no command is running and no event is queued. */
  idle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private isIdle(): boolean {
    return this.controller.signal.aborted || (this.inflight === 0 && this.queue.length === 0 && !this.draining);
  }

  private drain(): void {
    this.draining = true;
    let changed = false;
    try {
      for (let event = this.queue.shift(); event !== undefined; event = this.queue.shift()) {
        const reduction = this.reduce(event);
        if (!reduction) continue;
        const [next, commands] = reduction;
        if (next !== this.state) {
          this.state = next;
          changed = true;
        }
        for (const command of commands) this.schedule(command);
      }
    } finally {
      this.draining = false;
    }
    if (changed) this.notify();
    this.wakeIdle();
  }

  /** A reducer that throws drops the event and leaves the state as it was. */
  private reduce(event: E): Reduction<S, E> | null {
    try {
      return this.reducer(this.state, event);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      log.error('Reducer threw', 'scheduler', { message: err.message, stack: err.stack });
      return null;
    }
  }

  private schedule(command: Command<E>): void {
    const signal = this.controller.signal;
    if (signal.aborted) return;
    this.inflight++;
    void command(signal)
      .then(
        (event) => {
          if (event !== null) this.dispatch(event);
        },
        (error: unknown) => {
          const err = error instanceof Error ? error : new Error(String(error));
          log.error('Command rejected', 'scheduler', { message: err.message, stack: err.stack });
          this.dispatch(this.options.onCommandError(err));
        },
      )
      .finally(() => {
        this.inflight--;
        this.wakeIdle();
      });
  }

  private notify(): void {
    for (const listener of this.listeners) listener();
  }

  private wakeIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const w of waiters) w();
  }
}
