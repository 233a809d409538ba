import { setTimeout as sleep } from 'node:timers/promises';

/**
 * A unit of deferred work. It runs off the reducer, observes the signal, and
 * resolves to at most one event. `null` means "nothing to report" and is
 * dropped by the scheduler. Commands are expected to resolve, not reject:
 * failures are turned into events by the command itself.
 */
export type Command<E> = (signal: AbortSignal) => Promise<E | null>;

/** A reduction result: the next state plus the commands to schedule, in order. */
export type Reduction<S, E> = [S, Command<E>[]];

export type Reducer<S, E> = (state: S, event: E) => Reduction<S, E>;

export function none<S, E>(state: S): Reduction<S, E> {
  return [state, []];
}

/** Emit `event` after `ms`, or nothing if cancelled first. */
export function after<E>(ms: number, event: E): Command<E> {
  return async (signal) => {
    try {
      await sleep(ms, undefined, { signal });
      return event;
    } catch {
      return null;
    }
  };
}

/** Signal that aborts when `parent` does or after `ms`, whichever comes first. */
export function withDeadline(parent: AbortSignal, ms: number): AbortSignal {
  return AbortSignal.any([parent, AbortSignal.timeout(ms)]);
}
