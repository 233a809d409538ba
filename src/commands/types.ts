import type { Reduction } from '../runtime/command';
import type { AppState } from '../state/app-state';
import type { AppEvent, KeyStroke } from '../types/events';
import type { Effects } from './effects';

export type AppReduction = Reduction<AppState, AppEvent>;

export interface CommandContext {
  state: AppState;
  effects: Effects;
  /** Clock for banner expiry. */
  now: () => number;
  /** Settings the reducer needs at run time. */
  settings: { logBufferLines: number; statsHistory: number; refreshIntervalMs: number };
}

export interface InputHandler {
  /** Higher runs first. */
  priority: number;
  canHandle(context: CommandContext): boolean;
  /**
   * Returns the reduction when the key was consumed, null to let a
   * lower-priority handler try.
   */
  handleInput(key: KeyStroke, context: CommandContext): AppReduction | null;
}
