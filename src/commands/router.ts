import type { KeyStroke } from "../types/events";
import { FilterInputHandler, GlobalInputHandler, ModalInputHandler, ViewInputHandler } from "./handlers/keyboard";
import type { AppReduction, CommandContext, InputHandler } from "./types";

/**
 * Picks the single consumer of a key: modal, then filter, then the global
 * keymap, then the active view. The modal and filter handlers consume every
 * key they see, so nothing behind them ever receives it.
 */
export class InputRouter {
  private readonly handlers: InputHandler[];

  constructor(handlers: InputHandler[] = defaultHandlers()) {
    this.handlers = [...handlers].sort((a, b) => b.priority - a.priority);
  }

  route(key: KeyStroke, context: CommandContext): AppReduction {
    for (const handler of this.handlers) {
      if (!handler.canHandle(context)) continue;
      const result = handler.handleInput(key, context);
      if (result) return result;
    }
    return [context.state, []];
  }
}

export function defaultHandlers(): InputHandler[] {
  return [new ModalInputHandler(), new FilterInputHandler(), new GlobalInputHandler(), new ViewInputHandler()];
}
