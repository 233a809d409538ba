import { type AppState, isTabbedView } from "../../state/app-state";
import { modalReducer } from "../../state/modal-reducer";
import { tabsReducer } from "../../state/tabs-reducer";
import { uiReducer } from "../../state/ui-reducer";
import { MAIN_VIEWS } from "../../types/domain";
import type { KeyStroke } from "../../types/events";
import { applyPending } from "../pending";
import { cycleMainView, isFiltering, switchView, teardownDetail, updateActiveList, withTabs } from "../transitions";
import type { AppReduction, CommandContext, InputHandler } from "../types";
import { viewKeys } from "../views";

export class ModalInputHandler implements InputHandler {
  priority = 40; // An open modal owns every key

  canHandle(context: CommandContext): boolean {
    return context.state.modal !== null;
  }

  handleInput(key: KeyStroke, context: CommandContext): AppReduction {
    const { state } = context;
    if (!state.modal) return [state, []];

    const step = modalReducer(state.modal, key);
    switch (step.type) {
      case "open":
        return [step.modal === state.modal ? state : { ...state, modal: step.modal }, []];
      case "cancelled":
        return [{ ...state, modal: null }, []];
      case "confirmed":
        return applyPending({ ...state, modal: null }, step.pending, step.values, context);
    }
  }
}

export class FilterInputHandler implements InputHandler {
  priority = 30; // Typing a filter swallows everything else

  canHandle(context: CommandContext): boolean {
    return isFiltering(context.state);
  }

  handleInput(key: KeyStroke, context: CommandContext): AppReduction {
    const { state } = context;

    switch (key.id) {
      case "esc":
        return [updateActiveList(state, { type: "CLEAR_FILTER" }), []];
      case "enter":
        return [updateActiveList(state, { type: "COMMIT_FILTER" }), []];
      case "backspace":
        return [updateActiveList(state, { type: "FILTER_BACKSPACE" }), []];
      default:
        if (!key.text) return [state, []];
        return [updateActiveList(state, { type: "FILTER_INPUT", payload: key.text }), []];
    }
  }
}

const DIGIT_VIEWS: Record<string, (typeof MAIN_VIEWS)[number]> = {
  "1": "containers",
  "2": "images",
  "3": "groups",
  "4": "volumes",
  "5": "compose",
  "6": "networks",
  "7": "about",
  "?": "about",
};

function quit(state: AppState): AppReduction {
  const [torn, commands] = teardownDetail(state);
  return [{ ...torn, ui: uiReducer(torn.ui, { type: "QUIT" }) }, commands];
}

export class GlobalInputHandler implements InputHandler {
  priority = 20;

  canHandle(_context: CommandContext): boolean {
    return true;
  }

  handleInput(key: KeyStroke, context: CommandContext): AppReduction | null {
    const { state, effects } = context;
    const detail = state.view === "logs" || state.view === "stats" || state.view === "env";

    if (key.id === "ctrl+c" || key.id === "q") {
      // Detail views and About step back instead of quitting
      if (detail || state.view === "about") return switchView(state, "containers", effects);
      return quit(state);
    }

    if (key.id === "esc") {
      if (state.view === "about") return switchView(state, state.previousView, effects);
      if (detail) return switchView(state, "containers", effects);
      return null;
    }

    const target = Object.hasOwn(DIGIT_VIEWS, key.id) ? DIGIT_VIEWS[key.id] : undefined;
    if (target) return switchView(state, target, effects);

    switch (key.id) {
      case "tab":
      case "right":
        return cycleMainView(state, 1, effects);
      case "shift+tab":
      case "left":
        return cycleMainView(state, -1, effects);
      case "[":
      case "]": {
        const view = state.view;
        if (!isTabbedView(view)) return null;
        const tabs = tabsReducer(state.views[view], { type: "CYCLE_TAB", payload: key.id === "]" ? 1 : -1 });
        return [{ ...state, views: withTabs(state.views, view, tabs) }, []];
      }
      default:
        return null;
    }
  }
}

export class ViewInputHandler implements InputHandler {
  priority = 10;

  canHandle(_context: CommandContext): boolean {
    return true;
  }

  handleInput(key: KeyStroke, context: CommandContext): AppReduction | null {
    return viewKeys(context.state, key, context);
  }
}
