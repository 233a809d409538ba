export interface ListState {
  selected: number;
  filter: string;
  filtering: boolean;
}

export type ListAction =
  | { type: "MOVE"; payload: { delta: number; count: number } }
  | { type: "JUMP"; payload: { to: "top" | "bottom"; count: number } }
  | { type: "CLAMP"; payload: { count: number } }
  | { type: "START_FILTER" }
  | { type: "FILTER_INPUT"; payload: string }
  | { type: "FILTER_BACKSPACE" }
  | { type: "COMMIT_FILTER" }
  | { type: "CLEAR_FILTER" };

export const initialListState: ListState = {
  selected: 0,
  filter: "",
  filtering: false,
};

function clamp(index: number, count: number): number {
  if (count <= 0) return 0;
  return Math.min(Math.max(index, 0), count - 1);
}

/**
 * Pure reducer for one list: selection index and filter.
 * `count` is the number of visible (filtered) rows.
 */
export function listReducer(state: ListState, action: ListAction): ListState {
  switch (action.type) {
    case "MOVE": {
      const selected = clamp(state.selected + action.payload.delta, action.payload.count);
      return selected === state.selected ? state : { ...state, selected };
    }

    case "JUMP": {
      const selected = action.payload.to === "top" ? 0 : clamp(action.payload.count - 1, action.payload.count);
      return selected === state.selected ? state : { ...state, selected };
    }

    case "CLAMP": {
      const selected = clamp(state.selected, action.payload.count);
      return selected === state.selected ? state : { ...state, selected };
    }

    case "START_FILTER":
      return { ...state, filtering: true };

    case "FILTER_INPUT":
      return { ...state, filter: state.filter + action.payload, selected: 0 };

    case "FILTER_BACKSPACE":
      return { ...state, filter: state.filter.slice(0, -1), selected: 0 };

    case "COMMIT_FILTER":
      return { ...state, filtering: false };

    case "CLEAR_FILTER":
      return { ...state, filter: "", filtering: false, selected: 0 };

    default:
      return state;
  }
}

/** Case-insensitive substring match over the text returned by `text`. */
export function filterItems<T>(items: readonly T[], filter: string, text: (item: T) => string): T[] {
  const needle = filter.trim().toLowerCase();
  if (!needle) return items.slice();
  return items.filter((item) => text(item).toLowerCase().includes(needle));
}

export function selectedItem<T>(items: readonly T[], list: ListState): T | null {
  return items[list.selected] ?? null;
}
