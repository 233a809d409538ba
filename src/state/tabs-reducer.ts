import { type ListAction, type ListState, initialListState, listReducer } from "./list-reducer";

/**
 * A view made of tabs over a parent list and its dependents, e.g. groups →
 * containers in the group → containers that could be added. The parent (and
 * for three-level views, the child) is stored by key, not by index, so a
 * refresh that reorders the list keeps it.
 */
export interface TabbedViewState {
  tab: number;
  lists: ListState[];
  parent: string | null;
  child: string | null;
}

export type TabsAction =
  | { type: "CYCLE_TAB"; payload: number }
  | { type: "SET_TAB"; payload: number }
  | { type: "SELECT_PARENT"; payload: string }
  | { type: "SELECT_CHILD"; payload: string }
  | { type: "RESOLVE_PARENT"; payload: readonly string[] }
  | { type: "RESOLVE_CHILD"; payload: readonly string[] }
  | { type: "BACK" }
  | { type: "LIST"; payload: { tab: number; action: ListAction } };

export function initialTabbedViewState(tabCount: number): TabbedViewState {
  return {
    tab: 0,
    lists: Array.from({ length: tabCount }, () => initialListState),
    parent: null,
    child: null,
  };
}

function resetLists(lists: ListState[], from: number): ListState[] {
  return lists.map((l, i) => (i >= from ? initialListState : l));
}

export function wrapTab(tab: number, delta: number, count: number): number {
  if (count <= 0) return 0;
  return (((tab + delta) % count) + count) % count;
}

/**
 * Pure reducer for tabbed views.
 */
export function tabsReducer(state: TabbedViewState, action: TabsAction): TabbedViewState {
  switch (action.type) {
    case "CYCLE_TAB":
      return { ...state, tab: wrapTab(state.tab, action.payload, state.lists.length) };

    case "SET_TAB":
      if (action.payload < 0 || action.payload >= state.lists.length) return state;
      return { ...state, tab: action.payload };

    case "SELECT_PARENT":
      if (state.parent === action.payload) return { ...state, tab: Math.min(1, state.lists.length - 1) };
      return {
        ...state,
        parent: action.payload,
        child: null,
        tab: Math.min(1, state.lists.length - 1),
        lists: resetLists(state.lists, 1),
      };

    case "SELECT_CHILD":
      if (state.child === action.payload) return { ...state, tab: Math.min(2, state.lists.length - 1) };
      return {
        ...state,
        child: action.payload,
        tab: Math.min(2, state.lists.length - 1),
        lists: resetLists(state.lists, 2),
      };

    case "RESOLVE_PARENT":
      if (state.parent === null || action.payload.includes(state.parent)) return state;
      // The parent is gone: drop it and everything that depended on it
      return {
        ...state,
        tab: 0,
        parent: null,
        child: null,
        lists: resetLists(state.lists, 1),
      };

    case "RESOLVE_CHILD":
      if (state.child === null || action.payload.includes(state.child)) return state;
      return {
        ...state,
        tab: Math.min(state.tab, 1),
        child: null,
        lists: resetLists(state.lists, 2),
      };

    case "BACK":
      if (state.tab === 0) return state;
      return { ...state, tab: state.tab - 1 };

    case "LIST": {
      const { tab, action: listAction } = action.payload;
      const current = state.lists[tab];
      if (!current) return state;
      const next = listReducer(current, listAction);
      if (next === current) return state;
      const lists = state.lists.slice();
      lists[tab] = next;
      return { ...state, lists };
    }

    default:
      return state;
  }
}

export function activeList(state: TabbedViewState): ListState {
  return state.lists[state.tab] ?? initialListState;
}
