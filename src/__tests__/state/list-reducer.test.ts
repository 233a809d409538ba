import { describe, expect, it } from "vitest";
import { filterItems, initialListState, listReducer, selectedItem } from "../../state/list-reducer";

describe("listReducer", () => {
  it("moves within bounds and returns the same state at the edges", () => {
    const down = listReducer(initialListState, { type: "MOVE", payload: { delta: 1, count: 3 } });
    expect(down.selected).toBe(1);

    const far = listReducer(down, { type: "MOVE", payload: { delta: 10, count: 3 } });
    expect(far.selected).toBe(2);
    expect(listReducer(far, { type: "MOVE", payload: { delta: 1, count: 3 } })).toBe(far);
    expect(listReducer(initialListState, { type: "MOVE", payload: { delta: -1, count: 3 } })).toBe(initialListState);
  });

  it("jumps to either end", () => {
    const bottom = listReducer(initialListState, { type: "JUMP", payload: { to: "bottom", count: 5 } });
    expect(bottom.selected).toBe(4);
    expect(listReducer(bottom, { type: "JUMP", payload: { to: "top", count: 5 } }).selected).toBe(0);
  });

  it("clamps the selection after the list shrinks", () => {
    const state = { ...initialListState, selected: 7 };
    expect(listReducer(state, { type: "CLAMP", payload: { count: 3 } }).selected).toBe(2);
    expect(listReducer(state, { type: "CLAMP", payload: { count: 0 } }).selected).toBe(0);
  });

  it("edits the filter and resets the selection", () => {
    let state = { ...initialListState, selected: 3 };
    state = listReducer(state, { type: "START_FILTER" });
    state = listReducer(state, { type: "FILTER_INPUT", payload: "we" });
    state = listReducer(state, { type: "FILTER_INPUT", payload: "bx" });
    state = listReducer(state, { type: "FILTER_BACKSPACE" });
    expect(state).toEqual({ selected: 0, filter: "web", filtering: true });

    const committed = listReducer(state, { type: "COMMIT_FILTER" });
    expect(committed).toEqual({ selected: 0, filter: "web", filtering: false });
    expect(listReducer(committed, { type: "CLEAR_FILTER" })).toEqual(initialListState);
  });
});

describe("filterItems", () => {
  const names = ["web", "Web-Proxy", "db"];

  it("matches case-insensitive substrings", () => {
    expect(filterItems(names, " WEB ", (n) => n)).toEqual(["web", "Web-Proxy"]);
  });

  it("returns a copy of everything for an empty filter", () => {
    const all = filterItems(names, "", (n) => n);
    expect(all).toEqual(names);
    expect(all).not.toBe(names);
  });

  it("selects by index or gives null", () => {
    expect(selectedItem(names, { ...initialListState, selected: 2 })).toBe("db");
    expect(selectedItem([], initialListState)).toBeNull();
  });
});
