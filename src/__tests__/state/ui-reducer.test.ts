import { describe, expect, it } from "vitest";
import { initialUIState, uiReducer } from "../../state/ui-reducer";

describe("uiReducer", () => {
  it("expires a banner only once its own deadline has passed", () => {
    const shown = uiReducer(initialUIState, { type: "SET_BANNER", payload: { kind: "status", message: "Started web", expiresAt: 3000 } });
    expect(shown.status).toEqual({ message: "Started web", expiresAt: 3000 });

    // the timer of an earlier banner fires before this one is due
    expect(uiReducer(shown, { type: "EXPIRE_BANNER", payload: { kind: "status", at: 2500 } })).toBe(shown);
    expect(uiReducer(shown, { type: "EXPIRE_BANNER", payload: { kind: "status", at: 3000 } }).status).toBeNull();
  });

  it("keeps status and error banners apart", () => {
    let state = uiReducer(initialUIState, { type: "SET_BANNER", payload: { kind: "status", message: "ok", expiresAt: 10 } });
    state = uiReducer(state, { type: "SET_BANNER", payload: { kind: "error", message: "boom", expiresAt: 20 } });
    state = uiReducer(state, { type: "EXPIRE_BANNER", payload: { kind: "status", at: 15 } });
    expect(state.status).toBeNull();
    expect(state.error).toEqual({ message: "boom", expiresAt: 20 });
  });

  it("returns the same state for a resize to the current size", () => {
    const resized = uiReducer(initialUIState, { type: "RESIZE", payload: { cols: 100, rows: 40 } });
    expect(resized).toMatchObject({ cols: 100, rows: 40 });
    expect(uiReducer(resized, { type: "RESIZE", payload: { cols: 100, rows: 40 } })).toBe(resized);
  });

  it("tracks the shell hand-off and quitting", () => {
    const inShell = uiReducer(initialUIState, { type: "SHELL_STARTED", payload: "web" });
    expect(inShell.shell).toBe("web");
    expect(uiReducer(inShell, { type: "SHELL_EXITED" }).shell).toBeNull();
    expect(uiReducer(initialUIState, { type: "QUIT" }).quitting).toBe(true);
  });
});
