import { describe, expect, it } from "vitest";
import { InputRouter } from "../../commands/router";
import { initialListState } from "../../state/list-reducer";
import { confirmModal } from "../../state/modal-reducer";
import { keyFromId } from "../../types/events";
import { FakeClient, createContainer, createContext, createTestState } from "../test-utils";

const router = new InputRouter();

function twoContainers() {
  return createTestState({}, {
    containers: [createContainer({ id: "c1", name: "web" }), createContainer({ id: "c2", name: "db" })],
  });
}

describe("InputRouter", () => {
  it("gives an open modal every key, even quit", () => {
    const state = {
      ...twoContainers(),
      modal: confirmModal("Delete container", "Delete web?", { kind: "delete-container", id: "c1", name: "web" }),
    };
    const [next, commands] = router.route(keyFromId("q"), createContext(state));
    expect(next).toBe(state);
    expect(commands).toEqual([]);
  });

  it("types global keys into an active filter", () => {
    const state = { ...twoContainers(), views: { ...twoContainers().views, containers: { ...initialListState, filtering: true } } };
    const [typed, commands] = router.route(keyFromId("q"), createContext(state));
    expect(typed.views.containers.filter).toBe("q");
    expect(typed.ui.quitting).toBe(false);
    expect(commands).toEqual([]);

    const [cleared] = router.route(keyFromId("esc"), createContext(typed));
    expect(cleared.views.containers).toEqual(initialListState);
  });

  it("starts a filter with / and narrows the rows", () => {
    const [filtering] = router.route(keyFromId("/"), createContext(twoContainers()));
    const [typed] = router.route(keyFromId("d"), createContext(filtering));
    const [committed] = router.route(keyFromId("enter"), createContext(typed));
    expect(committed.views.containers).toEqual({ selected: 0, filter: "d", filtering: false });
  });

  it("switches views by number and loads what the view shows", async () => {
    const client = new FakeClient();
    const [next, commands] = router.route(keyFromId("2"), createContext(twoContainers(), client));
    expect(next.view).toBe("images");
    expect(next.previousView).toBe("containers");
    expect(commands).toHaveLength(1);

    await commands[0](new AbortController().signal);
    expect(client.methods()).toEqual(["listImages"]);
  });

  it("cycles views with tab and wraps backwards", () => {
    const [forward] = router.route(keyFromId("tab"), createContext(twoContainers()));
    expect(forward.view).toBe("images");
    const [back] = router.route(keyFromId("shift+tab"), createContext(twoContainers()));
    expect(back.view).toBe("about");
  });

  it("falls through to the view for cursor keys", () => {
    const [next] = router.route(keyFromId("j"), createContext(twoContainers()));
    expect(next.views.containers.selected).toBe(1);
    const [stuck] = router.route(keyFromId("j"), createContext(next));
    expect(stuck.views.containers.selected).toBe(1);
  });

  it("returns About to the view it was opened from", () => {
    const images = { ...twoContainers(), view: "images" as const };
    const [about] = router.route(keyFromId("?"), createContext(images));
    expect(about.view).toBe("about");
    const [back] = router.route(keyFromId("esc"), createContext(about));
    expect(back.view).toBe("images");
  });

  it("ignores keys nobody handles", () => {
    const state = twoContainers();
    const [next, commands] = router.route(keyFromId("F"), createContext(state));
    expect(next).toBe(state);
    expect(commands).toEqual([]);
  });
});
