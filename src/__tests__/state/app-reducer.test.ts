import { describe, expect, it } from "vitest";
import type { Command } from "../../runtime/command";
import { openSubscription } from "../../runtime/subscription";
import { type AppState, parseEnv } from "../../state/app-state";
import { createReducer } from "../../state/app-reducer";
import { initialTabbedViewState } from "../../state/tabs-reducer";
import type { LogRecord } from "../../types/domain";
import { type AppEvent, keyFromId } from "../../types/events";
import {
  FakeClient,
  createContainer,
  createGroup,
  createSpec,
  createTestEffects,
  createTestState,
  runCommands,
  testSettings,
} from "../test-utils";

const NOW = 1_000;

function setup(client: FakeClient = new FakeClient(), settings = testSettings) {
  const { effects, shells } = createTestEffects(client);
  const reduce = createReducer({ effects, settings, now: () => NOW });
  return { reduce, client, shells };
}

const key = (id: string): AppEvent => ({ type: "key", key: keyFromId(id) });

function press(reduce: ReturnType<typeof setup>["reduce"], state: AppState, ...ids: string[]) {
  let current = state;
  const commands: Command<AppEvent>[] = [];
  for (const id of ids) {
    const [next, issued] = reduce(current, key(id));
    current = next;
    commands.push(...issued);
  }
  return { state: current, commands };
}

function typeInto(reduce: ReturnType<typeof setup>["reduce"], state: AppState, text: string) {
  return press(reduce, state, ...text.split(""));
}

const web = createContainer({ id: "c1", name: "web" });
const api = createContainer({ id: "c2", name: "api" });

function never(): Promise<void> {
  return new Promise(() => undefined);
}

describe("banners", () => {
  it("shows an operation result and refreshes what it touched", async () => {
    const { reduce } = setup();
    const [next, commands] = reduce(createTestState(), {
      type: "op-result",
      ok: true,
      message: "Started web",
      refresh: ["containers"],
    });

    expect(next.ui.status).toEqual({ message: "Started web", expiresAt: 3000 });
    expect(commands).toHaveLength(2);
    const events = await runCommands(commands);
    expect(events.map((e) => e.type)).toEqual(["loaded"]);
  });

  it("shows failures as errors with the longer lifetime", () => {
    const { reduce } = setup();
    const [next] = reduce(createTestState(), {
      type: "op-result",
      ok: false,
      message: "start web failed: boom",
      refresh: [],
    });
    expect(next.ui.error).toEqual({ message: "start web failed: boom", expiresAt: 4000 });
  });

  it("keeps a newer banner when the old one's timer fires", () => {
    const { reduce } = setup();
    const state = createTestState();
    const shown = { ...state, ui: { ...state.ui, status: { message: "newer", expiresAt: 5000 } } };
    const [kept] = reduce(shown, { type: "banner-expired", kind: "status", at: 3000 });
    expect(kept.ui.status?.message).toBe("newer");
    const [cleared] = reduce(shown, { type: "banner-expired", kind: "status", at: 5000 });
    expect(cleared.ui.status).toBeNull();
  });

  it("reports a thrown command as an error", () => {
    const { reduce } = setup();
    const [next] = reduce(createTestState(), { type: "command-failed", message: "unexpected" });
    expect(next.ui.error?.message).toBe("unexpected");
  });
});

describe("deleting a container", () => {
  it("does nothing when the confirmation is cancelled", () => {
    const { reduce, client } = setup();
    const state = createTestState({}, { containers: [web] });

    const opened = press(reduce, state, "d");
    expect(opened.state.modal?.kind).toBe("confirm");
    expect(opened.state.modal?.title).toBe("Delete container");

    const cancelled = press(reduce, opened.state, "n");
    expect(cancelled.state.modal).toBeNull();
    expect(cancelled.commands).toEqual([]);
    expect(client.calls).toEqual([]);
  });

  it("force-removes the container once confirmed", async () => {
    const { reduce, client } = setup();
    const state = createTestState({}, { containers: [web] });

    const confirmed = press(reduce, state, "d", "y");
    expect(confirmed.state.modal).toBeNull();

    const events = await runCommands(confirmed.commands);
    expect(client.called("removeContainer")).toEqual([["c1", true]]);
    expect(events).toEqual([{ type: "op-result", ok: true, message: "Deleted web", refresh: ["containers", "groups"] }]);
  });

  it("reports a failed removal", async () => {
    const client = new FakeClient();
    client.failures.set("removeContainer", "container is running");
    const { reduce } = setup(client);

    const { commands } = press(reduce, createTestState({}, { containers: [web] }), "d", "enter");
    const events = await runCommands(commands);
    expect(events).toEqual([
      { type: "op-result", ok: false, message: "delete web failed: container is running", refresh: ["containers"] },
    ]);
  });
});

describe("container lifecycle", () => {
  it("starts the selected container", async () => {
    const { reduce, client } = setup();
    const { commands } = press(reduce, createTestState({}, { containers: [web, api] }), "j", "s");

    const events = await runCommands(commands);
    expect(client.called("startContainer")).toEqual([["c2"]]);
    expect(events).toEqual([{ type: "op-result", ok: true, message: "Started api", refresh: ["containers"] }]);
  });

  it("passes the configured stop timeout", async () => {
    const { reduce, client } = setup();
    const { commands } = press(reduce, createTestState({}, { containers: [web] }), "x");
    await runCommands(commands);
    expect(client.called("stopContainer")).toEqual([["c1", 10]]);
  });
});

describe("group batch actions", () => {
  function groupsState(containerIds: string[]): AppState {
    return createTestState({ view: "groups" }, { containers: [web, api], groups: [createGroup({ containerIds })] });
  }

  it("starts every member and reports the count", async () => {
    const { reduce, client } = setup();
    const { commands } = press(reduce, groupsState(["c1", "c2"]), "s");

    const events = await runCommands(commands);
    expect(client.called("startContainer")).toEqual([["c1"], ["c2"]]);
    expect(events).toEqual([
      { type: "batch-finished", label: "start group web-tier", result: { ok: true, count: 2 } },
    ]);
  });

  it("lists the members that failed", async () => {
    const client = new FakeClient();
    client.failures.set("startContainer:c2", "no such container");
    const { reduce } = setup(client);

    const { commands } = press(reduce, groupsState(["c1", "c2"]), "s");
    const [finished] = await runCommands(commands);
    if (finished?.type !== "batch-finished") throw new Error("expected a batch result");

    const [next, followUp] = reduce(groupsState(["c1", "c2"]), finished);
    expect(next.ui.error?.message).toBe("start group web-tier: 1 of 2 failed: api (no such container)");
    expect(followUp).toHaveLength(2);
  });

  it("refuses to act on an empty group", () => {
    const { reduce, client } = setup();
    const { state, commands } = press(reduce, groupsState([]), "s");
    expect(state.ui.error?.message).toBe("Group web-tier has no containers");
    expect(commands).toHaveLength(1);
    expect(client.calls).toEqual([]);
  });
});

describe("drill-down views", () => {
  it("drops back to the group list when the open group disappears", () => {
    const { reduce } = setup();
    const base = createTestState({ view: "groups" }, { containers: [web], groups: [createGroup()] });
    const opened = press(reduce, base, "enter").state;
    expect(opened.views.groups).toMatchObject({ tab: 1, parent: "g1" });

    const [next] = reduce(opened, { type: "loaded", data: { kind: "groups", items: [] } });
    expect(next.views.groups).toEqual(initialTabbedViewState(3));
  });

  it("keeps the open group when the list is reordered", () => {
    const { reduce } = setup();
    const other = createGroup({ id: "g0", name: "aaa" });
    const base = createTestState({ view: "groups" }, { containers: [web], groups: [createGroup()] });
    const opened = press(reduce, base, "enter").state;

    const [next] = reduce(opened, { type: "loaded", data: { kind: "groups", items: [other, createGroup()] } });
    expect(next.views.groups.parent).toBe("g1");
  });

  it("clamps the cursor when a refresh shrinks the list", () => {
    const { reduce } = setup();
    const moved = press(reduce, createTestState({}, { containers: [web, api] }), "j").state;
    const [next] = reduce(moved, { type: "loaded", data: { kind: "containers", items: [web] } });
    expect(next.views.containers.selected).toBe(0);
  });
});

describe("ticks", () => {
  it("re-arms and refreshes the current view", () => {
    const { reduce } = setup();
    const [, commands] = reduce(createTestState(), { type: "tick" });
    expect(commands).toHaveLength(2);
  });

  it("only re-arms while a modal is open", () => {
    const { reduce } = setup();
    const state = press(reduce, createTestState({}, { containers: [web] }), "d").state;
    const [next, commands] = reduce(state, { type: "tick" });
    expect(next).toBe(state);
    expect(commands).toHaveLength(1);
  });

  it("stops once quitting", () => {
    const { reduce } = setup();
    const state = createTestState();
    const [, commands] = reduce({ ...state, ui: { ...state.ui, quitting: true } }, { type: "tick" });
    expect(commands).toEqual([]);
  });
});

describe("quitting", () => {
  it("quits from a main view and then ignores keys", () => {
    const { reduce } = setup();
    const quit = press(reduce, createTestState(), "q").state;
    expect(quit.ui.quitting).toBe(true);
    const [after] = reduce(quit, key("2"));
    expect(after).toBe(quit);
  });

  it("steps back to containers from a detail view", () => {
    const { reduce } = setup();
    const logs = {
      containerId: "c1",
      name: "web",
      subscription: null,
      lines: [],
      follow: true,
      scroll: 0,
      pausedAt: null,
      request: 1,
    };
    const { state } = press(reduce, createTestState({ view: "logs", logs }), "q");
    expect(state.view).toBe("containers");
    expect(state.logs).toBeNull();
    expect(state.ui.quitting).toBe(false);
  });
});

describe("environment editor", () => {
  function envState(): AppState {
    const spec = createSpec();
    return createTestState(
      {
        view: "env",
        env: {
          containerId: "c1",
          name: "web",
          spec,
          vars: parseEnv(spec.env),
          list: { selected: 0, filter: "", filtering: false },
          error: null,
          saving: false,
          dirty: false,
        },
      },
      { containers: [web] },
    );
  }

  it("adds a variable through the form", () => {
    const { reduce } = setup();
    let state = press(reduce, envState(), "a").state;
    state = typeInto(reduce, state, "DEBUG").state;
    state = press(reduce, state, "tab").state;
    state = typeInto(reduce, state, "1").state;
    state = press(reduce, state, "enter").state;

    expect(state.modal).toBeNull();
    expect(state.env?.vars).toEqual([
      { key: "PORT", value: "80" },
      { key: "DEBUG", value: "1" },
    ]);
    expect(state.env?.dirty).toBe(true);
    expect(state.env?.list.selected).toBe(1);
  });

  it("rejects a key containing =", () => {
    const { reduce } = setup();
    let state = press(reduce, envState(), "a").state;
    state = typeInto(reduce, state, "A=B").state;
    state = press(reduce, state, "enter").state;
    expect(state.ui.error?.message).toBe('Variable names cannot contain "="');
    expect(state.env?.vars).toHaveLength(1);
  });

  it("recreates the container with the edited environment on ctrl+s", async () => {
    const { reduce, client } = setup();
    const edited = press(reduce, envState(), "d").state;
    expect(edited.env?.vars).toEqual([]);

    const saving = press(reduce, edited, "ctrl+s");
    expect(saving.state.env?.saving).toBe(true);
    expect(saving.state.ui.status?.message).toBe("Recreating web…");

    const events = await runCommands(saving.commands);
    const created = client.called("createContainer");
    expect(created).toHaveLength(1);
    expect(created[0][1]).toMatchObject({ name: "web", env: [] });

    const finished = events.find((e) => e.type === "recreate-finished");
    if (!finished) throw new Error("expected a recreate result");
    const [done] = reduce(saving.state, finished);
    expect(done.view).toBe("containers");
    expect(done.env).toBeNull();
    expect(done.ui.status?.message).toBe("Recreated web as new000000000");
  });

  it("stays in the editor when the old container could not be removed", () => {
    const { reduce } = setup();
    const saving = press(reduce, envState(), "ctrl+s").state;
    const [next] = reduce(saving, {
      type: "recreate-finished",
      oldId: "c1",
      name: "web",
      outcome: { status: "aborted", step: "remove", cause: "device busy", newId: null, skipped: [] },
    });
    expect(next.view).toBe("env");
    expect(next.env?.saving).toBe(false);
    expect(next.ui.error?.message).toBe("Recreate web failed at remove: device busy");
  });

  it("names the new container when starting it failed", () => {
    const { reduce } = setup();
    const saving = press(reduce, envState(), "ctrl+s").state;
    const [next] = reduce(saving, {
      type: "recreate-finished",
      oldId: "c1",
      name: "web",
      outcome: { status: "aborted", step: "start", cause: "port in use", newId: "abcdef1234567890", skipped: [] },
    });
    expect(next.view).toBe("containers");
    expect(next.ui.error?.message).toBe("Recreate web failed at start: port in use (new container abcdef123456 exists)");
  });

  it("ignores a spec that arrives for another container", () => {
    const { reduce } = setup();
    const state = envState();
    const [next] = reduce(state, { type: "container-spec-loaded", containerId: "other", spec: createSpec() });
    expect(next).toBe(state);
  });
});

describe("shell", () => {
  it("hands the terminal to the shell and reports its exit", async () => {
    const { reduce, shells } = setup();
    const started = press(reduce, createTestState({}, { containers: [web] }), "e");
    expect(started.state.ui.shell).toBe("web");

    const [ignored] = reduce(started.state, key("q"));
    expect(ignored).toBe(started.state);

    const events = await runCommands(started.commands);
    expect(shells).toEqual([{ containerId: "c1" }]);
    expect(events).toEqual([{ type: "shell-exited", name: "web", exitCode: 0 }]);

    const exited = events[0];
    if (!exited) throw new Error("expected the shell to exit");
    const [next] = reduce(started.state, exited);
    expect(next.ui.shell).toBeNull();
    expect(next.ui.status?.message).toBe("Shell in web exited with 0");
  });

  it("refuses a container that is not running", () => {
    const { reduce } = setup();
    const stopped = createContainer({ id: "c1", name: "web", state: "exited" });
    const { state, commands } = press(reduce, createTestState({}, { containers: [stopped] }), "e");
    expect(state.ui.shell).toBeNull();
    expect(state.ui.error?.message).toBe("web is not running");
    expect(commands).toHaveLength(1);
  });
});

describe("log streams", () => {
  function logsState(): AppState {
    return createTestState({
      view: "logs",
      logs: { containerId: "c1", name: "web", subscription: null, lines: [], follow: true, scroll: 0, pausedAt: null, request: 1 },
      logRequests: 1,
    });
  }

  it("cancels a stream opened for a view that was already left", async () => {
    const { reduce } = setup();
    const subscription = openSubscription<LogRecord>(never);
    const state = createTestState();

    const [next, commands] = reduce(state, { type: "logs-opened", containerId: "c1", request: 1, subscription });
    expect(next).toBe(state);
    await runCommands(commands);
    expect(subscription.cancelled).toBe(true);
  });

  it("attaches a stream and keeps only the newest lines", () => {
    const { reduce } = setup(new FakeClient(), { ...testSettings, logBufferLines: 3 });
    const subscription = openSubscription<LogRecord>(never);
    let [state] = reduce(logsState(), { type: "logs-opened", containerId: "c1", request: 1, subscription });
    expect(state.logs?.subscription).toBe(subscription);

    for (const line of ["a", "b", "c", "d", "e"]) {
      [state] = reduce(state, { type: "log-line", subscriptionId: subscription.id, record: { stream: "stdout", line } });
    }
    expect(state.logs?.lines.map((l) => l.line)).toEqual(["c", "d", "e"]);
    subscription.cancel();
  });

  it("ignores lines from a superseded stream", () => {
    const { reduce } = setup();
    const subscription = openSubscription<LogRecord>(never);
    const [state] = reduce(logsState(), { type: "logs-opened", containerId: "c1", request: 1, subscription });

    const [next] = reduce(state, {
      type: "log-line",
      subscriptionId: subscription.id + 1000,
      record: { stream: "stdout", line: "stale" },
    });
    expect(next).toBe(state);
    subscription.cancel();
  });

  it("pauses following and resumes from where it stopped", () => {
    const { reduce } = setup();
    const subscription = openSubscription<LogRecord>(never);
    const [opened] = reduce(logsState(), { type: "logs-opened", containerId: "c1", request: 1, subscription });

    const paused = press(reduce, opened, "f");
    expect(paused.state.logs).toMatchObject({ follow: false, subscription: null, pausedAt: 1 });
    expect(paused.commands).toHaveLength(1);

    const resumed = press(reduce, paused.state, "f");
    expect(resumed.state.logs).toMatchObject({ follow: true, pausedAt: null, request: 2 });
    expect(resumed.commands).toHaveLength(1);
    subscription.cancel();
  });

  it("keeps the resumed stream when the first open arrives late", async () => {
    const client = new FakeClient();
    client.containers = [createContainer({ id: "c1", name: "web" })];
    const { reduce } = setup(client);

    const opening = press(reduce, createTestState({}, { containers: client.containers }), "l");
    expect(opening.state.logs?.request).toBe(1);
    const paused = press(reduce, opening.state, "f");
    expect(paused.commands).toHaveLength(0);
    const resumed = press(reduce, paused.state, "f");
    expect(resumed.state.logs?.request).toBe(2);

    const late = openSubscription<LogRecord>(never);
    const current = openSubscription<LogRecord>(never);
    const [afterLate, cancelLate] = reduce(resumed.state, { type: "logs-opened", containerId: "c1", request: 1, subscription: late });
    expect(afterLate).toBe(resumed.state);
    await runCommands(cancelLate);
    expect(late.cancelled).toBe(true);

    const [attached] = reduce(afterLate, { type: "logs-opened", containerId: "c1", request: 2, subscription: current });
    expect(attached.logs?.subscription).toBe(current);
    current.cancel();
  });

  it("drops the stream after an error and says why", () => {
    const { reduce } = setup();
    const subscription = openSubscription<LogRecord>(never);
    const [state] = reduce(logsState(), { type: "logs-opened", containerId: "c1", request: 1, subscription });

    const [next] = reduce(state, { type: "stream-error", subscriptionId: subscription.id, stream: "logs", message: "EOF" });
    expect(next.logs?.subscription).toBeNull();
    expect(next.ui.error?.message).toBe("Log stream ended: EOF");
    subscription.cancel();
  });
});
