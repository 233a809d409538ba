import type { Effects } from "../commands/effects";
import { cancelStream } from "../commands/effects";
import { InputRouter } from "../commands/router";
import { banner, isFiltering, loadAll, reconcile, resourcesFor } from "../commands/transitions";
import type { AppReduction, CommandContext } from "../commands/types";
import { after, type Reducer } from "../runtime/command";
import type { NextResult } from "../runtime/subscription";
import type { LogRecord, StatsSample } from "../types/domain";
import type { AppEvent, LoadedData } from "../types/events";
import { formatBytes, shortId } from "../utils/formatters";
import { type AppState, parseEnv } from "./app-state";
import { uiReducer } from "./ui-reducer";

export type ReducerDeps = {
  effects: Effects;
  settings: CommandContext["settings"];
  now?: () => number;
  router?: InputRouter;
};

function withData(state: AppState, data: LoadedData): AppState {
  const resources = state.resources;
  const loaded = resources.loaded.includes(data.kind) ? resources.loaded : [...resources.loaded, data.kind];
  switch (data.kind) {
    case "containers":
      return { ...state, resources: { ...resources, containers: data.items, loaded } };
    case "images":
      return { ...state, resources: { ...resources, images: data.items, loaded } };
    case "networks":
      return { ...state, resources: { ...resources, networks: data.items, loaded } };
    case "volumes":
      return { ...state, resources: { ...resources, volumes: data.items, loaded } };
    case "groups":
      return { ...state, resources: { ...resources, groups: data.items, loaded } };
  }
}

export function logEvent(subscriptionId: number) {
  return (result: NextResult<LogRecord>): AppEvent =>
    result.kind === "item"
      ? { type: "log-line", subscriptionId, record: result.value }
      : { type: "stream-error", subscriptionId, stream: "logs", message: result.error.message };
}

export function statsEvent(subscriptionId: number) {
  return (result: NextResult<StatsSample>): AppEvent =>
    result.kind === "item"
      ? { type: "stats-sample", subscriptionId, sample: result.value }
      : { type: "stream-error", subscriptionId, stream: "stats", message: result.error.message };
}

/**
 * Builds the application reducer. It is total over `AppEvent`: events that
 * do not apply to the current state come back as `[state, []]`.
 */
export function createReducer(deps: ReducerDeps): Reducer<AppState, AppEvent> {
  const router = deps.router ?? new InputRouter();
  const now = deps.now ?? Date.now;

  return function reduce(state: AppState, event: AppEvent): AppReduction {
    const context: CommandContext = { state, effects: deps.effects, now, settings: deps.settings };

    // The shell owns the terminal; input and redraw-only events wait
    if (state.ui.shell !== null && (event.type === "key" || event.type === "resize")) {
      return [state, []];
    }

    switch (event.type) {
      case "key":
        if (state.ui.quitting) return [state, []];
        return router.route(event.key, context);

      case "resize":
        return [{ ...state, ui: uiReducer(state.ui, { type: "RESIZE", payload: { cols: event.cols, rows: event.rows } }) }, []];

      case "tick": {
        const next = after<AppEvent>(deps.settings.refreshIntervalMs, { type: "tick" });
        if (state.ui.quitting) return [state, []];
        if (state.modal || isFiltering(state) || state.ui.shell !== null) return [state, [next]];
        return [state, [next, ...loadAll(deps.effects, resourcesFor(state.view))]];
      }

      case "banner-expired":
        return [{ ...state, ui: uiReducer(state.ui, { type: "EXPIRE_BANNER", payload: { kind: event.kind, at: event.at } }) }, []];

      case "loaded":
        return [reconcile(withData(state, event.data)), []];

      case "load-failed":
        return banner(state, "error", `Loading ${event.resource} failed: ${event.message}`, context);

      case "op-result": {
        const [next, commands] = banner(state, event.ok ? "status" : "error", event.message, context);
        return [next, [...commands, ...loadAll(deps.effects, event.refresh)]];
      }

      case "batch-finished": {
        const [next, commands] = event.result.ok
          ? banner(state, "status", `${event.label}: ${event.result.count} succeeded`, context)
          : banner(state, "error", `${event.label}: ${event.result.error.message}`, context);
        return [next, [...commands, deps.effects.load("containers")]];
      }

      case "volumes-pruned": {
        const { removed, spaceReclaimed } = event.report;
        const message = `Pruned ${removed.length} volume${removed.length === 1 ? "" : "s"}, reclaimed ${formatBytes(spaceReclaimed)}`;
        const [next, commands] = banner(state, "status", message, context);
        return [next, [...commands, deps.effects.load("volumes")]];
      }

      case "container-spec-loaded": {
        const env = state.env;
        if (!env || env.containerId !== event.containerId) return [state, []];
        return [{ ...state, env: { ...env, spec: event.spec, vars: parseEnv(event.spec.env), error: null } }, []];
      }

      case "container-spec-failed": {
        const env = state.env;
        if (!env || env.containerId !== event.containerId) return [state, []];
        return banner({ ...state, env: { ...env, error: event.message } }, "error", `Inspect failed: ${event.message}`, context);
      }

      case "recreate-finished": {
        const { outcome } = event;
        const leaving = state.env?.containerId === event.oldId;
        const base: AppState = leaving ? { ...state, env: null, view: "containers" } : state;
        const refresh = loadAll(deps.effects, ["containers", "groups"]);

        if (outcome.status === "done") {
          const skipped = outcome.skipped.filter((s) => s.step === "attach").map((s) => s.target);
          const note = skipped.length ? ` (could not attach ${skipped.join(", ")})` : "";
          const [next, commands] = banner(base, "status", `Recreated ${event.name} as ${shortId(outcome.newId)}${note}`, context);
          return [next, [...commands, ...refresh]];
        }

        const created = outcome.newId ? ` (new container ${shortId(outcome.newId)} exists)` : "";
        const message = `Recreate ${event.name} failed at ${outcome.step}: ${outcome.cause}${created}`;
        // Before removal nothing changed, so stay in the editor with the edits intact
        const stay = outcome.step === "remove" && state.env ? { ...state, env: { ...state.env, saving: false } } : base;
        const [next, commands] = banner(stay, "error", message, context);
        return [next, [...commands, ...refresh]];
      }

      case "logs-opened": {
        const logs = state.logs;
        const subscription = event.subscription;
        // Opened for a view that has since been left, or superseded by a later open
        if (!logs || logs.request !== event.request || logs.containerId !== event.containerId || !logs.follow || logs.subscription) {
          return [state, [cancelStream(subscription)]];
        }
        return [{ ...state, logs: { ...logs, subscription } }, [subscription.nextCommand(logEvent(subscription.id))]];
      }

      case "stats-opened": {
        const stats = state.stats;
        const subscription = event.subscription;
        if (!stats || stats.containerId !== event.containerId || stats.subscription) {
          return [state, [cancelStream(subscription)]];
        }
        return [{ ...state, stats: { ...stats, subscription } }, [subscription.nextCommand(statsEvent(subscription.id))]];
      }

      case "log-line": {
        const logs = state.logs;
        const subscription = logs?.subscription;
        if (!logs || !subscription || subscription.id !== event.subscriptionId) return [state, []];
        const limit = deps.settings.logBufferLines;
        const appended = [...logs.lines, event.record];
        const lines = appended.length > limit ? appended.slice(appended.length - limit) : appended;
        // Keep a scrolled-up viewport on the same lines as new ones arrive
        const scroll = logs.scroll > 0 ? Math.min(logs.scroll + 1, lines.length - 1) : 0;
        return [{ ...state, logs: { ...logs, lines, scroll } }, [subscription.nextCommand(logEvent(subscription.id))]];
      }

      case "stats-sample": {
        const stats = state.stats;
        const subscription = stats?.subscription;
        if (!stats || !subscription || subscription.id !== event.subscriptionId) return [state, []];
        const samples = [...stats.samples, event.sample].slice(-deps.settings.statsHistory);
        return [{ ...state, stats: { ...stats, samples } }, [subscription.nextCommand(statsEvent(subscription.id))]];
      }

      case "stream-error": {
        if (event.stream === "logs") {
          const logs = state.logs;
          if (!logs || logs.subscription?.id !== event.subscriptionId) return [state, []];
          return banner({ ...state, logs: { ...logs, subscription: null } }, "error", `Log stream ended: ${event.message}`, context);
        }
        const stats = state.stats;
        if (!stats || stats.subscription?.id !== event.subscriptionId) return [state, []];
        return banner({ ...state, stats: { ...stats, subscription: null } }, "error", `Stats stream ended: ${event.message}`, context);
      }

      case "shell-exited": {
        const cleared: AppState = { ...state, ui: uiReducer(state.ui, { type: "SHELL_EXITED" }) };
        const [next, commands] =
          event.message !== undefined
            ? banner(cleared, "error", `Shell in ${event.name} failed: ${event.message}`, context)
            : banner(cleared, "status", `Shell in ${event.name} exited${event.exitCode === null ? "" : ` with ${event.exitCode}`}`, context);
        return [next, [...commands, deps.effects.load("containers")]];
      }

      case "command-failed":
        return banner(state, "error", event.message, context);
    }
  };
}

/** Commands to run once at startup: every resource list plus the refresh tick. */
export function startupCommands(deps: Pick<ReducerDeps, "effects" | "settings">) {
  return [
    ...loadAll(deps.effects, ["containers", "images", "networks", "volumes", "groups"]),
    after<AppEvent>(deps.settings.refreshIntervalMs, { type: "tick" }),
  ];
}
