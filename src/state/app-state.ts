import type { Subscription } from "../runtime/subscription";
import type {
  Container,
  ContainerSpec,
  EnvVar,
  Group,
  Image,
  LogRecord,
  MainView,
  Network,
  ResourceKind,
  StatsSample,
  View,
  Volume,
} from "../types/domain";
import { type ListState, initialListState } from "./list-reducer";
import type { ModalState } from "./modal-reducer";
import { type TabbedViewState, initialTabbedViewState } from "./tabs-reducer";
import { type UIState, initialUIState } from "./ui-reducer";

export interface Resources {
  containers: Container[];
  images: Image[];
  networks: Network[];
  volumes: Volume[];
  groups: Group[];
  /** Kinds that have loaded at least once. */
  loaded: ResourceKind[];
}

export interface LogsState {
  containerId: string;
  name: string;
  subscription: Subscription<LogRecord> | null;
  lines: LogRecord[];
  follow: boolean;
  /** Lines scrolled up from the bottom; 0 means pinned to the newest line. */
  scroll: number;
  /** Unix seconds when follow was turned off, used to resume without duplicates. */
  pausedAt: number | null;
  /** The open in flight or attached; a `logs-opened` for any other request is stale. */
  request: number;
}

export interface StatsState {
  containerId: string;
  name: string;
  subscription: Subscription<StatsSample> | null;
  samples: StatsSample[];
}

export interface EnvState {
  containerId: string;
  name: string;
  spec: ContainerSpec | null;
  vars: EnvVar[];
  list: ListState;
  error: string | null;
  saving: boolean;
  dirty: boolean;
}

export interface ViewStates {
  containers: ListState;
  images: ListState;
  volumes: ListState;
  groups: TabbedViewState;
  networks: TabbedViewState;
  compose: TabbedViewState;
}

export type TabbedView = "groups" | "networks" | "compose";
export type ListView = "containers" | "images" | "volumes";

export const TAB_TITLES: Record<TabbedView, readonly string[]> = {
  groups: ["List", "In group", "Available"],
  networks: ["List", "In network", "Available"],
  compose: ["Projects", "Services", "Containers"],
};

export interface AppState {
  view: View;
  /** Where About returns to. */
  previousView: MainView;
  resources: Resources;
  views: ViewStates;
  logs: LogsState | null;
  stats: StatsState | null;
  env: EnvState | null;
  modal: ModalState | null;
  ui: UIState;
  /** Last log stream request issued. */
  logRequests: number;
}

export function initialAppState(size?: { cols: number; rows: number }): AppState {
  return {
    view: "containers",
    previousView: "containers",
    resources: {
      containers: [],
      images: [],
      networks: [],
      volumes: [],
      groups: [],
      loaded: [],
    },
    views: {
      containers: initialListState,
      images: initialListState,
      volumes: initialListState,
      groups: initialTabbedViewState(TAB_TITLES.groups.length),
      networks: initialTabbedViewState(TAB_TITLES.networks.length),
      compose: initialTabbedViewState(TAB_TITLES.compose.length),
    },
    logs: null,
    stats: null,
    env: null,
    modal: null,
    ui: size ? { ...initialUIState, ...size } : initialUIState,
    logRequests: 0,
  };
}

export function isTabbedView(view: View): view is TabbedView {
  return view === "groups" || view === "networks" || view === "compose";
}

export function isListView(view: View): view is ListView {
  return view === "containers" || view === "images" || view === "volumes";
}

export function parseEnv(env: readonly string[]): EnvVar[] {
  return env.map((entry) => {
    const at = entry.indexOf("=");
    return at < 0 ? { key: entry, value: "" } : { key: entry.slice(0, at), value: entry.slice(at + 1) };
  });
}

export function formatEnv(vars: readonly EnvVar[]): string[] {
  return vars.map((v) => `${v.key}=${v.value}`);
}
