// src/__tests__/test-utils.ts
/**
 * Test utilities and factories. This file has no tests of its own.
 */
import { randomUUID } from "node:crypto";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable } from "node:stream";
import { errAsync, okAsync, type ResultAsync } from "neverthrow";
import type { PruneReport } from "../api/volumes";
import { createEffects } from "../commands/effects";
import type { AppReduction, CommandContext } from "../commands/types";
import type { Command } from "../runtime/command";
import type { LogStreamRequest, ResourceClient } from "../services/docker-client";
import { GroupStore } from "../services/group-store";
import { type AppState, initialAppState } from "../state/app-state";
import type { Container, ContainerSpec, Group, Image, Network, Volume } from "../types/domain";
import type { DockerError } from "../types/errors";
import type { AppEvent } from "../types/events";

export function createContainer(overrides: Partial<Container> = {}): Container {
  return {
    id: "c1aaaaaaaaaaaaaaaa",
    name: "web",
    image: "nginx:latest",
    state: "running",
    status: "Up 5 minutes",
    created: 1_700_000_000,
    ports: "",
    labels: {},
    networks: [],
    volumes: [],
    ...overrides,
  };
}

export function createImage(overrides: Partial<Image> = {}): Image {
  return {
    id: "sha256:1111111111111111",
    tags: ["nginx:latest"],
    size: 1024,
    created: 1_700_000_000,
    containers: 0,
    ...overrides,
  };
}

export function createNetwork(overrides: Partial<Network> = {}): Network {
  return {
    id: "n1",
    name: "backend",
    driver: "bridge",
    scope: "local",
    internal: false,
    created: "2024-01-01T00:00:00Z",
    ...overrides,
  };
}

export function createVolume(overrides: Partial<Volume> = {}): Volume {
  return {
    name: "data",
    driver: "local",
    mountpoint: "/var/lib/docker/volumes/data/_data",
    created: "2024-01-01T00:00:00Z",
    scope: "local",
    ...overrides,
  };
}

export function createGroup(overrides: Partial<Group> = {}): Group {
  return {
    id: "g1",
    name: "web-tier",
    description: "",
    containerIds: [],
    created: "2024-01-01T00:00:00Z",
    modified: "2024-01-01T00:00:00Z",
    color: "blue",
    ...overrides,
  };
}

export function createSpec(overrides: Partial<ContainerSpec> = {}): ContainerSpec {
  return {
    name: "web",
    image: "nginx:latest",
    env: ["PORT=80"],
    tty: false,
    openStdin: false,
    labels: {},
    hostConfig: {
      binds: [],
      portBindings: {},
      networkMode: "frontend",
      privileged: false,
      capAdd: [],
      capDrop: [],
      restartPolicy: { name: "no", maximumRetryCount: 0 },
    },
    networks: [{ name: "frontend" }],
    ...overrides,
  };
}

export type RecordedCall = { method: string; args: unknown[] };

/**
 * In-memory stand-in for the Docker daemon. Every call is recorded. A
 * failure registered under "method" fails every call of that method; one
 * under "method:target" fails only calls whose first argument is `target`.
 */
export class FakeClient implements ResourceClient {
  readonly calls: RecordedCall[] = [];
  readonly failures = new Map<string, string>();
  containers: Container[] = [];
  images: Image[] = [];
  networks: Network[] = [];
  volumes: Volume[] = [];
  specs = new Map<string, ContainerSpec>();
  createdIds: string[] = ["new0000000000000000"];
  logChunks: Array<Buffer | string> = [];
  statsChunks: string[] = [];

  called(method: string): unknown[][] {
    return this.calls.filter((c) => c.method === method).map((c) => c.args);
  }

  methods(): string[] {
    return this.calls.map((c) => c.method);
  }

  private reply<T>(method: string, args: unknown[], value: () => T): ResultAsync<T, DockerError> {
    this.calls.push({ method, args });
    const target = typeof args[0] === "string" ? args[0] : "";
    const cause = this.failures.get(`${method}:${target}`) ?? this.failures.get(method);
    if (cause !== undefined) return errAsync<T, DockerError>({ kind: "http", message: cause, status: 500 });
    return okAsync<T, DockerError>(value());
  }

  ping() {
    return this.reply("ping", [], () => undefined);
  }

  listContainers(all: boolean) {
    return this.reply("listContainers", [all], () => this.containers);
  }

  containerSpec(id: string) {
    return this.reply("containerSpec", [id], () => this.specs.get(id) ?? createSpec());
  }

  startContainer(id: string) {
    return this.reply("startContainer", [id], () => undefined);
  }

  stopContainer(id: string, timeoutSeconds: number) {
    return this.reply("stopContainer", [id, timeoutSeconds], () => undefined);
  }

  restartContainer(id: string, timeoutSeconds: number) {
    return this.reply("restartContainer", [id, timeoutSeconds], () => undefined);
  }

  removeContainer(id: string, force: boolean) {
    return this.reply("removeContainer", [id, force], () => undefined);
  }

  createContainer(spec: ContainerSpec) {
    return this.reply("createContainer", [spec.name, spec], () => this.createdIds.shift() ?? "new-fallback-id00000");
  }

  listImages() {
    return this.reply("listImages", [], () => this.images);
  }

  removeImage(id: string, force: boolean) {
    return this.reply("removeImage", [id, force], () => undefined);
  }

  pullImage(ref: string) {
    return this.reply("pullImage", [ref], () => undefined);
  }

  listNetworks() {
    return this.reply("listNetworks", [], () => this.networks);
  }

  createNetwork(name: string, driver: string) {
    return this.reply("createNetwork", [name, driver], () => `net-${name}`);
  }

  removeNetwork(id: string) {
    return this.reply("removeNetwork", [id], () => undefined);
  }

  attachNetwork(network: string, containerId: string, aliases?: string[]) {
    return this.reply("attachNetwork", [network, containerId, aliases], () => undefined);
  }

  detachNetwork(network: string, containerId: string) {
    return this.reply("detachNetwork", [network, containerId], () => undefined);
  }

  listVolumes() {
    return this.reply("listVolumes", [], () => this.volumes);
  }

  removeVolume(name: string, force: boolean) {
    return this.reply("removeVolume", [name, force], () => undefined);
  }

  pruneVolumes() {
    return this.reply("pruneVolumes", [], (): PruneReport => ({ removed: ["old"], spaceReclaimed: 2048 }));
  }

  openLogStream(id: string, request: LogStreamRequest) {
    return this.reply("openLogStream", [id, request], () => Readable.from(this.logChunks));
  }

  openStatsStream(id: string) {
    return this.reply("openStatsStream", [id], () => Readable.from(this.statsChunks));
  }
}

export const testSettings = { logBufferLines: 1000, statsHistory: 60, refreshIntervalMs: 2000 };

export type ShellCall = { containerId: string };

/** A group store in its own fresh directory under the OS temp dir. */
export function tempGroupStore(): GroupStore {
  return new GroupStore(join(tmpdir(), `dockhand-test-${randomUUID()}`, "groups.json"));
}

export function createTestEffects(client: FakeClient, groups: GroupStore = tempGroupStore()) {
  const shells: ShellCall[] = [];
  const effects = createEffects({
    client,
    groups,
    config: { logTail: 100, stopTimeoutSeconds: 10 },
    shell: async (containerId) => {
      shells.push({ containerId });
      return 0;
    },
  });
  return { effects, shells };
}

export function createTestState(overrides: Partial<AppState> = {}, resources: Partial<AppState["resources"]> = {}): AppState {
  const base = initialAppState({ cols: 120, rows: 30 });
  return {
    ...base,
    ...overrides,
    resources: {
      ...base.resources,
      loaded: ["containers", "images", "networks", "volumes", "groups"],
      ...resources,
    },
  };
}

export function createContext(state: AppState, client: FakeClient = new FakeClient(), now = 1_000): CommandContext {
  return { state, effects: createTestEffects(client).effects, now: () => now, settings: testSettings };
}

/**
 * Runs commands with an already-cancelled signal, so banner timers and
 * scheduled ticks resolve to nothing at once, and returns the events the
 * others produced, in order.
 */
export async function runCommands(commands: Command<AppEvent>[]): Promise<AppEvent[]> {
  const controller = new AbortController();
  controller.abort();
  const events: AppEvent[] = [];
  for (const command of commands) {
    const event = await command(controller.signal);
    if (event) events.push(event);
  }
  return events;
}

export function commandsOf(reduction: AppReduction): Command<AppEvent>[] {
  return reduction[1];
}

/** Strips ANSI escape sequences from rendered output. */
export function stripAnsi(str: string): string {
  return str.replace(/\u001b\[[0-9;]*m/g, "");
}
