import type { Readable } from 'node:stream';
import type { HttpClient } from '../services/http-client';
import type { Container, ContainerSpec, ContainerState } from '../types/domain';
import {
  containerInspectSchema,
  containerListSchema,
  createResponseSchema,
  type ContainerInspect,
  type ContainerSummary,
} from './schemas';

const KNOWN_STATES: readonly ContainerState[] = ['created', 'running', 'paused', 'restarting', 'removing', 'exited', 'dead'];

function toState(raw: string): ContainerState {
  return KNOWN_STATES.find((s) => s === raw.toLowerCase()) ?? 'dead';
}

function formatPorts(ports: ContainerSummary['Ports']): string {
  const seen = new Set<string>();
  for (const p of ports) {
    const entry = p.PublicPort
      ? `${p.PublicPort}->${p.PrivatePort}/${p.Type}`
      : `${p.PrivatePort}/${p.Type}`;
    seen.add(entry);
  }
  return [...seen].join(', ');
}

export function toContainer(raw: ContainerSummary): Container {
  const networks = Object.entries(raw.NetworkSettings?.Networks ?? {}).map(([name, n]) => ({ name, id: n.NetworkID }));
  const volumes = (raw.Mounts ?? [])
    .filter((m) => m.Type === 'volume' && m.Name)
    .map((m) => m.Name ?? '');
  return {
    id: raw.Id,
    name: (raw.Names[0] ?? raw.Id.slice(0, 12)).replace(/^\//, ''),
    image: raw.Image,
    state: toState(raw.State),
    status: raw.Status,
    created: raw.Created,
    ports: formatPorts(raw.Ports),
    labels: raw.Labels,
    networks,
    volumes,
  };
}

export async function listContainers(http: HttpClient, all: boolean, signal?: AbortSignal): Promise<Container[]> {
  const data = await http.get('/containers/json', { signal, query: { all: all ? 1 : 0 } });
  return containerListSchema.parse(data).map(toContainer);
}

export async function inspectContainer(http: HttpClient, id: string, signal?: AbortSignal): Promise<ContainerInspect> {
  const data = await http.get(`/containers/${encodeURIComponent(id)}/json`, { signal });
  return containerInspectSchema.parse(data);
}

/** Derive the spec needed to create the container again from its inspect data. */
export function specFromInspect(raw: ContainerInspect): ContainerSpec {
  const portBindings: ContainerSpec['hostConfig']['portBindings'] = {};
  for (const [port, bindings] of Object.entries(raw.HostConfig.PortBindings ?? {})) {
    portBindings[port] = (bindings ?? []).map((b) => ({ hostIp: b.HostIp, hostPort: b.HostPort }));
  }
  const shortId = raw.Id.slice(0, 12);
  const networks = Object.entries(raw.NetworkSettings.Networks ?? {}).map(([name, n]) => ({
    name,
    id: n.NetworkID || undefined,
    // The daemon adds the short id as an alias; the new container gets its own
    aliases: (n.Aliases ?? []).filter((a) => a !== shortId),
  }));
  return {
    name: raw.Name.replace(/^\//, ''),
    image: raw.Config.Image,
    env: raw.Config.Env,
    cmd: raw.Config.Cmd ?? undefined,
    entrypoint: raw.Config.Entrypoint ?? undefined,
    workingDir: raw.Config.WorkingDir ?? undefined,
    user: raw.Config.User ?? undefined,
    tty: raw.Config.Tty,
    openStdin: raw.Config.OpenStdin,
    labels: raw.Config.Labels,
    hostConfig: {
      binds: raw.HostConfig.Binds,
      portBindings,
      networkMode: raw.HostConfig.NetworkMode,
      privileged: raw.HostConfig.Privileged,
      capAdd: raw.HostConfig.CapAdd,
      capDrop: raw.HostConfig.CapDrop,
      restartPolicy: {
        name: raw.HostConfig.RestartPolicy.Name,
        maximumRetryCount: raw.HostConfig.RestartPolicy.MaximumRetryCount,
      },
    },
    networks,
  };
}

/** Request body for POST /containers/create. Only the first network is included. */
export function createBody(spec: ContainerSpec): Record<string, unknown> {
  const exposedPorts: Record<string, Record<string, never>> = {};
  const portBindings: Record<string, Array<{ HostIp: string; HostPort: string }>> = {};
  for (const [port, bindings] of Object.entries(spec.hostConfig.portBindings)) {
    exposedPorts[port] = {};
    portBindings[port] = bindings.map((b) => ({ HostIp: b.hostIp, HostPort: b.hostPort }));
  }
  const primary = spec.networks[0];
  return {
    Image: spec.image,
    Env: spec.env,
    Cmd: spec.cmd,
    Entrypoint: spec.entrypoint,
    WorkingDir: spec.workingDir,
    User: spec.user,
    Tty: spec.tty,
    OpenStdin: spec.openStdin,
    Labels: spec.labels,
    ExposedPorts: exposedPorts,
    HostConfig: {
      Binds: spec.hostConfig.binds,
      PortBindings: portBindings,
      NetworkMode: spec.hostConfig.networkMode || undefined,
      Privileged: spec.hostConfig.privileged,
      CapAdd: spec.hostConfig.capAdd,
      CapDrop: spec.hostConfig.capDrop,
      RestartPolicy: {
        Name: spec.hostConfig.restartPolicy.name,
        MaximumRetryCount: spec.hostConfig.restartPolicy.maximumRetryCount,
      },
    },
    NetworkingConfig: primary
      ? { EndpointsConfig: { [primary.name]: { Aliases: primary.aliases ?? [] } } }
      : undefined,
  };
}

export async function createContainer(http: HttpClient, spec: ContainerSpec, signal?: AbortSignal): Promise<string> {
  const data = await http.post('/containers/create', createBody(spec), { signal, query: { name: spec.name || undefined } });
  return createResponseSchema.parse(data).Id;
}

export async function startContainer(http: HttpClient, id: string, signal?: AbortSignal): Promise<void> {
  await http.post(`/containers/${encodeURIComponent(id)}/start`, undefined, { signal });
}

export async function stopContainer(http: HttpClient, id: string, timeoutSeconds: number, signal?: AbortSignal): Promise<void> {
  await http.post(`/containers/${encodeURIComponent(id)}/stop`, undefined, { signal, query: { t: timeoutSeconds } });
}

export async function restartContainer(http: HttpClient, id: string, timeoutSeconds: number, signal?: AbortSignal): Promise<void> {
  await http.post(`/containers/${encodeURIComponent(id)}/restart`, undefined, { signal, query: { t: timeoutSeconds } });
}

export async function removeContainer(http: HttpClient, id: string, force: boolean, signal?: AbortSignal): Promise<void> {
  await http.delete(`/containers/${encodeURIComponent(id)}`, { signal, query: { force: force ? 1 : 0 } });
}

export type LogStreamOptions = {
  follow: boolean;
  tail: number | 'all';
  since?: number;   // unix seconds
  signal?: AbortSignal;
};

export function containerLogs(http: HttpClient, id: string, opts: LogStreamOptions): Promise<Readable> {
  return http.stream(`/containers/${encodeURIComponent(id)}/logs`, {
    signal: opts.signal,
    query: {
      stdout: 1,
      stderr: 1,
      follow: opts.follow ? 1 : 0,
      tail: opts.tail,
      since: opts.since,
    },
  });
}

export function containerStats(http: HttpClient, id: string, signal?: AbortSignal): Promise<Readable> {
  return http.stream(`/containers/${encodeURIComponent(id)}/stats`, { signal, query: { stream: 1 } });
}
