import type { Readable } from 'node:stream';
import { ResultAsync } from 'neverthrow';
import { ZodError } from 'zod';
import * as containers from '../api/containers';
import * as images from '../api/images';
import * as networks from '../api/networks';
import * as volumes from '../api/volumes';
import { ping } from '../api/system';
import type { PruneReport } from '../api/volumes';
import type { Container, ContainerSpec, Image, Network, Volume } from '../types/domain';
import type { DockerError } from '../types/errors';
import { AbortedError, HttpError, getHttpClient, type DockerEndpoint, type HttpClient } from './http-client';
import { log } from './logger';

export type LogStreamRequest = {
  follow: boolean;
  tail: number | 'all';
  since?: number;
};

/**
 * Everything the app needs from the container daemon. Calls take an optional
 * signal; deadlines are applied by the callers.
 */
export interface ResourceClient {
  ping(signal?: AbortSignal): ResultAsync<void, DockerError>;

  listContainers(all: boolean, signal?: AbortSignal): ResultAsync<Container[], DockerError>;
  containerSpec(id: string, signal?: AbortSignal): ResultAsync<ContainerSpec, DockerError>;
  startContainer(id: string, signal?: AbortSignal): ResultAsync<void, DockerError>;
  stopContainer(id: string, timeoutSeconds: number, signal?: AbortSignal): ResultAsync<void, DockerError>;
  restartContainer(id: string, timeoutSeconds: number, signal?: AbortSignal): ResultAsync<void, DockerError>;
  removeContainer(id: string, force: boolean, signal?: AbortSignal): ResultAsync<void, DockerError>;
  createContainer(spec: ContainerSpec, signal?: AbortSignal): ResultAsync<string, DockerError>;

  listImages(signal?: AbortSignal): ResultAsync<Image[], DockerError>;
  removeImage(id: string, force: boolean, signal?: AbortSignal): ResultAsync<void, DockerError>;
  pullImage(ref: string, signal?: AbortSignal): ResultAsync<void, DockerError>;

  listNetworks(signal?: AbortSignal): ResultAsync<Network[], DockerError>;
  createNetwork(name: string, driver: string, signal?: AbortSignal): ResultAsync<string, DockerError>;
  removeNetwork(id: string, signal?: AbortSignal): ResultAsync<void, DockerError>;
  attachNetwork(network: string, containerId: string, aliases?: string[], signal?: AbortSignal): ResultAsync<void, DockerError>;
  detachNetwork(network: string, containerId: string, signal?: AbortSignal): ResultAsync<void, DockerError>;

  listVolumes(signal?: AbortSignal): ResultAsync<Volume[], DockerError>;
  removeVolume(name: string, force: boolean, signal?: AbortSignal): ResultAsync<void, DockerError>;
  pruneVolumes(signal?: AbortSignal): ResultAsync<PruneReport, DockerError>;

  openLogStream(id: string, request: LogStreamRequest, signal: AbortSignal): ResultAsync<Readable, DockerError>;
  openStatsStream(id: string, signal: AbortSignal): ResultAsync<Readable, DockerError>;
}

export function toDockerError(error: unknown): DockerError {
  if (error instanceof AbortedError || (error instanceof Error && error.name === 'AbortError')) {
    return { kind: 'aborted', message: 'operation timed out or was cancelled' };
  }
  if (error instanceof HttpError) {
    return { kind: 'http', message: error.message, status: error.status };
  }
  if (error instanceof ZodError) {
    return { kind: 'decode', message: `unexpected daemon response: ${error.issues[0]?.message ?? error.message}` };
  }
  if (error instanceof Error) {
    const code = 'code' in error ? error.code : undefined;
    if (code === 'ECONNREFUSED' || code === 'ENOENT' || code === 'EACCES') {
      return { kind: 'unreachable', message: `cannot reach the Docker daemon: ${error.message}` };
    }
    return { kind: 'http', message: error.message, status: 0 };
  }
  return { kind: 'http', message: String(error), status: 0 };
}

function call<T>(what: string, run: () => Promise<T>): ResultAsync<T, DockerError> {
  return ResultAsync.fromPromise(run(), toDockerError).mapErr((error) => {
    if (error.kind !== 'aborted') log.debug(`${what} failed`, 'docker', error);
    return error;
  });
}

export class DockerClient implements ResourceClient {
  constructor(private readonly http: HttpClient) {}

  static connect(endpoint: DockerEndpoint): DockerClient {
    return new DockerClient(getHttpClient(endpoint));
  }

  ping(signal?: AbortSignal) {
    return call('ping', () => ping(this.http, signal));
  }

  listContainers(all: boolean, signal?: AbortSignal) {
    return call('listContainers', () => containers.listContainers(this.http, all, signal));
  }

  containerSpec(id: string, signal?: AbortSignal) {
    return call('inspectContainer', async () => containers.specFromInspect(await containers.inspectContainer(this.http, id, signal)));
  }

  startContainer(id: string, signal?: AbortSignal) {
    return call('startContainer', () => containers.startContainer(this.http, id, signal));
  }

  stopContainer(id: string, timeoutSeconds: number, signal?: AbortSignal) {
    return call('stopContainer', () => containers.stopContainer(this.http, id, timeoutSeconds, signal));
  }

  restartContainer(id: string, timeoutSeconds: number, signal?: AbortSignal) {
    return call('restartContainer', () => containers.restartContainer(this.http, id, timeoutSeconds, signal));
  }

  removeContainer(id: string, force: boolean, signal?: AbortSignal) {
    return call('removeContainer', () => containers.removeContainer(this.http, id, force, signal));
  }

  createContainer(spec: ContainerSpec, signal?: AbortSignal) {
    return call('createContainer', () => containers.createContainer(this.http, spec, signal));
  }

  listImages(signal?: AbortSignal) {
    return call('listImages', () => images.listImages(this.http, signal));
  }

  removeImage(id: string, force: boolean, signal?: AbortSignal) {
    return call('removeImage', () => images.removeImage(this.http, id, force, signal));
  }

  pullImage(ref: string, signal?: AbortSignal) {
    return call('pullImage', () => images.pullImage(this.http, ref, signal));
  }

  listNetworks(signal?: AbortSignal) {
    return call('listNetworks', () => networks.listNetworks(this.http, signal));
  }

  createNetwork(name: string, driver: string, signal?: AbortSignal) {
    return call('createNetwork', () => networks.createNetwork(this.http, name, driver, signal));
  }

  removeNetwork(id: string, signal?: AbortSignal) {
    return call('removeNetwork', () => networks.removeNetwork(this.http, id, signal));
  }

  attachNetwork(network: string, containerId: string, aliases?: string[], signal?: AbortSignal) {
    return call('attachNetwork', () => networks.connectNetwork(this.http, network, containerId, aliases, signal));
  }

  detachNetwork(network: string, containerId: string, signal?: AbortSignal) {
    return call('detachNetwork', () => networks.disconnectNetwork(this.http, network, containerId, signal));
  }

  listVolumes(signal?: AbortSignal) {
    return call('listVolumes', () => volumes.listVolumes(this.http, signal));
  }

  removeVolume(name: string, force: boolean, signal?: AbortSignal) {
    return call('removeVolume', () => volumes.removeVolume(this.http, name, force, signal));
  }

  pruneVolumes(signal?: AbortSignal) {
    return call('pruneVolumes', () => volumes.pruneVolumes(this.http, signal));
  }

  openLogStream(id: string, request: LogStreamRequest, signal: AbortSignal) {
    return call('openLogStream', () => containers.containerLogs(this.http, id, { ...request, signal }));
  }

  openStatsStream(id: string, signal: AbortSignal) {
    return call('openStatsStream', () => containers.containerStats(this.http, id, signal));
  }
}
