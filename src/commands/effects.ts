import type { ResultAsync } from 'neverthrow';
import type { AppConfig } from '../config/app-config';
import type { Command } from '../runtime/command';
import { withDeadline } from '../runtime/command';
import { runBatch, type BatchTask } from '../services/batch-executor';
import { openLogSubscription, openStatsSubscription } from '../services/container-streams';
import type { LogStreamRequest, ResourceClient } from '../services/docker-client';
import type { GroupStore } from '../services/group-store';
import { log } from '../services/logger';
import { recreateContainer } from '../services/recreate-workflow';
import type { Container, ContainerSpec, ResourceKind } from '../types/domain';
import { errorMessage } from '../types/errors';
import type { AppEvent } from '../types/events';
import { shortId } from '../utils/formatters';

export const DEADLINES = {
  list: 5_000,
  lifecycle: 10_000,
  mutate: 30_000,
  recreate: 60_000,
  pull: 120_000,
} as const;

export type ContainerAction = 'start' | 'stop' | 'restart';

/** Runs an interactive shell in a container with the terminal handed over. */
export type ShellRunner = (containerId: string) => Promise<number | null>;

export type EffectDeps = {
  client: ResourceClient;
  groups: GroupStore;
  config: Pick<AppConfig, 'logTail' | 'stopTimeoutSeconds'>;
  shell: ShellRunner;
};

type AppCommand = Command<AppEvent>;

const PAST: Record<ContainerAction, string> = { start: 'Started', stop: 'Stopped', restart: 'Restarted' };

function opResult(
  result: ResultAsync<unknown, { message: string }>,
  success: string,
  failure: string,
  refresh: ResourceKind[],
): Promise<AppEvent> {
  return result.match(
    (): AppEvent => ({ type: 'op-result', ok: true, message: success, refresh }),
    (error): AppEvent => ({ type: 'op-result', ok: false, message: `${failure}: ${error.message}`, refresh }),
  );
}

/**
 * Command factories. Each one applies its own deadline and resolves to an
 * event; failures are reported as events, never thrown.
 */
export function createEffects(deps: EffectDeps) {
  const { client, groups, config } = deps;

  const load = (kind: ResourceKind): AppCommand => async (signal) => {
    const deadline = withDeadline(signal, DEADLINES.list);
    const failed = (message: string): AppEvent => ({ type: 'load-failed', resource: kind, message });
    switch (kind) {
      case 'containers':
        return client.listContainers(true, deadline).match(
          (items): AppEvent => ({ type: 'loaded', data: { kind, items } }),
          (e) => failed(e.message),
        );
      case 'images':
        return client.listImages(deadline).match(
          (items): AppEvent => ({ type: 'loaded', data: { kind, items } }),
          (e) => failed(e.message),
        );
      case 'networks':
        return client.listNetworks(deadline).match(
          (items): AppEvent => ({ type: 'loaded', data: { kind, items } }),
          (e) => failed(e.message),
        );
      case 'volumes':
        return client.listVolumes(deadline).match(
          (items): AppEvent => ({ type: 'loaded', data: { kind, items } }),
          (e) => failed(e.message),
        );
      case 'groups':
        return groups.list().match(
          (items): AppEvent => ({ type: 'loaded', data: { kind, items } }),
          (e) => failed(e.message),
        );
    }
  };

  function lifecycle(action: ContainerAction, id: string, signal: AbortSignal) {
    const deadline = withDeadline(signal, DEADLINES.lifecycle);
    if (action === 'start') return client.startContainer(id, deadline);
    if (action === 'stop') return client.stopContainer(id, config.stopTimeoutSeconds, deadline);
    return client.restartContainer(id, config.stopTimeoutSeconds, deadline);
  }

  const containerAction = (action: ContainerAction, container: Container): AppCommand => (signal) =>
    opResult(lifecycle(action, container.id, signal), `${PAST[action]} ${container.name}`, `${action} ${container.name} failed`, [
      'containers',
    ]);

  /** Same action on many containers at once; one aggregate outcome. */
  const batchAction = (action: ContainerAction, label: string, tasks: BatchTask[]): AppCommand => async (signal) => {
    const result = await runBatch(tasks, (id, taskSignal) => lifecycle(action, id, taskSignal), {
      timeoutMs: DEADLINES.mutate,
      signal,
      name: `${action} ${label}`,
    });
    return {
      type: 'batch-finished',
      label: `${action} ${label}`,
      result: result.isOk() ? { ok: true, count: result.value.succeeded.length } : { ok: false, error: result.error },
    };
  };

  const removeContainer = (id: string, name: string): AppCommand => async (signal) => {
    const removed = await client.removeContainer(id, true, withDeadline(signal, DEADLINES.mutate));
    if (removed.isErr()) {
      return { type: 'op-result', ok: false, message: `delete ${name} failed: ${removed.error.message}`, refresh: ['containers'] };
    }
    const cleaned = await groups.removeFromAll(id);
    if (cleaned.isErr()) log.warn('Could not drop deleted container from groups', 'groups', { id, message: cleaned.error.message });
    return { type: 'op-result', ok: true, message: `Deleted ${name}`, refresh: ['containers', 'groups'] };
  };

  const removeImage = (id: string, name: string): AppCommand => (signal) =>
    opResult(client.removeImage(id, false, withDeadline(signal, DEADLINES.mutate)), `Deleted image ${name}`, `delete ${name} failed`, [
      'images',
    ]);

  const pullImage = (ref: string): AppCommand => (signal) =>
    opResult(client.pullImage(ref, withDeadline(signal, DEADLINES.pull)), `Pulled ${ref}`, `pull ${ref} failed`, ['images']);

  const removeVolume = (name: string): AppCommand => (signal) =>
    opResult(client.removeVolume(name, false, withDeadline(signal, DEADLINES.mutate)), `Deleted volume ${name}`, `delete ${name} failed`, [
      'volumes',
    ]);

  const pruneVolumes = (): AppCommand => (signal) =>
    client.pruneVolumes(withDeadline(signal, DEADLINES.mutate)).match(
      (report): AppEvent => ({ type: 'volumes-pruned', report }),
      (error): AppEvent => ({ type: 'op-result', ok: false, message: `prune failed: ${error.message}`, refresh: ['volumes'] }),
    );

  const createNetwork = (name: string, driver: string): AppCommand => (signal) =>
    opResult(client.createNetwork(name, driver, withDeadline(signal, DEADLINES.mutate)), `Created network ${name}`, `create ${name} failed`, [
      'networks',
    ]);

  const removeNetwork = (id: string, name: string): AppCommand => (signal) =>
    opResult(client.removeNetwork(id, withDeadline(signal, DEADLINES.mutate)), `Deleted network ${name}`, `delete ${name} failed`, [
      'networks',
    ]);

  const connect = (networkId: string, networkName: string, container: Container): AppCommand => (signal) =>
    opResult(
      client.attachNetwork(networkId, container.id, undefined, withDeadline(signal, DEADLINES.mutate)),
      `Connected ${container.name} to ${networkName}`,
      `connect ${container.name} failed`,
      ['containers', 'networks'],
    );

  const disconnect = (networkId: string, networkName: string, containerId: string, name: string): AppCommand => (signal) =>
    opResult(
      client.detachNetwork(networkId, containerId, withDeadline(signal, DEADLINES.mutate)),
      `Disconnected ${name} from ${networkName}`,
      `disconnect ${name} failed`,
      ['containers', 'networks'],
    );

  const createGroup = (name: string, description: string): AppCommand => () =>
    opResult(groups.create(name, description), `Created group ${name}`, 'create group failed', ['groups']);

  const deleteGroup = (id: string, name: string): AppCommand => () =>
    opResult(groups.delete(id), `Deleted group ${name}`, `delete ${name} failed`, ['groups']);

  const addToGroup = (groupId: string, container: Container): AppCommand => () =>
    opResult(groups.addMember(groupId, container.id), `Added ${container.name}`, `add ${container.name} failed`, ['groups']);

  const removeFromGroup = (groupId: string, containerId: string, name: string): AppCommand => () =>
    opResult(groups.removeMember(groupId, containerId), `Removed ${name} from group`, `remove ${name} failed`, ['groups']);

  const loadSpec = (containerId: string): AppCommand => (signal) =>
    client.containerSpec(containerId, withDeadline(signal, DEADLINES.list)).match(
      (spec): AppEvent => ({ type: 'container-spec-loaded', containerId, spec }),
      (error): AppEvent => ({ type: 'container-spec-failed', containerId, message: error.message }),
    );

  /** Recreates the container, then points its group memberships at the new id. */
  const recreate = (oldId: string, spec: ContainerSpec): AppCommand => async (signal) => {
    const outcome = await recreateContainer(client, oldId, spec, {
      signal,
      timeoutMs: DEADLINES.recreate,
      stopTimeoutSeconds: config.stopTimeoutSeconds,
    });
    if (outcome.newId) {
      const moved = await groups.replaceMember(oldId, outcome.newId);
      if (moved.isErr()) log.warn('Could not update groups after recreate', 'groups', { oldId, message: moved.error.message });
    }
    return { type: 'recreate-finished', oldId, name: spec.name, outcome };
  };

  const openLogs = (containerId: string, request: number, options?: Partial<LogStreamRequest>): AppCommand => async (signal) => ({
    type: 'logs-opened',
    containerId,
    request,
    subscription: openLogSubscription(client, containerId, { follow: true, tail: config.logTail, ...options }, signal),
  });

  const openStats = (containerId: string): AppCommand => async (signal) => ({
    type: 'stats-opened',
    containerId,
    subscription: openStatsSubscription(client, containerId, signal),
  });

  const shell = (container: Container): AppCommand => async () => {
    try {
      const exitCode = await deps.shell(container.id);
      return { type: 'shell-exited', name: container.name, exitCode };
    } catch (error) {
      log.warn('Shell failed', 'shell', { id: shortId(container.id), message: errorMessage(error) });
      return { type: 'shell-exited', name: container.name, exitCode: null, message: errorMessage(error) };
    }
  };

  return {
    load,
    containerAction,
    batchAction,
    removeContainer,
    removeImage,
    pullImage,
    removeVolume,
    pruneVolumes,
    createNetwork,
    removeNetwork,
    connect,
    disconnect,
    createGroup,
    deleteGroup,
    addToGroup,
    removeFromGroup,
    loadSpec,
    recreate,
    openLogs,
    openStats,
    shell,
  };
}

export type Effects = ReturnType<typeof createEffects>;

/** Tears a subscription down; yields no event. */
export function cancelStream(subscription: { cancel(): void }): AppCommand {
  return async () => {
    subscription.cancel();
    return null;
  };
}
