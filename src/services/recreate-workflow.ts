import { withDeadline } from '../runtime/command';
import type { ContainerSpec } from '../types/domain';
import type { ResourceClient } from './docker-client';
import { log } from './logger';

export type RecreatePhase = 'Stopping' | 'Removing' | 'Creating' | 'Attaching' | 'Starting' | 'Done';

/** Steps whose failure aborts the workflow. */
export type FatalStep = 'remove' | 'create' | 'start';

export type SkippedStep = {
  step: 'stop' | 'attach';
  target: string;
  cause: string;
};

export type RecreateOutcome =
  | { status: 'done'; newId: string; skipped: SkippedStep[] }
  | {
      status: 'aborted';
      step: FatalStep;
      cause: string;
      /** Set when the replacement was created before the failure. */
      newId: string | null;
      skipped: SkippedStep[];
    };

export type RecreateOptions = {
  signal: AbortSignal;
  timeoutMs: number;
  stopTimeoutSeconds: number;
  onPhase?: (phase: RecreatePhase) => void;
};

/**
 * Replaces a container with a new one built from `spec`:
 * stop (best effort) → remove → create on the first network → attach the
 * remaining networks (each best effort) → start.
 */
export async function recreateContainer(
  client: ResourceClient,
  oldId: string,
  spec: ContainerSpec,
  options: RecreateOptions,
): Promise<RecreateOutcome> {
  const signal = withDeadline(options.signal, options.timeoutMs);
  const skipped: SkippedStep[] = [];
  const enter = (phase: RecreatePhase) => {
    log.debug(`recreate ${phase}`, 'recreate', { oldId, name: spec.name });
    options.onPhase?.(phase);
  };
  const abort = (step: FatalStep, cause: string, newId: string | null): RecreateOutcome => {
    log.warn('Recreate aborted', 'recreate', { oldId, step, cause, newId });
    return { status: 'aborted', step, cause, newId, skipped };
  };

  enter('Stopping');
  const stopped = await client.stopContainer(oldId, options.stopTimeoutSeconds, signal);
  if (stopped.isErr()) {
    // Usually "already stopped"; removal is forced anyway
    skipped.push({ step: 'stop', target: oldId, cause: stopped.error.message });
    log.debug('Stop before recreate failed, continuing', 'recreate', { oldId, cause: stopped.error.message });
  }

  enter('Removing');
  const removed = await client.removeContainer(oldId, true, signal);
  if (removed.isErr()) return abort('remove', removed.error.message, null);

  enter('Creating');
  const created = await client.createContainer(spec, signal);
  if (created.isErr()) return abort('create', created.error.message, null);
  const newId = created.value;

  enter('Attaching');
  for (const network of spec.networks.slice(1)) {
    const attached = await client.attachNetwork(network.id ?? network.name, newId, network.aliases, signal);
    if (attached.isErr()) {
      skipped.push({ step: 'attach', target: network.name, cause: attached.error.message });
      log.warn('Network attach failed during recreate', 'recreate', { newId, network: network.name, cause: attached.error.message });
    }
  }

  enter('Starting');
  const started = await client.startContainer(newId, signal);
  if (started.isErr()) return abort('start', started.error.message, newId);

  enter('Done');
  log.info('Container recreated', 'recreate', { oldId, newId, name: spec.name });
  return { status: 'done', newId, skipped };
}
