import type { AppState } from '../state/app-state';
import type { PendingAction } from '../state/modal-reducer';
import { banner } from './transitions';
import type { AppReduction, CommandContext } from './types';

/**
 * Performs what a confirmed modal was opened for. The modal itself has
 * already been discarded from `state`.
 */
export function applyPending(
  state: AppState,
  pending: PendingAction,
  values: string[],
  context: CommandContext,
): AppReduction {
  const { effects } = context;
  const [first = '', second = ''] = values;

  switch (pending.kind) {
    case 'delete-container':
      return [state, [effects.removeContainer(pending.id, pending.name)]];

    case 'delete-image':
      return [state, [effects.removeImage(pending.id, pending.name)]];

    case 'delete-volume':
      return [state, [effects.removeVolume(pending.name)]];

    case 'prune-volumes':
      return [state, [effects.pruneVolumes()]];

    case 'delete-group':
      return [state, [effects.deleteGroup(pending.id, pending.name)]];

    case 'delete-network':
      return [state, [effects.removeNetwork(pending.id, pending.name)]];

    case 'remove-from-group':
      return [state, [effects.removeFromGroup(pending.groupId, pending.containerId, pending.name)]];

    case 'disconnect-network': {
      const network = state.resources.networks.find((n) => n.id === pending.networkId);
      const networkName = network?.name ?? pending.networkId;
      return [state, [effects.disconnect(pending.networkId, networkName, pending.containerId, pending.name)]];
    }

    case 'create-group':
      return [state, [effects.createGroup(first, second)]];

    case 'create-network':
      return [state, [effects.createNetwork(first, second || 'bridge')]];

    case 'pull-image': {
      const [next, commands] = banner(state, 'status', `Pulling ${first}…`, context);
      return [next, [...commands, effects.pullImage(first)]];
    }

    case 'env-add':
    case 'env-edit': {
      const env = state.env;
      if (!env) return [state, []];
      if (first.includes('=')) return banner(state, 'error', 'Variable names cannot contain "="', context);
      const entry = { key: first, value: second };
      const index = pending.kind === 'env-edit' ? pending.index : -1;
      const vars = index < 0 ? [...env.vars, entry] : env.vars.map((v, i) => (i === index ? entry : v));
      const selected = index < 0 ? vars.length - 1 : env.list.selected;
      return [{ ...state, env: { ...env, vars, dirty: true, list: { ...env.list, selected } } }, []];
    }
  }
}
