import { activeListState, findGroup, findNetwork, findProject, selectedContainer, visibleRows } from '../selectors/visible';
import { initialListState, selectedItem } from '../state/list-reducer';
import { confirmModal, formModal } from '../state/modal-reducer';
import { type AppState, type TabbedView, formatEnv } from '../state/app-state';
import { type TabsAction, activeList, tabsReducer } from '../state/tabs-reducer';
import { uiReducer } from '../state/ui-reducer';
import type { Container } from '../types/domain';
import { isSystemNetwork } from '../types/domain';
import type { KeyStroke } from '../types/events';
import { projectContainers } from '../utils/compose';
import { cancelStream, type ContainerAction } from './effects';
import { banner, jumpSelection, moveSelection, switchView, teardownDetail, updateActiveList, withTabs } from './transitions';
import type { AppReduction, CommandContext } from './types';

const ACTIONS: Partial<Record<string, ContainerAction>> = { s: 'start', x: 'stop', r: 'restart' };

function unchanged(state: AppState): AppReduction {
  return [state, []];
}

/** Cursor movement and filter entry, shared by every list. */
export function listKeys(state: AppState, key: KeyStroke): AppReduction | null {
  switch (key.id) {
    case 'up':
    case 'k':
      return [moveSelection(state, -1), []];
    case 'down':
    case 'j':
      return [moveSelection(state, 1), []];
    case 'pageup':
      return [moveSelection(state, -10), []];
    case 'pagedown':
      return [moveSelection(state, 10), []];
    case 'g':
      return [jumpSelection(state, 'top'), []];
    case 'G':
      return [jumpSelection(state, 'bottom'), []];
    case '/':
      if (state.view === 'env' || !activeListState(state)) return null;
      return [updateActiveList(state, { type: 'START_FILTER' }), []];
    default:
      return null;
  }
}

/** Keys that act on one container, from any view that lists containers. */
export function containerKeys(
  state: AppState,
  key: KeyStroke,
  container: Container | null,
  context: CommandContext,
): AppReduction | null {
  const { effects } = context;
  if (!container) return ['s', 'x', 'r', 'l', 't', 'e', 'v', 'd'].includes(key.id) ? unchanged(state) : null;

  const action = ACTIONS[key.id];
  if (action) return [state, [effects.containerAction(action, container)]];

  switch (key.id) {
    case 'l': {
      const [torn, cancel] = teardownDetail(state);
      const [next, commands] = switchView(torn, 'logs', effects);
      const request = state.logRequests + 1;
      const logs = { containerId: container.id, name: container.name, subscription: null, lines: [], follow: true, scroll: 0, pausedAt: null, request };
      return [{ ...next, logs, logRequests: request }, [...cancel, ...commands, effects.openLogs(container.id, request)]];
    }

    case 't': {
      const [torn, cancel] = teardownDetail(state);
      const [next, commands] = switchView(torn, 'stats', effects);
      const stats = { containerId: container.id, name: container.name, subscription: null, samples: [] };
      return [{ ...next, stats }, [...cancel, ...commands, effects.openStats(container.id)]];
    }

    case 'e': {
      if (container.state !== 'running') return banner(state, 'error', `${container.name} is not running`, context);
      const ui = uiReducer(state.ui, { type: 'SHELL_STARTED', payload: container.name });
      return [{ ...state, ui }, [effects.shell(container)]];
    }

    case 'v': {
      const [torn, cancel] = teardownDetail(state);
      const [next, commands] = switchView(torn, 'env', effects);
      const env = {
        containerId: container.id,
        name: container.name,
        spec: null,
        vars: [],
        list: initialListState,
        error: null,
        saving: false,
        dirty: false,
      };
      return [{ ...next, env }, [...cancel, ...commands, effects.loadSpec(container.id)]];
    }

    case 'd':
      return [
        {
          ...state,
          modal: confirmModal('Delete container', `Delete ${container.name}? It will be force-removed.`, {
            kind: 'delete-container',
            id: container.id,
            name: container.name,
          }),
        },
        [],
      ];

    default:
      return null;
  }
}

function selectTab(state: AppState, view: TabbedView, reduce: TabsAction): AppReduction {
  return [{ ...state, views: withTabs(state.views, view, tabsReducer(state.views[view], reduce)) }, []];
}

function containersView(state: AppState, key: KeyStroke, context: CommandContext): AppReduction | null {
  return containerKeys(state, key, selectedContainer(state), context);
}

function imagesView(state: AppState, key: KeyStroke): AppReduction | null {
  const rows = visibleRows(state);
  const image = rows.kind === 'images' ? selectedItem(rows.items, state.views.images) : null;
  switch (key.id) {
    case 'p':
      return [{ ...state, modal: formModal('Pull image', [{ label: 'Image' }], { kind: 'pull-image' }) }, []];
    case 'd': {
      if (!image) return unchanged(state);
      const name = image.tags[0] ?? image.id.replace(/^sha256:/, '').slice(0, 12);
      return [{ ...state, modal: confirmModal('Delete image', `Delete image ${name}?`, { kind: 'delete-image', id: image.id, name }) }, []];
    }
    default:
      return null;
  }
}

function volumesView(state: AppState, key: KeyStroke): AppReduction | null {
  const rows = visibleRows(state);
  const volume = rows.kind === 'volumes' ? selectedItem(rows.items, state.views.volumes) : null;
  switch (key.id) {
    case 'p':
      return [{ ...state, modal: confirmModal('Prune volumes', 'Remove all unused volumes?', { kind: 'prune-volumes' }) }, []];
    case 'd':
      if (!volume) return unchanged(state);
      return [
        { ...state, modal: confirmModal('Delete volume', `Delete volume ${volume.name}?`, { kind: 'delete-volume', name: volume.name }) },
        [],
      ];
    default:
      return null;
  }
}

function groupsView(state: AppState, key: KeyStroke, context: CommandContext): AppReduction | null {
  const view = state.views.groups;
  const rows = visibleRows(state);

  if (key.id === 'n') {
    const modal = formModal('New group', [{ label: 'Name' }, { label: 'Description', optional: true }], { kind: 'create-group' });
    return [{ ...state, modal }, []];
  }
  if (key.id === 'esc' && view.tab > 0) return selectTab(state, 'groups', { type: 'SET_TAB', payload: 0 });

  if (view.tab === 0) {
    const group = rows.kind === 'groups' ? selectedItem(rows.items, activeList(view)) : null;
    if (!group) return ['enter', 'd', 's', 'x', 'r'].includes(key.id) ? unchanged(state) : null;
    const action = ACTIONS[key.id];
    if (action) {
      if (group.containerIds.length === 0) return banner(state, 'error', `Group ${group.name} has no containers`, context);
      const names = new Map(state.resources.containers.map((c) => [c.id, c.name]));
      const tasks = group.containerIds.map((id) => ({ id, label: names.get(id) }));
      return [state, [context.effects.batchAction(action, `group ${group.name}`, tasks)]];
    }
    switch (key.id) {
      case 'enter':
        return selectTab(state, 'groups', { type: 'SELECT_PARENT', payload: group.id });
      case 'd':
        return [
          { ...state, modal: confirmModal('Delete group', `Delete group ${group.name}?`, { kind: 'delete-group', id: group.id, name: group.name }) },
          [],
        ];
      default:
        return null;
    }
  }

  const group = findGroup(state);
  const container = selectedContainer(state);
  if (group && container && view.tab === 1 && key.id === 'u') {
    const modal = confirmModal('Remove from group', `Remove ${container.name} from ${group.name}?`, {
      kind: 'remove-from-group',
      groupId: group.id,
      containerId: container.id,
      name: container.name,
    });
    return [{ ...state, modal }, []];
  }
  if (group && container && view.tab === 2 && key.id === 'enter') {
    return [state, [context.effects.addToGroup(group.id, container)]];
  }
  return containerKeys(state, key, container, context);
}

function networksView(state: AppState, key: KeyStroke, context: CommandContext): AppReduction | null {
  const view = state.views.networks;
  const rows = visibleRows(state);

  if (key.id === 'n') {
    const modal = formModal('New network', [{ label: 'Name' }, { label: 'Driver', optional: true }], { kind: 'create-network' });
    return [{ ...state, modal }, []];
  }
  if (key.id === 'esc' && view.tab > 0) return selectTab(state, 'networks', { type: 'SET_TAB', payload: 0 });

  if (view.tab === 0) {
    const network = rows.kind === 'networks' ? selectedItem(rows.items, activeList(view)) : null;
    if (!network) return key.id === 'enter' || key.id === 'd' ? unchanged(state) : null;
    switch (key.id) {
      case 'enter':
        return selectTab(state, 'networks', { type: 'SELECT_PARENT', payload: network.id });
      case 'd':
        if (isSystemNetwork(network)) return banner(state, 'error', `Cannot delete system network ${network.name}`, context);
        return [
          {
            ...state,
            modal: confirmModal('Delete network', `Delete network ${network.name}?`, { kind: 'delete-network', id: network.id, name: network.name }),
          },
          [],
        ];
      default:
        return null;
    }
  }

  const network = findNetwork(state);
  const container = selectedContainer(state);
  if (network && container && view.tab === 1 && key.id === 'u') {
    const modal = confirmModal('Disconnect', `Disconnect ${container.name} from ${network.name}?`, {
      kind: 'disconnect-network',
      networkId: network.id,
      containerId: container.id,
      name: container.name,
    });
    return [{ ...state, modal }, []];
  }
  if (network && container && view.tab === 2 && key.id === 'enter') {
    return [state, [context.effects.connect(network.id, network.name, container)]];
  }
  return containerKeys(state, key, container, context);
}

function composeView(state: AppState, key: KeyStroke, context: CommandContext): AppReduction | null {
  const view = state.views.compose;
  const rows = visibleRows(state);
  const list = activeListState(state);
  if (key.id === 'esc' && view.tab > 0) return selectTab(state, 'compose', { type: 'SET_TAB', payload: 0 });

  if (view.tab === 0) {
    const project = rows.kind === 'projects' && list ? selectedItem(rows.items, list) : null;
    if (!project) return ['enter', 's', 'x', 'r'].includes(key.id) ? unchanged(state) : null;
    const action = ACTIONS[key.id];
    if (action) {
      const tasks = projectContainers(project).map((c) => ({ id: c.id, label: c.name }));
      return [state, [context.effects.batchAction(action, `project ${project.name}`, tasks)]];
    }
    return key.id === 'enter' ? selectTab(state, 'compose', { type: 'SELECT_PARENT', payload: project.name }) : null;
  }

  if (view.tab === 1) {
    const service = rows.kind === 'services' && list ? selectedItem(rows.items, list) : null;
    if (key.id === 'enter' && service && findProject(state)) {
      return selectTab(state, 'compose', { type: 'SELECT_CHILD', payload: service.name });
    }
    return key.id === 'enter' ? unchanged(state) : null;
  }

  return containerKeys(state, key, selectedContainer(state), context);
}

function logsView(state: AppState, key: KeyStroke, context: CommandContext): AppReduction | null {
  const logs = state.logs;
  if (!logs) return null;
  const maxScroll = Math.max(0, logs.lines.length - 1);

  switch (key.id) {
    case 'up':
    case 'k':
      return [{ ...state, logs: { ...logs, scroll: Math.min(maxScroll, logs.scroll + 1) } }, []];
    case 'down':
    case 'j':
      return [{ ...state, logs: { ...logs, scroll: Math.max(0, logs.scroll - 1) } }, []];
    case 'pageup':
      return [{ ...state, logs: { ...logs, scroll: Math.min(maxScroll, logs.scroll + 10) } }, []];
    case 'pagedown':
      return [{ ...state, logs: { ...logs, scroll: Math.max(0, logs.scroll - 10) } }, []];
    case 'g':
      return [{ ...state, logs: { ...logs, scroll: maxScroll } }, []];
    case 'G':
      return [{ ...state, logs: { ...logs, scroll: 0 } }, []];
    case 'c':
      return [{ ...state, logs: { ...logs, lines: [], scroll: 0 } }, []];
    case 'f': {
      if (logs.follow) {
        const cancel = logs.subscription ? [cancelStream(logs.subscription)] : [];
        const pausedAt = Math.floor(context.now() / 1000);
        return [{ ...state, logs: { ...logs, follow: false, subscription: null, pausedAt } }, cancel];
      }
      const options = logs.pausedAt === null ? undefined : { tail: 'all' as const, since: logs.pausedAt };
      const cancel = logs.subscription ? [cancelStream(logs.subscription)] : [];
      const request = state.logRequests + 1;
      return [
        { ...state, logs: { ...logs, follow: true, scroll: 0, pausedAt: null, subscription: null, request }, logRequests: request },
        [...cancel, context.effects.openLogs(logs.containerId, request, options)],
      ];
    }
    default:
      return null;
  }
}

function envView(state: AppState, key: KeyStroke, context: CommandContext): AppReduction | null {
  const env = state.env;
  if (!env) return null;
  const current = env.vars[env.list.selected];

  switch (key.id) {
    case 'a':
      return [{ ...state, modal: formModal('Add variable', [{ label: 'Key' }, { label: 'Value', optional: true }], { kind: 'env-add' }) }, []];

    case 'enter':
      if (!current) return unchanged(state);
      return [
        {
          ...state,
          modal: formModal(
            'Edit variable',
            [
              { label: 'Key', value: current.key },
              { label: 'Value', value: current.value, optional: true },
            ],
            { kind: 'env-edit', index: env.list.selected },
          ),
        },
        [],
      ];

    case 'd': {
      if (!current) return unchanged(state);
      const vars = env.vars.filter((_, i) => i !== env.list.selected);
      const selected = Math.min(env.list.selected, Math.max(0, vars.length - 1));
      return [{ ...state, env: { ...env, vars, dirty: true, list: { ...env.list, selected } } }, []];
    }

    case 'ctrl+s': {
      if (env.saving) return unchanged(state);
      if (!env.spec) return banner(state, 'error', 'Container configuration is not loaded yet', context);
      const spec = { ...env.spec, env: formatEnv(env.vars) };
      const [next, commands] = banner({ ...state, env: { ...env, saving: true } }, 'status', `Recreating ${env.name}…`, context);
      return [next, [...commands, context.effects.recreate(env.containerId, spec)]];
    }

    default:
      return null;
  }
}

/** Dispatches a key to the active view's own handler. */
export function viewKeys(state: AppState, key: KeyStroke, context: CommandContext): AppReduction | null {
  if (state.view !== 'logs' && state.view !== 'stats') {
    const moved = listKeys(state, key);
    if (moved) return moved;
  }
  switch (state.view) {
    case 'containers':
      return containersView(state, key, context);
    case 'images':
      return imagesView(state, key);
    case 'volumes':
      return volumesView(state, key);
    case 'groups':
      return groupsView(state, key, context);
    case 'networks':
      return networksView(state, key, context);
    case 'compose':
      return composeView(state, key, context);
    case 'logs':
      return logsView(state, key, context);
    case 'env':
      return envView(state, key, context);
    default:
      return null;
  }
}
