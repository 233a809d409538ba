import { type AppState, isListView, isTabbedView } from '../state/app-state';
import { type ListState, filterItems, initialListState, selectedItem } from '../state/list-reducer';
import { activeList } from '../state/tabs-reducer';
import type {
  ComposeProject,
  ComposeService,
  Container,
  EnvVar,
  Group,
  Image,
  Network,
  Volume,
} from '../types/domain';
import { composeProjects } from '../utils/compose';

export type Rows =
  | { kind: 'containers'; items: Container[] }
  | { kind: 'images'; items: Image[] }
  | { kind: 'volumes'; items: Volume[] }
  | { kind: 'groups'; items: Group[] }
  | { kind: 'networks'; items: Network[] }
  | { kind: 'projects'; items: ComposeProject[] }
  | { kind: 'services'; items: ComposeService[] }
  | { kind: 'env'; items: EnvVar[] }
  | { kind: 'none' };

const containerText = (c: Container) => `${c.name} ${c.image} ${c.state} ${c.status}`;
const imageText = (i: Image) => `${i.tags.join(' ')} ${i.id}`;
const volumeText = (v: Volume) => `${v.name} ${v.driver}`;
const groupText = (g: Group) => `${g.name} ${g.description}`;
const networkText = (n: Network) => `${n.name} ${n.driver}`;

export function isAttached(container: Container, network: Network): boolean {
  return container.networks.some((n) => n.id === network.id || n.name === network.name);
}

export function volumeUsers(containers: readonly Container[], volume: string): Container[] {
  return containers.filter((c) => c.volumes.includes(volume));
}

export function findGroup(state: AppState): Group | null {
  const id = state.views.groups.parent;
  return state.resources.groups.find((g) => g.id === id) ?? null;
}

export function findNetwork(state: AppState): Network | null {
  const id = state.views.networks.parent;
  return state.resources.networks.find((n) => n.id === id) ?? null;
}

export function projects(state: AppState): ComposeProject[] {
  return composeProjects(state.resources.containers);
}

export function findProject(state: AppState): ComposeProject | null {
  const name = state.views.compose.parent;
  return projects(state).find((p) => p.name === name) ?? null;
}

export function findService(state: AppState): ComposeService | null {
  const name = state.views.compose.child;
  return findProject(state)?.services.find((s) => s.name === name) ?? null;
}

function groupRows(state: AppState, tab: number, list: ListState): Rows {
  const { groups, containers } = state.resources;
  if (tab === 0) return { kind: 'groups', items: filterItems(groups, list.filter, groupText) };
  const group = findGroup(state);
  if (!group) return { kind: 'containers', items: [] };
  const pick = tab === 1
    ? containers.filter((c) => group.containerIds.includes(c.id))
    : containers.filter((c) => !group.containerIds.includes(c.id));
  return { kind: 'containers', items: filterItems(pick, list.filter, containerText) };
}

function networkRows(state: AppState, tab: number, list: ListState): Rows {
  const { networks, containers } = state.resources;
  if (tab === 0) return { kind: 'networks', items: filterItems(networks, list.filter, networkText) };
  const network = findNetwork(state);
  if (!network) return { kind: 'containers', items: [] };
  const pick = containers.filter((c) => isAttached(c, network) === (tab === 1));
  return { kind: 'containers', items: filterItems(pick, list.filter, containerText) };
}

function composeRows(state: AppState, tab: number, list: ListState): Rows {
  if (tab === 0) return { kind: 'projects', items: filterItems(projects(state), list.filter, (p) => p.name) };
  if (tab === 1) {
    const services = findProject(state)?.services ?? [];
    return { kind: 'services', items: filterItems(services, list.filter, (s) => s.name) };
  }
  const members = findService(state)?.containers ?? [];
  return { kind: 'containers', items: filterItems(members, list.filter, containerText) };
}

/** The list state that owns the cursor in the active view, if it has one. */
export function activeListState(state: AppState): ListState | null {
  const { view, views } = state;
  if (isListView(view)) return views[view];
  if (isTabbedView(view)) return activeList(views[view]);
  if (view === 'env') return state.env?.list ?? null;
  return null;
}

/** Rows shown in the active view (and tab), filtered. */
export function visibleRows(state: AppState): Rows {
  const { view, views, resources } = state;
  switch (view) {
    case 'containers':
      return { kind: 'containers', items: filterItems(resources.containers, views.containers.filter, containerText) };
    case 'images':
      return { kind: 'images', items: filterItems(resources.images, views.images.filter, imageText) };
    case 'volumes':
      return { kind: 'volumes', items: filterItems(resources.volumes, views.volumes.filter, volumeText) };
    case 'groups':
      return groupRows(state, views.groups.tab, activeList(views.groups));
    case 'networks':
      return networkRows(state, views.networks.tab, activeList(views.networks));
    case 'compose':
      return composeRows(state, views.compose.tab, activeList(views.compose));
    case 'env':
      return { kind: 'env', items: state.env?.vars ?? [] };
    default:
      return { kind: 'none' };
  }
}

export function rowCount(rows: Rows): number {
  return rows.kind === 'none' ? 0 : rows.items.length;
}

/** The container under the cursor, in any view that lists containers. */
export function selectedContainer(state: AppState): Container | null {
  const rows = visibleRows(state);
  const list = activeListState(state);
  if (rows.kind !== 'containers' || !list) return null;
  return selectedItem(rows.items, list);
}

/** Row counts for every list of every view, used to clamp after a refresh. */
export function allRowCounts(state: AppState): {
  containers: number;
  images: number;
  volumes: number;
  groups: number[];
  networks: number[];
  compose: number[];
} {
  const { views } = state;
  const tabs = (count: number, rowsFor: (tab: number, list: ListState) => Rows, lists: ListState[]) =>
    Array.from({ length: count }, (_, tab) => rowCount(rowsFor(tab, lists[tab] ?? initialListState)));

  return {
    containers: filterItems(state.resources.containers, views.containers.filter, containerText).length,
    images: filterItems(state.resources.images, views.images.filter, imageText).length,
    volumes: filterItems(state.resources.volumes, views.volumes.filter, volumeText).length,
    groups: tabs(views.groups.lists.length, (t, l) => groupRows(state, t, l), views.groups.lists),
    networks: tabs(views.networks.lists.length, (t, l) => networkRows(state, t, l), views.networks.lists),
    compose: tabs(views.compose.lists.length, (t, l) => composeRows(state, t, l), views.compose.lists),
  };
}
