import { after } from '../runtime/command';
import { activeListState, allRowCounts, projects, rowCount, visibleRows } from '../selectors/visible';
import {
  type AppState,
  type ListView,
  type TabbedView,
  type ViewStates,
  isListView,
  isTabbedView,
} from '../state/app-state';
import { type ListAction, type ListState, listReducer } from '../state/list-reducer';
import { type TabbedViewState, tabsReducer } from '../state/tabs-reducer';
import { BANNER_TTL, uiReducer } from '../state/ui-reducer';
import type { ResourceKind, View } from '../types/domain';
import { MAIN_VIEWS } from '../types/domain';
import type { AppEvent, BannerKind } from '../types/events';
import { cancelStream, type Effects } from './effects';
import type { AppReduction, CommandContext } from './types';

type AppCommand = AppReduction[1][number];

/** Shows a banner and schedules its expiry. */
export function banner(
  state: AppState,
  kind: BannerKind,
  message: string,
  context: Pick<CommandContext, 'now'>,
): AppReduction {
  const expiresAt = context.now() + BANNER_TTL[kind];
  const ui = uiReducer(state.ui, { type: 'SET_BANNER', payload: { kind, message, expiresAt } });
  return [{ ...state, ui }, [after<AppEvent>(BANNER_TTL[kind], { type: 'banner-expired', kind, at: expiresAt })]];
}

export function withList(views: ViewStates, view: ListView, list: ListState): ViewStates {
  switch (view) {
    case 'containers':
      return { ...views, containers: list };
    case 'images':
      return { ...views, images: list };
    case 'volumes':
      return { ...views, volumes: list };
  }
}

export function withTabs(views: ViewStates, view: TabbedView, tabs: TabbedViewState): ViewStates {
  switch (view) {
    case 'groups':
      return { ...views, groups: tabs };
    case 'networks':
      return { ...views, networks: tabs };
    case 'compose':
      return { ...views, compose: tabs };
  }
}

/** Applies a list action to whichever list owns the cursor in the active view. */
export function updateActiveList(state: AppState, action: ListAction): AppState {
  const { view, views } = state;
  if (isListView(view)) {
    const next = listReducer(views[view], action);
    return next === views[view] ? state : { ...state, views: withList(views, view, next) };
  }
  if (isTabbedView(view)) {
    const current = views[view];
    const next = tabsReducer(current, { type: 'LIST', payload: { tab: current.tab, action } });
    return next === current ? state : { ...state, views: withTabs(views, view, next) };
  }
  if (view === 'env' && state.env) {
    const list = listReducer(state.env.list, action);
    return list === state.env.list ? state : { ...state, env: { ...state.env, list } };
  }
  return state;
}

export function moveSelection(state: AppState, delta: number): AppState {
  return updateActiveList(state, { type: 'MOVE', payload: { delta, count: rowCount(visibleRows(state)) } });
}

export function jumpSelection(state: AppState, to: 'top' | 'bottom'): AppState {
  return updateActiveList(state, { type: 'JUMP', payload: { to, count: rowCount(visibleRows(state)) } });
}

export function isFiltering(state: AppState): boolean {
  return activeListState(state)?.filtering ?? false;
}

/** Resources a view shows, refreshed on entry and on every tick. */
export function resourcesFor(view: View): ResourceKind[] {
  switch (view) {
    case 'containers':
    case 'compose':
      return ['containers'];
    case 'images':
      return ['images'];
    case 'volumes':
      return ['volumes', 'containers'];
    case 'groups':
      return ['groups', 'containers'];
    case 'networks':
      return ['networks', 'containers'];
    default:
      return [];
  }
}

export function loadAll(effects: Effects, kinds: readonly ResourceKind[]): AppCommand[] {
  return kinds.map((kind) => effects.load(kind));
}

/** Cancels the detail-view subscriptions and drops their state. */
export function teardownDetail(state: AppState): AppReduction {
  const commands: AppCommand[] = [];
  if (state.logs?.subscription) commands.push(cancelStream(state.logs.subscription));
  if (state.stats?.subscription) commands.push(cancelStream(state.stats.subscription));
  if (!state.logs && !state.stats && !state.env) return [state, commands];
  return [{ ...state, logs: null, stats: null, env: null }, commands];
}

/** Switches to another view, tearing down streams owned by the one being left. */
export function switchView(state: AppState, view: View, effects: Effects): AppReduction {
  if (state.view === view) return [state, []];
  const leaving = state.view;
  const [torn, commands]: AppReduction = view === 'logs' || view === 'stats' || view === 'env' ? [state, []] : teardownDetail(state);
  const previousView = MAIN_VIEWS.find((v) => v === leaving && v !== 'about') ?? state.previousView;
  return [{ ...torn, view, previousView }, [...commands, ...loadAll(effects, resourcesFor(view))]];
}

export function cycleMainView(state: AppState, delta: number, effects: Effects): AppReduction {
  const index = MAIN_VIEWS.findIndex((v) => v === state.view);
  const from = index < 0 ? 0 : index;
  const next = MAIN_VIEWS[(((from + delta) % MAIN_VIEWS.length) + MAIN_VIEWS.length) % MAIN_VIEWS.length];
  return switchView(state, next ?? 'containers', effects);
}

/**
 * Re-resolves drill-down parents by key after data changed and clamps every
 * list to its row count.
 */
export function reconcile(state: AppState): AppState {
  const { resources } = state;
  let views = state.views;

  const groups = tabsReducer(views.groups, { type: 'RESOLVE_PARENT', payload: resources.groups.map((g) => g.id) });
  const networks = tabsReducer(views.networks, { type: 'RESOLVE_PARENT', payload: resources.networks.map((n) => n.id) });
  const composeProjects = projects(state);
  let compose = tabsReducer(views.compose, { type: 'RESOLVE_PARENT', payload: composeProjects.map((p) => p.name) });
  const project = composeProjects.find((p) => p.name === compose.parent);
  compose = tabsReducer(compose, { type: 'RESOLVE_CHILD', payload: project ? project.services.map((s) => s.name) : [] });
  if (groups !== views.groups || networks !== views.networks || compose !== views.compose) {
    views = { ...views, groups, networks, compose };
  }

  const resolved = views === state.views ? state : { ...state, views };
  const counts = allRowCounts(resolved);
  const clamp = (count: number): ListAction => ({ type: 'CLAMP', payload: { count } });
  const clampTabs = (tabbed: TabbedViewState, tabCounts: number[]) =>
    tabCounts.reduce((acc, count, tab) => tabsReducer(acc, { type: 'LIST', payload: { tab, action: clamp(count) } }), tabbed);

  const next: ViewStates = {
    containers: listReducer(views.containers, clamp(counts.containers)),
    images: listReducer(views.images, clamp(counts.images)),
    volumes: listReducer(views.volumes, clamp(counts.volumes)),
    groups: clampTabs(views.groups, counts.groups),
    networks: clampTabs(views.networks, counts.networks),
    compose: clampTabs(views.compose, counts.compose),
  };
  const unchanged =
    next.containers === views.containers &&
    next.images === views.images &&
    next.volumes === views.volumes &&
    next.groups === views.groups &&
    next.networks === views.networks &&
    next.compose === views.compose;
  return unchanged ? resolved : { ...resolved, views: next };
}
