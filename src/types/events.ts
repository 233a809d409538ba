import type { Key } from 'ink';
import type { PruneReport } from '../api/volumes';
import type { RecreateOutcome } from '../services/recreate-workflow';
import type { Subscription } from '../runtime/subscription';
import type { BatchError } from './errors';
import type {
  Container,
  ContainerSpec,
  Group,
  Image,
  LogRecord,
  Network,
  ResourceKind,
  StatsSample,
  Volume,
} from './domain';

/**
 * A normalized keystroke. `name` is the key ("up", "enter", "esc", "tab",
 * "backspace", ...) or the typed text; `id` adds modifiers, e.g. "ctrl+s",
 * "shift+tab".
 */
export type KeyStroke = {
  id: string;
  name: string;
  text: string;
  ctrl: boolean;
  shift: boolean;
};

type InkKey = Pick<Key, 'upArrow' | 'downArrow' | 'leftArrow' | 'rightArrow' | 'return' | 'escape' | 'ctrl' | 'shift' | 'tab' | 'backspace' | 'delete' | 'pageUp' | 'pageDown'>;

const NO_MODIFIERS: InkKey = {
  upArrow: false,
  downArrow: false,
  leftArrow: false,
  rightArrow: false,
  return: false,
  escape: false,
  ctrl: false,
  shift: false,
  tab: false,
  backspace: false,
  delete: false,
  pageUp: false,
  pageDown: false,
};

function keyName(input: string, key: InkKey): string {
  if (key.upArrow) return 'up';
  if (key.downArrow) return 'down';
  if (key.leftArrow) return 'left';
  if (key.rightArrow) return 'right';
  if (key.return) return 'enter';
  if (key.escape) return 'esc';
  if (key.tab) return 'tab';
  // Most terminals send DEL for the backspace key
  if (key.backspace || key.delete) return 'backspace';
  if (key.pageUp) return 'pageup';
  if (key.pageDown) return 'pagedown';
  return input;
}

export function toKeyStroke(input: string, key: Partial<InkKey> = {}): KeyStroke {
  const full: InkKey = { ...NO_MODIFIERS, ...key };
  const name = keyName(input, full);
  const shifted = full.shift && name === 'tab';
  const id = `${full.ctrl ? 'ctrl+' : ''}${shifted ? 'shift+' : ''}${name}`;
  const isText = name === input && !full.ctrl;
  return { id, name, text: isText ? input : '', ctrl: full.ctrl, shift: full.shift };
}

/** Parses "ctrl+s", "shift+tab", "esc", "q" ... into a stroke; used by tests and key maps. */
export function keyFromId(id: string): KeyStroke {
  const parts = id.split('+');
  const name = parts.pop() ?? id;
  const ctrl = parts.includes('ctrl');
  const special = ['up', 'down', 'left', 'right', 'enter', 'esc', 'tab', 'backspace', 'pageup', 'pagedown'];
  return {
    id,
    name,
    text: ctrl || special.includes(name) ? '' : name,
    ctrl,
    shift: parts.includes('shift'),
  };
}

export type LoadedData =
  | { kind: 'containers'; items: Container[] }
  | { kind: 'images'; items: Image[] }
  | { kind: 'networks'; items: Network[] }
  | { kind: 'volumes'; items: Volume[] }
  | { kind: 'groups'; items: Group[] };

export type BannerKind = 'status' | 'error';

export type AppEvent =
  | { type: 'key'; key: KeyStroke }
  | { type: 'resize'; cols: number; rows: number }
  | { type: 'tick' }
  | { type: 'banner-expired'; kind: BannerKind; at: number }
  | { type: 'loaded'; data: LoadedData }
  | { type: 'load-failed'; resource: ResourceKind; message: string }
  | { type: 'op-result'; ok: boolean; message: string; refresh: ResourceKind[] }
  | { type: 'batch-finished'; label: string; result: { ok: true; count: number } | { ok: false; error: BatchError } }
  | { type: 'volumes-pruned'; report: PruneReport }
  | { type: 'container-spec-loaded'; containerId: string; spec: ContainerSpec }
  | { type: 'container-spec-failed'; containerId: string; message: string }
  | { type: 'recreate-finished'; oldId: string; name: string; outcome: RecreateOutcome }
  | { type: 'logs-opened'; containerId: string; request: number; subscription: Subscription<LogRecord> }
  | { type: 'stats-opened'; containerId: string; subscription: Subscription<StatsSample> }
  | { type: 'log-line'; subscriptionId: number; record: LogRecord }
  | { type: 'stats-sample'; subscriptionId: number; sample: StatsSample }
  | { type: 'stream-error'; subscriptionId: number; stream: 'logs' | 'stats'; message: string }
  | { type: 'shell-exited'; name: string; exitCode: number | null; message?: string }
  | { type: 'command-failed'; message: string };
