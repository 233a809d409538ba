import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { ResultAsync, errAsync, okAsync } from 'neverthrow';
import { z } from 'zod';
import type { Group } from '../types/domain';
import type { GroupStoreError } from '../types/errors';
import { errorMessage } from '../types/errors';
import { log } from './logger';

export const GROUP_COLORS = ['blue', 'green', 'yellow', 'magenta', 'cyan', 'red'] as const;
const FILE_VERSION = '1.0';

const groupSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().default(''),
  container_ids: z.array(z.string()).nullish().transform((v) => v ?? []),
  created: z.string(),
  modified: z.string(),
  color: z.string().default('blue'),
});

const fileSchema = z.object({
  version: z.string().default(FILE_VERSION),
  groups: z.array(groupSchema).nullish().transform((v) => v ?? []),
  last_modified: z.string().optional(),
});

type StoredGroup = z.infer<typeof groupSchema>;

function fromStored(g: StoredGroup): Group {
  return {
    id: g.id,
    name: g.name,
    description: g.description,
    containerIds: g.container_ids,
    created: g.created,
    modified: g.modified,
    color: g.color,
  };
}

export type GroupPatch = Partial<Pick<Group, 'name' | 'description' | 'color'>>;

const ioError = (error: unknown): GroupStoreError => ({ kind: 'io', message: errorMessage(error) });

/**
 * Container groups persisted as JSON. Every operation is a read-modify-write
 * under one lock and is on disk before its result resolves. Writes go to a
 * temp file, the previous file is kept as `.bak`, then the temp file is
 * renamed into place. Last writer wins.
 */
export class GroupStore {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    readonly filePath: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  list(): ResultAsync<Group[], GroupStoreError> {
    return this.locked(async () => (await this.read()).map(fromStored));
  }

  get(id: string): ResultAsync<Group, GroupStoreError> {
    return this.list().andThen((groups) => {
      const group = groups.find((g) => g.id === id);
      return group ? okAsync(group) : errAsync(notFound(id));
    });
  }

  create(name: string, description = ''): ResultAsync<Group, GroupStoreError> {
    const trimmed = name.trim();
    if (!trimmed) return errAsync({ kind: 'invalid', message: 'group name is required' });
    return this.mutate((groups) => {
      const stamp = this.now().toISOString();
      const group: StoredGroup = {
        id: randomUUID(),
        name: trimmed,
        description: description.trim(),
        container_ids: [],
        created: stamp,
        modified: stamp,
        color: GROUP_COLORS[groups.length % GROUP_COLORS.length],
      };
      return { groups: [...groups, group], value: fromStored(group) };
    });
  }

  update(id: string, patch: GroupPatch): ResultAsync<Group, GroupStoreError> {
    if (patch.name !== undefined && !patch.name.trim()) {
      return errAsync({ kind: 'invalid', message: 'group name is required' });
    }
    return this.modifyOne(id, (g) => ({
      ...g,
      ...(patch.name !== undefined && { name: patch.name.trim() }),
      ...(patch.description !== undefined && { description: patch.description }),
      ...(patch.color !== undefined && { color: patch.color }),
    }));
  }

  delete(id: string): ResultAsync<void, GroupStoreError> {
    return this.mutate((groups) => {
      if (!groups.some((g) => g.id === id)) throw notFound(id);
      return { groups: groups.filter((g) => g.id !== id), value: undefined };
    });
  }

  addMember(id: string, containerId: string): ResultAsync<Group, GroupStoreError> {
    return this.modifyOne(id, (g) =>
      g.container_ids.includes(containerId) ? g : { ...g, container_ids: [...g.container_ids, containerId] },
    );
  }

  removeMember(id: string, containerId: string): ResultAsync<Group, GroupStoreError> {
    return this.modifyOne(id, (g) => ({ ...g, container_ids: g.container_ids.filter((c) => c !== containerId) }));
  }

  /** Points every group at `newId` instead of `oldId`; returns how many groups changed. */
  replaceMember(oldId: string, newId: string): ResultAsync<number, GroupStoreError> {
    return this.mutate((groups) => {
      let changed = 0;
      const stamp = this.now().toISOString();
      const next = groups.map((g) => {
        if (!g.container_ids.includes(oldId)) return g;
        changed++;
        return { ...g, modified: stamp, container_ids: g.container_ids.map((c) => (c === oldId ? newId : c)) };
      });
      return { groups: next, value: changed };
    });
  }

  removeFromAll(containerId: string): ResultAsync<number, GroupStoreError> {
    return this.mutate((groups) => {
      let changed = 0;
      const stamp = this.now().toISOString();
      const next = groups.map((g) => {
        if (!g.container_ids.includes(containerId)) return g;
        changed++;
        return { ...g, modified: stamp, container_ids: g.container_ids.filter((c) => c !== containerId) };
      });
      return { groups: next, value: changed };
    });
  }

  private modifyOne(id: string, change: (g: StoredGroup) => StoredGroup): ResultAsync<Group, GroupStoreError> {
    return this.mutate((groups) => {
      const index = groups.findIndex((g) => g.id === id);
      if (index < 0) throw notFound(id);
      const before = groups[index];
      const after = change(before);
      const updated = after === before ? before : { ...after, modified: this.now().toISOString() };
      const next = groups.slice();
      next[index] = updated;
      return { groups: next, value: fromStored(updated) };
    });
  }

  private mutate<T>(change: (groups: StoredGroup[]) => { groups: StoredGroup[]; value: T }): ResultAsync<T, GroupStoreError> {
    return this.locked(async () => {
      const { groups, value } = change(await this.read());
      await this.write(groups);
      return value;
    });
  }

  // Serializes all store operations, including reads
  private locked<T>(work: () => Promise<T>): ResultAsync<T, GroupStoreError> {
    const run = this.tail.then(work, work);
    this.tail = run.catch(() => undefined);
    return ResultAsync.fromPromise(run, (error) => (isStoreError(error) ? error : ioError(error)));
  }

  private async read(): Promise<StoredGroup[]> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
      throw error;
    }
    if (!text.trim()) return [];
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw { kind: 'invalid', message: `${this.filePath} is not valid JSON: ${errorMessage(error)}` } satisfies GroupStoreError;
    }
    const parsed = fileSchema.safeParse(raw);
    if (!parsed.success) {
      throw { kind: 'invalid', message: `${this.filePath}: ${parsed.error.issues[0]?.message ?? 'invalid format'}` } satisfies GroupStoreError;
    }
    return parsed.data.groups;
  }

  private async write(groups: StoredGroup[]): Promise<void> {
    const body = JSON.stringify(
      { version: FILE_VERSION, groups, last_modified: this.now().toISOString() },
      null,
      2,
    );
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    await fs.writeFile(tmp, body, { mode: 0o644 });
    try {
      await fs.copyFile(this.filePath, `${this.filePath}.bak`);
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        log.warn('Could not back up group file', 'groups', { message: errorMessage(error) });
      }
    }
    await fs.rename(tmp, this.filePath);
    log.debug('Groups saved', 'groups', { count: groups.length, path: this.filePath });
  }
}

function notFound(id: string): GroupStoreError {
  return { kind: 'not_found', message: `group ${id} not found`, id };
}

function isStoreError(value: unknown): value is GroupStoreError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    (value.kind === 'not_found' || value.kind === 'invalid' || value.kind === 'io') &&
    'message' in value
  );
}
