import type { HttpClient } from '../services/http-client';
import type { Volume } from '../types/domain';
import { volumeListSchema, volumePruneSchema } from './schemas';

export type PruneReport = {
  removed: string[];
  spaceReclaimed: number;
};

export async function listVolumes(http: HttpClient, signal?: AbortSignal): Promise<Volume[]> {
  const data = await http.get('/volumes', { signal });
  return volumeListSchema.parse(data).Volumes
    .map((raw) => ({
      name: raw.Name,
      driver: raw.Driver,
      mountpoint: raw.Mountpoint,
      created: raw.CreatedAt,
      scope: raw.Scope,
    }))
    .sort((a, b) => a.name.localeCompare(b.name));
}

export async function removeVolume(http: HttpClient, name: string, force: boolean, signal?: AbortSignal): Promise<void> {
  await http.delete(`/volumes/${encodeURIComponent(name)}`, { signal, query: { force: force ? 1 : 0 } });
}

export async function pruneVolumes(http: HttpClient, signal?: AbortSignal): Promise<PruneReport> {
  const data = await http.post('/volumes/prune', undefined, { signal });
  const parsed = volumePruneSchema.parse(data ?? {});
  return { removed: parsed.VolumesDeleted, spaceReclaimed: parsed.SpaceReclaimed };
}
