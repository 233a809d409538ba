import type { HttpClient } from '../services/http-client';
import type { Network } from '../types/domain';
import { networkCreateSchema, networkListSchema } from './schemas';

export async function listNetworks(http: HttpClient, signal?: AbortSignal): Promise<Network[]> {
  const data = await http.get('/networks', { signal });
  return networkListSchema.parse(data)
    .map((raw) => ({
      id: raw.Id,
      name: raw.Name,
      driver: raw.Driver,
      scope: raw.Scope,
      internal: raw.Internal,
      created: raw.Created,
    }))
    .sort((a, b) => a.name.localeCompare(b.name));
}

export async function createNetwork(http: HttpClient, name: string, driver: string, signal?: AbortSignal): Promise<string> {
  const data = await http.post('/networks/create', {
    Name: name,
    Driver: driver || 'bridge',
    CheckDuplicate: true,
  }, { signal });
  return networkCreateSchema.parse(data).Id;
}

export async function removeNetwork(http: HttpClient, id: string, signal?: AbortSignal): Promise<void> {
  await http.delete(`/networks/${encodeURIComponent(id)}`, { signal });
}

export async function connectNetwork(
  http: HttpClient,
  network: string,
  containerId: string,
  aliases: string[] = [],
  signal?: AbortSignal,
): Promise<void> {
  await http.post(`/networks/${encodeURIComponent(network)}/connect`, {
    Container: containerId,
    EndpointConfig: aliases.length ? { Aliases: aliases } : undefined,
  }, { signal });
}

export async function disconnectNetwork(http: HttpClient, network: string, containerId: string, signal?: AbortSignal): Promise<void> {
  await http.post(`/networks/${encodeURIComponent(network)}/disconnect`, {
    Container: containerId,
    Force: false,
  }, { signal });
}
