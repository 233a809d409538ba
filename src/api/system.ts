import type { HttpClient } from '../services/http-client';

export async function ping(http: HttpClient, signal?: AbortSignal): Promise<void> {
  const data = await http.get('/_ping', { signal });
  if (data !== 'OK') throw new Error(`unexpected ping response: ${String(data)}`);
}
