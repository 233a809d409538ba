import type { HttpClient } from '../services/http-client';
import type { Image } from '../types/domain';
import { NdjsonDecoder, chunkBytes } from '../services/docker-streams';
import { imageListSchema, pullProgressSchema } from './schemas';

export async function listImages(http: HttpClient, signal?: AbortSignal): Promise<Image[]> {
  const data = await http.get('/images/json', { signal });
  return imageListSchema.parse(data).map((raw) => ({
    id: raw.Id,
    tags: raw.RepoTags.filter((t) => t !== '<none>:<none>'),
    size: raw.Size,
    created: raw.Created,
    containers: raw.Containers,
  }));
}

export async function removeImage(http: HttpClient, id: string, force: boolean, signal?: AbortSignal): Promise<void> {
  await http.delete(`/images/${encodeURIComponent(id)}`, { signal, query: { force: force ? 1 : 0 } });
}

/** Splits "repo:tag" (or "repo@digest"); the tag defaults to latest. */
export function parseImageRef(ref: string): { fromImage: string; tag: string } {
  const trimmed = ref.trim();
  if (trimmed.includes('@')) return { fromImage: trimmed, tag: '' };
  const slash = trimmed.lastIndexOf('/');
  const colon = trimmed.lastIndexOf(':');
  if (colon > slash) {
    return { fromImage: trimmed.slice(0, colon), tag: trimmed.slice(colon + 1) || 'latest' };
  }
  return { fromImage: trimmed, tag: 'latest' };
}

/**
 * Pulls an image and waits for the progress stream to finish. The daemon
 * reports pull failures inside the stream with a 200 status, so every line
 * is checked for an error.
 */
export async function pullImage(http: HttpClient, ref: string, signal?: AbortSignal): Promise<void> {
  const { fromImage, tag } = parseImageRef(ref);
  const stream = await http.stream('/images/create', {
    method: 'POST',
    signal,
    query: { fromImage, tag: tag || undefined },
  });
  const decoder = new NdjsonDecoder();
  const check = (values: unknown[]) => {
    for (const value of values) {
      const line = pullProgressSchema.safeParse(value);
      if (line.success && (line.data.error || line.data.errorDetail?.message)) {
        throw new Error(line.data.error ?? line.data.errorDetail?.message);
      }
    }
  };
  for await (const chunk of stream) {
    check(decoder.push(chunkBytes(chunk)));
  }
  check(decoder.end());
}
