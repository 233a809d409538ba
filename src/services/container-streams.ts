import type { Readable } from 'node:stream';
import { openSubscription, type Emit, type Subscription } from '../runtime/subscription';
import type { LogRecord, StatsSample } from '../types/domain';
import { LogDecoder, NdjsonDecoder, chunkBytes, rawStatsSchema, toStatsSample } from './docker-streams';
import type { LogStreamRequest, ResourceClient } from './docker-client';

// Buffered records per stream before the producer waits on the UI
const LOG_CAPACITY = 256;
const STATS_CAPACITY = 4;

async function pump(stream: Readable, signal: AbortSignal, onChunk: (chunk: Buffer | string) => Promise<boolean>): Promise<void> {
  const onAbort = () => stream.destroy();
  signal.addEventListener('abort', onAbort, { once: true });
  try {
    for await (const chunk of stream) {
      if (signal.aborted) return;
      if (!(await onChunk(chunkBytes(chunk)))) return;
    }
  } finally {
    signal.removeEventListener('abort', onAbort);
    stream.destroy();
  }
}

async function emitAll<T>(emit: Emit<T>, values: T[]): Promise<boolean> {
  for (const value of values) {
    if (!(await emit(value))) return false;
  }
  return true;
}

export function openLogSubscription(
  client: ResourceClient,
  containerId: string,
  request: LogStreamRequest,
  parent: AbortSignal,
): Subscription<LogRecord> {
  return openSubscription<LogRecord>(async (emit, signal) => {
    const opened = await client.openLogStream(containerId, request, signal);
    if (opened.isErr()) throw new Error(opened.error.message);

    const decoder = new LogDecoder();
    await pump(opened.value, signal, (chunk) => emitAll(emit, decoder.push(chunk)));
    if (!signal.aborted) await emitAll(emit, decoder.end());
  }, { capacity: LOG_CAPACITY, signal: parent, label: `logs:${containerId.slice(0, 12)}` });
}

export function openStatsSubscription(
  client: ResourceClient,
  containerId: string,
  parent: AbortSignal,
): Subscription<StatsSample> {
  return openSubscription<StatsSample>(async (emit, signal) => {
    const opened = await client.openStatsStream(containerId, signal);
    if (opened.isErr()) throw new Error(opened.error.message);

    const decoder = new NdjsonDecoder();
    const toSamples = (values: unknown[]) => values.map((v) => toStatsSample(rawStatsSchema.parse(v)));
    await pump(opened.value, signal, (chunk) => emitAll(emit, toSamples(decoder.push(chunk))));
    if (!signal.aborted) await emitAll(emit, toSamples(decoder.end()));
  }, { capacity: STATS_CAPACITY, signal: parent, label: `stats:${containerId.slice(0, 12)}` });
}
