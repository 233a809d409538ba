import { StringDecoder } from 'node:string_decoder';
import { z } from 'zod';
import type { LogRecord, StatsSample } from '../types/domain';

const HEADER_SIZE = 8;

export function chunkBytes(chunk: unknown): Buffer | string {
  if (typeof chunk === 'string' || Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  return String(chunk);
}

/**
 * Decodes a container log stream into lines.
 *
 * Containers without a TTY send multiplexed frames: one byte for the stream
 * (1 stdout, 2 stderr), three zero bytes, then a big-endian uint32 payload
 * length. TTY containers send raw text. The format is detected from the
 * first bytes received.
 */
export class LogDecoder {
  private mode: 'unknown' | 'multiplexed' | 'raw' = 'unknown';
  private pending: Buffer = Buffer.alloc(0);
  private partial: Record<LogRecord['stream'], string> = { stdout: '', stderr: '' };
  // One decoder per stream: a character may be split across chunks or frames
  private text: Record<LogRecord['stream'], StringDecoder> = {
    stdout: new StringDecoder('utf8'),
    stderr: new StringDecoder('utf8'),
  };

  push(chunk: Buffer | string): LogRecord[] {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    this.pending = this.pending.length ? Buffer.concat([this.pending, bytes]) : bytes;

    if (this.mode === 'unknown') {
      if (this.pending.length < 4) return [];
      this.mode = looksMultiplexed(this.pending) ? 'multiplexed' : 'raw';
    }

    if (this.mode === 'raw') {
      const text = this.text.stdout.write(this.pending);
      this.pending = Buffer.alloc(0);
      return this.splitLines('stdout', text);
    }

    const records: LogRecord[] = [];
    while (this.pending.length >= HEADER_SIZE) {
      const size = this.pending.readUInt32BE(4);
      if (this.pending.length < HEADER_SIZE + size) break;
      const stream: LogRecord['stream'] = this.pending[0] === 2 ? 'stderr' : 'stdout';
      const payload = this.text[stream].write(this.pending.subarray(HEADER_SIZE, HEADER_SIZE + size));
      this.pending = this.pending.subarray(HEADER_SIZE + size);
      records.push(...this.splitLines(stream, payload));
    }
    return records;
  }

  /** Flush whatever is left once the stream has ended. */
  end(): LogRecord[] {
    const records: LogRecord[] = [];
    if (this.pending.length) {
      // Too few bytes ever arrived to tell the format apart: treat as raw text
      if (this.mode !== 'multiplexed') records.push(...this.splitLines('stdout', this.text.stdout.write(this.pending)));
      this.pending = Buffer.alloc(0);
    }
    for (const stream of ['stdout', 'stderr'] as const) {
      const rest = this.text[stream].end();
      if (rest) records.push(...this.splitLines(stream, rest));
      if (this.partial[stream]) {
        records.push({ stream, line: this.partial[stream] });
        this.partial[stream] = '';
      }
    }
    return records;
  }

  private splitLines(stream: LogRecord['stream'], text: string): LogRecord[] {
    const parts = (this.partial[stream] + text).split('\n');
    this.partial[stream] = parts.pop() ?? '';
    return parts.map((line) => ({ stream, line: line.replace(/\r$/, '') }));
  }
}

function looksMultiplexed(buf: Buffer): boolean {
  return buf[0] <= 2 && buf[1] === 0 && buf[2] === 0 && buf[3] === 0;
}

/** Splits newline-delimited JSON into parsed values. */
export class NdjsonDecoder {
  private buffer = '';
  private readonly text = new StringDecoder('utf8');

  push(chunk: Buffer | string): unknown[] {
    this.buffer += typeof chunk === 'string' ? chunk : this.text.write(chunk);
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';
    return lines.map((l) => l.trim()).filter(Boolean).map((l) => JSON.parse(l));
  }

  end(): unknown[] {
    const rest = (this.buffer + this.text.end()).trim();
    this.buffer = '';
    return rest ? [JSON.parse(rest)] : [];
  }
}

const cpuStatsSchema = z.object({
  cpu_usage: z.object({
    total_usage: z.number().default(0),
    percpu_usage: z.array(z.number()).nullish(),
  }).default({}),
  system_cpu_usage: z.number().default(0),
  online_cpus: z.number().default(0),
}).default({});

export const rawStatsSchema = z.object({
  read: z.string().optional(),
  cpu_stats: cpuStatsSchema,
  precpu_stats: cpuStatsSchema,
  memory_stats: z.object({
    usage: z.number().default(0),
    limit: z.number().default(0),
    stats: z.record(z.number()).default({}),
  }).default({}),
  networks: z.record(z.object({ rx_bytes: z.number().default(0), tx_bytes: z.number().default(0) })).nullish(),
  blkio_stats: z.object({
    io_service_bytes_recursive: z.array(z.object({ op: z.string(), value: z.number() })).nullish(),
  }).default({}),
  pids_stats: z.object({ current: z.number().default(0) }).default({}),
});

export type RawStats = z.infer<typeof rawStatsSchema>;

export function cpuPercent(raw: RawStats): number {
  const cpuDelta = raw.cpu_stats.cpu_usage.total_usage - raw.precpu_stats.cpu_usage.total_usage;
  const systemDelta = raw.cpu_stats.system_cpu_usage - raw.precpu_stats.system_cpu_usage;
  if (cpuDelta <= 0 || systemDelta <= 0) return 0;
  const cpus = raw.cpu_stats.online_cpus || raw.cpu_stats.cpu_usage.percpu_usage?.length || 1;
  return (cpuDelta / systemDelta) * cpus * 100;
}

export function toStatsSample(raw: RawStats, now: Date = new Date()): StatsSample {
  const cache = raw.memory_stats.stats.inactive_file ?? raw.memory_stats.stats.cache ?? 0;
  const memoryUsage = Math.max(0, raw.memory_stats.usage - cache);
  const memoryLimit = raw.memory_stats.limit;

  let networkRx = 0;
  let networkTx = 0;
  for (const net of Object.values(raw.networks ?? {})) {
    networkRx += net.rx_bytes;
    networkTx += net.tx_bytes;
  }

  let blockRead = 0;
  let blockWrite = 0;
  for (const entry of raw.blkio_stats.io_service_bytes_recursive ?? []) {
    const op = entry.op.toLowerCase();
    if (op === 'read') blockRead += entry.value;
    else if (op === 'write') blockWrite += entry.value;
  }

  return {
    cpuPercent: cpuPercent(raw),
    memoryUsage,
    memoryLimit,
    memoryPercent: memoryLimit > 0 ? (memoryUsage / memoryLimit) * 100 : 0,
    networkRx,
    networkTx,
    blockRead,
    blockWrite,
    pids: raw.pids_stats.current,
    at: now.toISOString(),
  };
}
