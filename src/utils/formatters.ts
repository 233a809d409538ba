/**
 * Pure formatting utility functions
 */

import type { ComposeStatus, ContainerState } from "../types/domain";

type Tone = { color?: "green" | "red" | "yellow" | "gray"; dimColor?: boolean };

/**
 * Get color styling for a container or compose project state
 */
export function colorFor(state: ContainerState | ComposeStatus | string): Tone {
  const v = (state || "").toLowerCase();
  if (v === "running") return { color: "green" };
  if (v === "exited" || v === "dead" || v === "stopped") return { color: "red" };
  if (v === "restarting" || v === "paused" || v === "partial" || v === "removing") return { color: "yellow" };
  if (v === "created") return { dimColor: true };
  return {};
}

/**
 * Convert ISO date or unix seconds to a "time since" string
 */
export function humanizeSince(when?: string | number, now: number = Date.now()): string {
  if (when === undefined || when === "") return "—";
  const t = typeof when === "number" ? when * 1000 : new Date(when).getTime();
  if (!Number.isFinite(t)) return "—";
  const s = Math.max(0, Math.floor((now - t) / 1000));
  if (s < 60) return `${s}s`;
  const m = Math.floor(s / 60);
  if (m < 60) return `${m}m`;
  const h = Math.floor(m / 60);
  if (h < 24) return `${h}h`;
  const d = Math.floor(h / 24);
  if (d < 30) return `${d}d`;
  const mo = Math.floor(d / 30);
  if (mo < 12) return `${mo}mo`;
  const y = Math.floor(mo / 12);
  return `${y}y`;
}

/** Docker's 12-character short id; strips a "sha256:" prefix. */
export function shortId(id?: string): string {
  return (id || "").replace(/^sha256:/, "").slice(0, 12);
}

/**
 * Format a byte count in human-readable form
 */
export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) return "0 B";
  const k = 1024;
  const sizes = ["B", "KB", "MB", "GB", "TB"];
  const i = Math.min(sizes.length - 1, Math.floor(Math.log(bytes) / Math.log(k)));
  return `${parseFloat((bytes / k ** i).toFixed(1))} ${sizes[i]}`;
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

const SPARKS = ["▁", "▂", "▃", "▄", "▅", "▆", "▇", "█"];

/**
 * Render values as a sparkline scaled to `max` (or the largest value).
 */
export function sparkline(values: readonly number[], max?: number): string {
  if (values.length === 0) return "";
  const top = max ?? Math.max(...values);
  if (top <= 0) return SPARKS[0].repeat(values.length);
  return values
    .map((v) => {
      const level = Math.round((Math.min(Math.max(v, 0), top) / top) * (SPARKS.length - 1));
      return SPARKS[level];
    })
    .join("");
}
