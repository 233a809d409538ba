import { Box, Text } from "ink";
import type React from "react";
import stringWidth from "string-width";

export type Column<T> = {
  header: string;
  /** Fixed width; the first column without one takes the remaining space. */
  width?: number;
  render: (item: T) => string;
  color?: (item: T) => { color?: string; dimColor?: boolean };
};

/** Pads or cuts `text` to exactly `width` terminal cells. */
export function fit(text: string, width: number): string {
  if (width <= 0) return "";
  const full = stringWidth(text);
  if (full <= width) return text + " ".repeat(width - full);
  let out = "";
  let used = 0;
  for (const ch of text) {
    const w = stringWidth(ch);
    if (used + w > width - 1) break;
    out += ch;
    used += w;
  }
  return `${out}…${" ".repeat(width - used - 1)}`;
}

function widths<T>(columns: Column<T>[], total: number): number[] {
  const fixed = columns.reduce((sum, c) => sum + (c.width ?? 0), 0);
  const gaps = columns.length - 1;
  const flexible = columns.filter((c) => c.width === undefined).length;
  const rest = Math.max(8, total - fixed - gaps);
  return columns.map((c) => c.width ?? Math.floor(rest / Math.max(1, flexible)));
}

interface TableProps<T> {
  columns: Column<T>[];
  items: T[];
  selected: number;
  width: number;
  height: number;
  rowKey: (item: T, index: number) => string;
  empty?: string;
}

/**
 * Fixed-width table with a highlighted cursor row. Scrolls to keep the cursor
 * in view.
 */
export function Table<T>({ columns, items, selected, width, height, rowKey, empty }: TableProps<T>): React.ReactElement {
  const sizes = widths(columns, width);
  const bodyRows = Math.max(1, height - 1);
  const start = Math.min(Math.max(0, selected - bodyRows + 1), Math.max(0, items.length - bodyRows));
  const page = items.slice(start, start + bodyRows);

  return (
    <Box flexDirection="column">
      <Text bold>{columns.map((c, i) => fit(c.header, sizes[i] ?? 0)).join(" ")}</Text>
      {items.length === 0 ? (
        <Text dimColor>{empty ?? "No items"}</Text>
      ) : (
        page.map((item, i) => {
          const active = start + i === selected;
          return (
            <Box key={rowKey(item, start + i)}>
              {columns.map((c, col) => {
                const tone = active ? {} : (c.color?.(item) ?? {});
                const gap = col < columns.length - 1 ? " " : "";
                return (
                  <Text key={c.header} inverse={active} {...tone}>
                    {fit(c.render(item), sizes[col] ?? 0)}
                    {gap}
                  </Text>
                );
              })}
            </Box>
          );
        })
      )}
    </Box>
  );
}
