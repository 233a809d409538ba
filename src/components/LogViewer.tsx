import { Box, Text } from 'ink';
import type React from 'react';
import type { LogsState } from '../state/app-state';
import { fit } from './Table';

interface LogViewerProps {
  logs: LogsState;
  width: number;
  height: number;
}

/**
 * The newest lines of a container's log, or an older window when scrolled up.
 * stderr lines are red.
 */
export default function LogViewer({ logs, width, height }: LogViewerProps) {
  const rows = Math.max(1, height - 1);
  const end = logs.lines.length - logs.scroll;
  const start = Math.max(0, end - rows);
  const visible = logs.lines.slice(start, end);
  const state = logs.follow ? (logs.subscription ? 'following' : 'ended') : 'paused';

  return (
    <Box flexDirection="column">
      <Text>
        <Text bold>Logs</Text> <Text color="cyan">{logs.name}</Text>{' '}
        <Text color={state === 'following' ? 'green' : 'yellow'}>[{state}]</Text>
        {logs.scroll > 0 && <Text dimColor> ↑{logs.scroll}</Text>}
        <Text dimColor> • f follow • c clear • esc back</Text>
      </Text>
      {visible.length === 0 ? (
        <Text dimColor>Waiting for output…</Text>
      ) : (
        visible.map((record, i) => (
          <Text key={start + i} color={record.stream === 'stderr' ? 'red' : undefined}>
            {fit(record.line.replace(/\t/g, '  '), width)}
          </Text>
        ))
      )}
    </Box>
  );
}
