import { Box, Text } from 'ink';
import type React from 'react';
import type { StatsState } from '../state/app-state';
import { formatBytes, formatPercent, sparkline } from '../utils/formatters';

interface StatsViewProps {
  stats: StatsState;
  width: number;
}

const LABEL = 10;

export const StatsView: React.FC<StatsViewProps> = ({ stats, width }) => {
  const latest = stats.samples[stats.samples.length - 1];
  const span = Math.max(10, width - LABEL - 12);
  const recent = stats.samples.slice(-span);

  if (!latest) {
    return (
      <Box flexDirection="column">
        <Text>
          <Text bold>Stats</Text> <Text color="cyan">{stats.name}</Text>
        </Text>
        <Text dimColor>{stats.subscription ? 'Waiting for the first sample…' : 'Connecting…'}</Text>
      </Box>
    );
  }

  // CPU can exceed 100% on multi-core hosts, so scale to the observed peak
  const cpuPeak = Math.max(100, ...recent.map((s) => s.cpuPercent));

  return (
    <Box flexDirection="column">
      <Text>
        <Text bold>Stats</Text> <Text color="cyan">{stats.name}</Text>
        <Text dimColor> • {stats.samples.length} samples • esc back</Text>
      </Text>
      <Box marginTop={1}>
        <Box width={LABEL}>
          <Text bold>CPU</Text>
        </Box>
        <Text color="green">{sparkline(recent.map((s) => s.cpuPercent), cpuPeak)}</Text>
        <Text> {formatPercent(latest.cpuPercent)}</Text>
      </Box>
      <Box>
        <Box width={LABEL}>
          <Text bold>Memory</Text>
        </Box>
        <Text color="magenta">{sparkline(recent.map((s) => s.memoryPercent), 100)}</Text>
        <Text>
          {' '}
          {formatPercent(latest.memoryPercent)} ({formatBytes(latest.memoryUsage)} / {formatBytes(latest.memoryLimit)})
        </Text>
      </Box>
      <Box marginTop={1}>
        <Box width={LABEL}>
          <Text bold>Network</Text>
        </Box>
        <Text>
          rx {formatBytes(latest.networkRx)} • tx {formatBytes(latest.networkTx)}
        </Text>
      </Box>
      <Box>
        <Box width={LABEL}>
          <Text bold>Block I/O</Text>
        </Box>
        <Text>
          read {formatBytes(latest.blockRead)} • write {formatBytes(latest.blockWrite)}
        </Text>
      </Box>
      <Box>
        <Box width={LABEL}>
          <Text bold>PIDs</Text>
        </Box>
        <Text>{latest.pids}</Text>
      </Box>
    </Box>
  );
};
