import React from 'react';
import { Box, Text, useInput, useStdout } from 'ink';
import { log } from '../services/logger';

interface ErrorBoundaryState {
  error: Error | null;
}

interface ErrorBoundaryProps {
  children: React.ReactNode;
  /** Called when the user chooses to leave the crash screen. */
  onExit: () => void;
  logFile?: string | null;
}

export class ErrorBoundary extends React.Component<ErrorBoundaryProps, ErrorBoundaryState> {
  constructor(props: ErrorBoundaryProps) {
    super(props);
    this.state = { error: null };
  }

  static getDerivedStateFromError(error: Error): Partial<ErrorBoundaryState> {
    return { error };
  }

  componentDidCatch(error: Error, errorInfo: React.ErrorInfo) {
    log.error('Render crashed', 'main', {
      message: error.message,
      stack: error.stack,
      componentStack: errorInfo.componentStack,
    });
  }

  render() {
    if (this.state.error) {
      return <ErrorDisplay error={this.state.error} logFile={this.props.logFile ?? null} onExit={this.props.onExit} />;
    }

    return this.props.children;
  }
}

function ErrorDisplay({ error, logFile, onExit }: { error: Error; logFile: string | null; onExit: () => void }) {
  const { stdout } = useStdout();
  const termRows = stdout.rows || 24;

  useInput((input, key) => {
    if (key.escape || key.return || input === 'q' || input === 'Q') {
      onExit();
    }
  });

  return (
    <Box flexDirection="column" height={termRows - 1}>
      <Box
        flexDirection="column"
        borderStyle="round"
        borderColor="red"
        paddingX={2}
        paddingY={1}
        flexGrow={1}
      >
        <Box justifyContent="center" marginBottom={1}>
          <Text color="red" bold>Application Error</Text>
        </Box>

        <Box flexDirection="column" marginBottom={1}>
          <Text color="red">Something went wrong while drawing the screen:</Text>
          <Text wrap="wrap">{error.message}</Text>
        </Box>

        {error.stack && (
          <Box flexDirection="column" marginBottom={1}>
            <Text color="gray" dimColor>Stack trace:</Text>
            <Text wrap="truncate-end" dimColor>{error.stack}</Text>
          </Box>
        )}

        {logFile && (
          <Box flexDirection="column">
            <Text dimColor>Details were written to {logFile}</Text>
          </Box>
        )}
      </Box>

      <Box paddingX={1} marginTop={1}>
        <Text color="cyan">Q/Esc/Enter</Text>
        <Text dimColor> to exit</Text>
      </Box>
    </Box>
  );
}
