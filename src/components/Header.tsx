import { Box, Text } from "ink";
import chalk from "chalk";
import type React from "react";
import type { Resources } from "../state/app-state";

interface HeaderProps {
  dockerHost: string;
  version: string;
  resources: Resources;
  termCols: number;
}

const Header: React.FC<HeaderProps> = ({ dockerHost, version, resources, termCols }) => {
  const running = resources.containers.filter((c) => c.state === "running").length;
  const summary = `${running}/${resources.containers.length} running • ${resources.images.length} images • ${resources.volumes.length} volumes`;

  // Narrow terminals get the title and host only
  if (termCols <= 80) {
    return (
      <Box>
        <Text>
          {chalk.bgCyan.white.bold(" dockhand ")} <Text color="cyan">{dockerHost}</Text>
        </Text>
      </Box>
    );
  }

  return (
    <Box justifyContent="space-between">
      <Text>
        {chalk.bgCyan.white.bold(" dockhand ")} {chalk.dim(version)} <Text bold>Host:</Text>{" "}
        <Text color="cyan">{dockerHost}</Text>
      </Text>
      <Text dimColor>{summary}</Text>
    </Box>
  );
};

export default Header;
