import React from 'react';
import {Box, Text} from 'ink';

export type AboutProps = {
  version: string;
  dockerHost: string;
  logFile: string | null;
};

const Section: React.FC<{title: string; children: React.ReactNode}> = ({title, children}) => (
  <Box marginTop={1}>
    <Box width={24}>
      <Text color="green" bold>
        {title}
      </Text>
    </Box>
    <Box>
      <Text>{children}</Text>
    </Box>
  </Box>
);

const About: React.FC<AboutProps> = ({version, dockerHost, logFile}) => (
  <Box flexDirection="column" paddingX={2} paddingY={1}>
    <Box justifyContent="center">
      <Text color="magentaBright" bold>
        dockhand {version}
      </Text>
    </Box>
    <Section title="VIEWS">
      <Text color="cyan">1</Text> containers • <Text color="cyan">2</Text> images • <Text color="cyan">3</Text> groups • <Text color="cyan">4</Text> volumes • <Text color="cyan">5</Text> compose • <Text color="cyan">6</Text> networks • <Text color="cyan">7/?</Text> about
    </Section>
    <Section title="NAV">
      <Text color="cyan">j/k</Text> up/down • <Text color="cyan">g/G</Text> top/bottom • <Text color="cyan">tab</Text> next view • <Text color="cyan">[ ]</Text> tabs • <Text color="cyan">/</Text> filter • <Text color="cyan">enter</Text> drill down
    </Section>
    <Section title="CONTAINERS">
      <Text color="cyan">s</Text> start • <Text color="cyan">x</Text> stop • <Text color="cyan">r</Text> restart • <Text color="cyan">l</Text> logs • <Text color="cyan">t</Text> stats • <Text color="cyan">e</Text> shell • <Text color="cyan">v</Text> env • <Text color="cyan">d</Text> delete
    </Section>
    <Section title="RESOURCES">
      <Text color="cyan">p</Text> pull/prune • <Text color="cyan">n</Text> new group/network • <Text color="cyan">u</Text> remove from group/network • <Text color="cyan">d</Text> delete
    </Section>
    <Section title="ENV EDITOR">
      <Text color="cyan">a</Text> add • <Text color="cyan">enter</Text> edit • <Text color="cyan">d</Text> delete • <Text color="cyan">ctrl+s</Text> save and recreate
    </Section>
    <Section title="HOST">
      {dockerHost}
    </Section>
    {logFile && (
      <Section title="LOG FILE">
        {logFile}
      </Section>
    )}
    <Box marginTop={1}>
      <Text dimColor>Press Esc to go back • q to return to containers</Text>
    </Box>
  </Box>
);

export default About;
