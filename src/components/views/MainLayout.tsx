import { Box, Text } from "ink";
import type React from "react";
import { useMemo } from "react";
import { useAppState } from "../../contexts/AppStateContext";
import { activeListState, rowCount, visibleRows } from "../../selectors/visible";
import { isTabbedView } from "../../state/app-state";
import { MAIN_VIEWS } from "../../types/domain";
import About from "../About";
import Header from "../Header";
import LogViewer from "../LogViewer";
import { Modal } from "../Modal";
import { StatsView } from "../StatsView";
import { FilterBar } from "./FilterBar";
import { ResourceList, TabBar } from "./ResourceList";

interface MainLayoutProps {
  dockerHost: string;
  version: string;
  logFile: string | null;
}

const VIEW_TITLES = {
  containers: "Containers",
  images: "Images",
  groups: "Groups",
  volumes: "Volumes",
  compose: "Compose",
  networks: "Networks",
  about: "About",
} as const;

export const MainLayout: React.FC<MainLayoutProps> = ({ dockerHost, version, logFile }) => {
  const { state } = useAppState();
  const { view, ui, modal } = state;

  const rows = useMemo(() => visibleRows(state), [state]);
  const list = activeListState(state);
  const total = rowCount(rows);

  // Height calculations
  const HEADER_LINES = 1;
  const VIEW_LINE = 1;
  const TAB_LINE = isTabbedView(view) ? 1 : 0;
  const FILTER_LINE = list && (list.filtering || list.filter) ? 1 : 0;
  const ENV_LINE = view === "env" ? 1 : 0;
  const BORDER_LINES = 2;
  const STATUS_LINES = 1;
  const MODAL_LINES = modal ? (modal.kind === "confirm" ? 5 : modal.fields.length + 4 + (modal.error ? 1 : 0)) : 0;
  const OVERHEAD =
    HEADER_LINES + VIEW_LINE + TAB_LINE + FILTER_LINE + ENV_LINE + BORDER_LINES + STATUS_LINES + MODAL_LINES;
  const bodyRows = Math.max(2, ui.rows - OVERHEAD);
  const bodyCols = Math.max(20, ui.cols - 6);

  let body: React.ReactNode;
  if (view === "about") {
    body = <About version={version} dockerHost={dockerHost} logFile={logFile} />;
  } else if (view === "logs" && state.logs) {
    body = <LogViewer logs={state.logs} width={bodyCols} height={bodyRows} />;
  } else if (view === "stats" && state.stats) {
    body = <StatsView stats={state.stats} width={bodyCols} />;
  } else {
    body = <ResourceList state={state} rows={rows} selected={list?.selected ?? 0} width={bodyCols} height={bodyRows} />;
  }

  const banner = ui.error ? (
    <Text color="red">{ui.error.message}</Text>
  ) : ui.status ? (
    <Text color="green">{ui.status.message}</Text>
  ) : (
    <Text dimColor>? help • q quit</Text>
  );

  return (
    <Box flexDirection="column" paddingX={1} height={ui.rows - 1}>
      <Header dockerHost={dockerHost} version={version} resources={state.resources} termCols={ui.cols} />

      <Box>
        {MAIN_VIEWS.map((v, i) => (
          <Text key={v} color={v === view ? "cyan" : undefined} bold={v === view} dimColor={v !== view}>
            {i + 1}:{VIEW_TITLES[v]}{"  "}
          </Text>
        ))}
      </Box>

      <TabBar state={state} />
      <FilterBar list={list} />

      {view === "env" && state.env && (
        <Text>
          <Text bold>Env</Text> <Text color="cyan">{state.env.name}</Text>
          {state.env.dirty && <Text color="yellow"> [modified]</Text>}
          {state.env.saving && <Text color="magenta"> [saving…]</Text>}
          <Text dimColor> • a add • enter edit • d delete • ctrl+s save • esc back</Text>
        </Text>
      )}

      <Box
        flexDirection="column"
        flexGrow={1}
        borderStyle="round"
        borderColor="magenta"
        paddingX={1}
        flexWrap="nowrap"
      >
        {body}
      </Box>

      {modal && <Modal modal={modal} />}

      {/* Status line outside the main box */}
      <Box justifyContent="space-between">
        <Box>{banner}</Box>
        <Box>
          <Text dimColor>
            {list ? `${total ? list.selected + 1 : 0}/${total}` : `<${view}>`}
          </Text>
        </Box>
      </Box>
    </Box>
  );
};
