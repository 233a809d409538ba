import { Box, Text } from "ink";
import type React from "react";
import { findGroup, findNetwork, findProject, findService, type Rows, volumeUsers } from "../../selectors/visible";
import { type AppState, TAB_TITLES, isTabbedView } from "../../state/app-state";
import type { ComposeProject, ComposeService, Container, EnvVar, Group, Image, Network, Volume } from "../../types/domain";
import { colorFor, formatBytes, humanizeSince, shortId } from "../../utils/formatters";
import { type Column, Table } from "../Table";

const containerColumns: Column<Container>[] = [
  { header: "NAME", render: (c) => c.name },
  { header: "IMAGE", render: (c) => c.image },
  { header: "STATE", width: 10, render: (c) => c.state, color: (c) => colorFor(c.state) },
  { header: "STATUS", width: 22, render: (c) => c.status },
  { header: "PORTS", width: 18, render: (c) => c.ports },
  { header: "ID", width: 12, render: (c) => shortId(c.id) },
];

const imageColumns: Column<Image>[] = [
  { header: "REPOSITORY:TAG", render: (i) => i.tags[0] ?? "<none>" },
  { header: "ID", width: 12, render: (i) => shortId(i.id) },
  { header: "SIZE", width: 10, render: (i) => formatBytes(i.size) },
  { header: "AGE", width: 6, render: (i) => humanizeSince(i.created) },
  { header: "USED", width: 5, render: (i) => (i.containers > 0 ? String(i.containers) : "") },
];

function volumeColumns(containers: Container[]): Column<Volume>[] {
  return [
    { header: "NAME", render: (v) => v.name },
    { header: "DRIVER", width: 10, render: (v) => v.driver },
    { header: "AGE", width: 6, render: (v) => humanizeSince(v.created) },
    {
      header: "IN USE BY",
      width: 24,
      render: (v) => volumeUsers(containers, v.name).map((c) => c.name).join(", "),
    },
  ];
}

const groupColumns: Column<Group>[] = [
  { header: "NAME", width: 20, render: (g) => g.name, color: (g) => ({ color: g.color }) },
  { header: "DESCRIPTION", render: (g) => g.description },
  { header: "MEMBERS", width: 8, render: (g) => String(g.containerIds.length) },
  { header: "MODIFIED", width: 9, render: (g) => humanizeSince(g.modified) },
];

const networkColumns: Column<Network>[] = [
  { header: "NAME", render: (n) => n.name },
  { header: "DRIVER", width: 10, render: (n) => n.driver },
  { header: "SCOPE", width: 7, render: (n) => n.scope },
  { header: "INTERNAL", width: 8, render: (n) => (n.internal ? "yes" : "") },
  { header: "ID", width: 12, render: (n) => shortId(n.id) },
];

const projectColumns: Column<ComposeProject>[] = [
  { header: "PROJECT", render: (p) => p.name },
  { header: "STATUS", width: 9, render: (p) => p.status, color: (p) => colorFor(p.status) },
  { header: "SERVICES", width: 8, render: (p) => String(p.services.length) },
  { header: "WORKING DIR", render: (p) => p.workingDir },
];

const serviceColumns: Column<ComposeService>[] = [
  { header: "SERVICE", render: (s) => s.name },
  {
    header: "RUNNING",
    width: 8,
    render: (s) => `${s.containers.filter((c) => c.state === "running").length}/${s.containers.length}`,
  },
];

const envColumns: Column<EnvVar>[] = [
  { header: "KEY", width: 28, render: (v) => v.key },
  { header: "VALUE", render: (v) => v.value },
];

function emptyText(state: AppState): string {
  const { view } = state;
  if (view === "groups" && state.views.groups.tab > 0 && !findGroup(state)) return "Select a group on the List tab first";
  if (view === "networks" && state.views.networks.tab > 0 && !findNetwork(state)) return "Select a network on the List tab first";
  if (view === "compose" && state.views.compose.tab === 1 && !findProject(state)) return "Select a project first";
  if (view === "compose" && state.views.compose.tab === 2 && !findService(state)) return "Select a service first";
  if (view === "env") return state.env?.spec ? "No variables" : state.env?.error ?? "Loading…";
  const kinds = ["containers", "images", "volumes", "networks", "groups"] as const;
  const kind = kinds.find((k) => k === view);
  if (kind && !state.resources.loaded.includes(kind)) return "Loading…";
  return "No items";
}

export const TabBar: React.FC<{ state: AppState }> = ({ state }) => {
  const view = state.view;
  if (!isTabbedView(view)) return null;
  const current = state.views[view].tab;
  const context =
    view === "groups" ? findGroup(state)?.name : view === "networks" ? findNetwork(state)?.name : findProject(state)?.name;
  return (
    <Box>
      {TAB_TITLES[view].map((title, i) => (
        <Text key={title} color={i === current ? "cyan" : undefined} bold={i === current} dimColor={i !== current}>
          {i === current ? `[${title}]` : ` ${title} `}{" "}
        </Text>
      ))}
      {context && <Text dimColor> • {context}</Text>}
    </Box>
  );
};

interface ResourceListProps {
  state: AppState;
  rows: Rows;
  selected: number;
  width: number;
  height: number;
}

export const ResourceList: React.FC<ResourceListProps> = ({ state, rows, selected, width, height }) => {
  const common = { selected, width, height, empty: emptyText(state) };
  switch (rows.kind) {
    case "containers":
      return <Table columns={containerColumns} items={rows.items} rowKey={(c) => c.id} {...common} />;
    case "images":
      return <Table columns={imageColumns} items={rows.items} rowKey={(i) => i.id} {...common} />;
    case "volumes":
      return <Table columns={volumeColumns(state.resources.containers)} items={rows.items} rowKey={(v) => v.name} {...common} />;
    case "groups":
      return <Table columns={groupColumns} items={rows.items} rowKey={(g) => g.id} {...common} />;
    case "networks":
      return <Table columns={networkColumns} items={rows.items} rowKey={(n) => n.id} {...common} />;
    case "projects":
      return <Table columns={projectColumns} items={rows.items} rowKey={(p) => p.name} {...common} />;
    case "services":
      return <Table columns={serviceColumns} items={rows.items} rowKey={(s) => s.name} {...common} />;
    case "env":
      return <Table columns={envColumns} items={rows.items} rowKey={(_, i) => String(i)} {...common} />;
    case "none":
      return null;
  }
};
