import type { ComposeProject, ComposeService, ComposeStatus, Container } from "../types/domain";

export const COMPOSE_PROJECT_LABEL = "com.docker.compose.project";
export const COMPOSE_SERVICE_LABEL = "com.docker.compose.service";
export const COMPOSE_WORKDIR_LABEL = "com.docker.compose.project.working_dir";

function projectStatus(containers: readonly Container[]): ComposeStatus {
  const running = containers.filter((c) => c.state === "running").length;
  if (running === 0) return "stopped";
  return running === containers.length ? "running" : "partial";
}

/**
 * Groups containers into compose projects by their compose labels.
 * Containers without a project label are left out. Projects and services
 * are sorted by name.
 */
export function composeProjects(containers: readonly Container[]): ComposeProject[] {
  const byProject = new Map<string, { workingDir: string; services: Map<string, Container[]> }>();

  for (const c of containers) {
    const project = c.labels[COMPOSE_PROJECT_LABEL];
    if (!project) continue;
    const service = c.labels[COMPOSE_SERVICE_LABEL] || c.name;
    let entry = byProject.get(project);
    if (!entry) {
      entry = { workingDir: c.labels[COMPOSE_WORKDIR_LABEL] ?? "", services: new Map() };
      byProject.set(project, entry);
    }
    const members = entry.services.get(service) ?? [];
    members.push(c);
    entry.services.set(service, members);
  }

  return [...byProject.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, { workingDir, services }]) => {
      const list: ComposeService[] = [...services.entries()]
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([service, members]) => ({ name: service, containers: members }));
      const all = list.flatMap((s) => s.containers);
      return { name, workingDir, services: list, status: projectStatus(all) };
    });
}

export function projectContainers(project: ComposeProject): Container[] {
  return project.services.flatMap((s) => s.containers);
}
