import { describe, expect, it } from "vitest";
import { COMPOSE_PROJECT_LABEL, COMPOSE_SERVICE_LABEL, composeProjects, projectContainers } from "../../utils/compose";
import { createContainer } from "../test-utils";

function member(id: string, project: string, service: string, state: "running" | "exited" = "running") {
  return createContainer({
    id,
    name: `${project}-${service}-${id}`,
    state,
    labels: { [COMPOSE_PROJECT_LABEL]: project, [COMPOSE_SERVICE_LABEL]: service },
  });
}

describe("composeProjects", () => {
  it("groups labelled containers by project and service, sorted by name", () => {
    const projects = composeProjects([
      member("3", "shop", "web"),
      member("1", "blog", "db", "exited"),
      member("2", "shop", "api"),
      member("4", "shop", "web", "exited"),
      createContainer({ id: "5", name: "loose" }),
    ]);

    expect(projects.map((p) => p.name)).toEqual(["blog", "shop"]);
    const shop = projects[1];
    expect(shop.services.map((s) => [s.name, s.containers.map((c) => c.id)])).toEqual([
      ["api", ["2"]],
      ["web", ["3", "4"]],
    ]);
    expect(shop.status).toBe("partial");
    expect(projects[0].status).toBe("stopped");
    expect(projectContainers(shop).map((c) => c.id)).toEqual(["2", "3", "4"]);
  });

  it("marks a project running when every container runs", () => {
    const [project] = composeProjects([member("1", "shop", "web"), member("2", "shop", "api")]);
    expect(project.status).toBe("running");
  });
});
