import { Hono } from "hono";
import type { ProjectsService } from "@docqa/core/projects";

export interface OperationsRouteDeps {
  projects: ProjectsService;
}

export function operationsRoutes(deps: OperationsRouteDeps): Hono {
  const app = new Hono();

  // GET /pending: interrupted multi-step actions, optionally for one project
  app.get("/pending", (c) => {
    const projectId = c.req.query("projectId");
    const operations = deps.projects.listPendingOperations(
      projectId !== undefined && projectId !== "" ? projectId : undefined,
    );
    return c.json({ operations });
  });

  // DELETE /:operationId: acknowledge an interrupted action after cleanup
  app.delete("/:operationId", (c) => {
    deps.projects.dismissPendingOperation(c.req.param("operationId"));
    return c.body(null, 204);
  });

  return app;
}
