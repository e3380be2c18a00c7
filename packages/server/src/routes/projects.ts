/**
 * Project administration routes. Uploads and removals reach the remote index;
 * rename and archive touch the catalog only.
 */

import { Hono } from "hono";
import { z } from "zod";
import type { Logger } from "pino";
import { ValidationError } from "@docqa/core/errors";
import type { ProjectsService } from "@docqa/core/projects";
import type { ReconcileEngine } from "@docqa/core/reconcile";
import { createBodyLimit, DEFAULT_MAX_SIZE } from "../middleware/body-limit.js";
import { formFile, formText, readForm, readJson } from "./request.js";

export interface ProjectsRouteDeps {
  projects: ProjectsService;
  reconcile: ReconcileEngine;
  logger: Logger;
  uploadMaxBytes: number;
}

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46, 0x2d]; // "%PDF-"

const NameBodySchema = z.object({
  name: z.string().min(1),
});

function isPdf(bytes: Uint8Array): boolean {
  return PDF_MAGIC.every((byte, i) => bytes[i] === byte);
}

function parseFlag(value: string | undefined, field: string, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (value === "true" || value === "1") return true;
  if (value === "false" || value === "0") return false;
  throw new ValidationError(`${field} must be true or false`, { field, value });
}

export function projectsRoutes(deps: ProjectsRouteDeps): Hono {
  const app = new Hono();
  const jsonLimit = createBodyLimit(DEFAULT_MAX_SIZE);

  // GET /: list projects (active only unless ?activeOnly=false)
  app.get("/", (c) => {
    const activeOnly = parseFlag(c.req.query("activeOnly"), "activeOnly", true);
    return c.json({ projects: deps.projects.listProjects(activeOnly) });
  });

  // POST /: create a project and its remote index
  app.post("/", jsonLimit, async (c) => {
    const { name } = await readJson(c, NameBodySchema);
    const project = await deps.projects.createProject(name);
    return c.json({ project }, 201);
  });

  app.get("/:projectId", (c) => {
    return c.json({ project: deps.projects.getProject(c.req.param("projectId")) });
  });

  // PATCH /:projectId: rename
  app.patch("/:projectId", jsonLimit, async (c) => {
    const { name } = await readJson(c, NameBodySchema);
    const project = deps.projects.renameProject(c.req.param("projectId"), name);
    return c.json({ project });
  });

  // POST /:projectId/archive: soft archive; the remote index is kept
  app.post("/:projectId/archive", (c) => {
    const project = deps.projects.archiveProject(c.req.param("projectId"));
    return c.json({ project });
  });

  app.get("/:projectId/documents", (c) => {
    const documents = deps.projects.listDocuments(c.req.param("projectId"));
    return c.json({ documents });
  });

  // POST /:projectId/documents: multipart upload of one PDF
  app.post(
    "/:projectId/documents",
    createBodyLimit(deps.uploadMaxBytes),
    async (c) => {
      const projectId = c.req.param("projectId");
      const form = await readForm(c);
      const file = await formFile(form, "file");
      const dedup = parseFlag(formText(form, "dedup"), "dedup", true);

      if (!isPdf(file.bytes)) {
        throw new ValidationError("Only PDF documents are accepted", {
          field: "file",
          filename: file.name,
        });
      }

      const outcome = await deps.projects.uploadDocument(
        projectId,
        file.bytes,
        file.name,
        { dedup },
      );
      return c.json(outcome, outcome.status === "added" ? 201 : 200);
    },
  );

  // DELETE /:projectId/documents/:documentId: detach from the index
  app.delete("/:projectId/documents/:documentId", async (c) => {
    await deps.projects.removeDocument(
      c.req.param("projectId"),
      c.req.param("documentId"),
    );
    return c.body(null, 204);
  });

  // GET /:projectId/reconcile: read-only drift report
  app.get("/:projectId/reconcile", async (c) => {
    const report = await deps.reconcile.reconcile(c.req.param("projectId"));
    return c.json(report);
  });

  // POST /:projectId/repair: record remote-only documents in the catalog
  app.post("/:projectId/repair", async (c) => {
    const result = await deps.reconcile.repair(c.req.param("projectId"));
    deps.logger.info(
      { projectId: result.projectId, added: result.added.length },
      "Catalog repaired",
    );
    return c.json(result);
  });

  return app;
}
