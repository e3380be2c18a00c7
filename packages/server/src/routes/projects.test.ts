import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Hono } from "hono";
import pino from "pino";
import {
  createCatalogStore,
  initializeCatalogDatabase,
  type CatalogStore,
} from "@docqa/core/catalog";
import { GatewayError } from "@docqa/core/errors";
import { fingerprint } from "@docqa/core/fingerprint";
import { createProjectsService } from "@docqa/core/projects";
import { createReconcileEngine } from "@docqa/core/reconcile";
import { createFakeIndexGateway, type FakeIndexGateway } from "@docqa/core/test-utils";
import { createErrorHandler } from "../middleware/error-handler.js";
import { operationsRoutes } from "./operations.js";
import { projectsRoutes } from "./projects.js";

const PDF_TEXT = "%PDF-1.4 product requirements";

function pdfForm(text = PDF_TEXT, filename = "PRD.pdf", extra: Record<string, string> = {}): FormData {
  const form = new FormData();
  form.append("file", new File([text], filename, { type: "application/pdf" }));
  for (const [key, value] of Object.entries(extra)) {
    form.append(key, value);
  }
  return form;
}

/** Serialises the form so the request carries a Content-Length. */
async function sized(form: FormData): Promise<RequestInit> {
  const req = new Request("http://localhost/", { method: "POST", body: form });
  const body = await req.arrayBuffer();
  return {
    method: "POST",
    body,
    headers: {
      "Content-Type": req.headers.get("Content-Type") ?? "",
      "Content-Length": String(body.byteLength),
    },
  };
}

describe("projectsRoutes", () => {
  let catalog: CatalogStore;
  let gateway: FakeIndexGateway;
  let app: Hono;

  beforeEach(() => {
    const logger = pino({ level: "silent" });
    catalog = createCatalogStore(initializeCatalogDatabase(":memory:"));
    gateway = createFakeIndexGateway();
    const projects = createProjectsService({ catalog, gateway, logger });
    const reconcile = createReconcileEngine({ catalog, gateway, logger });

    app = new Hono();
    app.route(
      "/v1/projects",
      projectsRoutes({ projects, reconcile, logger, uploadMaxBytes: 1024 }),
    );
    app.route("/v1/operations", operationsRoutes({ projects }));
    app.onError(createErrorHandler(logger));
  });

  afterEach(() => {
    catalog.close();
  });

  async function createProject(name: string): Promise<string> {
    const res = await app.request("/v1/projects", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ name }),
    });
    const body = await res.json();
    return body.project.projectId;
  }

  function upload(projectId: string, form: FormData): Promise<Response> {
    return Promise.resolve(
      app.request(`/v1/projects/${projectId}/documents`, {
        method: "POST",
        body: form,
      }),
    );
  }

  describe("POST /", () => {
    it("creates a project bound to a new remote index", async () => {
      const res = await app.request("/v1/projects", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ name: "Acme" }),
      });

      expect(res.status).toBe(201);
      const body = await res.json();
      expect(body.project).toMatchObject({
        projectName: "Acme",
        remoteIndexId: "idx-1",
        status: "active",
      });
      expect(gateway.countCalls("createIndex")).toBe(1);
    });

    it("returns 400 for a missing name", async () => {
      const res = await app.request("/v1/projects", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({}),
      });

      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body.error.errorCode).toBe("VALIDATION_ERROR");
      expect(gateway.countCalls("createIndex")).toBe(0);
    });

    it("returns 400 for malformed JSON", async () => {
      const res = await app.request("/v1/projects", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      });

      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body.error.message).toBe("Request body must be valid JSON");
    });
  });

  describe("GET /", () => {
    it("lists active projects by default and all with activeOnly=false", async () => {
      const acme = await createProject("Acme");
      await createProject("Beta");
      await app.request(`/v1/projects/${acme}/archive`, { method: "POST" });

      const active = await (await app.request("/v1/projects")).json();
      expect(active.projects.map((p: { projectName: string }) => p.projectName)).toEqual(["Beta"]);

      const all = await (await app.request("/v1/projects?activeOnly=false")).json();
      expect(all.projects).toHaveLength(2);
    });

    it("rejects a non-boolean activeOnly", async () => {
      const res = await app.request("/v1/projects?activeOnly=maybe");
      expect(res.status).toBe(400);
    });
  });

  describe("single project", () => {
    it("returns 404 for an unknown project", async () => {
      const res = await app.request("/v1/projects/missing");

      expect(res.status).toBe(404);
      const body = await res.json();
      expect(body.error).toEqual({
        code: 404,
        errorCode: "NOT_FOUND",
        message: "Project not found: missing",
        details: { projectId: "missing" },
      });
    });

    it("renames without touching the remote index", async () => {
      const id = await createProject("Acme");

      const res = await app.request(`/v1/projects/${id}`, {
        method: "PATCH",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ name: "Acme Corp" }),
      });

      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body.project.projectName).toBe("Acme Corp");
      expect(body.project.remoteIndexId).toBe("idx-1");
    });

    it("archives idempotently", async () => {
      const id = await createProject("Acme");

      await app.request(`/v1/projects/${id}/archive`, { method: "POST" });
      const res = await app.request(`/v1/projects/${id}/archive`, { method: "POST" });

      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body.project.status).toBe("archived");
      expect(body.project.projectName).toBe("Acme");
    });
  });

  describe("documents", () => {
    it("uploads a PDF and records its fingerprint", async () => {
      const id = await createProject("Acme");

      const res = await upload(id, pdfForm());

      expect(res.status).toBe(201);
      const body = await res.json();
      expect(body.status).toBe("added");
      expect(body.document).toMatchObject({
        projectId: id,
        remoteDocumentId: "doc-1",
        filename: "PRD.pdf",
        contentFingerprint: fingerprint(new TextEncoder().encode(PDF_TEXT)),
      });

      const list = await (await app.request(`/v1/projects/${id}/documents`)).json();
      expect(list.documents).toHaveLength(1);
    });

    it("skips an identical upload unless dedup is off", async () => {
      const id = await createProject("Acme");
      await upload(id, pdfForm());

      const skipped = await upload(id, pdfForm(PDF_TEXT, "PRD-copy.pdf"));
      expect(skipped.status).toBe(200);
      expect(await skipped.json()).toEqual({
        status: "skipped",
        reason: "duplicate",
        fingerprint: fingerprint(new TextEncoder().encode(PDF_TEXT)),
      });
      expect(gateway.countCalls("addDocument")).toBe(1);

      const forced = await upload(id, pdfForm(PDF_TEXT, "PRD-copy.pdf", { dedup: "false" }));
      expect(forced.status).toBe(201);
      const body = await forced.json();
      expect(body.document.remoteDocumentId).toBe("doc-2");
    });

    it("rejects files that are not PDFs", async () => {
      const id = await createProject("Acme");

      const res = await upload(id, pdfForm("plain text", "notes.txt"));

      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body.error.message).toBe("Only PDF documents are accepted");
      expect(gateway.countCalls("addDocument")).toBe(0);
    });

    it("rejects a form without a file field", async () => {
      const id = await createProject("Acme");
      const form = new FormData();
      form.append("dedup", "true");

      const res = await upload(id, form);

      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body.error.message).toBe("Missing file field: file");
    });

    it("rejects uploads larger than the limit", async () => {
      const id = await createProject("Acme");

      const res = await app.request(
        `/v1/projects/${id}/documents`,
        await sized(pdfForm(`%PDF-${"x".repeat(2048)}`)),
      );

      expect(res.status).toBe(413);
      const body = await res.json();
      expect(body.error.errorCode).toBe("CONTENT_TOO_LARGE");
      expect(gateway.countCalls("addDocument")).toBe(0);
    });

    it("refuses uploads to an archived project", async () => {
      const id = await createProject("Acme");
      await app.request(`/v1/projects/${id}/archive`, { method: "POST" });

      const res = await upload(id, pdfForm());

      expect(res.status).toBe(404);
      expect(gateway.countCalls("addDocument")).toBe(0);
    });

    it("maps a gateway failure to 502 and keeps the pending marker", async () => {
      const id = await createProject("Acme");
      gateway.failNext(
        "addDocument",
        new GatewayError("provider", "addDocument failed: index unavailable"),
      );

      const res = await upload(id, pdfForm());

      expect(res.status).toBe(502);
      const body = await res.json();
      expect(body.error.errorCode).toBe("GATEWAY_ERROR");
      expect(body.error.details).toEqual({ kind: "provider" });

      const pending = await (
        await app.request(`/v1/operations/pending?projectId=${id}`)
      ).json();
      expect(pending.operations).toHaveLength(1);
      expect(pending.operations[0]).toMatchObject({
        kind: "add_document",
        projectId: id,
      });
    });

    it("removes a document", async () => {
      const id = await createProject("Acme");
      await upload(id, pdfForm());

      const res = await app.request(`/v1/projects/${id}/documents/doc-1`, {
        method: "DELETE",
      });

      expect(res.status).toBe(204);
      expect(gateway.indexes.get("idx-1")).toEqual([]);
      const list = await (await app.request(`/v1/projects/${id}/documents`)).json();
      expect(list.documents).toEqual([]);
    });
  });

  describe("reconciliation", () => {
    it("reports remote-only documents and repairs them", async () => {
      const id = await createProject("Acme");
      await upload(id, pdfForm());
      gateway.injectDocument("idx-1", "ext-doc-9");

      const report = await (await app.request(`/v1/projects/${id}/reconcile`)).json();
      expect(report).toMatchObject({
        projectId: id,
        remoteIndexId: "idx-1",
        onlyLocal: [],
        onlyRemote: ["ext-doc-9"],
        remoteTruncated: false,
      });

      const repair = await app.request(`/v1/projects/${id}/repair`, { method: "POST" });
      expect(repair.status).toBe(200);
      const result = await repair.json();
      expect(result.added).toEqual(["ext-doc-9"]);

      const again = await (
        await app.request(`/v1/projects/${id}/repair`, { method: "POST" })
      ).json();
      expect(again.added).toEqual([]);

      const list = await (await app.request(`/v1/projects/${id}/documents`)).json();
      const repaired = list.documents.find(
        (d: { remoteDocumentId: string }) => d.remoteDocumentId === "ext-doc-9",
      );
      expect(repaired).toMatchObject({ filename: "ext-doc-9", contentFingerprint: null });
    });

    it("returns 404 when reconciling an unknown project", async () => {
      const res = await app.request("/v1/projects/missing/reconcile");
      expect(res.status).toBe(404);
    });
  });
});
