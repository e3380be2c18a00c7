import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Hono } from "hono";
import pino from "pino";
import {
  createCatalogStore,
  initializeCatalogDatabase,
  type CatalogStore,
} from "@docqa/core/catalog";
import { GatewayError } from "@docqa/core/errors";
import { createProjectsService, type ProjectsService } from "@docqa/core/projects";
import { createFakeIndexGateway, type FakeIndexGateway } from "@docqa/core/test-utils";
import { createErrorHandler } from "../middleware/error-handler.js";
import { operationsRoutes } from "./operations.js";

describe("operationsRoutes", () => {
  let catalog: CatalogStore;
  let gateway: FakeIndexGateway;
  let projects: ProjectsService;
  let app: Hono;

  beforeEach(() => {
    const logger = pino({ level: "silent" });
    catalog = createCatalogStore(initializeCatalogDatabase(":memory:"));
    gateway = createFakeIndexGateway();
    projects = createProjectsService({ catalog, gateway, logger });

    app = new Hono();
    app.route("/v1/operations", operationsRoutes({ projects }));
    app.onError(createErrorHandler(logger));
  });

  afterEach(() => {
    catalog.close();
  });

  async function interruptedCreate(): Promise<string> {
    gateway.failNext("createIndex", new GatewayError("timeout", "createIndex timed out"));
    await projects.createProject("Acme").catch(() => undefined);
    const [marker] = projects.listPendingOperations();
    if (!marker) throw new Error("expected a pending marker");
    return marker.operationId;
  }

  it("lists surviving markers", async () => {
    const operationId = await interruptedCreate();

    const res = await app.request("/v1/operations/pending");

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.operations).toHaveLength(1);
    expect(body.operations[0]).toMatchObject({
      operationId,
      kind: "create_project",
      projectId: null,
    });
  });

  it("dismisses a marker so it no longer appears", async () => {
    const operationId = await interruptedCreate();

    const res = await app.request(`/v1/operations/${operationId}`, { method: "DELETE" });

    expect(res.status).toBe(204);
    const body = await (await app.request("/v1/operations/pending")).json();
    expect(body.operations).toEqual([]);
  });

  it("returns 404 for an unknown marker", async () => {
    const res = await app.request("/v1/operations/missing", { method: "DELETE" });

    expect(res.status).toBe(404);
    const body = await res.json();
    expect(body.error.message).toBe("Pending operation not found: missing");
  });
});
