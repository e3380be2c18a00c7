import { describe, it, expect, afterEach } from "vitest";
import pino from "pino";
import { ServerConfigSchema } from "../schemas/server-config.js";
import { createFakeIndexGateway } from "../test-utils/fake-gateway.js";
import { createCoreServices, type CoreServices } from "./index.js";

describe("createCoreServices", () => {
  let services: CoreServices | undefined;

  afterEach(() => {
    services?.close();
    services = undefined;
  });

  it("wires the services over one catalog and gateway", async () => {
    const gateway = createFakeIndexGateway({ answerText: "From the PRD." });
    services = await createCoreServices({
      config: ServerConfigSchema.parse({ catalog: { path: ":memory:" } }),
      secrets: { openaiApiKey: "test-key" },
      rootPath: "/tmp/docqa-unused",
      logger: pino({ level: "silent" }),
      gateway,
    });

    expect(services.catalogPath).toBe(":memory:");
    const project = await services.projects.createProject("Acme");
    await expect(
      services.answering.answer(project.projectId, "What is in scope?"),
    ).resolves.toEqual({ text: "From the PRD.", citations: [] });
    await expect(services.reconcile.reconcile(project.projectId)).resolves.toMatchObject({
      onlyLocal: [],
      onlyRemote: [],
    });
  });
});
