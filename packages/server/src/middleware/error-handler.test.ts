import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import pino from "pino";
import { ConflictError, GatewayError } from "@docqa/core/errors";
import { createErrorHandler, notFoundHandler } from "./error-handler.js";

describe("createErrorHandler", () => {
  function createApp(error: Error) {
    const app = new Hono();
    app.get("/boom", () => {
      throw error;
    });
    app.onError(createErrorHandler(pino({ level: "silent" })));
    app.notFound(notFoundHandler);
    return app;
  }

  it("renders a typed error with its status and envelope", async () => {
    const app = createApp(
      new ConflictError("Remote index already bound: vs-1", { remoteIndexId: "vs-1" }),
    );

    const res = await app.request("/boom");

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: {
        code: 409,
        errorCode: "CONFLICT",
        message: "Remote index already bound: vs-1",
        details: { remoteIndexId: "vs-1" },
      },
    });
  });

  it("renders gateway failures as 502", async () => {
    const app = createApp(new GatewayError("auth", "createIndex failed: bad key"));

    const res = await app.request("/boom");

    expect(res.status).toBe(502);
    const json = await res.json();
    expect(json.error.details).toEqual({ kind: "auth" });
  });

  it("hides untyped errors behind a 500", async () => {
    const app = createApp(new Error("secret internals"));

    const res = await app.request("/boom");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: {
        code: 500,
        errorCode: "INTERNAL_ERROR",
        message: "Internal server error",
      },
    });
  });

  it("returns the 404 envelope for unknown paths", async () => {
    const res = await createApp(new Error("unused")).request("/missing");

    expect(res.status).toBe(404);
    const json = await res.json();
    expect(json.error.errorCode).toBe("NOT_FOUND");
  });
});
