import { describe, it, expect, vi, afterEach } from "vitest";
import { GatewayError } from "../errors/catalog.js";
import { withTimeout } from "./timeout.js";

const classify = (err: unknown, operation: string) =>
  new GatewayError("provider", `${operation} failed`, { cause: err });

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the result when the call finishes in time", async () => {
    const result = await withTimeout(
      "createIndex",
      1000,
      async () => "vs_1",
      classify,
    );
    expect(result).toBe("vs_1");
  });

  it("fails with a timeout GatewayError and aborts the signal", async () => {
    vi.useFakeTimers();
    let seen: AbortSignal | undefined;

    const pending = withTimeout(
      "answer",
      60_000,
      (signal) => {
        seen = signal;
        return new Promise<string>(() => {});
      },
      classify,
    );
    const assertion = expect(pending).rejects.toMatchObject({
      kind: "timeout",
      message: "answer timed out after 60000ms",
      code: 504,
    });

    await vi.advanceTimersByTimeAsync(60_000);
    await assertion;
    expect(seen?.aborted).toBe(true);
  });

  it("routes other failures through the classifier", async () => {
    const cause = new Error("boom");
    await expect(
      withTimeout(
        "listDocuments",
        1000,
        async () => {
          throw cause;
        },
        classify,
      ),
    ).rejects.toMatchObject({
      kind: "provider",
      message: "listDocuments failed",
      cause,
    });
  });

  it("passes GatewayErrors through untouched", async () => {
    const original = new GatewayError("not_found", "no such index");
    await expect(
      withTimeout(
        "removeDocument",
        1000,
        async () => {
          throw original;
        },
        classify,
      ),
    ).rejects.toBe(original);
  });
});
