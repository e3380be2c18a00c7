/**
 * Request body readers shared by the routes. Anything malformed becomes a
 * ValidationError so the global handler renders it as 400.
 */

import type { Context } from "hono";
import type { z } from "zod";
import { ValidationError } from "@docqa/core/errors";

/** Errors raised by hono/body-limit must reach it unchanged to become 413. */
function isBodyLimitError(err: unknown): boolean {
  return err instanceof Error && err.name === "BodyLimitError";
}

function describeIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
  }));
}

export async function readJson<S extends z.ZodType>(
  c: Context,
  schema: S,
): Promise<z.output<S>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (err) {
    if (isBodyLimitError(err)) throw err;
    throw new ValidationError("Request body must be valid JSON");
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = describeIssues(result.error);
    const first = issues[0];
    throw new ValidationError(
      first ? `Invalid request body: ${first.path || "body"}: ${first.message}` : "Invalid request body",
      { issues },
    );
  }
  return result.data;
}

export async function readForm(c: Context): Promise<Record<string, unknown>> {
  try {
    return await c.req.parseBody();
  } catch (err) {
    if (isBodyLimitError(err)) throw err;
    throw new ValidationError("Request body must be multipart/form-data");
  }
}

export async function formFile(
  form: Record<string, unknown>,
  field: string,
): Promise<{ name: string; bytes: Uint8Array }> {
  const value = form[field];
  if (!(value instanceof File)) {
    throw new ValidationError(`Missing file field: ${field}`, { field });
  }
  return { name: value.name, bytes: new Uint8Array(await value.arrayBuffer()) };
}

export function formText(
  form: Record<string, unknown>,
  field: string,
): string | undefined {
  const value = form[field];
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}
