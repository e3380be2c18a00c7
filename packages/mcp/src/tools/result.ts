import { DocQaError } from "@docqa/core/errors";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

export function jsonResult(value: unknown): CallToolResult {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }],
  };
}

/** Typed failures become tool errors the model can read; anything else is rethrown. */
export function errorResult(err: unknown): CallToolResult {
  if (err instanceof DocQaError) {
    return {
      isError: true,
      content: [{ type: "text" as const, text: JSON.stringify(err.toJSON().error) }],
    };
  }
  throw err;
}
