import type { ErrorHandler, NotFoundHandler } from "hono";
import type { Logger } from "pino";
import { DocQaError } from "@docqa/core/errors";

/**
 * Renders typed errors in the `{ error: { code, errorCode, message } }`
 * envelope. Anything untyped is logged with its stack and hidden behind 500.
 */
export function createErrorHandler(logger: Logger): ErrorHandler {
  return (err, c) => {
    if (err instanceof DocQaError) {
      logger.warn(
        { err, path: c.req.path, errorCode: err.errorCode },
        err.message,
      );
      return c.json(err.toJSON(), err.code);
    }

    logger.error({ err, path: c.req.path }, "Unhandled error");
    return c.json(
      {
        error: {
          code: 500,
          errorCode: "INTERNAL_ERROR",
          message: "Internal server error",
        },
      },
      500,
    );
  };
}

export const notFoundHandler: NotFoundHandler = (c) => {
  return c.json(
    {
      error: {
        code: 404,
        errorCode: "NOT_FOUND",
        message: "Not found",
      },
    },
    404,
  );
};
