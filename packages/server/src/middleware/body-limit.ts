import { bodyLimit } from 'hono/body-limit'
import type { MiddlewareHandler } from 'hono'

/** 1 MB: default max body size for JSON routes */
export const DEFAULT_MAX_SIZE = 1 * 1024 * 1024

/**
 * Creates a Hono body-limit middleware that returns 413 in the error envelope.
 */
export function createBodyLimit(maxSize: number): MiddlewareHandler {
  return bodyLimit({
    maxSize,
    onError: (c) => {
      return c.json(
        {
          error: {
            code: 413,
            errorCode: 'CONTENT_TOO_LARGE',
            message: `Request body exceeds maximum size of ${maxSize} bytes`,
          },
        },
        413,
      )
    },
  })
}
