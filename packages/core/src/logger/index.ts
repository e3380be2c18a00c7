import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/server-config.js'

export type { Logger } from 'pino'

export interface CreateLoggerOptions {
  /**
   * File descriptor the logs go to. The MCP stdio server needs 2 so that
   * stdout carries nothing but protocol frames.
   */
  fd?: 1 | 2
}

export function createLogger(
  config: LoggingConfig,
  options: CreateLoggerOptions = {},
): Logger {
  const fd = options.fd ?? 1
  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  if (usePretty) {
    return pino({
      level: config.level,
      transport: { target: 'pino-pretty', options: { destination: fd } },
    })
  }

  return pino({ level: config.level }, pino.destination(fd))
}
