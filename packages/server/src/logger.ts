/**
 * Logging: pino, to stderr or a log file. Never stdout: stdout may be
 * the wire.
 */

import pino, { type Logger } from "pino"
import type { ServerConfig } from "./config.js"

export type { Logger }

export function createLogger(config: Pick<ServerConfig, "logLevel" | "logFile">): Logger {
  const destination = pino.destination({ dest: config.logFile ?? 2, sync: true, mkdir: config.logFile !== null })
  return pino({ name: "crossline", level: config.logLevel }, destination)
}

/** A logger that discards everything */
export function silentLogger(): Logger {
  return pino({ level: "silent" })
}
