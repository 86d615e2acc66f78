import * as fs from "node:fs"
import type { Readable, Writable } from "node:stream"
import { object } from "@optique/core/constructs"
import { message } from "@optique/core/message"
import { multiple, optional } from "@optique/core/modifiers"
import { constant, option } from "@optique/core/primitives"
import { choice, integer, string } from "@optique/core/valueparser"
import { path } from "@optique/run"
import { LOG_LEVELS, ServerConfig } from "../config.js"
import { createLogger } from "../logger.js"
import { Session } from "../session.js"
import { guardStdout, type StdoutGuard } from "../stdout-guard.js"
import { StdioTransport } from "../transports/stdio-transport.js"

export const serveCommand = object({
  cmd: constant("serve" as const),
  input: optional(option("--input", path({ mustExist: true }), { description: message`Read requests from a file instead of stdin` })),
  output: optional(option("--output", path(), { description: message`Write responses to a file instead of stdout` })),
  preload: multiple(option("--preload", string({ metavar: "MODULE" }), { description: message`Load a module into the realm before serving` })),
  logLevel: optional(option("--log-level", choice(LOG_LEVELS), { description: message`Log level` })),
  logFile: optional(option("--log-file", path(), { description: message`Write logs to a file instead of stderr` })),
  noPromoteWarnings: option("--no-promote-warnings", { description: message`Print runtime warnings instead of failing the command` }),
  reprDepth: optional(option("--repr-depth", integer({ min: 1 }), { description: message`Nesting depth for repr` })),
})

export interface ServeOptions {
  input?: string
  output?: string
  preload: readonly string[]
  logLevel?: (typeof LOG_LEVELS)[number]
  logFile?: string
  noPromoteWarnings: boolean
  reprDepth?: number
}

/** Serve until the input ends; resolves with the process exit code */
export async function handleServe(opts: ServeOptions): Promise<number> {
  const config = new ServerConfig({
    input: opts.input,
    output: opts.output,
    preload: opts.preload,
    logLevel: opts.logLevel,
    logFile: opts.logFile,
    promoteWarnings: opts.noPromoteWarnings ? false : undefined,
    reprDepth: opts.reprDepth,
  })
  const logger = createLogger(config)

  const input: Readable = config.input === null ? process.stdin : fs.createReadStream(config.input)
  let guard: StdoutGuard | null = null
  let output: Writable
  if (config.output === null) {
    guard = guardStdout()
    output = guard.wire
  } else {
    output = fs.createWriteStream(config.output, { flags: "a" })
  }

  try {
    const session = await Session.open(config, logger)
    const end = await session.serve(new StdioTransport(input, output))
    switch (end.reason) {
      case "closed":
        return 0
      case "exit":
        return end.status
      case "connection_lost":
        return 1
    }
  } finally {
    await new Promise<void>((resolve) => output.end(() => resolve()))
    guard?.restore()
    logger.flush()
  }
}
