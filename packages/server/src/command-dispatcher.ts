/**
 * CommandDispatcher: the request/response loop.
 *
 * Listening → Executing → Listening, until the input ends (Closed).
 * Exactly one command is in flight: the next line is read only after the
 * previous response has been written.
 *
 * Every failure while parsing, decoding, running or encoding a command
 * becomes a thrownException response; only end of input, a failed read
 * or an exit request ends the loop.
 */

import { BridgeError, WireJson, WireValue, type WireResponse } from "@crossline/core"
import { ErrExitRequested } from "@crossline/realm"
import type { CommandSet } from "./command-set.js"
import { ErrConnectionLost, ErrResponseUnencodable } from "./errors.js"
import type { Logger } from "./logger.js"
import { CommandRequest } from "./protocol.js"
import type { Transport } from "./transport.js"

export type DispatcherState = "listening" | "executing" | "closed"

/** Why a session ended */
export type SessionEnd =
  | { readonly reason: "closed" }
  | { readonly reason: "exit"; readonly status: number }
  | { readonly reason: "connection_lost"; readonly error: BridgeError }

export class CommandDispatcher {
  private currentState: DispatcherState = "listening"
  private exitStatus: number | null = null

  constructor(
    private readonly commands: CommandSet,
    private readonly logger: Logger,
  ) {}

  get state(): DispatcherState {
    return this.currentState
  }

  /** Serve requests from the transport until the session ends */
  async run(transport: Transport): Promise<SessionEnd> {
    this.logger.info("session started")
    try {
      for (;;) {
        let line: string | null
        try {
          line = await transport.receive()
        } catch (err) {
          const error = ErrConnectionLost.create({ reason: BridgeError.serialize(err).message })
          this.logger.info({ code: error.code }, error.message)
          return { reason: "connection_lost", error }
        }

        if (line === null) {
          this.logger.info("input closed")
          return { reason: "closed" }
        }
        if (line.trim() === "") continue

        const response = await this.handleLine(line)
        await transport.send(response)

        if (this.exitStatus !== null) {
          this.logger.info({ status: this.exitStatus }, "exit requested")
          return { reason: "exit", status: this.exitStatus }
        }
      }
    } finally {
      this.currentState = "closed"
      this.logger.info("session ended")
    }
  }

  /** Serve one request line and return the response line */
  async handleLine(line: string): Promise<string> {
    const started = performance.now()
    this.currentState = "executing"
    let cmd = "(unparsed)"
    let response: WireResponse

    try {
      const request = CommandRequest.parse(line)
      cmd = request.cmd
      const result: unknown = await this.commands.execute(request)
      response = this.commands.codec.encode(result)
      this.logger.debug({ cmd, outcome: "ok", ms: elapsed(started) }, "command")
    } catch (err) {
      if (ErrExitRequested.is(err)) {
        this.exitStatus = err.data.status
        response = WireValue.null()
      } else {
        response = this.commands.codec.encodeThrown(err)
      }
      this.logger.debug({ cmd, outcome: "thrown", code: BridgeError.serialize(err).code, ms: elapsed(started) }, "command")
    } finally {
      this.currentState = "listening"
    }

    return this.serialize(cmd, response)
  }

  private serialize(cmd: string, response: WireResponse): string {
    try {
      return WireJson.stringify(response)
    } catch (err) {
      const error = ErrResponseUnencodable.create({ command: cmd, reason: BridgeError.serialize(err).message })
      this.logger.debug({ cmd, code: error.code }, error.message)
      return WireJson.stringify(this.commands.codec.encodeThrown(error))
    }
  }
}

function elapsed(started: number): number {
  return Math.round((performance.now() - started) * 1000) / 1000
}
