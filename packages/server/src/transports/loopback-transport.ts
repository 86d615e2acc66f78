/**
 * LoopbackTransport: client-side test utility for dispatcher roundtrips.
 *
 * Takes a dispatch function that mirrors the dispatcher: one request line
 * in, one response line out. Requests are built and responses parsed in
 * memory, so commands can be exercised without any stream or process.
 */

import { BridgeError, WireJson } from "@crossline/core"

export type LineDispatchFn = (line: string) => Promise<string>

export class LoopbackTransport {
  constructor(private readonly dispatch: LineDispatchFn) {}

  /** Send a command; resolves with the parsed response line, envelope included */
  async request(cmd: string, data?: unknown): Promise<unknown> {
    const line = WireJson.stringify(data === undefined ? { cmd } : { cmd, data })
    return WireJson.parse(await this.dispatch(line))
  }

  /** Send a command; resolves with the wire value, or throws the reconstituted error */
  async send(cmd: string, data?: unknown): Promise<unknown> {
    const response = await this.request(cmd, data)
    if (isRecord(response) && response.type === "thrownException" && isRecord(response.value)) {
      const { message, code, facets, data: errData } = response.value
      throw BridgeError.reconstitute({
        message: typeof message === "string" ? message : "",
        code: typeof code === "string" ? code : undefined,
        boundary: typeof code === "string" ? code.split(".")[0] : undefined,
        facets: Array.isArray(facets) ? facets.filter((f): f is string => typeof f === "string") : undefined,
        data: isRecord(errData) ? errData : undefined,
      })
    }
    return response
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}
