/**
 * MemoryTransport: an in-process pipe. Requests are pushed by the caller,
 * responses collected in `sent`.
 */

import type { Transport } from "../transport.js"

export class MemoryTransport implements Transport {
  readonly sent: string[] = []
  private readonly queue: string[] = []
  private readonly waiting: Array<(line: string | null) => void> = []
  private ended = false

  /** Queue request lines */
  push(...lines: string[]): this {
    for (const line of lines) {
      const waiter = this.waiting.shift()
      if (waiter) waiter(line)
      else this.queue.push(line)
    }
    return this
  }

  /** End the input; pending and later receives report closure */
  end(): this {
    this.ended = true
    for (const waiter of this.waiting.splice(0)) waiter(null)
    return this
  }

  receive(): Promise<string | null> {
    const line = this.queue.shift()
    if (line !== undefined) return Promise.resolve(line)
    if (this.ended) return Promise.resolve(null)
    return new Promise((resolve) => this.waiting.push(resolve))
  }

  async send(line: string): Promise<void> {
    this.sent.push(line)
  }

  async close(): Promise<void> {
    this.end()
  }
}
