/**
 * StdioTransport: newline-delimited text over a pair of streams
 * (stdin/stdout by default, or files given on the command line).
 */

import * as readline from "node:readline"
import type { Readable, Writable } from "node:stream"
import type { Transport } from "../transport.js"

export class StdioTransport implements Transport {
  private readonly lines: readline.Interface
  private readonly iterator: AsyncIterator<string>

  constructor(
    input: Readable = process.stdin,
    private readonly output: Writable = process.stdout,
  ) {
    this.lines = readline.createInterface({ input, crlfDelay: Infinity, terminal: false })
    this.iterator = this.lines[Symbol.asyncIterator]()
  }

  async receive(): Promise<string | null> {
    const next = await this.iterator.next()
    return next.done ? null : next.value
  }

  send(line: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.output.write(`${line}\n`, (err) => (err ? reject(err) : resolve()))
    })
  }

  async close(): Promise<void> {
    this.lines.close()
  }
}
