/**
 * Stdout guard: while responses go to stdout, anything else that writes
 * there (console.log in a loaded module, a stray process.stdout.write) is
 * sent to stderr so it cannot break the line framing.
 */

import { Writable } from "node:stream"

export interface StdoutGuard {
  /** The only way left to write to the real stdout */
  readonly wire: Writable
  restore(): void
}

export function guardStdout(
  stdout: Writable = process.stdout,
  divertTo: Writable = process.stderr,
): StdoutGuard {
  const original = stdout.write

  const wire = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      Reflect.apply(original, stdout, [chunk, callback])
    },
  })

  stdout.write = (chunk: unknown, ...rest: unknown[]): boolean =>
    Boolean(Reflect.apply(divertTo.write, divertTo, [chunk, ...rest]))

  return {
    wire,
    restore() {
      stdout.write = original
    },
  }
}
