/**
 * Resources: opaque runtime handles (open files and the like) that travel
 * by their own integer id instead of by object identity.
 */

import { Inspect } from "@crossline/core"
import { ErrResourceClosed } from "./errors.js"

export class Resource {
  private open = true

  static {
    Inspect(this, (self) => ({
      format: "Resource(%s #%d%s)",
      params: [self.kind, self.id, self.isOpen ? "" : ", closed"],
    }))
  }

  constructor(
    readonly id: number,
    readonly kind: string,
    private readonly release?: () => void,
  ) {}

  get isOpen(): boolean {
    return this.open
  }

  assertOpen(): void {
    if (!this.open) throw ErrResourceClosed.create({ id: this.id, kind: this.kind })
  }

  close(): void {
    this.assertOpen()
    this.open = false
    this.release?.()
  }
}

/** Hands out resource ids; ids are never reused within a realm */
export class ResourceTable {
  private nextId = 1

  /** Next id for a resource about to be constructed */
  allocateId(): number {
    return this.nextId++
  }
}

/** A file opened through the realm's stream functions */
export class StreamResource extends Resource {
  constructor(id: number, readonly fd: number, readonly path: string, release: () => void) {
    super(id, "stream", release)
  }
}
