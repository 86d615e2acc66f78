/**
 * ObjectStore: session-lifetime table of values that travel by handle.
 *
 * Objects and resources live in two independent identity spaces:
 *   - objects are keyed by JS identity and get string handles ("obj_<n>")
 *   - resources are keyed by their own resource id and get integer handles
 * A lookup is routed by the handle's type, so the spaces cannot alias.
 *
 * Nothing is ever evicted automatically. `remove` exists for callers that
 * release handles explicitly; the server never calls it on its own.
 */

import { ErrHandleNotFound } from "./errors/errors.js"
import type { Handle, ObjectHandle, ResourceHandle } from "./wire.js"

export class ObjectStore {
  private readonly handlesByObject = new Map<object, ObjectHandle>()
  private readonly objects = new Map<ObjectHandle, object>()
  private readonly resources = new Map<ResourceHandle, object>()
  private counter = 0

  /** Handle for an object; the same object always yields the same handle */
  encodeObject(value: object): ObjectHandle {
    const existing = this.handlesByObject.get(value)
    if (existing !== undefined) return existing

    const handle: ObjectHandle = `obj_${++this.counter}`
    this.handlesByObject.set(value, handle)
    this.objects.set(handle, value)
    return handle
  }

  /** Handle for a resource, keyed by the resource's own id */
  encodeResource(resourceId: number, value: object): ResourceHandle {
    this.resources.set(resourceId, value)
    return resourceId
  }

  decode(handle: Handle): object {
    const found = typeof handle === "number" ? this.resources.get(handle) : this.objects.get(handle)
    if (found === undefined) throw ErrHandleNotFound.create({ handle })
    return found
  }

  has(handle: Handle): boolean {
    return typeof handle === "number" ? this.resources.has(handle) : this.objects.has(handle)
  }

  remove(handle: Handle): void {
    if (typeof handle === "number") {
      this.resources.delete(handle)
      return
    }
    const value = this.objects.get(handle)
    if (value === undefined) return
    this.objects.delete(handle)
    this.handlesByObject.delete(value)
  }

  get size(): number {
    return this.objects.size + this.resources.size
  }
}
