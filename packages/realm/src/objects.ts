/**
 * Object operations: property access, method calls and invocation of
 * callable values.
 */

import { ErrAttributeError, ErrNotCallable } from "./errors.js"
import { typeName } from "./collections.js"

function asTarget(value: unknown, name: string): object {
  if ((typeof value === "object" && value !== null) || typeof value === "function") return value
  throw ErrAttributeError.create({ className: typeName(value), name })
}

export function getProperty(obj: unknown, name: string): unknown {
  const target = asTarget(obj, name)
  if (!(name in target)) throw ErrAttributeError.create({ className: typeName(target), name })
  const value: unknown = Reflect.get(target, name)
  return value
}

export function setProperty(obj: unknown, name: string, value: unknown): void {
  const target = asTarget(obj, name)
  if (!Reflect.set(target, name, value)) {
    throw new TypeError(`Cannot assign to read only property '${name}' of ${typeName(target)}`)
  }
}

export function unsetProperty(obj: unknown, name: string): void {
  const target = asTarget(obj, name)
  if (!Reflect.deleteProperty(target, name)) {
    throw new TypeError(`Cannot delete property '${name}' of ${typeName(target)}`)
  }
}

/** Public (own, enumerable) property names */
export function listProperties(obj: unknown): string[] {
  return Object.keys(asTarget(obj, ""))
}

export function callMethod(obj: unknown, name: string, args: readonly unknown[]): unknown {
  const target = asTarget(obj, name)
  const method: unknown = Reflect.get(target, name)
  if (typeof method !== "function") throw ErrAttributeError.create({ className: typeName(target), name })
  const result: unknown = Reflect.apply(method, target, args)
  return result
}

export function callValue(callable: unknown, args: readonly unknown[]): unknown {
  if (typeof callable !== "function") throw ErrNotCallable.create({ valueType: typeName(callable) })
  const result: unknown = Reflect.apply(callable, undefined, args)
  return result
}
