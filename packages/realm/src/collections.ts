/**
 * Collections: counting, item access and stepwise iteration.
 *
 * Item access works on Arrays (integer offsets), Maps (any key) and objects
 * that implement the offset protocol:
 *
 *   offsetExists(offset) / offsetGet(offset) / offsetSet(offset, value) / offsetUnset(offset)
 */

import { types } from "node:util"
import { constructorName, Inspect } from "@crossline/core"
import {
  ErrInvalidCursor,
  ErrNotCountable,
  ErrNotIndexable,
  ErrNotIterable,
  ErrUndefinedOffset,
} from "./errors.js"

// ============================================================================
// Helpers
// ============================================================================

export function typeName(value: unknown): string {
  if (value === null || value === undefined) return "null"
  if (Array.isArray(value)) return "array"
  if (typeof value === "object" || typeof value === "function") return constructorName(value)
  return typeof value
}

function method(value: unknown, name: string): Function | undefined {
  if ((typeof value !== "object" && typeof value !== "function") || value === null) return undefined
  const found: unknown = Reflect.get(value, name)
  return typeof found === "function" ? found : undefined
}

function call(value: unknown, name: string, args: unknown[]): unknown {
  const fn = method(value, name)
  if (!fn) throw ErrNotIndexable.create({ valueType: typeName(value) })
  return Reflect.apply(fn, value, args)
}

function isOffsetAccessible(value: unknown): boolean {
  return method(value, "offsetGet") !== undefined
}

function arrayIndex(array: unknown[], offset: unknown): number | undefined {
  const index = typeof offset === "string" && /^(0|[1-9]\d*)$/.test(offset) ? Number(offset) : offset
  return typeof index === "number" && Number.isInteger(index) && index >= 0 && index < array.length ? index : undefined
}

// ============================================================================
// Counting
// ============================================================================

export function count(value: unknown): number {
  if (Array.isArray(value)) return value.length
  if (types.isMap(value) || types.isSet(value)) return value.size
  const counter = method(value, "count")
  if (counter) {
    const result: unknown = Reflect.apply(counter, value, [])
    if (typeof result === "number") return result
  }
  throw ErrNotCountable.create({ valueType: typeName(value) })
}

// ============================================================================
// Item access
// ============================================================================

export function hasItem(container: unknown, offset: unknown): boolean {
  if (Array.isArray(container)) {
    const index = arrayIndex(container, offset)
    return index !== undefined && container[index] !== null && container[index] !== undefined
  }
  if (types.isMap(container)) return container.has(offset) && container.get(offset) !== null
  if (isOffsetAccessible(container)) return Boolean(call(container, "offsetExists", [offset]))
  throw ErrNotIndexable.create({ valueType: typeName(container) })
}

export function getItem(container: unknown, offset: unknown): unknown {
  if (Array.isArray(container)) {
    const index = arrayIndex(container, offset)
    if (index === undefined) throw ErrUndefinedOffset.create({ offset: String(offset) })
    return container[index]
  }
  if (types.isMap(container)) {
    if (!container.has(offset)) throw ErrUndefinedOffset.create({ offset: String(offset) })
    return container.get(offset)
  }
  if (isOffsetAccessible(container)) return call(container, "offsetGet", [offset])
  throw ErrNotIndexable.create({ valueType: typeName(container) })
}

/** A null offset appends */
export function setItem(container: unknown, offset: unknown, value: unknown): void {
  if (Array.isArray(container)) {
    if (offset === null || offset === undefined) {
      container.push(value)
      return
    }
    const index = typeof offset === "number" && Number.isInteger(offset) && offset >= 0 ? offset : undefined
    if (index === undefined) throw ErrNotIndexable.create({ valueType: `array offset ${typeName(offset)}` })
    container[index] = value
    return
  }
  if (types.isMap(container)) {
    container.set(offset ?? container.size, value)
    return
  }
  call(container, "offsetSet", [offset, value])
}

export function delItem(container: unknown, offset: unknown): void {
  if (Array.isArray(container)) {
    const index = arrayIndex(container, offset)
    if (index !== undefined) container.splice(index, 1)
    return
  }
  if (types.isMap(container)) {
    container.delete(offset)
    return
  }
  call(container, "offsetUnset", [offset])
}

// ============================================================================
// Iteration
// ============================================================================

export type IterationStep = readonly [hasMore: boolean, key: unknown, value: unknown]

function* positional(values: Iterable<unknown>): Generator<readonly [number, unknown]> {
  let position = 0
  for (const value of values) yield [position++, value]
}

function* pairs(entries: Iterable<unknown>): Generator<readonly [unknown, unknown]> {
  for (const entry of entries) {
    if (Array.isArray(entry) && entry.length === 2) yield [entry[0], entry[1]]
    else throw ErrNotIterable.create({ valueType: "entries() yielding non-pairs" })
  }
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return typeof value === "object" && value !== null && Symbol.iterator in value
}

/**
 * A suspended iteration. Each `next()` advances one step; once exhausted,
 * every further call returns `[false, null, null]`.
 */
export class IterationCursor {
  private done = false
  private position = 0

  static {
    Inspect(this, (self) => ({
      format: "IterationCursor( step %d%s )",
      params: [self.position, self.done ? " | done" : ""],
    }))
  }

  private constructor(private readonly source: Iterator<readonly [unknown, unknown]>) {}

  static over(value: unknown): IterationCursor {
    if (Array.isArray(value) || types.isMap(value)) {
      return new IterationCursor(value.entries())
    }
    if (types.isSet(value)) {
      return new IterationCursor(positional(value))
    }
    const entries = method(value, "entries")
    if (entries && typeof value === "object") {
      const produced: unknown = Reflect.apply(entries, value, [])
      if (isIterable(produced)) return new IterationCursor(pairs(produced))
    }
    if (isIterable(value)) {
      return new IterationCursor(positional(value))
    }
    if (typeof value === "object" && value !== null) {
      return new IterationCursor(Object.entries(value)[Symbol.iterator]())
    }
    throw ErrNotIterable.create({ valueType: typeName(value) })
  }

  next(): IterationStep {
    if (this.done) return [false, null, null]
    const step = this.source.next()
    if (step.done) {
      this.done = true
      return [false, null, null]
    }
    this.position++
    const [key, value] = step.value
    return [true, key, value]
  }

  static advance(cursor: unknown): IterationStep {
    if (!(cursor instanceof IterationCursor)) throw ErrInvalidCursor.create({ valueType: typeName(cursor) })
    return cursor.next()
  }
}
