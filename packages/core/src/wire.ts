/**
 * Wire values: the `{type, value}` tagged JSON representation of every value
 * crossing the pipe.
 *
 * Scalars and collections are copied. Objects and resources are never
 * copied: they travel as a Handle issued by the ObjectStore.
 */

import { StaticTypeCompanion } from "./type-system-utils.js"
import type { SoftBrand } from "./brand.js"

// ============================================================================
// Handles
// ============================================================================

/** Identifies one live object for the lifetime of a session */
export type ObjectHandle = SoftBrand<string, "object-handle">

/** Identifies one live resource; the resource's own id */
export type ResourceHandle = SoftBrand<number, "resource-handle">

export type Handle = ObjectHandle | ResourceHandle

// ============================================================================
// Wire Values
// ============================================================================

export type NonFiniteDouble = "NAN" | "INF" | "-INF"

export interface WireInteger { readonly type: "integer"; readonly value: number }
export interface WireDouble { readonly type: "double"; readonly value: number | NonFiniteDouble }
export interface WireString { readonly type: "string"; readonly value: string }
export interface WireBoolean { readonly type: "boolean"; readonly value: boolean }
export interface WireNull { readonly type: "NULL"; readonly value: null }

/** Integer or string key of an associative array */
export type WireKey = string | number

export type WireArrayEntry = readonly [WireKey, WireValue]

/**
 * A list of values (sequential), or a list of [key, value] pairs
 * (associative; keys need not be contiguous, order is kept). An empty
 * associative array is the JSON object `{}`.
 */
export interface WireArray {
  readonly type: "array"
  readonly value: readonly WireValue[] | readonly WireArrayEntry[] | Readonly<Record<string, WireValue>>
}

/** Base64 text of a byte buffer */
export interface WireBytes { readonly type: "bytes"; readonly value: string }

export interface WireObject {
  readonly type: "object"
  readonly value: { readonly class: string; readonly hash: ObjectHandle }
}

export interface WireResource {
  readonly type: "resource"
  readonly value: { readonly type: string; readonly hash: ResourceHandle }
}

export interface ThrownExceptionPayload {
  /** Error kind: a BridgeError code, or the JS error name */
  readonly type: string
  readonly message: string
  readonly code?: string
  readonly facets?: readonly string[]
  readonly data?: Readonly<Record<string, unknown>>
  /** The thrown value itself, when it is an object the client may inspect */
  readonly object?: WireObject
}

export interface WireThrownException {
  readonly type: "thrownException"
  readonly value: ThrownExceptionPayload
}

export type WireValue =
  | WireInteger
  | WireDouble
  | WireString
  | WireBoolean
  | WireNull
  | WireArray
  | WireBytes
  | WireObject
  | WireResource

/** Anything that may be written as a response line */
export type WireResponse = WireValue | WireThrownException

export type WireTag = WireResponse["type"]

export const WIRE_TAGS: readonly WireTag[] = [
  "integer", "double", "string", "boolean", "NULL", "array", "bytes", "object", "resource", "thrownException",
]

// ============================================================================
// Companion
// ============================================================================

export const WireValue = StaticTypeCompanion({
  integer(value: number): WireInteger {
    return { type: "integer", value }
  },

  double(value: number): WireDouble {
    if (Number.isNaN(value)) return { type: "double", value: "NAN" }
    if (value === Infinity) return { type: "double", value: "INF" }
    if (value === -Infinity) return { type: "double", value: "-INF" }
    return { type: "double", value }
  },

  string(value: string): WireString {
    return { type: "string", value }
  },

  boolean(value: boolean): WireBoolean {
    return { type: "boolean", value }
  },

  null(): WireNull {
    return { type: "NULL", value: null }
  },

  list(items: readonly WireValue[]): WireArray {
    return { type: "array", value: items }
  },

  entries(entries: readonly WireArrayEntry[]): WireArray {
    return { type: "array", value: entries.length === 0 ? {} : entries }
  },

  bytes(base64: string): WireBytes {
    return { type: "bytes", value: base64 }
  },

  object(className: string, hash: ObjectHandle): WireObject {
    return { type: "object", value: { class: className, hash } }
  },

  resource(kind: string, hash: ResourceHandle): WireResource {
    return { type: "resource", value: { type: kind, hash } }
  },

  thrownException(payload: ThrownExceptionPayload): WireThrownException {
    return { type: "thrownException", value: payload }
  },

  isTag(tag: unknown): tag is WireTag {
    return WIRE_TAGS.some((known) => known === tag)
  },
})
