/**
 * ValueCodec: converts between native values and wire values.
 *
 * The only place that understands the wire format. Scalars and collections
 * are copied; everything else becomes a handle in the ObjectStore, so
 * `decode(encode(obj)) === obj`.
 *
 * What counts as a resource, and which class name the client sees for an
 * object, is decided by a ValueClassifier supplied by the runtime side.
 */

import { types } from "node:util"
import { BridgeError } from "./bridge-error.js"
import { ErrDecodingFailed, ErrEncodingFailed, ErrLegacyException } from "./errors/errors.js"
import { ObjectStore } from "./object-store.js"
import {
  WireValue,
  type Handle,
  type ThrownExceptionPayload,
  type WireArrayEntry,
  type WireKey,
  type WireObject,
  type WireThrownException,
} from "./wire.js"

// ============================================================================
// Classification
// ============================================================================

export interface ResourceIdentity {
  readonly id: number
  readonly kind: string
}

export interface ValueClassifier {
  /** Resource identity when the value is a resource, otherwise undefined */
  resourceOf(value: object): ResourceIdentity | undefined
  /** Class name the client should see for an object */
  classNameOf(value: object): string
}

export function constructorName(value: object): string {
  const ctor: unknown = Reflect.get(value, "constructor")
  if (typeof ctor === "function" && ctor.name) return ctor.name
  return "Object"
}

export const DefaultClassifier: ValueClassifier = {
  resourceOf: () => undefined,
  classNameOf: constructorName,
}

// ============================================================================
// Helpers
// ============================================================================

const INTEGER_KEY = /^(0|-?[1-9]\d*)$/

/** Integer-like string keys become numbers, as they would in an associative array */
function normalizeKey(key: string): WireKey {
  if (INTEGER_KEY.test(key)) {
    const n = Number(key)
    if (Number.isSafeInteger(n)) return n
  }
  return key
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function isWireKey(key: unknown): key is WireKey {
  return typeof key === "string" || (typeof key === "number" && Number.isSafeInteger(key))
}

function typeNameOf(value: unknown): string {
  if (value === null) return "null"
  if (typeof value === "object") return constructorName(value)
  return typeof value
}

// ============================================================================
// Codec
// ============================================================================

export class ValueCodec {
  constructor(
    readonly store: ObjectStore = new ObjectStore(),
    private readonly classifier: ValueClassifier = DefaultClassifier,
  ) {}

  encode(value: unknown): WireValue {
    return this.encodeWithin(value, new Set())
  }

  decode(wire: unknown): unknown {
    if (!isRecord(wire)) {
      throw ErrDecodingFailed.create({ tag: typeNameOf(wire), reason: "expected a {type, value} object" })
    }
    const tag = wire.type
    const value = wire.value
    if (typeof tag !== "string") {
      throw ErrDecodingFailed.create({ tag: typeNameOf(tag), reason: "type tag must be a string" })
    }

    switch (tag) {
      case "integer":
        if (typeof value !== "number" || !Number.isInteger(value)) {
          throw ErrDecodingFailed.create({ tag, reason: "value is not an integer" })
        }
        // JSON.parse has already rounded anything past 2^53
        if (!Number.isSafeInteger(value)) {
          throw ErrDecodingFailed.create({ tag, reason: "integer outside the safe range" })
        }
        return value
      case "double":
        return this.decodeDouble(value)
      case "string":
        if (typeof value === "string") return value
        throw ErrDecodingFailed.create({ tag, reason: "value is not a string" })
      case "boolean":
        if (typeof value === "boolean") return value
        throw ErrDecodingFailed.create({ tag, reason: "value is not a boolean" })
      case "NULL":
        return null
      case "array":
        return this.decodeArray(value)
      case "bytes":
        if (typeof value === "string") return Buffer.from(value, "base64")
        throw ErrDecodingFailed.create({ tag, reason: "value is not base64 text" })
      case "object":
      case "resource":
        return this.store.decode(this.handleOf(tag, value))
      case "thrownException":
        // Kept for clients of the older dialect that echo an exception back as a value
        throw ErrLegacyException.create({
          kind: isRecord(value) && typeof value.type === "string" ? value.type : "Exception",
          embeddedMessage: isRecord(value) && typeof value.message === "string"
            ? value.message
            : typeof wire.message === "string" ? wire.message : "",
        })
      default:
        throw ErrDecodingFailed.create({ tag, reason: "unknown type" })
    }
  }

  /** Decode a list of wire values, e.g. call arguments */
  decodeList(items: readonly unknown[]): unknown[] {
    return items.map((item) => this.decode(item))
  }

  /**
   * Build the thrownException envelope for anything thrown while serving a
   * command. Thrown objects are also stored, so the client can inspect them.
   */
  encodeThrown(thrown: unknown): WireThrownException {
    const serialized = BridgeError.serialize(thrown)
    let object: WireObject | undefined
    if ((typeof thrown === "object" && thrown !== null) || typeof thrown === "function") {
      object = WireValue.object(this.classifier.classNameOf(thrown), this.store.encodeObject(thrown))
    }
    const payload: ThrownExceptionPayload = {
      type: serialized.code ?? serialized.name ?? "Error",
      message: serialized.message,
      code: serialized.code,
      facets: serialized.facets,
      data: serialized.data,
      object,
    }
    return WireValue.thrownException(payload)
  }

  // --------------------------------------------------------------------------

  private encodeWithin(value: unknown, path: Set<object>): WireValue {
    switch (typeof value) {
      case "undefined":
        return WireValue.null()
      case "boolean":
        return WireValue.boolean(value)
      case "string":
        return WireValue.string(value)
      case "number":
        return Number.isSafeInteger(value) && !Object.is(value, -0)
          ? WireValue.integer(value)
          : WireValue.double(value)
      case "bigint":
      case "symbol":
        throw ErrEncodingFailed.create({ valueType: typeof value })
      case "function":
        return WireValue.object(this.classifier.classNameOf(value), this.store.encodeObject(value))
      case "object":
        if (value === null) return WireValue.null()
        return this.encodeObjectLike(value, path)
    }
  }

  private encodeObjectLike(value: object, path: Set<object>): WireValue {
    if (Array.isArray(value) || types.isMap(value)) {
      if (path.has(value)) {
        throw ErrEncodingFailed.create({ valueType: constructorName(value), reason: "collection contains itself" })
      }
      path.add(value)
      try {
        if (Array.isArray(value)) {
          return WireValue.list(Array.from(value, (item: unknown) => this.encodeWithin(item, path)))
        }
        const entries: WireArrayEntry[] = []
        for (const [key, item] of value) {
          if (!isWireKey(key)) {
            throw ErrEncodingFailed.create({ valueType: "Map", reason: `key of type '${typeNameOf(key)}'` })
          }
          entries.push([key, this.encodeWithin(item, path)])
        }
        return WireValue.entries(entries)
      } finally {
        path.delete(value)
      }
    }

    if (types.isUint8Array(value)) {
      return WireValue.bytes(Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString("base64"))
    }

    const resource = this.classifier.resourceOf(value)
    if (resource) {
      return WireValue.resource(resource.kind, this.store.encodeResource(resource.id, value))
    }
    return WireValue.object(this.classifier.classNameOf(value), this.store.encodeObject(value))
  }

  private decodeDouble(value: unknown): number {
    if (typeof value === "number") return value
    if (value === "NAN") return NaN
    if (value === "INF") return Infinity
    if (value === "-INF") return -Infinity
    throw ErrDecodingFailed.create({ tag: "double", reason: "value is not a number" })
  }

  private decodeArray(value: unknown): unknown[] | Map<WireKey, unknown> {
    if (Array.isArray(value)) {
      const items: unknown[] = value
      if (items.length === 0 || !items.every((item) => Array.isArray(item))) {
        return items.map((item) => this.decode(item))
      }
      const map = new Map<WireKey, unknown>()
      for (const entry of items) {
        const pair: unknown[] = Array.isArray(entry) ? entry : []
        const key = pair[0]
        if (pair.length !== 2 || !isWireKey(key)) {
          throw ErrDecodingFailed.create({ tag: "array", reason: "entries must be [key, value] pairs" })
        }
        map.set(key, this.decode(pair[1]))
      }
      return map
    }
    if (isRecord(value)) {
      const map = new Map<WireKey, unknown>()
      for (const [key, item] of Object.entries(value)) {
        map.set(normalizeKey(key), this.decode(item))
      }
      return map
    }
    throw ErrDecodingFailed.create({ tag: "array", reason: "value is not a list or a mapping" })
  }

  private handleOf(tag: string, value: unknown): Handle {
    const hash = isRecord(value) ? value.hash : value
    if (typeof hash === "string" || (typeof hash === "number" && Number.isSafeInteger(hash))) return hash
    throw ErrDecodingFailed.create({ tag, reason: "missing handle" })
  }
}
