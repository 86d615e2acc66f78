/**
 * WireJson: line framing for the pipe.
 *
 * One JSON value per line. The writer never emits a literal newline (strings
 * are escaped) and keeps integral doubles distinguishable from integers:
 * `{"type":"double","value":2}` is written as `2.0`.
 *
 * Node 20's JSON.stringify has no raw-number hook, so the writer walks the
 * value itself and delegates leaves to JSON.stringify.
 */

import { StaticTypeCompanion } from "./type-system-utils.js"
import { ErrEncodingFailed, ErrMalformedJson } from "./errors/errors.js"

/** JSON literal for a finite double, always with a fraction or exponent */
export function formatDouble(n: number): string {
  if (!Number.isFinite(n)) {
    throw ErrEncodingFailed.create({ valueType: "double", reason: "non-finite number in numeric position" })
  }
  if (Object.is(n, -0)) return "-0.0"
  const text = JSON.stringify(n)
  return /[.eE]/.test(text) ? text : `${text}.0`
}

function write(value: unknown, parts: string[]): void {
  if (value === null) {
    parts.push("null")
    return
  }
  switch (typeof value) {
    case "string":
      parts.push(JSON.stringify(value))
      return
    case "boolean":
      parts.push(value ? "true" : "false")
      return
    case "number":
      if (!Number.isFinite(value)) {
        throw ErrEncodingFailed.create({ valueType: "number", reason: "non-finite number in numeric position" })
      }
      parts.push(JSON.stringify(value))
      return
    case "object":
      break
    default:
      throw ErrEncodingFailed.create({ valueType: typeof value, reason: "not representable in JSON" })
  }

  if (Array.isArray(value)) {
    parts.push("[")
    value.forEach((item, i) => {
      if (i > 0) parts.push(",")
      write(item === undefined ? null : item, parts)
    })
    parts.push("]")
    return
  }

  const isDouble = "type" in value && value.type === "double"
  parts.push("{")
  let first = true
  for (const [key, item] of Object.entries(value)) {
    if (item === undefined) continue
    if (!first) parts.push(",")
    first = false
    parts.push(JSON.stringify(key), ":")
    if (isDouble && key === "value" && typeof item === "number") {
      parts.push(formatDouble(item))
    } else {
      write(item, parts)
    }
  }
  parts.push("}")
}

export const WireJson = StaticTypeCompanion({
  /** Serialize one message as a single line (without the trailing newline) */
  stringify(value: unknown): string {
    const parts: string[] = []
    write(value, parts)
    return parts.join("")
  },

  /** Parse one received line */
  parse(line: string): unknown {
    try {
      const parsed: unknown = JSON.parse(line)
      return parsed
    } catch (e) {
      throw ErrMalformedJson.create({ reason: e instanceof Error ? e.message : String(e) })
    }
  },
})
