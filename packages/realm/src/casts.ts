/**
 * Loose type conversions exposed as the cast pseudo-functions
 * (`int`, `float`, `bool`, `string`, `array`, `object`) and used by the
 * `str` command.
 */

import { types } from "node:util"
import { constructorName, formatDouble } from "@crossline/core"
import { ErrNotStringable } from "./errors.js"
import { Resource } from "./resource.js"

const LEADING_NUMBER = /^\s*[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?/

function leadingNumber(text: string): number {
  const match = LEADING_NUMBER.exec(text)
  return match ? Number(match[0]) : 0
}

function isEmptyCollection(value: unknown): boolean {
  return (Array.isArray(value) && value.length === 0) || (types.isMap(value) && value.size === 0)
}

export function toBool(value: unknown): boolean {
  if (value === "0") return false
  if (isEmptyCollection(value)) return false
  return Boolean(value)
}

export function toFloat(value: unknown): number {
  if (typeof value === "number") return value
  if (typeof value === "string") return leadingNumber(value)
  if (value instanceof Resource) return value.id
  return toBool(value) ? 1 : 0
}

export function toInt(value: unknown): number {
  const n = toFloat(value)
  if (!Number.isFinite(n)) return 0
  return Math.trunc(n)
}

function hasCustomToString(value: object): boolean {
  const method: unknown = Reflect.get(value, "toString")
  return typeof method === "function" && method !== Object.prototype.toString
}

export function toStr(value: unknown): string {
  switch (typeof value) {
    case "undefined":
      return ""
    case "string":
      return value
    case "boolean":
      return value ? "1" : ""
    case "number":
      if (Number.isNaN(value)) return "NAN"
      if (value === Infinity) return "INF"
      if (value === -Infinity) return "-INF"
      return Number.isInteger(value) && !Object.is(value, -0) ? String(value) : formatDouble(value).replace(/\.0$/, "")
    case "bigint":
      return value.toString()
    case "symbol":
      return value.description ?? ""
    case "function":
    case "object":
      if (value === null) return ""
      if (Array.isArray(value) || types.isMap(value)) return "Array"
      if (value instanceof Resource) return `Resource id #${value.id}`
      if (hasCustomToString(value)) return String(value)
      throw ErrNotStringable.create({ valueType: constructorName(value) })
  }
}

/** Collections pass through; objects become a key/value map; scalars a one-item list */
export function toArray(value: unknown): unknown[] | Map<unknown, unknown> {
  if (value === null || value === undefined) return []
  if (Array.isArray(value) || types.isMap(value)) return value
  if (typeof value === "object") return new Map(Object.entries(value))
  return [value]
}

/** Objects pass through; collections become a plain object; scalars `{scalar}` */
export function toObject(value: unknown): object {
  if (value === null || value === undefined) return {}
  if (Array.isArray(value)) return Object.fromEntries(value.entries())
  if (types.isMap(value)) return Object.fromEntries(Array.from(value, ([key, item]): [string, unknown] => [String(key), item]))
  if (typeof value === "object" || typeof value === "function") return value
  return { scalar: value }
}
