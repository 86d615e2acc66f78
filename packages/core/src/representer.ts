/**
 * Representer: terse, depth-limited, human-readable rendering of any value.
 *
 * A representation is either a literal that would evaluate back to the same
 * value, or a description inside `<` and `>`. Independent of the wire codec.
 *
 * Subclasses change the output by overriding `tokens` and `convertClassName`;
 * see PythonRepresenter.
 */

import { types } from "node:util"
import { DefaultClassifier, type ValueClassifier } from "./value-codec.js"
import { formatDouble } from "./wire-json.js"

// ============================================================================
// Types
// ============================================================================

/** Values that render themselves. `depth` is already decremented. */
export interface Representable {
  represent(representer: Representer, depth: number): string
}

export interface RepresenterTokens {
  readonly true: string
  readonly false: string
  readonly null: string
  readonly nan: string
  readonly inf: string
  readonly negInf: string
  readonly seqDelims: readonly [string, string]
  readonly assocDelims: readonly [string, string]
  readonly keySep: string
  readonly itemSep: string
  readonly objectIden: string
  readonly resourceIden: string
}

export interface RepresenterOptions {
  classifier?: ValueClassifier
  /** Identity shown for opaque objects, after `0x` */
  identityOf?: (value: object) => string
}

export function isRepresentable(value: unknown): value is Representable {
  return typeof value === "object" && value !== null && "represent" in value && typeof value.represent === "function"
}

// ============================================================================
// Representer
// ============================================================================

export class Representer {
  protected readonly tokens: RepresenterTokens = {
    true: "true",
    false: "false",
    null: "null",
    nan: "NAN",
    inf: "INF",
    negInf: "-INF",
    seqDelims: ["[", "]"],
    assocDelims: ["[", "]"],
    keySep: " => ",
    itemSep: ", ",
    objectIden: "object",
    resourceIden: "resource",
  }

  private readonly classifier: ValueClassifier
  private readonly identityOf: (value: object) => string

  constructor(options: RepresenterOptions = {}) {
    this.classifier = options.classifier ?? DefaultClassifier
    this.identityOf = options.identityOf ?? sequentialIdentity()
  }

  render(value: unknown, depth = 2): string {
    depth -= 1

    switch (typeof value) {
      case "undefined":
        return this.tokens.null
      case "boolean":
        return value ? this.tokens.true : this.tokens.false
      case "number":
        return this.renderNumber(value)
      case "string":
        return this.renderString(value)
      case "bigint":
      case "symbol":
        return `<${typeof value}>`
      case "object":
      case "function":
        if (value === null) return this.tokens.null
        if (isRepresentable(value)) return value.represent(this, depth)
        if (Array.isArray(value)) return this.renderEntries(value.entries(), value.length, depth)
        if (types.isMap(value)) return this.renderEntries(value.entries(), value.size, depth)
        return this.renderObject(value, depth)
    }
  }

  /** Rewrite a class name into the consumer's notation */
  protected convertClassName(name: string): string {
    return name
  }

  protected renderNumber(value: number): string {
    if (Number.isNaN(value)) return this.tokens.nan
    if (value === Infinity) return this.tokens.inf
    if (value === -Infinity) return this.tokens.negInf
    if (Number.isSafeInteger(value) && !Object.is(value, -0)) return String(value)
    return formatDouble(value)
  }

  protected renderString(value: string): string {
    return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`
  }

  // --------------------------------------------------------------------------

  private renderEntries(entries: Iterable<readonly [unknown, unknown]>, size: number, depth: number): string {
    const t = this.tokens
    if (size === 0) return t.assocDelims.join("")

    const pairs = [...entries]
    const sequential = pairs.every(([key], i) => key === i)
    if (depth <= 0) {
      return sequential
        ? `${t.assocDelims[0]}... (${size})${t.assocDelims[1]}`
        : `${t.seqDelims[0]}...${t.keySep}(${size})${t.seqDelims[1]}`
    }

    if (sequential) {
      const items = pairs.map(([, item]) => this.render(item, depth))
      return `${t.seqDelims[0]}${items.join(t.itemSep)}${t.seqDelims[1]}`
    }
    const items = pairs.map(([key, item]) => `${this.render(key, depth)}${t.keySep}${this.render(item, depth)}`)
    return `${t.assocDelims[0]}${items.join(t.itemSep)}${t.assocDelims[1]}`
  }

  private renderObject(value: object, depth: number): string {
    const resource = this.classifier.resourceOf(value)
    if (resource) {
      return `<${resource.kind} ${this.tokens.resourceIden} id #${resource.id}>`
    }

    const properties = Object.entries(value)
    if (depth <= 0 || properties.length === 0) return this.renderOpaque(value)

    const cls = this.convertClassName(this.classifier.classNameOf(value))
    const rendered = properties.map(([key, item]) => `${key}=${this.render(item, depth)}`)
    return `<${cls} ${this.tokens.objectIden} (${rendered.join(", ")})>`
  }

  private renderOpaque(value: object): string {
    const cls = this.convertClassName(this.classifier.classNameOf(value))
    return `<${cls} ${this.tokens.objectIden} 0x${this.identityOf(value)}>`
  }
}

function sequentialIdentity(): (value: object) => string {
  const ids = new WeakMap<object, number>()
  let next = 0
  return (value) => {
    let id = ids.get(value)
    if (id === undefined) {
      id = ++next
      ids.set(value, id)
    }
    return id.toString(16).padStart(8, "0")
  }
}

// ============================================================================
// PythonRepresenter
// ============================================================================

/** Renders values in Python syntax, with class names as dotted module paths */
export class PythonRepresenter extends Representer {
  protected override readonly tokens: RepresenterTokens = {
    true: "True",
    false: "False",
    null: "None",
    nan: "nan",
    inf: "inf",
    negInf: "-inf",
    seqDelims: ["[", "]"],
    assocDelims: ["{", "}"],
    keySep: ": ",
    itemSep: ", ",
    objectIden: "JS object",
    resourceIden: "JS resource",
  }

  constructor(private readonly module = "", options: RepresenterOptions = {}) {
    super(options)
  }

  protected override convertClassName(name: string): string {
    const dotted = name.replace(/\\/g, ".")
    return this.module === "" ? dotted : `${this.module}.${dotted}`
  }
}
