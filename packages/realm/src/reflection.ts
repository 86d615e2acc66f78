/**
 * Reflection: describes functions and classes for `funcInfo` / `classInfo`.
 *
 * Parameter lists are read from the function source when no metadata was
 * registered with the function. Types are erased at runtime, so inferred
 * parameters and return types carry no type unless metadata supplies one.
 */

// ============================================================================
// Types
// ============================================================================

export interface ParamInfo {
  readonly name: string
  readonly type: string | null
  readonly hasDefault: boolean
  /** Literal default value when it could be read from the source, else null */
  readonly default: unknown
  readonly isOptional: boolean
  readonly variadic: boolean
}

export interface FunctionMeta {
  readonly doc?: string
  readonly params?: readonly ParamInfo[]
  readonly returnType?: string
}

export interface ClassMeta {
  readonly doc?: string
  readonly interfaces?: readonly string[]
  readonly isAbstract?: boolean
  readonly isInterface?: boolean
  /** Declared public properties */
  readonly properties?: readonly string[]
  readonly methods?: Readonly<Record<string, FunctionMeta>>
}

export interface FuncInfo {
  readonly name: string
  readonly doc: string | null
  readonly params: readonly ParamInfo[]
  readonly returnType: string | null
}

export interface MethodInfo extends FuncInfo {
  readonly static: boolean
  /** Class that declares the method */
  readonly owner: string
}

export interface ClassInfo {
  readonly name: string
  readonly doc: string | null
  readonly consts: ReadonlyMap<string, unknown>
  readonly methods: ReadonlyMap<string, MethodInfo>
  readonly properties: readonly string[]
  readonly interfaces: readonly string[]
  readonly isAbstract: boolean
  readonly isInterface: boolean
  readonly parent: string | null
}

/** Names a constructor the way the realm exposes it */
export type ClassNamer = (cls: Function) => string
/** Metadata registered for a constructor, if any */
export type ClassMetaLookup = (cls: Function) => ClassMeta | undefined

// ============================================================================
// Source scanning
// ============================================================================

const OPENERS = "([{"
const CLOSERS = ")]}"
const QUOTES = "'\"`"

/** Index of the bracket closing the one at `open`, skipping quoted text */
function matchingClose(src: string, open: number): number {
  let depth = 0
  let quote: string | null = null
  for (let i = open; i < src.length; i++) {
    const ch = src[i]
    if (quote) {
      if (ch === "\\") i++
      else if (ch === quote) quote = null
      continue
    }
    if (QUOTES.includes(ch)) quote = ch
    else if (OPENERS.includes(ch)) depth++
    else if (CLOSERS.includes(ch) && --depth === 0) return i
  }
  return -1
}

/** Split at `sep` where it is not nested inside brackets or quotes */
function splitTopLevel(src: string, sep: string, limit = Infinity): string[] {
  const parts: string[] = []
  let depth = 0
  let quote: string | null = null
  let start = 0
  for (let i = 0; i < src.length && parts.length < limit - 1; i++) {
    const ch = src[i]
    if (quote) {
      if (ch === "\\") i++
      else if (ch === quote) quote = null
      continue
    }
    if (QUOTES.includes(ch)) quote = ch
    else if (OPENERS.includes(ch)) depth++
    else if (CLOSERS.includes(ch)) depth--
    else if (depth === 0 && ch === sep && src[i + 1] !== ">" && src[i + 1] !== "=" && src[i - 1] !== "=") {
      parts.push(src.slice(start, i))
      start = i + 1
    }
  }
  parts.push(src.slice(start))
  return parts
}

function stripComments(src: string): string {
  return src.replace(/\/\*[\s\S]*?\*\//g, "").replace(/\/\/[^\n]*/g, "")
}

function readLiteral(text: string): unknown {
  if (text === "undefined") return null
  const quoted = /^'((?:[^'\\]|\\.)*)'$/.exec(text)
  if (quoted) return quoted[1].replace(/\\(.)/g, "$1")
  try {
    const parsed: unknown = JSON.parse(text)
    return typeof parsed === "object" && parsed !== null && !Array.isArray(parsed) ? null : parsed
  } catch {
    // not a literal (an expression or a reference); reported as having a default without a value
    return null
  }
}

function parseParam(raw: string, index: number): ParamInfo | null {
  const text = raw.trim()
  if (text === "") return null

  const variadic = text.startsWith("...")
  const body = variadic ? text.slice(3).trim() : text
  const [target, defaultText] = splitTopLevel(body, "=", 2).map((s) => s.trim())
  const hasDefault = defaultText !== undefined
  const name = /^[A-Za-z_$][\w$]*$/.test(target) ? target : `arg${index}`

  return {
    name,
    type: null,
    hasDefault,
    default: hasDefault ? readLiteral(defaultText) : null,
    isOptional: hasDefault || variadic,
    variadic,
  }
}

function parameterSource(src: string, isClassSource: boolean): string | null {
  const code = stripComments(src)
  if (isClassSource) {
    const ctor = /\bconstructor\s*\(/.exec(code)
    if (!ctor) return null
    const open = ctor.index + ctor[0].length - 1
    return code.slice(open + 1, matchingClose(code, open))
  }
  const bareArrow = /^\s*(?:async\s+)?([A-Za-z_$][\w$]*)\s*=>/.exec(code)
  if (bareArrow) return bareArrow[1]
  const open = code.indexOf("(")
  if (open === -1) return ""
  return code.slice(open + 1, matchingClose(code, open))
}

export function isClassConstructor(value: unknown): value is Function {
  return typeof value === "function" && /^class[\s{]/.test(Function.prototype.toString.call(value))
}

/** Parent constructor of a class, or undefined at the root */
export function parentClass(cls: Function): Function | undefined {
  const parent: unknown = Object.getPrototypeOf(cls)
  return typeof parent === "function" && parent !== Function.prototype ? parent : undefined
}

/** Parameters of a function or class constructor, read from its source */
export function inferParams(fn: Function): ParamInfo[] {
  const src = Function.prototype.toString.call(fn)
  if (src.includes("[native code]")) return []

  const isClassSource = isClassConstructor(fn)
  const params = parameterSource(src, isClassSource)
  if (params === null) {
    // a class without its own constructor takes its parent's
    const parent = parentClass(fn)
    return parent ? inferParams(parent) : []
  }

  const result: ParamInfo[] = []
  splitTopLevel(params, ",").forEach((raw, i) => {
    const param = parseParam(raw, i)
    if (param) result.push(param)
  })
  return result
}

// ============================================================================
// Descriptions
// ============================================================================

export function describeFunction(name: string, fn: Function | undefined, meta: FunctionMeta = {}): FuncInfo {
  return {
    name,
    doc: meta.doc ?? null,
    params: meta.params ?? (fn ? inferParams(fn) : []),
    returnType: meta.returnType ?? null,
  }
}

const STATIC_BUILTINS = new Set(["length", "name", "prototype", "caller", "arguments"])

export function describeClass(
  name: string,
  cls: Function,
  meta: ClassMeta,
  nameOf: ClassNamer,
  metaOf: ClassMetaLookup,
): ClassInfo {
  const consts = new Map<string, unknown>()
  const methods = new Map<string, MethodInfo>()

  for (let current: Function | undefined = cls; current; current = parentClass(current)) {
    const owner = nameOf(current)
    const ownerMeta = current === cls ? meta : metaOf(current) ?? {}

    const prototype: unknown = Reflect.get(current, "prototype")
    if (typeof prototype === "object" && prototype !== null) {
      for (const key of Object.getOwnPropertyNames(prototype)) {
        if (key === "constructor" || methods.has(key)) continue
        const method: unknown = Object.getOwnPropertyDescriptor(prototype, key)?.value
        if (typeof method !== "function") continue
        methods.set(key, { ...describeFunction(key, method, ownerMeta.methods?.[key]), static: false, owner })
      }
    }

    for (const key of Object.getOwnPropertyNames(current)) {
      if (STATIC_BUILTINS.has(key)) continue
      const value: unknown = Object.getOwnPropertyDescriptor(current, key)?.value
      if (typeof value === "function") {
        if (!methods.has(key)) {
          methods.set(key, { ...describeFunction(key, value, ownerMeta.methods?.[key]), static: true, owner })
        }
      } else if (!consts.has(key)) {
        consts.set(key, value)
      }
    }
  }

  const parent = parentClass(cls)
  return {
    name,
    doc: meta.doc ?? null,
    consts,
    methods,
    properties: meta.properties ?? [],
    interfaces: meta.interfaces ?? [],
    isAbstract: meta.isAbstract ?? false,
    isInterface: meta.isInterface ?? false,
    parent: parent ? nameOf(parent) : null,
  }
}
