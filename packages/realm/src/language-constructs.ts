/**
 * Language constructs: syntax rather than callables (output, eval,
 * include/require, exit, casts), exposed as pseudo-functions so `callFun`,
 * `funcInfo` and `listFuns` treat them like any other function.
 *
 * A real function registered under the same name always wins.
 */

import { types } from "node:util"
import { toArray, toBool, toFloat, toInt, toObject, toStr } from "./casts.js"
import { ErrExitRequested } from "./errors.js"
import type { ParamInfo, FunctionMeta } from "./reflection.js"
import type { Realm } from "./realm.js"

export interface LanguageConstruct {
  readonly name: string
  readonly meta: FunctionMeta
  invoke(realm: Realm, args: readonly unknown[]): unknown
}

// ============================================================================
// Parameter shorthands
// ============================================================================

function required(name: string, type: string | null = null): ParamInfo {
  return { name, type, hasDefault: false, default: null, isOptional: false, variadic: false }
}

function optional(name: string, fallback: unknown, type: string | null = null): ParamInfo {
  return { name, type, hasDefault: true, default: fallback, isOptional: true, variadic: false }
}

function variadic(name: string): ParamInfo {
  return { name, type: null, hasDefault: false, default: null, isOptional: true, variadic: true }
}

// ============================================================================
// Constructs
// ============================================================================

function exit(realm: Realm, args: readonly unknown[]): never {
  const [status = 0] = args
  if (typeof status === "string") {
    realm.write(status)
    throw ErrExitRequested.create({ status: 0 })
  }
  throw ErrExitRequested.create({ status: toInt(status) })
}

function include(mode: "include" | "require", once: boolean) {
  return async (realm: Realm, args: readonly unknown[]): Promise<boolean> => {
    const file = toStr(args[0])
    try {
      if (once) {
        await realm.modules.loadOnce(file)
      } else {
        await realm.modules.load(file)
      }
      return true
    } catch (err) {
      if (mode === "require") throw err
      // include degrades to a warning and a false result
      process.emitWarning(types.isNativeError(err) ? err.message : String(err), "IncludeWarning")
      return false
    }
  }
}

function cast(name: string, returnType: string, convert: (value: unknown) => unknown): LanguageConstruct {
  return {
    name,
    meta: { doc: `Convert a value to ${returnType}.`, params: [required("value")], returnType },
    invoke: (_realm, args) => convert(args[0]),
  }
}

const constructs: LanguageConstruct[] = [
  {
    name: "echo",
    meta: { doc: "Output one or more strings.", params: [required("arg1"), variadic("rest")], returnType: "void" },
    invoke(realm, args) {
      realm.write(args.map(toStr).join(""))
      return null
    },
  },
  {
    name: "print",
    meta: { doc: "Output a string. Always returns 1.", params: [required("arg")], returnType: "int" },
    invoke(realm, args) {
      realm.write(toStr(args[0]))
      return 1
    },
  },
  {
    name: "eval",
    meta: { doc: "Evaluate a string as code in the realm's global scope.", params: [required("code", "string")], returnType: "mixed" },
    invoke: (realm, args) => realm.evaluate(toStr(args[0])),
  },
  {
    name: "exit",
    meta: { doc: "End the session, printing the status if it is a string.", params: [optional("status", 0)], returnType: "void" },
    invoke: exit,
  },
  {
    name: "die",
    meta: { doc: "Equivalent to exit.", params: [optional("status", 0)], returnType: "void" },
    invoke: exit,
  },
  {
    name: "include",
    meta: { doc: "Load a module; a failure is a warning.", params: [required("file", "string")], returnType: "bool" },
    invoke: include("include", false),
  },
  {
    name: "require",
    meta: { doc: "Load a module; a failure is an error.", params: [required("file", "string")], returnType: "bool" },
    invoke: include("require", false),
  },
  {
    name: "include_once",
    meta: { doc: "Load a module unless it was loaded before; a failure is a warning.", params: [required("file", "string")], returnType: "bool" },
    invoke: include("include", true),
  },
  {
    name: "require_once",
    meta: { doc: "Load a module unless it was loaded before; a failure is an error.", params: [required("file", "string")], returnType: "bool" },
    invoke: include("require", true),
  },
  cast("int", "int", toInt),
  cast("float", "float", toFloat),
  cast("bool", "bool", toBool),
  cast("string", "string", toStr),
  cast("array", "array", toArray),
  cast("object", "object", toObject),
]

export const LanguageConstructs: ReadonlyMap<string, LanguageConstruct> = new Map(
  constructs.map((construct): [string, LanguageConstruct] => [construct.name, construct]),
)
