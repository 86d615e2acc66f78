/**
 * CommandSet: the catalogue of operations a client can run against a realm.
 *
 * Receives validated requests, decodes the wire values they carry, and
 * returns native results for the dispatcher to encode. Structured results
 * (reflection, name resolution) are built from Maps and Arrays so they
 * cross the wire as associative and sequential arrays.
 *
 * Adding a command requires updating:
 * 1. the request shape in protocol.ts: `execute` stops compiling until handled
 * 2. the case below
 * 3. its catalogue entry in COMMAND_DESCRIPTIONS
 */

import { assertNever, Representer, ValueCodec } from "@crossline/core"
import {
  callMethod,
  callValue,
  count,
  delItem,
  getItem,
  getProperty,
  hasItem,
  IterationCursor,
  listProperties,
  setItem,
  setProperty,
  toStr,
  unsetProperty,
  type ClassInfo,
  type FuncInfo,
  type MethodInfo,
  type ParamInfo,
  type Realm,
} from "@crossline/realm"
import type { CommandName, CommandRequest } from "./protocol.js"

export interface CommandSetOptions {
  /** Depth for `repr` */
  reprDepth?: number
  representer?: Representer
}

export class CommandSet {
  readonly codec: ValueCodec
  private readonly representer: Representer
  private readonly reprDepth: number

  constructor(readonly realm: Realm, options: CommandSetOptions = {}) {
    this.codec = new ValueCodec(undefined, realm.classifier)
    this.representer = options.representer ?? new Representer({ classifier: realm.classifier })
    this.reprDepth = options.reprDepth ?? 2
  }

  /** Run one command; the result may be a promise when realm code is async */
  execute(request: CommandRequest): unknown {
    const realm = this.realm
    const decode = (wire: unknown) => this.codec.decode(wire)
    const decodeList = (items: readonly unknown[]) => this.codec.decodeList(items)

    switch (request.cmd) {
      case "getConst":
        return realm.getConstant(request.data)
      case "setConst":
        realm.defineConstant(request.data.name, decode(request.data.value))
        return null
      case "getGlobal":
        return realm.getGlobal(request.data)
      case "setGlobal":
        realm.setGlobal(request.data.name, decode(request.data.value))
        return null
      case "callFun":
        return realm.callFunction(request.data.name, decodeList(request.data.args))
      case "createObject":
        return realm.construct(request.data.name, decodeList(request.data.args))
      case "callObj":
        return callValue(decode(request.data.obj), decodeList(request.data.args))
      case "callMethod":
        return callMethod(decode(request.data.obj), request.data.name, decodeList(request.data.args))
      case "hasItem":
        return hasItem(decode(request.data.obj), decode(request.data.offset))
      case "getItem":
        return getItem(decode(request.data.obj), decode(request.data.offset))
      case "setItem":
        setItem(decode(request.data.obj), decode(request.data.offset), decode(request.data.value))
        return null
      case "delItem":
        delItem(decode(request.data.obj), decode(request.data.offset))
        return null
      case "getProperty":
        return getProperty(decode(request.data.obj), request.data.name)
      case "setProperty":
        setProperty(decode(request.data.obj), request.data.name, decode(request.data.value))
        return null
      case "unsetProperty":
        unsetProperty(decode(request.data.obj), request.data.name)
        return null
      case "listProperties":
        return listProperties(decode(request.data))
      case "listNonDefaultProperties":
        return realm.nonDefaultProperties(decode(request.data))
      case "classInfo":
        return classInfoValue(realm.classInfo(request.data))
      case "funcInfo":
        return funcInfoValue(realm.functionInfo(request.data))
      case "listConsts":
        return realm.constantNames()
      case "listGlobals":
        return realm.globalNames()
      case "listFuns":
        return realm.functionNames()
      case "listClasses":
        return realm.classNames()
      case "resolveName":
        return [...realm.resolveName(request.data)]
      case "repr":
        return this.representer.render(decode(request.data), this.reprDepth)
      case "str":
        return toStr(decode(request.data))
      case "count":
        return count(decode(request.data))
      case "startIteration":
        return IterationCursor.over(decode(request.data))
      case "nextIteration":
        return [...IterationCursor.advance(decode(request.data))]
      default:
        return assertNever(request, "command")
    }
  }
}

// ============================================================================
// Catalogue
// ============================================================================

export const COMMAND_DESCRIPTIONS: Readonly<Record<CommandName, string>> = {
  getConst: "Read a constant",
  setConst: "Define a constant",
  getGlobal: "Read a global variable (GLOBALS for all of them)",
  setGlobal: "Assign a global variable",
  callFun: "Call a function or language construct by name",
  createObject: "Construct an instance of a class",
  callObj: "Invoke a callable value",
  callMethod: "Call a method on an object",
  hasItem: "Whether an offset is set",
  getItem: "Read an offset",
  setItem: "Assign an offset (null appends)",
  delItem: "Remove an offset",
  getProperty: "Read a property",
  setProperty: "Assign a property",
  unsetProperty: "Remove a property",
  listProperties: "Public property names of an object",
  listNonDefaultProperties: "Properties an object has beyond those its class declares",
  classInfo: "Describe a class",
  funcInfo: "Describe a function or language construct",
  listConsts: "Names of all constants",
  listGlobals: "Names of all global variables",
  listFuns: "Names of all functions and language constructs",
  listClasses: "Names of all classes",
  resolveName: "What a bare name refers to",
  repr: "Human-readable rendering of a value",
  str: "String cast of a value",
  count: "Number of elements in a countable value",
  startIteration: "Open an iteration cursor over a value",
  nextIteration: "Advance an iteration cursor one step",
}

// ============================================================================
// Reflection results
// ============================================================================

function paramValue(param: ParamInfo): Map<string, unknown> {
  return new Map<string, unknown>([
    ["name", param.name],
    ["type", param.type],
    ["hasDefault", param.hasDefault],
    ["default", param.default],
    ["isOptional", param.isOptional],
    ["variadic", param.variadic],
  ])
}

function funcInfoValue(info: FuncInfo): Map<string, unknown> {
  return new Map<string, unknown>([
    ["name", info.name],
    ["doc", info.doc],
    ["params", info.params.map(paramValue)],
    ["returnType", info.returnType],
  ])
}

function methodValue(info: MethodInfo): Map<string, unknown> {
  const value = funcInfoValue(info)
  value.set("static", info.static)
  value.set("owner", info.owner)
  return value
}

function classInfoValue(info: ClassInfo): Map<string, unknown> {
  return new Map<string, unknown>([
    ["name", info.name],
    ["doc", info.doc],
    ["consts", new Map(info.consts)],
    ["methods", new Map([...info.methods].map(([name, method]): [string, Map<string, unknown>] => [name, methodValue(method)]))],
    ["properties", [...info.properties]],
    ["interfaces", [...info.interfaces]],
    ["isAbstract", info.isAbstract],
    ["isInterface", info.isInterface],
    ["parent", info.parent],
  ])
}
