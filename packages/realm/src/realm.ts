/**
 * Realm: the runtime the bridge exposes: named constants, global
 * variables, functions and classes, plus the resources and modules that
 * live alongside them.
 *
 * Globals are the properties of a vm context, so code run through `eval`
 * reads and writes the same variables that `getGlobal` / `setGlobal` see.
 */

import * as vm from "node:vm"
import { constructorName, type ValueClassifier } from "@crossline/core"
import {
  ErrConstantAlreadyDefined,
  ErrUndefinedConstant,
  ErrUndefinedGlobal,
  ErrUnknownClass,
  ErrUnresolvableFunction,
} from "./errors.js"
import { LanguageConstructs } from "./language-constructs.js"
import { ModuleLoader } from "./module-loader.js"
import { listProperties } from "./objects.js"
import {
  describeClass,
  describeFunction,
  type ClassInfo,
  type ClassMeta,
  type FuncInfo,
  type FunctionMeta,
} from "./reflection.js"
import { Resource, ResourceTable } from "./resource.js"

// ============================================================================
// Types
// ============================================================================

interface RegisteredFunction {
  readonly name: string
  readonly fn: Function
  readonly meta: FunctionMeta
}

interface RegisteredClass {
  readonly name: string
  readonly cls: Function
  readonly meta: ClassMeta
}

/** What a bare name refers to, by precedence: constant, function, class, global */
export type ResolvedName =
  | readonly ["const", unknown]
  | readonly ["func", string]
  | readonly ["class", string]
  | readonly ["global", unknown]
  | readonly ["none", null]

export interface RealmOptions {
  /** Sink for echo/print; never the wire */
  output?: (text: string) => void
  /** Directory relative module paths resolve against */
  baseDir?: string
}

/** The meta-global holding all other globals */
export const GLOBALS = "GLOBALS"

// ============================================================================
// Realm
// ============================================================================

export class Realm {
  private readonly constants = new Map<string, unknown>()
  private readonly functions = new Map<string, RegisteredFunction>()
  private readonly classes = new Map<string, RegisteredClass>()
  private readonly namesByClass = new Map<Function, string>()
  private readonly globals: vm.Context = vm.createContext({})

  readonly resources = new ResourceTable()
  readonly modules: ModuleLoader
  private readonly output: (text: string) => void

  constructor(options: RealmOptions = {}) {
    this.output = options.output ?? ((text) => { process.stderr.write(text) })
    this.modules = new ModuleLoader(this, options.baseDir)
  }

  /** Write program output (echo, print, exit messages) */
  write(text: string): void {
    this.output(text)
  }

  // --------------------------------------------------------------------------
  // Constants
  // --------------------------------------------------------------------------

  defineConstant(name: string, value: unknown): void {
    if (this.constants.has(name)) throw ErrConstantAlreadyDefined.create({ name })
    this.constants.set(name, value)
  }

  hasConstant(name: string): boolean {
    return this.constants.has(name)
  }

  getConstant(name: string): unknown {
    if (!this.constants.has(name)) throw ErrUndefinedConstant.create({ name })
    return this.constants.get(name)
  }

  constantNames(): string[] {
    return [...this.constants.keys()]
  }

  // --------------------------------------------------------------------------
  // Globals
  // --------------------------------------------------------------------------

  setGlobal(name: string, value: unknown): void {
    this.globals[name] = value
  }

  hasGlobal(name: string): boolean {
    return name === GLOBALS || Object.hasOwn(this.globals, name)
  }

  /** `GLOBALS` yields every other global, never itself */
  getGlobal(name: string): unknown {
    if (name === GLOBALS) {
      return new Map(Object.entries(this.globals).filter(([key]) => key !== GLOBALS))
    }
    if (!Object.hasOwn(this.globals, name)) throw ErrUndefinedGlobal.create({ name })
    const value: unknown = this.globals[name]
    return value
  }

  globalNames(): string[] {
    return Object.keys(this.globals)
  }

  /** Run code with the globals as its global scope; yields the completion value */
  evaluate(code: string): unknown {
    const result: unknown = vm.runInContext(code, this.globals, { filename: "eval" })
    return result
  }

  // --------------------------------------------------------------------------
  // Functions
  // --------------------------------------------------------------------------

  defineFunction(name: string, fn: Function, meta: FunctionMeta = {}): void {
    this.functions.set(name, { name, fn, meta })
  }

  /** A registered function or a language construct */
  hasFunction(name: string): boolean {
    return this.functions.has(name) || LanguageConstructs.has(name)
  }

  /** Registered functions first, then the language constructs not shadowed by one */
  functionNames(): string[] {
    const names = [...this.functions.keys()]
    for (const name of LanguageConstructs.keys()) {
      if (!this.functions.has(name)) names.push(name)
    }
    return names
  }

  callFunction(name: string, args: readonly unknown[]): unknown {
    const registered = this.functions.get(name)
    if (registered) {
      const result: unknown = Reflect.apply(registered.fn, undefined, args)
      return result
    }
    const construct = LanguageConstructs.get(name)
    if (construct) return construct.invoke(this, args)
    throw ErrUnresolvableFunction.create({ name })
  }

  functionInfo(name: string): FuncInfo {
    const registered = this.functions.get(name)
    if (registered) return describeFunction(name, registered.fn, registered.meta)
    const construct = LanguageConstructs.get(name)
    if (construct) return describeFunction(name, undefined, construct.meta)
    throw ErrUnresolvableFunction.create({ name })
  }

  // --------------------------------------------------------------------------
  // Classes
  // --------------------------------------------------------------------------

  defineClass(name: string, cls: Function, meta: ClassMeta = {}): void {
    this.classes.set(name, { name, cls, meta })
    this.namesByClass.set(cls, name)
  }

  hasClass(name: string): boolean {
    return this.classes.has(name)
  }

  classNames(): string[] {
    return [...this.classes.keys()]
  }

  construct(name: string, args: readonly unknown[]): object {
    const registered = this.classes.get(name)
    if (!registered) throw ErrUnknownClass.create({ name })
    const instance: object = Reflect.construct(registered.cls, args)
    return instance
  }

  classInfo(name: string): ClassInfo {
    const registered = this.classes.get(name)
    if (!registered) throw ErrUnknownClass.create({ name })
    return describeClass(
      name,
      registered.cls,
      registered.meta,
      (cls) => this.nameOfClass(cls),
      (cls) => this.metaOfClass(cls),
    )
  }

  /** Name under which a constructor is registered, else its own name */
  nameOfClass(cls: Function): string {
    return this.namesByClass.get(cls) ?? (cls.name || "Function")
  }

  metaOfClass(cls: Function): ClassMeta | undefined {
    const name = this.namesByClass.get(cls)
    return name === undefined ? undefined : this.classes.get(name)?.meta
  }

  /** Class name of a value, as the client sees it */
  classNameOf(value: object): string {
    const ctor: unknown = Reflect.get(value, "constructor")
    if (typeof ctor === "function") {
      const registered = this.namesByClass.get(ctor)
      if (registered !== undefined) return registered
    }
    return constructorName(value)
  }

  /** Properties an object carries beyond those its class declares */
  nonDefaultProperties(value: unknown): string[] {
    const names = listProperties(value)
    const ctor: unknown = typeof value === "object" && value !== null ? Reflect.get(value, "constructor") : undefined
    const declared = new Set(typeof ctor === "function" ? this.metaOfClass(ctor)?.properties ?? [] : [])
    return names.filter((key) => !declared.has(key))
  }

  // --------------------------------------------------------------------------
  // Names and values
  // --------------------------------------------------------------------------

  resolveName(name: string): ResolvedName {
    if (this.constants.has(name)) return ["const", this.constants.get(name)]
    if (this.hasFunction(name)) return ["func", name]
    if (this.classes.has(name)) return ["class", name]
    if (this.hasGlobal(name)) return ["global", this.getGlobal(name)]
    return ["none", null]
  }

  /** Resource detection and class naming for the value codec and representer */
  get classifier(): ValueClassifier {
    return {
      resourceOf: (value) => value instanceof Resource ? { id: value.id, kind: value.kind } : undefined,
      classNameOf: (value) => this.classNameOf(value),
    }
  }
}
