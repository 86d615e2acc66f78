// Realm
export { Realm, GLOBALS } from "./realm.js"
export type { RealmOptions, ResolvedName } from "./realm.js"

// Errors
export * from "./errors.js"

// Values
export { Resource, ResourceTable, StreamResource } from "./resource.js"
export { toArray, toBool, toFloat, toInt, toObject, toStr } from "./casts.js"
export { count, delItem, getItem, hasItem, setItem, typeName, IterationCursor } from "./collections.js"
export type { IterationStep } from "./collections.js"
export { callMethod, callValue, getProperty, listProperties, setProperty, unsetProperty } from "./objects.js"

// Reflection
export { describeClass, describeFunction, inferParams, isClassConstructor, parentClass } from "./reflection.js"
export type {
  ClassInfo,
  ClassMeta,
  FuncInfo,
  FunctionMeta,
  MethodInfo,
  ParamInfo,
} from "./reflection.js"

// Code
export { LanguageConstructs } from "./language-constructs.js"
export type { LanguageConstruct } from "./language-constructs.js"
export { ModuleLoader } from "./module-loader.js"
export { installStdlib } from "./stdlib.js"
