/**
 * Realm boundary: errors raised while resolving names or operating on
 * values inside the runtime the bridge exposes.
 */

import { BadInput, BridgeError, ErrFacet, HasValueType, NotFound, NotSupported } from "@crossline/core"

// ============================================================================
// Facets
// ============================================================================

/** Carries the name that failed to resolve */
export const HasName = ErrFacet.data<{ name: string }>("HasName")

/** A missing attribute, as opposed to a failure while computing one */
export const Attribute = ErrFacet.marker("Attribute")

// ============================================================================
// Realm Boundary
// ============================================================================

export const RealmBoundary = BridgeError.boundary("realm")

export const ErrUndefinedConstant = RealmBoundary.define("undefined_constant", {
  facets: [NotFound, HasName],
  message: (d) => `Constant '${d.name}' is not defined`,
})

export const ErrConstantAlreadyDefined = RealmBoundary.define("constant_already_defined", {
  facets: [BadInput, HasName],
  message: (d) => `Constant '${d.name}' already defined`,
})

export const ErrUndefinedGlobal = RealmBoundary.define("undefined_global", {
  facets: [NotFound, HasName],
  message: (d) => `Global variable '${d.name}' does not exist`,
})

export const ErrUnresolvableFunction = RealmBoundary.define("unresolvable_function", {
  facets: [NotFound, HasName],
  message: (d) => `Could not resolve function '${d.name}'`,
})

export const ErrUnknownClass = RealmBoundary.define("unknown_class", {
  facets: [NotFound, HasName],
  message: (d) => `Class '${d.name}' not found`,
})

export const ErrAttributeError = RealmBoundary.define("attribute_error", {
  customProps: ErrFacet.props<{ className: string }>(),
  facets: [NotFound, Attribute, HasName],
  message: (d) => `'${d.className}' object has no attribute '${d.name}'`,
})

export const ErrUndefinedOffset = RealmBoundary.define("undefined_offset", {
  customProps: ErrFacet.props<{ offset: string }>(),
  facets: [NotFound],
  message: (d) => `Undefined offset: ${d.offset}`,
})

export const ErrNotCallable = RealmBoundary.define("not_callable", {
  facets: [NotSupported, HasValueType],
  message: (d) => `Value of type '${d.valueType}' is not callable`,
})

export const ErrNotCountable = RealmBoundary.define("not_countable", {
  facets: [NotSupported, HasValueType],
  message: (d) => `Value of type '${d.valueType}' is not countable`,
})

export const ErrNotIterable = RealmBoundary.define("not_iterable", {
  facets: [NotSupported, HasValueType],
  message: (d) => `Value of type '${d.valueType}' is not iterable`,
})

export const ErrNotIndexable = RealmBoundary.define("not_indexable", {
  facets: [NotSupported, HasValueType],
  message: (d) => `Value of type '${d.valueType}' does not support item access`,
})

export const ErrNotStringable = RealmBoundary.define("not_stringable", {
  facets: [NotSupported, HasValueType],
  message: (d) => `Object of class ${d.valueType} could not be converted to string`,
})

export const ErrInvalidCursor = RealmBoundary.define("invalid_cursor", {
  facets: [BadInput, HasValueType],
  message: (d) => `Expected an iteration cursor, got '${d.valueType}'`,
})

export const ErrModuleLoadFailed = RealmBoundary.define("module_load_failed", {
  customProps: ErrFacet.props<{ specifier: string }>(),
  facets: [],
  message: (d) => `Failed opening '${d.specifier}' for inclusion`,
})

export const ErrResourceClosed = RealmBoundary.define("resource_closed", {
  customProps: ErrFacet.props<{ id: number; kind: string }>(),
  facets: [BadInput],
  message: (d) => `${d.kind} resource #${d.id} is already closed`,
})

/** Raised by exit/die; the server answers the command and then ends the session */
export const ErrExitRequested = RealmBoundary.define("exit_requested", {
  customProps: ErrFacet.props<{ status: number }>(),
  facets: [],
  message: (d) => `Exit requested with status ${d.status}`,
})
