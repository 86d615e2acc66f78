/**
 * @crossline/core - wire format, value codec, object store and errors
 */

// Branding utilities
export type { SoftBrand } from "./brand.js";

export { StaticTypeCompanion, assertNever } from "./type-system-utils.js";
export type { UnionToIntersection } from "./type-system-utils.js";
export { Inspect, inspect } from "./inspect.js";

// Errors
export { BridgeError, ErrFacet } from "./bridge-error.js";
export type {
  ErrorDef,
  ErrorBoundary,
  ErrMarkerFacet,
  ErrDataFacet,
  ErrFacetAny,
  ErrProps,
  FacetProps,
  MergeFacetProps,
  BridgeErrorJSON,
  SerializedError,
} from "./bridge-error.js";
export * from "./errors/errors.js";

// Wire values
export { WireValue, WIRE_TAGS } from "./wire.js";
export type {
  ObjectHandle,
  ResourceHandle,
  Handle,
  NonFiniteDouble,
  WireInteger,
  WireDouble,
  WireString,
  WireBoolean,
  WireNull,
  WireKey,
  WireArrayEntry,
  WireArray,
  WireBytes,
  WireObject,
  WireResource,
  ThrownExceptionPayload,
  WireThrownException,
  WireResponse,
  WireTag,
} from "./wire.js";
export { WireJson, formatDouble } from "./wire-json.js";

// Store and codec
export { ObjectStore } from "./object-store.js";
export { ValueCodec, DefaultClassifier, constructorName } from "./value-codec.js";
export type { ValueClassifier, ResourceIdentity } from "./value-codec.js";

// Representation
export { Representer, PythonRepresenter, isRepresentable } from "./representer.js";
export type { Representable, RepresenterTokens, RepresenterOptions } from "./representer.js";
