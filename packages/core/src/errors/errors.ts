/**
 * Standard facets and the error definitions owned by the codec and the
 * object store.
 *
 * Facets are reusable markers/data traits composed into any ErrorDef.
 * Other packages define their own boundaries but reuse these facets.
 */

import {ErrFacet, BridgeError} from "../bridge-error.js";

// ============================================================================
// Standard Facets
// ============================================================================

/** Something expected was not found */
export const NotFound = ErrFacet.marker("NotFound");

/** Caller provided invalid input */
export const BadInput = ErrFacet.marker("BadInput");

/** The value or operation is outside what the bridge can express */
export const NotSupported = ErrFacet.marker("NotSupported");

/** Internal invariant violated: a protocol misuse or a bug */
export const Invariant = ErrFacet.marker("Invariant");

/** Carries the runtime type name of the offending value */
export const HasValueType = ErrFacet.data<{ valueType: string }>("HasValueType");

/** Carries a handle */
export const HasHandle = ErrFacet.data<{ handle: string | number }>("HasHandle");

// ============================================================================
// Codec Boundary
// ============================================================================

export const Codec = BridgeError.boundary("codec");

/** A native value has no wire representation */
export const ErrEncodingFailed = Codec.define("encoding_failed", {
  customProps: ErrFacet.props<{ reason?: string }>(),
  facets: [NotSupported, HasValueType],
  message: (d) => d.reason
    ? `Can't encode value of type '${d.valueType}': ${d.reason}`
    : `Can't encode value of type '${d.valueType}'`,
});

/** A wire value could not be turned back into a native value */
export const ErrDecodingFailed = Codec.define("decoding_failed", {
  customProps: ErrFacet.props<{ tag: string; reason: string }>(),
  facets: [BadInput],
  message: (d) => `Can't decode wire value of type '${d.tag}': ${d.reason}`,
});

/** A thrownException envelope was decoded as an ordinary value */
export const ErrLegacyException = Codec.define("legacy_exception", {
  customProps: ErrFacet.props<{ kind: string; embeddedMessage: string }>(),
  facets: [],
  message: (d) => d.embeddedMessage,
});

// ============================================================================
// Store Boundary
// ============================================================================

export const Store = BridgeError.boundary("store");

/** Handle was never issued by this store, or was removed */
export const ErrHandleNotFound = Store.define("handle_not_found", {
  facets: [Invariant, NotFound, HasHandle],
  message: (d) => `No object or resource with handle ${JSON.stringify(d.handle)}`,
});

/** A line on the wire is not valid JSON */
export const ErrMalformedJson = Codec.define("malformed_json", {
  customProps: ErrFacet.props<{ reason: string }>(),
  facets: [BadInput],
  message: (d) => `Malformed JSON line: ${d.reason}`,
});
