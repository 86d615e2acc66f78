/**
 * BridgeError - Composable error system with facets and boundaries.
 *
 * Errors are composed from facets (marker traits and data traits) instead of
 * class inheritance. Three discrimination axes: exact type (code), facet, domain.
 *
 * Two wrapping mechanisms:
 * - ErrorDef.wrap(fn): intent wrap: "if this fails, the error is X"
 * - Boundary.wrap(fn): domain entry: foreign errors escaping the boundary get a thin boundary error
 *
 * Errors cross the wire as SerializedError (see serialize / reconstitute).
 */

import { types } from "node:util";
import {StaticTypeCompanion, type UnionToIntersection} from "./type-system-utils.js";
import {Inspect} from "./inspect.js";

// ============================================================================
// Facet Types
// ============================================================================

export interface ErrMarkerFacet {
  readonly kind: "marker";
  readonly name: string;
}

export interface ErrDataFacet<TData extends Record<string, unknown> = Record<string, unknown>> {
  readonly kind: "data";
  readonly name: string;
  readonly _data?: TData; // phantom type for compile-time inference
}

export type ErrFacetAny = ErrMarkerFacet | ErrDataFacet;

/** Phantom type carrier for error-local custom props */
export interface ErrProps<T extends Record<string, unknown> = {}> {
  readonly _kind: "props";
  readonly _phantom?: T;
}

/** Extract the data type from an ErrProps */
export type InferPropsData<P> = P extends ErrProps<infer T> ? T : {};

// ============================================================================
// Facet Companion
// ============================================================================

export const ErrFacet = StaticTypeCompanion({
  /** Create a marker facet (no associated data) */
  marker(name: string): ErrMarkerFacet {
    return Object.freeze({ kind: "marker" as const, name });
  },

  /** Create a data facet with typed associated data */
  data<TData extends Record<string, unknown>>(name: string): ErrDataFacet<TData> {
    const facet: ErrDataFacet<TData> = { kind: "data", name };
    return Object.freeze(facet);
  },

  /** Declare error-local custom props (phantom type only) */
  props<T extends Record<string, unknown>>(): ErrProps<T> {
    return { _kind: "props" };
  },
});

// ============================================================================
// Type Utilities
// ============================================================================

/** Extract the data type from a facet. Markers contribute {} */
export type FacetProps<F> = F extends ErrDataFacet<infer D> ? D : {};

/** Merge data types from a tuple of facets into a single intersection */
export type MergeFacetProps<Fs extends readonly ErrFacetAny[]> = UnionToIntersection<
  FacetProps<Fs[number]>
>;

// ============================================================================
// ErrorDef Interface
// ============================================================================

export interface ErrorDef<
  Fs extends readonly ErrFacetAny[] = readonly ErrFacetAny[],
  D extends Record<string, unknown> = {},
> {
  readonly code: string;
  readonly domain: string;
  readonly facets: Fs;
  create(data: MergeFacetProps<Fs> & D, context?: string, cause?: BridgeError): BridgeError<Fs>;
  is(err: unknown): err is BridgeError<Fs> & { readonly data: MergeFacetProps<Fs> & D };

  /** Intent wrap: run fn, if it throws, wrap the error in this ErrorDef */
  wrap<T>(data: MergeFacetProps<Fs> & D, fn: () => T): T;
}

// ============================================================================
// ErrorBoundary Interface
// ============================================================================

export interface ErrorBoundary {
  readonly domain: string;
  /** Define an error within this boundary. Code is prefixed with the domain. */
  define<const Fs extends readonly ErrFacetAny[], P extends ErrProps = ErrProps>(
    code: string,
    opts: { customProps?: P; facets: Fs; message: (data: MergeFacetProps<Fs> & InferPropsData<P>) => string },
  ): ErrorDef<Fs, InferPropsData<P>>;
  /** Check if an error belongs to this boundary's domain */
  is(err: unknown): boolean;
  /**
   * Domain entry wrap: run fn within this boundary.
   * If anything escapes, wraps in a thin boundary error.
   * Same-domain BridgeErrors pass through unwrapped.
   */
  wrap<T>(fn: () => T): T;
}

// ============================================================================
// BridgeError Interface
// ============================================================================

export interface BridgeError<Fs extends readonly ErrFacetAny[] = readonly ErrFacetAny[]> extends Error {
  readonly code: string;
  readonly domain: string;
  readonly context?: string;
  readonly data: MergeFacetProps<Fs>;
  readonly facetNames: ReadonlySet<string>;
  readonly cause?: BridgeError;
  toJSON(): BridgeErrorJSON;
  prettyPrint(opts?: { color?: boolean; includeStackTrace?: boolean }): string;
}

export interface BridgeErrorJSON {
  code: string;
  domain: string;
  message: string;
  context?: string;
  data: Record<string, unknown>;
  facets: string[];
  stack?: string;
  cause?: BridgeErrorJSON;
}

/**
 * Wire-safe error shape. Plain errors carry only a message (and their JS
 * name); BridgeErrors also carry code, boundary, facets and data.
 */
export interface SerializedError {
  message: string;
  name?: string;
  code?: string;
  boundary?: string;
  facets?: string[];
  data?: Record<string, unknown>;
  cause?: SerializedError;
}

// ============================================================================
// Helpers
// ============================================================================

/** Extract stack frames, stripping the error message line and the internal create() frame */
function stackFrames(stack: string | undefined): string {
  if (!stack) return "";
  const first = stack.indexOf("\n    at ");
  if (first === -1) return "";
  // If the first frame is the internal create() call, skip it
  const secondFrame = stack.indexOf("\n    at ", first + 1);
  if (secondFrame !== -1 && stack.slice(first, secondFrame).includes("at create (")) {
    return stack.slice(secondFrame + 1);
  }
  return stack.slice(first + 1);
}

function describeThrown(thrown: unknown): string {
  if (types.isNativeError(thrown)) return thrown.message;
  if (typeof thrown === "string") return thrown;
  return String(thrown);
}

/** Convert any thrown value to a BridgeError, preserving stack */
function asBridgeError(thrown: unknown): BridgeErrorImpl {
  if (thrown instanceof BridgeErrorImpl) return thrown;
  const wrapped = new BridgeErrorImpl("unknown", "unknown", describeThrown(thrown), Object.freeze(new Set<string>()), {});
  if (types.isNativeError(thrown) && thrown.stack) wrapped.stack = thrown.stack;
  return wrapped;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (typeof value === "object" || typeof value === "function") && value !== null &&
    "then" in value && typeof value.then === "function";
}

// ============================================================================
// BridgeError Implementation (internal)
// ============================================================================

class BridgeErrorImpl extends Error implements BridgeError {
  readonly code: string;
  readonly domain: string;
  readonly context?: string;
  readonly data: Record<string, unknown>;
  readonly facetNames: ReadonlySet<string>;
  override cause?: BridgeErrorImpl;

  static {
    // the class name clients see for a thrown error
    Object.defineProperty(this, "name", { value: "BridgeError" });
    Inspect(this, (self, opts) => ({
      format: self.prettyPrint({ color: opts.colors, includeStackTrace: true }),
      params: [],
    }));
  }

  constructor(
    code: string,
    domain: string,
    message: string,
    facetNames: ReadonlySet<string>,
    data: Record<string, unknown>,
    context?: string,
    cause?: BridgeErrorImpl,
  ) {
    const fullMessage = context ? `${message} — ${context}` : message;
    super(fullMessage);
    this.name = `BridgeError[${code}]`;
    this.code = code;
    this.domain = domain;
    this.context = context;
    this.data = { ...data };
    this.facetNames = facetNames;
    if (cause) this.cause = cause;
  }

  toJSON(): BridgeErrorJSON {
    const json: BridgeErrorJSON = {
      code: this.code,
      domain: this.domain,
      message: this.message,
      data: this.data,
      facets: [...this.facetNames],
      stack: this.stack,
    };
    if (this.context !== undefined) {
      json.context = this.context;
    }
    if (this.cause) {
      json.cause = this.cause.toJSON();
    }
    return json;
  }

  prettyPrint(opts?: { color?: boolean; includeStackTrace?: boolean }): string {
    const color = opts?.color ?? false;
    const includeStack = opts?.includeStackTrace ?? false;

    const red = color ? "\x1b[31m" : "";
    const dim = color ? "\x1b[2m" : "";
    const reset = color ? "\x1b[0m" : "";

    const lines: string[] = [];

    lines.push(`BridgeError: ` + formatErrorLine(this, "", { red, dim, reset }, !this.cause));

    // Cause chain
    let current: BridgeErrorImpl | undefined = this.cause;
    let indent = "  ";
    while (current) {
      const last = !current.cause
      lines.push(`${indent}${dim}└ caused by:${reset} ${formatErrorLine(current, indent, { red, dim, reset }, last)}`);
      current = current.cause;
      indent += "  ";
    }

    if (includeStack) {
      const frames = stackFrames(this.stack);
      if (frames) {
        lines.push(`  ${dim}➝ Stack trace:${reset}`);
        for (const frame of frames.split("\n")) {
          if (frame.trim()) lines.push(`${dim}${frame}${reset}`);
        }
      }
    }

    return lines.join("\n");
  }
}

function formatErrorLine(
  err: BridgeErrorImpl,
  indent: string,
  c: { red: string; dim: string; reset: string },
  isLast: boolean
): string {
  const hasData = Object.keys(err.data).length > 0;
  let line = `${c.red}${err.code}${c.reset}: ${err.message}`;
  if (hasData) {
    const connectorChar = isLast ? '└' : '├'
    line += `\n${indent}  ${c.dim}${connectorChar} data: ${JSON.stringify(err.data)}${c.reset}`;
  }
  return line;
}

// ============================================================================
// Internal: try/catch wrapper for both sync and async
// ============================================================================

function tryCatchWrap<T>(fn: () => T, onError: (thrown: unknown) => never): T {
  try {
    const result = fn();
    if (isPromiseLike(result)) {
      // T is the promise type here; the rejection handler rethrows the wrapped error
      const wrapped: unknown = Promise.resolve(result).then(undefined, (thrown: unknown) => onError(thrown));
      return wrapped as T;
    }
    return result;
  } catch (thrown) {
    onError(thrown);
  }
}

// ============================================================================
// Internal: create an ErrorDef
// ============================================================================

function defineError<const Fs extends readonly ErrFacetAny[], D extends Record<string, unknown> = {}>(
  fullCode: string,
  domain: string,
  opts: { facets: Fs; message: (data: MergeFacetProps<Fs> & D) => string },
): ErrorDef<Fs, D> {
  const facetNames = Object.freeze(new Set(opts.facets.map((f) => f.name)));

  function create(data: MergeFacetProps<Fs> & D, context?: string, cause?: BridgeError): BridgeError<Fs> {
    const message = opts.message(data);
    const err = new BridgeErrorImpl(
      fullCode,
      domain,
      message,
      facetNames,
      { ...data },
      context,
      cause === undefined ? undefined : asBridgeError(cause),
    );
    Error.captureStackTrace(err, create)
    // Data was built from MergeFacetProps<Fs>, so the facet-typed view is sound
    return err as unknown as BridgeError<Fs>
  }

  function is(err: unknown): err is BridgeError<Fs> & { readonly data: MergeFacetProps<Fs> & D } {
    return err instanceof BridgeErrorImpl && err.code === fullCode;
  }

  return Object.freeze({
    code: fullCode,
    domain,
    facets: opts.facets,
    create,
    is,

    wrap<T>(data: MergeFacetProps<Fs> & D, fn: () => T): T {
      return tryCatchWrap(fn, (thrown) => {
        throw create(data, undefined, asBridgeError(thrown));
      });
    },
  });
}

// ============================================================================
// Internal: serialization
// ============================================================================

function serializeError(err: unknown): SerializedError {
  if (err instanceof BridgeErrorImpl) {
    const serialized: SerializedError = {
      message: err.message,
      code: err.code,
      boundary: err.domain,
      facets: [...err.facetNames],
      data: { ...err.data },
    };
    if (err.cause) serialized.cause = serializeError(err.cause);
    return serialized;
  }
  if (types.isNativeError(err)) {
    return { message: err.message, name: err.name };
  }
  return { message: describeThrown(err) };
}

function reconstituteError(serialized: SerializedError): BridgeErrorImpl {
  return new BridgeErrorImpl(
    serialized.code ?? "unknown",
    serialized.boundary ?? "unknown",
    serialized.message,
    Object.freeze(new Set(serialized.facets ?? [])),
    serialized.data ?? {},
    undefined,
    serialized.cause ? reconstituteError(serialized.cause) : undefined,
  );
}

// ============================================================================
// BridgeError Companion
// ============================================================================

/** Static methods for BridgeError */
export const BridgeError = StaticTypeCompanion({
  /**
   * Define a new error type with a code, facets, and message function.
   * The code's prefix before the first "." becomes the domain.
   *
   * Prefer using boundary.define() instead for domain-owned errors.
   */
  define<const Fs extends readonly ErrFacetAny[], P extends ErrProps = ErrProps>(
    code: string,
    opts: {
      customProps?: P;
      facets: Fs;
      message: (data: MergeFacetProps<Fs> & InferPropsData<P>) => string;
    },
  ): ErrorDef<Fs, InferPropsData<P>> {
    const dotIdx = code.indexOf(".");
    const domain = dotIdx === -1 ? code : code.slice(0, dotIdx);
    return defineError(code, domain, opts);
  },

  /**
   * Create an error boundary for a domain.
   * Errors defined via the boundary are automatically prefixed with the domain:
   *
   *   const Codec = BridgeError.boundary("codec");
   *   const ErrEncodingFailed = Codec.define("encoding_failed", {...});  // "codec.encoding_failed"
   */
  boundary(domain: string): ErrorBoundary {
    // The boundary's thin error: wraps foreign errors escaping the boundary
    const boundaryErrorDef = defineError<readonly []>(`${domain}.error`, domain, {
      facets: [] as const,
      message: () => `${domain} error`,
    });

    return {
      domain,

      define<const Fs extends readonly ErrFacetAny[], PP extends ErrProps = ErrProps>(
        code: string,
        opts: { customProps?: PP; facets: Fs; message: (data: MergeFacetProps<Fs> & InferPropsData<PP>) => string },
      ): ErrorDef<Fs, InferPropsData<PP>> {
        return defineError(`${domain}.${code}`, domain, opts);
      },

      is(err: unknown): boolean {
        return err instanceof BridgeErrorImpl && err.domain === domain;
      },

      wrap<T>(fn: () => T): T {
        return tryCatchWrap(fn, (thrown) => {
          // Same-domain BridgeErrors pass through unwrapped
          if (thrown instanceof BridgeErrorImpl && thrown.domain === domain) {
            throw thrown;
          }
          throw boundaryErrorDef.create({}, undefined, asBridgeError(thrown));
        });
      },
    };
  },

  /** Check if a value is any BridgeError */
  isBridgeError(err: unknown): err is BridgeError {
    return err instanceof BridgeErrorImpl;
  },

  /**
   * Check if a BridgeError has a specific facet.
   * For DataFacet<D>, narrows err.data to include D.
   * Returns false for non-BridgeErrors.
   */
  has<F extends ErrFacetAny>(
    err: unknown,
    facet: F,
  ): err is BridgeError & { readonly data: FacetProps<F> } {
    return err instanceof BridgeErrorImpl && err.facetNames.has(facet.name);
  },

  /** Check if a BridgeError belongs to a domain */
  inDomain(err: unknown, domain: string): boolean {
    return err instanceof BridgeErrorImpl && err.domain === domain;
  },

  /**
   * Convert any value to a BridgeError, preserving stack.
   * If already a BridgeError, returns it unchanged.
   */
  wrap(err: unknown): BridgeError {
    return asBridgeError(err);
  },

  /** Flatten any thrown value into the wire-safe SerializedError shape. */
  serialize(err: unknown): SerializedError {
    return serializeError(err);
  },

  /**
   * Rebuild a BridgeError from its serialized form. Facet membership, code
   * and data survive; the stack is the reconstituting side's.
   */
  reconstitute(serialized: SerializedError): BridgeError {
    return reconstituteError(serialized);
  },
});
