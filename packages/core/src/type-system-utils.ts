/** Convert a union to an intersection */
export type UnionToIntersection<U> = (U extends unknown ? (x: U) => void : never) extends (
    x: infer I,
  ) => void
  ? I
  : never;

/** Fails to compile when a switch over a closed union misses a case */
export function assertNever(value: never, what: string): never {
  throw new Error(`Unhandled ${what}: ${JSON.stringify(value)}`)
}

/**
 * Marks an object as the companion of a same-named type (`WireValue` the
 * type, `WireValue` the helpers). Identity at runtime; `const` keeps the
 * literal types of what it is given.
 */
export function StaticTypeCompanion<const Companion>(companion: Companion): Companion {
  return companion
}
