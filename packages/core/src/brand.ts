/**
 * Branding utilities for type-safe nominal typing.
 *
 * Brands create distinct types from primitives without runtime overhead.
 */

declare const SoftBrandTag: unique symbol;

/**
 * SoftBrand<U, Name> - A branded type that allows naked U as assignable.
 *
 * Use when you want type safety but don't want to force explicit construction.
 *
 * @example
 * type ObjectHandle = SoftBrand<string, 'object-handle'>;
 * const h: ObjectHandle = "obj_1";   // ✅ Works - string assignable to ObjectHandle
 * const s: string = h;               // ✅ Works - ObjectHandle assignable to string
 *
 * type ClassName = SoftBrand<string, 'class-name'>;
 * const name: ClassName = h;         // ❌ Error - ObjectHandle not assignable to ClassName
 */
export type SoftBrand<U, Name extends string> = U & { [SoftBrandTag]?: Name };
