import util, {type InspectOptions} from 'node-inspect-extracted'

/**
 * Assign a custom inspect renderer to a class prototype.
 * Call inside a `static {}` block: assigns once to the prototype, not per instance.
 *
 * The `fn` receives the instance as `self` and returns a format string with params.
 * Format specifiers (%s, %O, %d, etc.) are handled by `util.formatWithOptions`.
 *
 * ```typescript
 * class Cursor {
 *   static {
 *     Inspect(this, (self) => ({
 *       format: "Cursor( %s | %O )",
 *       params: [self.position, self.current],
 *     }));
 *   }
 * }
 * ```
 */
export function Inspect<T extends object>(
  cls: { prototype: T },
  fn: (self: T, options: InspectOptions) => { format: string; params: unknown[] },
): void {
  Object.defineProperty(cls.prototype, inspect, {
    configurable: true,
    writable: true,
    value: function(this: T, depth: number | undefined, options: InspectOptions) {
      const opts = { ...options, depth: (depth ?? 2) - 1 }
      const data = fn(this, opts)
      return util.formatWithOptions(opts, data.format, ...data.params)
    },
  })
}

export const inspect: unique symbol = Symbol.for('nodejs.util.inspect.custom')
