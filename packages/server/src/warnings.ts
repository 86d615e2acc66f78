/**
 * Warning promotion: while a command runs, any runtime warning
 * (process.emitWarning, deprecations included) throws inside that command
 * instead of being printed next to the wire. Warnings raised between
 * commands (timers, late callbacks) have no command to fail, so they are
 * logged.
 */

import { types } from "node:util"
import { ErrWarningPromoted } from "./errors.js"
import type { Logger } from "./logger.js"

export interface WarningPolicy {
  /** Whether a command is in flight */
  isExecuting(): boolean
  logger: Logger
}

let installed: (() => void) | null = null

function warningName(warning: string | Error, details: readonly unknown[]): string {
  if (types.isNativeError(warning)) return warning.name
  const [typeOrOptions] = details
  if (typeof typeOrOptions === "string") return typeOrOptions
  if (typeof typeOrOptions === "object" && typeOrOptions !== null) {
    const type: unknown = Reflect.get(typeOrOptions, "type")
    if (typeof type === "string") return type
  }
  return "Warning"
}

/** Install the policy process-wide; returns the function that restores the original */
export function promoteWarnings(policy: WarningPolicy): () => void {
  if (installed) return installed

  const original = process.emitWarning
  process.emitWarning = (warning: string | Error, ...details: unknown[]): void => {
    const data = {
      warningName: warningName(warning, details),
      warningMessage: typeof warning === "string" ? warning : warning.message,
    }
    if (policy.isExecuting()) throw ErrWarningPromoted.create(data)
    policy.logger.warn(data, "warning outside a command")
  }

  const restore = () => {
    process.emitWarning = original
    installed = null
  }
  installed = restore
  return restore
}
