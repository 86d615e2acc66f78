/**
 * Command requests: the closed set of commands a client may send, each
 * with its own `data` shape.
 *
 * Fields holding values (arguments, objects, offsets) stay wire-encoded
 * here; the dispatcher decodes them. Names are plain strings.
 */

import { z } from "zod"
import { StaticTypeCompanion, WireJson } from "@crossline/core"
import { ErrInvalidRequest, ErrUnknownCommand } from "./errors.js"

// ============================================================================
// Shapes
// ============================================================================

/** A still-encoded wire value */
const Wire = z.unknown().refine((value) => value !== undefined, "a wire value is required")
const Args = z.array(z.unknown())
const Name = z.string()

const request = <C extends string, D extends z.ZodTypeAny>(cmd: C, data: D) =>
  z.object({ cmd: z.literal(cmd), data })

/** Commands that take no data; any `data` sent along is ignored */
const bare = <C extends string>(cmd: C) =>
  z.object({ cmd: z.literal(cmd), data: z.unknown().optional() })

const Request = z.discriminatedUnion("cmd", [
  request("getConst", Name),
  request("setConst", z.object({ name: Name, value: Wire })),
  request("getGlobal", Name),
  request("setGlobal", z.object({ name: Name, value: Wire })),
  request("callFun", z.object({ name: Name, args: Args })),
  request("createObject", z.object({ name: Name, args: Args })),
  request("callObj", z.object({ obj: Wire, args: Args })),
  request("callMethod", z.object({ obj: Wire, name: Name, args: Args })),
  request("hasItem", z.object({ obj: Wire, offset: Wire })),
  request("getItem", z.object({ obj: Wire, offset: Wire })),
  request("setItem", z.object({ obj: Wire, offset: Wire, value: Wire })),
  request("delItem", z.object({ obj: Wire, offset: Wire })),
  request("getProperty", z.object({ obj: Wire, name: Name })),
  request("setProperty", z.object({ obj: Wire, name: Name, value: Wire })),
  request("unsetProperty", z.object({ obj: Wire, name: Name })),
  request("listProperties", Wire),
  request("listNonDefaultProperties", Wire),
  request("classInfo", Name),
  request("funcInfo", Name),
  bare("listConsts"),
  bare("listGlobals"),
  bare("listFuns"),
  bare("listClasses"),
  request("resolveName", Name),
  request("repr", Wire),
  request("str", Wire),
  request("count", Wire),
  request("startIteration", Wire),
  request("nextIteration", Wire),
])

export type CommandRequest = z.infer<typeof Request>
export type CommandName = CommandRequest["cmd"]

export const COMMAND_NAMES: readonly CommandName[] = Request.options.map((option) => option.shape.cmd.value)

function isCommandName(name: unknown): name is CommandName {
  return COMMAND_NAMES.some((known) => known === name)
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ")
}

function validate(raw: unknown): CommandRequest {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw ErrInvalidRequest.create({ reason: "expected a {cmd, data} object" })
  }
  const cmd: unknown = Reflect.get(raw, "cmd")
  if (typeof cmd !== "string") throw ErrInvalidRequest.create({ reason: "cmd must be a string" })
  if (!isCommandName(cmd)) throw ErrUnknownCommand.create({ command: cmd })

  const parsed = Request.safeParse(raw)
  if (!parsed.success) throw ErrInvalidRequest.create({ reason: `${cmd}: ${describeIssues(parsed.error)}` })
  return parsed.data
}

// ============================================================================
// Companion
// ============================================================================

export const CommandRequest = StaticTypeCompanion({
  /** Parse and validate one request line */
  parse(line: string): CommandRequest {
    return validate(WireJson.parse(line))
  },

  /** Validate an already-parsed request */
  validate,
})
