import * as path from "node:path"
import { z } from "zod"
import { ErrInvalidConfig } from "./errors.js"

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

const Flag = z
  .enum(["1", "0", "true", "false", "yes", "no"])
  .transform((value) => value === "1" || value === "true" || value === "yes")

// Settings the environment may supply when the command line does not
const EnvSchema = z.object({
  CROSSLINE_INPUT: z.string().min(1).optional(),
  CROSSLINE_OUTPUT: z.string().min(1).optional(),
  CROSSLINE_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  CROSSLINE_LOG_FILE: z.string().min(1).optional(),
  CROSSLINE_PROMOTE_WARNINGS: Flag.optional(),
  CROSSLINE_REPR_DEPTH: z.coerce.number().int().min(1).optional(),
})

export interface ServerConfigOptions {
  input?: string
  output?: string
  logLevel?: LogLevel
  logFile?: string
  promoteWarnings?: boolean
  preload?: readonly string[]
  reprDepth?: number
  cwd?: string
}

export class ServerConfig {
  readonly input: string | null // null: stdin
  readonly output: string | null // null: stdout
  readonly logLevel: LogLevel
  readonly logFile: string | null // null: stderr
  readonly promoteWarnings: boolean
  readonly preload: readonly string[]
  readonly reprDepth: number
  readonly cwd: string

  constructor(opts: ServerConfigOptions = {}, env: NodeJS.ProcessEnv = process.env) {
    const parsed = EnvSchema.safeParse(env)
    if (!parsed.success) {
      const reason = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")
      throw ErrInvalidConfig.create({ reason })
    }
    const fromEnv = parsed.data

    this.cwd = opts.cwd ?? process.cwd()

    this.input = this.resolvePath(opts.input ?? fromEnv.CROSSLINE_INPUT)

    this.output = this.resolvePath(opts.output ?? fromEnv.CROSSLINE_OUTPUT)

    this.logLevel = opts.logLevel ?? fromEnv.CROSSLINE_LOG_LEVEL ?? "warn"

    this.logFile = this.resolvePath(opts.logFile ?? fromEnv.CROSSLINE_LOG_FILE)

    this.promoteWarnings = opts.promoteWarnings ?? fromEnv.CROSSLINE_PROMOTE_WARNINGS ?? true

    this.preload = opts.preload ?? []

    this.reprDepth = opts.reprDepth ?? fromEnv.CROSSLINE_REPR_DEPTH ?? 2
  }

  private resolvePath(file: string | undefined): string | null {
    return file === undefined ? null : path.resolve(this.cwd, file)
  }
}
