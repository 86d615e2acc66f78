import { object } from "@optique/core/constructs"
import { constant } from "@optique/core/primitives"
import { COMMAND_DESCRIPTIONS } from "../command-set.js"
import { COMMAND_NAMES } from "../protocol.js"

export const commandsCommand = object({
  cmd: constant("commands" as const),
})

/** The command catalogue, one `name  description` line each */
export function commandCatalogue(): string[] {
  const width = Math.max(...COMMAND_NAMES.map((name) => name.length))
  return COMMAND_NAMES.map((name) => `${name.padEnd(width)}  ${COMMAND_DESCRIPTIONS[name]}`)
}

export function handleCommands(): void {
  process.stdout.write(`${commandCatalogue().join("\n")}\n`)
}
