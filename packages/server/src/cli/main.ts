import { or } from "@optique/core/constructs"
import { message } from "@optique/core/message"
import { command } from "@optique/core/primitives"
import { run } from "@optique/run"
import { commandsCommand, handleCommands } from "./commands.js"
import { handleServe, serveCommand } from "./serve.js"

const parser = or(
  command("serve", serveCommand, { description: message`Serve bridge commands over stdio` }),
  command("commands", commandsCommand, { description: message`List the commands a client can send` }),
)

const result = run(parser, {
  programName: "crossline",
  version: "0.1.0",
  description: message`Drive a Node.js runtime from another process over a JSON line pipe`,
  help: "both",
})

try {
  switch (result.cmd) {
    case "serve":
      process.exitCode = await handleServe(result)
      break
    case "commands":
      handleCommands()
      break
  }
} catch (err) {
  console.error(err instanceof Error ? err : "Command failed")
  process.exitCode = 1
}
