/**
 * Session: one realm served over one transport, from the first request
 * to the end of input.
 *
 * Opening a session installs the standard library and preloads modules;
 * serving it installs the warning policy for as long as the loop runs.
 */

import { installStdlib, Realm, type RealmOptions } from "@crossline/realm"
import { CommandDispatcher, type SessionEnd } from "./command-dispatcher.js"
import { CommandSet } from "./command-set.js"
import type { ServerConfig } from "./config.js"
import type { Logger } from "./logger.js"
import type { Transport } from "./transport.js"
import { promoteWarnings } from "./warnings.js"

export class Session {
  readonly commands: CommandSet
  readonly dispatcher: CommandDispatcher

  private constructor(
    readonly realm: Realm,
    private readonly config: Pick<ServerConfig, "promoteWarnings" | "reprDepth">,
    private readonly logger: Logger,
  ) {
    this.commands = new CommandSet(realm, { reprDepth: config.reprDepth })
    this.dispatcher = new CommandDispatcher(this.commands, logger)
  }

  static async open(
    config: Pick<ServerConfig, "promoteWarnings" | "reprDepth" | "preload" | "cwd">,
    logger: Logger,
    realmOptions: RealmOptions = {},
  ): Promise<Session> {
    const realm = new Realm({ baseDir: config.cwd, ...realmOptions })
    installStdlib(realm)
    for (const specifier of config.preload) {
      logger.debug({ specifier }, "preloading module")
      await realm.modules.load(specifier)
    }
    return new Session(realm, config, logger)
  }

  async serve(transport: Transport): Promise<SessionEnd> {
    const restore = this.config.promoteWarnings
      ? promoteWarnings({ isExecuting: () => this.dispatcher.state === "executing", logger: this.logger })
      : undefined
    try {
      return await this.dispatcher.run(transport)
    } finally {
      restore?.()
      await transport.close()
    }
  }
}
