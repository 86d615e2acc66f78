// Protocol
export { CommandRequest, COMMAND_NAMES } from "./protocol.js"
export type { CommandName } from "./protocol.js"
export * from "./errors.js"

// Serving
export { CommandSet, COMMAND_DESCRIPTIONS } from "./command-set.js"
export type { CommandSetOptions } from "./command-set.js"
export { CommandDispatcher } from "./command-dispatcher.js"
export type { DispatcherState, SessionEnd } from "./command-dispatcher.js"
export { Session } from "./session.js"
export { guardStdout } from "./stdout-guard.js"
export type { StdoutGuard } from "./stdout-guard.js"
export { promoteWarnings } from "./warnings.js"
export type { WarningPolicy } from "./warnings.js"

// Transports
export type { Transport } from "./transport.js"
export { StdioTransport } from "./transports/stdio-transport.js"
export { MemoryTransport } from "./transports/memory-transport.js"
export { LoopbackTransport } from "./transports/loopback-transport.js"
export type { LineDispatchFn } from "./transports/loopback-transport.js"

// Ambient
export { ServerConfig, LOG_LEVELS } from "./config.js"
export type { LogLevel, ServerConfigOptions } from "./config.js"
export { createLogger, silentLogger } from "./logger.js"
export type { Logger } from "./logger.js"
