/**
 * Protocol and session boundaries: failures of the request/response loop
 * itself, as opposed to failures of the command being served.
 */

import { BadInput, BridgeError, ErrFacet, NotFound, NotSupported } from "@crossline/core"

// ============================================================================
// Protocol Boundary
// ============================================================================

export const Protocol = BridgeError.boundary("protocol")

/** The request line is not a well-formed command for its `cmd` */
export const ErrInvalidRequest = Protocol.define("invalid_request", {
  customProps: ErrFacet.props<{ reason: string }>(),
  facets: [BadInput],
  message: (d) => `Invalid request: ${d.reason}`,
})

export const ErrUnknownCommand = Protocol.define("unknown_command", {
  customProps: ErrFacet.props<{ command: string }>(),
  facets: [NotFound],
  message: (d) => `Unknown command '${d.command}'`,
})

/** Reading from the transport failed; logged, never sent */
export const ErrConnectionLost = Protocol.define("connection_lost", {
  customProps: ErrFacet.props<{ reason: string }>(),
  facets: [],
  message: (d) => `Connection lost: ${d.reason}`,
})

/** The result was computed but could not be written as a response */
export const ErrResponseUnencodable = Protocol.define("response_unencodable", {
  customProps: ErrFacet.props<{ command: string; reason: string }>(),
  facets: [NotSupported],
  message: (d) => `Response to '${d.command}' could not be encoded: ${d.reason}`,
})

// ============================================================================
// Session Boundary
// ============================================================================

export const Session = BridgeError.boundary("session")

/** A runtime warning raised while a command ran; thrown instead of printed */
export const ErrWarningPromoted = Session.define("warning_promoted", {
  customProps: ErrFacet.props<{ warningName: string; warningMessage: string }>(),
  facets: [],
  message: (d) => `${d.warningName}: ${d.warningMessage}`,
})

// ============================================================================
// Config Boundary
// ============================================================================

export const Config = BridgeError.boundary("config")

export const ErrInvalidConfig = Config.define("invalid_config", {
  customProps: ErrFacet.props<{ reason: string }>(),
  facets: [BadInput],
  message: (d) => `Invalid configuration: ${d.reason}`,
})
