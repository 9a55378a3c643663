/**
 * Forwarder daemon and client.
 */

export { AuthEnsurer, type AuthEnsurerOptions, type AuthOutcome } from "./auth.js";
export { type CapturedResult, type CommandRunner, captureCommand } from "./capture.js";
export { ClientError, type SendCommandOptions, sendCommand } from "./client.js";
export {
	AlreadyBoundError,
	AuthenticationError,
	CommandRejectedError,
	ForwarderError,
	type ForwarderErrorCode,
	InvalidRequestError,
	SocketSetupError,
	SpawnError,
} from "./errors.js";
export { CommandPolicy, type PolicyDecision, type PolicyRule } from "./policy.js";
export {
	buildArgumentVector,
	decodeRequestLine,
	formatErrorLine,
	getDefaultSocketPath,
	MAX_REQUEST_BYTES,
	tokenizeCommand,
} from "./protocol.js";
export { type ExitOutcome, type Relay, type RelayOptions, runRelay } from "./relay.js";
export { type ServerHandle, type ServerOptions, startServer } from "./server.js";
export { installShutdownHandlers, type ShutdownOptions } from "./shutdown.js";
export { bindSocket, teardownSocket } from "./socket.js";
export { type ConnectionResult, superviseConnection } from "./supervisor.js";
