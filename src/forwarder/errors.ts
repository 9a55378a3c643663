import { formatErrorSafe } from "../infra/errors.js";

export type ForwarderErrorCode =
	| "ALREADY_BOUND"
	| "SOCKET_SETUP"
	| "INVALID_REQUEST"
	| "COMMAND_REJECTED"
	| "AUTHENTICATION"
	| "SPAWN";

export class ForwarderError extends Error {
	constructor(
		message: string,
		public readonly code: ForwarderErrorCode,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "ForwarderError";
	}

	/** Text written to the caller after the "Error: " prefix. */
	get response(): string {
		return this.message;
	}
}

/**
 * A file already exists at the socket path. Treated as another instance running;
 * the file is never removed on the operator's behalf.
 */
export class AlreadyBoundError extends ForwarderError {
	constructor(public readonly socketPath: string) {
		super(
			`Socket file already exists at ${socketPath}. Another server might be running.\n` +
				`If you're sure no other server is running, remove it manually with: rm ${socketPath}`,
			"ALREADY_BOUND",
		);
		this.name = "AlreadyBoundError";
	}
}

export class SocketSetupError extends ForwarderError {
	constructor(message: string, cause?: unknown) {
		super(cause === undefined ? message : `${message}: ${formatErrorSafe(cause)}`, "SOCKET_SETUP", {
			cause,
		});
		this.name = "SocketSetupError";
	}
}

export class InvalidRequestError extends ForwarderError {
	constructor(message: string) {
		super(message, "INVALID_REQUEST");
		this.name = "InvalidRequestError";
	}
}

export class CommandRejectedError extends ForwarderError {
	constructor(public readonly command: string) {
		super(`Command not allowed: ${command}`, "COMMAND_REJECTED");
		this.name = "CommandRejectedError";
	}
}

export class AuthenticationError extends ForwarderError {
	constructor(
		public readonly accountId: string,
		public readonly output: string,
		detail: string,
		cause?: unknown,
	) {
		// Folded onto one line: the reply to the caller is a single line
		const captured = output.trim().replace(/\s*\n\s*/g, " ");
		super(
			`failed to sign in to account ${accountId}: ${detail}${captured ? `: ${captured}` : ""}`,
			"AUTHENTICATION",
			{ cause },
		);
		this.name = "AuthenticationError";
	}

	override get response(): string {
		return `Could not sign in: ${this.message}`;
	}
}

export class SpawnError extends ForwarderError {
	constructor(
		public readonly binary: string,
		cause: unknown,
	) {
		super(
			`failed to start ${binary}: ${cause instanceof Error ? cause.message : String(cause)}`,
			"SPAWN",
			{ cause },
		);
		this.name = "SpawnError";
	}
}
