/**
 * Per-connection control flow:
 * read one line → check policy → ensure sign-in → relay the tool's output → close.
 *
 * Every fault stays inside the connection. The socket is closed on every path.
 */

import { randomBytes } from "node:crypto";
import type { Socket } from "node:net";
import type { Readable } from "node:stream";

import { formatErrorSafe, isPeerDisconnectError } from "../infra/errors.js";
import { getChildLogger } from "../logging.js";
import { quoteArgs } from "../utils.js";
import type { AuthOutcome } from "./auth.js";
import {
	AuthenticationError,
	CommandRejectedError,
	ForwarderError,
	InvalidRequestError,
	SpawnError,
} from "./errors.js";
import type { CommandPolicy } from "./policy.js";
import {
	MAX_REQUEST_BYTES,
	buildArgumentVector,
	decodeRequestLine,
	formatErrorLine,
} from "./protocol.js";
import type { Relay } from "./relay.js";

const logger = () => getChildLogger({ module: "forwarder-supervisor" });

export type ConnectionResult =
	| "no-request"
	| "invalid-request"
	| "rejected"
	| "auth-failed"
	| "spawn-failed"
	| "relayed"
	| "faulted";

export type SupervisorDeps = {
	policy: CommandPolicy;
	accountId: string;
	binary: string;
	auth: { ensureSignedIn: (accountId: string) => Promise<AuthOutcome> };
	relay: Relay;
	maxRequestBytes?: number;
};

/**
 * Read bytes up to the first "\n" and return them without the newline, undecoded.
 *
 * Resolves null on EOF with nothing buffered, on a read error, or when the line
 * grows past `maxBytes`. Data after the newline is left unread.
 */
export function readRequestLine(
	stream: Readable,
	maxBytes = MAX_REQUEST_BYTES,
): Promise<Buffer | null> {
	return new Promise((resolve) => {
		const chunks: Buffer[] = [];
		let size = 0;
		let done = false;

		const finish = (line: Buffer | null) => {
			if (done) return;
			done = true;
			stream.off("data", onData);
			stream.off("end", onEnd);
			stream.off("close", onEnd);
			stream.off("error", onError);
			stream.pause();
			resolve(line);
		};

		const onData = (chunk: Buffer) => {
			const newline = chunk.indexOf(0x0a);
			const head = newline === -1 ? chunk : chunk.subarray(0, newline);
			size += head.length;
			if (size > maxBytes) {
				logger().warn({ maxBytes }, "request line too long");
				finish(null);
				return;
			}
			chunks.push(head);
			if (newline !== -1) {
				finish(Buffer.concat(chunks));
			}
		};

		// A final line without a terminator still counts, as long as it is non-empty
		const onEnd = () => {
			finish(size > 0 ? Buffer.concat(chunks) : null);
		};

		const onError = (err: Error) => {
			logger().debug({ error: formatErrorSafe(err) }, "error reading from connection");
			finish(null);
		};

		stream.on("data", onData);
		stream.once("end", onEnd);
		stream.once("close", onEnd);
		stream.once("error", onError);
	});
}

function writeLine(socket: Socket, line: string): Promise<void> {
	return new Promise((resolve) => {
		if (socket.destroyed || !socket.writable) {
			resolve();
			return;
		}
		socket.write(line, (err) => {
			if (err) {
				logger().debug({ error: formatErrorSafe(err) }, "error writing response");
			}
			resolve();
		});
	});
}

/**
 * End the socket once pending writes are flushed, then release it.
 */
export function closeConnection(socket: Socket): Promise<void> {
	return new Promise((resolve) => {
		if (socket.destroyed) {
			resolve();
			return;
		}
		socket.once("close", () => resolve());
		if (!socket.writable) {
			socket.destroy();
			return;
		}
		socket.end(() => socket.destroy());
	});
}

function resultFor(err: ForwarderError): ConnectionResult {
	if (err instanceof InvalidRequestError) return "invalid-request";
	if (err instanceof CommandRejectedError) return "rejected";
	if (err instanceof AuthenticationError) return "auth-failed";
	if (err instanceof SpawnError) return "spawn-failed";
	return "faulted";
}

export async function superviseConnection(
	socket: Socket,
	deps: SupervisorDeps,
): Promise<ConnectionResult> {
	const clientId = randomBytes(4).toString("hex");
	logger().debug({ clientId }, "client connected");

	// Lives as long as the socket: an unhandled socket error would take the process down
	socket.on("error", (err) => {
		const level = isPeerDisconnectError(err) ? "debug" : "warn";
		logger()[level]({ clientId, error: formatErrorSafe(err) }, "socket error");
	});

	let result: ConnectionResult = "faulted";
	try {
		const raw = await readRequestLine(socket, deps.maxRequestBytes);
		if (raw === null) {
			logger().debug({ clientId }, "no request received");
			result = "no-request";
			return result;
		}

		// Invalid UTF-8 is refused, never replaced
		const line = decodeRequestLine(raw);
		if (line === null) {
			throw new InvalidRequestError("request is not valid UTF-8");
		}

		const input = line.trim();
		logger().info({ clientId, input }, "received input");

		const decision = deps.policy.evaluate(input);
		if (!decision.allowed) {
			throw new CommandRejectedError(input);
		}
		logger().debug({ clientId, rule: decision.rule }, "command allowed");

		const auth = await deps.auth.ensureSignedIn(deps.accountId);
		logger().debug({ clientId, auth }, "authentication ensured");

		const argv = buildArgumentVector(deps.accountId, input);
		logger().info({ clientId, args: quoteArgs(argv) }, `executing ${deps.binary}`);

		const outcome = await deps.relay({ binary: deps.binary, argv, sink: socket });
		logger().info({ clientId, code: outcome.code, signal: outcome.signal }, "command finished");
		result = "relayed";
		return result;
	} catch (err) {
		if (err instanceof ForwarderError) {
			result = resultFor(err);
			logger().info({ clientId, code: err.code, error: err.message }, "request refused");
			await writeLine(socket, formatErrorLine(err.response));
		} else {
			result = "faulted";
			logger().error({ clientId, error: formatErrorSafe(err) }, "unexpected fault in connection");
			socket.destroy();
		}
		return result;
	} finally {
		await closeConnection(socket);
		logger().debug({ clientId, result }, "client disconnected");
	}
}
