/**
 * Listening socket lifecycle.
 *
 * Security:
 * - Socket permissions set to 0600 (owner only), verified after chmod
 * - Parent directory created 0700 when missing
 * - An existing file at the path is never removed: it means another instance
 */

import fs from "node:fs";
import { createServer, type Server, type Socket } from "node:net";
import path from "node:path";

import { formatErrorSafe } from "../infra/errors.js";
import { getChildLogger } from "../logging.js";
import { AlreadyBoundError, SocketSetupError } from "./errors.js";

const logger = () => getChildLogger({ module: "forwarder-socket" });

const SOCKET_MODE = 0o600;
const SOCKET_DIR_MODE = 0o700;

async function pathExists(p: string): Promise<boolean> {
	try {
		// lstat so that a dangling symlink still counts as occupied
		await fs.promises.lstat(p);
		return true;
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
		throw new SocketSetupError(`failed to inspect socket path ${p}`, err);
	}
}

function closeServer(server: Server): Promise<void> {
	return new Promise((resolve) => {
		if (!server.listening) {
			resolve();
			return;
		}
		server.close(() => resolve());
	});
}

/**
 * Bind a Unix socket listener at `socketPath` and secure it.
 *
 * Rejects with AlreadyBoundError if anything exists at the path, or SocketSetupError
 * if the directory, listener or permissions cannot be set up. On a permission failure
 * the listener is closed and the socket file removed before rejecting.
 */
export async function bindSocket(
	socketPath: string,
	onConnection: (socket: Socket) => void,
): Promise<Server> {
	if (await pathExists(socketPath)) {
		throw new AlreadyBoundError(socketPath);
	}

	const socketDir = path.dirname(socketPath);
	try {
		await fs.promises.mkdir(socketDir, { recursive: true, mode: SOCKET_DIR_MODE });
	} catch (err) {
		throw new SocketSetupError(`failed to create socket directory ${socketDir}`, err);
	}

	// Half-open so a caller that shuts down its write side still receives the reply
	const server = createServer({ allowHalfOpen: true }, onConnection);

	await new Promise<void>((resolve, reject) => {
		const onError = (err: Error) => {
			reject(new SocketSetupError(`failed to listen on socket ${socketPath}`, err));
		};
		server.once("error", onError);
		server.listen(socketPath, () => {
			server.off("error", onError);
			resolve();
		});
	});

	try {
		await fs.promises.chmod(socketPath, SOCKET_MODE);
		const stats = await fs.promises.stat(socketPath);
		const mode = stats.mode & 0o777;
		if (mode !== SOCKET_MODE) {
			throw new Error(`socket permissions are ${mode.toString(8)}, expected 600`);
		}
	} catch (err) {
		logger().error(
			{ error: formatErrorSafe(err), socketPath },
			"CRITICAL: failed to secure socket permissions",
		);
		await closeServer(server);
		await teardownSocket(socketPath);
		throw new SocketSetupError(`failed to set permissions on socket ${socketPath}`, err);
	}

	server.on("error", (err) => {
		logger().error({ error: formatErrorSafe(err), socketPath }, "listener error");
	});

	logger().debug({ socketPath }, "socket bound");
	return server;
}

/**
 * Remove the socket file. Idempotent: a missing file is logged, not thrown.
 */
export async function teardownSocket(socketPath: string): Promise<void> {
	logger().info({ socketPath }, "cleaning up and removing socket");
	try {
		await fs.promises.unlink(socketPath);
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code === "ENOENT") {
			logger().debug({ socketPath }, "socket already removed");
			return;
		}
		logger().warn({ error: formatErrorSafe(err), socketPath }, "failed to remove socket");
	}
}
