/**
 * Forwarder daemon server.
 *
 * Binds the socket, then runs one supervisor per accepted connection with no
 * upper bound on concurrent connections.
 */

import { formatErrorSafe } from "../infra/errors.js";
import { getChildLogger } from "../logging.js";
import { AuthEnsurer } from "./auth.js";
import type { CommandPolicy } from "./policy.js";
import { type Relay, runRelay } from "./relay.js";
import { bindSocket, teardownSocket } from "./socket.js";
import { type SupervisorDeps, superviseConnection } from "./supervisor.js";

const logger = () => getChildLogger({ module: "forwarder-server" });

export type ServerOptions = {
	socketPath: string;
	accountId: string;
	policy: CommandPolicy;
	binary?: string;
	singleFlight?: boolean;
	auth?: SupervisorDeps["auth"];
	relay?: Relay;
	maxRequestBytes?: number;
};

export type ServerHandle = {
	socketPath: string;
	isRunning: () => boolean;
	activeConnections: () => number;
	/** Stop accepting, close the listener and remove the socket file. In-flight connections keep running. */
	stop: () => Promise<void>;
	/** Resolves after stop() has completed and every connection has finished. */
	drained: Promise<void>;
};

/**
 * Start the forwarder server.
 */
export async function startServer(options: ServerOptions): Promise<ServerHandle> {
	const { socketPath, accountId, policy } = options;
	const binary = options.binary ?? "op";

	const deps: SupervisorDeps = {
		policy,
		accountId,
		binary,
		auth: options.auth ?? new AuthEnsurer({ binary, singleFlight: options.singleFlight }),
		relay: options.relay ?? runRelay,
		maxRequestBytes: options.maxRequestBytes,
	};

	let active = 0;
	const server = await bindSocket(socketPath, (socket) => {
		active++;
		void superviseConnection(socket, deps)
			.catch((err: unknown) => {
				logger().error({ error: formatErrorSafe(err) }, "connection task failed");
				socket.destroy();
			})
			.finally(() => {
				active--;
			});
	});

	// "close" fires once the listener is closed and all connections have ended
	const serverClosed = new Promise<void>((resolve) => {
		server.once("close", () => resolve());
	});

	let stopping: Promise<void> | null = null;
	const stop = (): Promise<void> => {
		if (!stopping) {
			stopping = (async () => {
				logger().info({ socketPath, activeConnections: active }, "shutting down server");
				server.close();
				await teardownSocket(socketPath);
			})();
		}
		return stopping;
	};

	logger().info(
		{
			socketPath,
			account: accountId,
			binary,
			allowedCommands: policy.exactCommands,
			allowedPrefixes: policy.prefixes,
		},
		"server listening",
	);
	if (policy.isEmpty()) {
		logger().warn({ socketPath }, "policy is empty, every command will be rejected");
	}

	return {
		socketPath,
		isRunning: () => server.listening,
		activeConnections: () => active,
		stop,
		drained: serverClosed.then(() => stop()),
	};
}
