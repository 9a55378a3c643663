/**
 * Signal-driven shutdown: stop accepting, close the listener, remove the socket.
 * Connections that are still relaying are left to finish on their own.
 */

import { formatErrorSafe } from "../infra/errors.js";
import { getChildLogger } from "../logging.js";
import type { ServerHandle } from "./server.js";

const logger = () => getChildLogger({ module: "forwarder-shutdown" });

type SignalSource = {
	on(event: NodeJS.Signals, listener: () => void): unknown;
	off(event: NodeJS.Signals, listener: () => void): unknown;
};

export type ShutdownOptions = {
	signals?: readonly NodeJS.Signals[];
	onShutdown?: (signal: NodeJS.Signals) => void | Promise<void>;
	/** Defaults to the current process */
	source?: SignalSource;
};

export const DEFAULT_SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/**
 * Install termination signal handlers for a running server.
 * Returns a function that removes them again.
 */
export function installShutdownHandlers(
	handle: Pick<ServerHandle, "stop">,
	options: ShutdownOptions = {},
): () => void {
	const signals = options.signals ?? DEFAULT_SHUTDOWN_SIGNALS;
	const source: SignalSource = options.source ?? process;
	let shuttingDown = false;

	const shutdown = async (signal: NodeJS.Signals) => {
		await handle.stop();
		await options.onShutdown?.(signal);
	};

	const listeners = signals.map((signal) => {
		const listener = () => {
			if (shuttingDown) {
				logger().debug({ signal }, "shutdown already in progress");
				return;
			}
			shuttingDown = true;
			logger().info({ signal }, "received termination signal");
			shutdown(signal).catch((err: unknown) => {
				logger().error({ signal, error: formatErrorSafe(err) }, "shutdown failed");
				process.exitCode = 1;
			});
		};
		source.on(signal, listener);
		return { signal, listener };
	});

	return () => {
		for (const { signal, listener } of listeners) {
			source.off(signal, listener);
		}
	};
}
