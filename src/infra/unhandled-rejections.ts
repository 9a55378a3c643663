/**
 * Process-level unhandled rejection handler.
 *
 * Classifies unhandled rejections and decides whether to exit or continue:
 * - Fatal / config errors → exit(1)
 * - Peer disconnects on the forwarding socket → warn + continue
 * - AbortError → suppress (expected during shutdown)
 */

import { getChildLogger } from "../logging.js";
import { formatErrorSafe, isAbortError, isPeerDisconnectError } from "./errors.js";

const logger = () => getChildLogger({ module: "unhandled-rejections" });

export type RejectionCategory = "fatal" | "config" | "disconnect" | "abort" | "unknown";

export function categorize(err: unknown): RejectionCategory {
	if (isAbortError(err)) return "abort";
	if (isPeerDisconnectError(err)) return "disconnect";

	const lower = formatErrorSafe(err, 1000).toLowerCase();

	if (
		lower.includes("configerror") ||
		lower.includes("invalid configuration") ||
		lower.includes("config file not found") ||
		lower.includes("cannot find module")
	) {
		return "config";
	}

	if (
		lower.includes("out of memory") ||
		lower.includes("assertion") ||
		lower.includes("invariant") ||
		lower.includes("maximum call stack")
	) {
		return "fatal";
	}

	return "unknown";
}

/**
 * Install the unhandled rejection handler.
 * Call once at process startup.
 *
 * @param processLabel - label for log context, e.g. "server"
 */
export function installUnhandledRejectionHandler(processLabel: string): () => void {
	const handler = (reason: unknown) => {
		const category = categorize(reason);
		const formatted = formatErrorSafe(reason);

		switch (category) {
			case "abort":
				logger().debug({ process: processLabel }, `suppressed abort rejection: ${formatted}`);
				break;

			case "disconnect":
				logger().warn(
					{ process: processLabel, category },
					`peer disconnect rejection (continuing): ${formatted}`,
				);
				break;

			case "config":
				logger().fatal({ process: processLabel, category }, `config error (exiting): ${formatted}`);
				process.exit(1);
				break;

			case "fatal":
				logger().fatal(
					{ process: processLabel, category },
					`fatal unhandled rejection (exiting): ${formatted}`,
				);
				process.exit(1);
				break;

			default:
				// One connection's failure must never take the server down with it.
				logger().error({ process: processLabel, category }, `unhandled rejection: ${formatted}`);
				break;
		}
	};

	process.on("unhandledRejection", handler);
	logger().debug({ process: processLabel }, "unhandled rejection handler installed");
	return () => {
		process.off("unhandledRejection", handler);
	};
}
