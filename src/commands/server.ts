/**
 * CLI command to run the forwarder daemon.
 */

import { spawnSync } from "node:child_process";
import type { Command } from "commander";
import { type ForwarderConfig, loadConfig } from "../config/config.js";
import { CommandPolicy, installShutdownHandlers, startServer } from "../forwarder/index.js";
import { formatErrorSafe } from "../infra/errors.js";
import { installUnhandledRejectionHandler } from "../infra/unhandled-rejections.js";
import { getChildLogger } from "../logging.js";
import { expandHome } from "../utils.js";

const logger = () => getChildLogger({ module: "cmd-server" });

export type ServerCommandOptions = {
	socketPath?: string;
};

/**
 * Run `<binary> --version` to confirm the tool is installed before binding the socket.
 * Returns the version string.
 */
export function probeBinary(binary: string): string {
	const result = spawnSync(binary, ["--version"], {
		encoding: "utf8",
		stdio: ["ignore", "pipe", "pipe"],
	});
	if (result.error) {
		throw new Error(
			`The secret-manager CLI (${binary}) was not found in your PATH.\n` +
				"Install the 1Password CLI (op) or set `binary` in the config.\n" +
				`Error details: ${result.error.message}`,
		);
	}
	return result.stdout.trim() || "unknown";
}

/**
 * The `--socket-path` option wins over the config's `socketPath`.
 */
export function resolveServerSocketPath(
	optionPath: string | undefined,
	config: Pick<ForwarderConfig, "socketPath">,
): string {
	return optionPath ? expandHome(optionPath) : config.socketPath;
}

export function registerServerCommand(program: Command): void {
	program
		.command("server")
		.description("Run the forwarding daemon on a Unix socket")
		.option("--socket-path <path>", "Unix socket path (default: socketPath from config)")
		.action(async (opts: ServerCommandOptions) => {
			try {
				const config = loadConfig();
				const socketPath = resolveServerSocketPath(opts.socketPath, config);
				const version = probeBinary(config.binary);
				logger().info({ binary: config.binary, version }, "found secret-manager CLI");

				installUnhandledRejectionHandler("server");

				const handle = await startServer({
					socketPath,
					accountId: config.account,
					policy: CommandPolicy.fromConfig(config),
					binary: config.binary,
					singleFlight: config.auth.singleFlight,
				});

				console.log(`opfwd server listening on: ${handle.socketPath}`);
				console.log(`Using account: ${config.account}`);
				console.log("Press Ctrl+C to stop.");

				installShutdownHandlers(handle, {
					onShutdown: () => {
						console.log("\nShutting down server...");
					},
				});

				// Resolves after a signal has stopped the listener and the last relay has drained
				await handle.drained;
				logger().info("server shutdown completed");
			} catch (err) {
				logger().error({ error: formatErrorSafe(err) }, "server command failed");
				console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
				process.exitCode = 1;
			}
		});
}
