/**
 * CLI command that sends one command to a running forwarder and prints the reply.
 */

import type { Command } from "commander";
import { tryLoadConfig } from "../config/config.js";
import { ClientError, getDefaultSocketPath, sendCommand } from "../forwarder/index.js";
import { formatErrorSafe } from "../infra/errors.js";
import { getChildLogger } from "../logging.js";
import { expandHome } from "../utils.js";

const logger = () => getChildLogger({ module: "cmd-exec" });

export type ExecOptions = {
	socketPath?: string;
};

/**
 * Resolve the socket to connect to: CLI option → OPFWD_SOCKET → config → default.
 */
export function resolveClientSocketPath(optionPath?: string): string {
	if (optionPath) return expandHome(optionPath);

	const envPath = process.env.OPFWD_SOCKET;
	if (envPath) return expandHome(envPath);

	try {
		const config = tryLoadConfig();
		if (config) return config.socketPath;
	} catch (err) {
		// The client only needs the socket path; a broken server config should not block it
		logger().debug({ error: formatErrorSafe(err) }, "ignoring unreadable config");
	}

	return getDefaultSocketPath();
}

export function registerExecCommand(program: Command): void {
	program
		.command("exec")
		.description("Send a command to the forwarder and print its output")
		.argument("<command...>", "command and arguments, e.g. read op://vault/item/field")
		.option("--socket-path <path>", "Unix socket path")
		.passThroughOptions()
		.addHelpText(
			"after",
			"\nArguments are joined with single spaces and split again on whitespace by the\n" +
				"server. Quoting is not preserved: avoid arguments that contain spaces.",
		)
		.action(async (command: string[], opts: ExecOptions) => {
			const socketPath = resolveClientSocketPath(opts.socketPath);
			try {
				await sendCommand({ socketPath, command: command.join(" "), output: process.stdout });
			} catch (err) {
				logger().debug({ socketPath, error: formatErrorSafe(err) }, "exec failed");
				console.error(err instanceof ClientError ? err.message : `Error: ${String(err)}`);
				process.exitCode = 1;
			}
		});
}
