#!/usr/bin/env node

import { createProgram } from "./cli/program.js";
import { registerCheckCommand } from "./commands/check.js";
import { registerDoctorCommand } from "./commands/doctor.js";
import { registerExecCommand } from "./commands/exec.js";
import { registerServerCommand } from "./commands/server.js";
import { setConfigPath } from "./config/path.js";
import { setVerbose } from "./globals.js";
import { closeLogger, refreshLogger } from "./logging.js";

// Create CLI program
const program = createProgram();

// Register commands
registerServerCommand(program);
registerExecCommand(program);
registerCheckCommand(program);
registerDoctorCommand(program);

// Apply global options before any command loads config or logs
program.hook("preAction", (thisCommand) => {
	const opts = thisCommand.opts();
	if (opts.config) {
		setConfigPath(opts.config);
	}
	if (opts.verbose) {
		setVerbose(true);
	}
	refreshLogger();
});

async function main(): Promise<void> {
	await program.parseAsync();
}

main()
	.catch((err) => {
		// Commander prints some errors itself; keep this minimal.
		console.error(`Error: ${String(err)}`);
		process.exitCode = 1;
	})
	.finally(() => {
		// Flush the pino destination so the process can exit cleanly.
		closeLogger();
	});
