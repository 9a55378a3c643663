import fs from "node:fs";
import chalk from "chalk";
import type { Command } from "commander";
import { type ForwarderConfig, getConfigPath, loadConfig } from "../config/config.js";
import { getResolvedLoggerSettings } from "../logging.js";
import { probeBinary } from "./server.js";

export type DoctorReport = {
	config: { path: string; ok: boolean; error?: string };
	account: string | null;
	binary: { name: string; version: string | null; error?: string };
	socket: { path: string | null; exists: boolean; mode: string | null };
	policy: { exactCommands: number; prefixes: number };
	logFile: string;
};

function inspectSocket(socketPath: string): DoctorReport["socket"] {
	try {
		const stats = fs.statSync(socketPath);
		return { path: socketPath, exists: true, mode: (stats.mode & 0o777).toString(8) };
	} catch {
		return { path: socketPath, exists: false, mode: null };
	}
}

export function buildDoctorReport(): DoctorReport {
	const configPath = getConfigPath();
	let config: ForwarderConfig | null = null;
	let configError: string | undefined;
	try {
		config = loadConfig(configPath);
	} catch (err) {
		configError = err instanceof Error ? err.message : String(err);
	}

	const binaryName = config?.binary ?? "op";
	let version: string | null = null;
	let binaryError: string | undefined;
	try {
		version = probeBinary(binaryName);
	} catch (err) {
		binaryError = err instanceof Error ? err.message : String(err);
	}

	return {
		config: { path: configPath, ok: config !== null, error: configError },
		account: config?.account ?? null,
		binary: { name: binaryName, version, error: binaryError },
		socket: config ? inspectSocket(config.socketPath) : { path: null, exists: false, mode: null },
		policy: {
			exactCommands: config?.allowedCommands.length ?? 0,
			prefixes: config?.allowedPrefixes.length ?? 0,
		},
		logFile: getResolvedLoggerSettings().file,
	};
}

export function registerDoctorCommand(program: Command): void {
	program
		.command("doctor")
		.description("Check config, secret-manager CLI and socket state")
		.option("--json", "Output as JSON")
		.action((opts: { json?: boolean }) => {
			const report = buildDoctorReport();

			if (opts.json) {
				console.log(JSON.stringify(report, null, 2));
			} else {
				console.log(chalk.bold("\nopfwd doctor\n"));
				console.log(`Config: ${report.config.path}`);
				console.log(
					`   ${report.config.ok ? chalk.green("✓ valid") : chalk.red(`✗ ${report.config.error}`)}`,
				);
				console.log(`Account: ${report.account ?? "(not configured)"}`);
				console.log(`CLI: ${report.binary.name}`);
				console.log(
					`   ${report.binary.version ? chalk.green(`✓ ${report.binary.version}`) : chalk.red(`✗ ${report.binary.error}`)}`,
				);
				if (report.socket.path) {
					console.log(`Socket: ${report.socket.path}`);
					console.log(
						`   ${report.socket.exists ? `present (mode ${report.socket.mode})` : chalk.yellow("not present (server not running)")}`,
					);
				}
				console.log(
					`Policy: ${report.policy.exactCommands} exact command(s), ${report.policy.prefixes} prefix(es)`,
				);
				console.log(`Log file: ${report.logFile}`);
			}

			if (!report.config.ok || !report.binary.version) {
				process.exitCode = 1;
			}
		});
}
