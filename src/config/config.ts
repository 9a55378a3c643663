import fs from "node:fs";

import JSON5 from "json5";
import { z } from "zod";

import { getDefaultSocketPath } from "../forwarder/protocol.js";
import { expandHome } from "../utils.js";
import { resolveConfigPath } from "./path.js";

/**
 * A whitelist entry. Blank entries are refused: an empty prefix would match
 * every command.
 */
const WhitelistEntrySchema = z
	.string()
	.refine((value) => value.trim().length > 0, { message: "whitelist entries must not be blank" });

const AuthConfigSchema = z.object({
	// Collapse concurrent status-check/sign-in runs for one account into a single in-flight run
	singleFlight: z.boolean().default(true),
});

const LoggingConfigSchema = z.object({
	level: z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]).optional(),
	// A path, or "stderr"
	file: z.string().min(1).transform(expandHome).optional(),
});

const ForwarderConfigSchema = z.object({
	// Passed verbatim to the external tool as `--account <id>`
	account: z
		.string({ required_error: "account is required in config" })
		.refine((value) => value.trim().length > 0, { message: "account is required in config" }),
	socketPath: z
		.string()
		.min(1)
		.optional()
		.transform((value) => (value ? expandHome(value) : getDefaultSocketPath())),
	allowedCommands: z.array(WhitelistEntrySchema).default([]),
	allowedPrefixes: z.array(WhitelistEntrySchema).default([]),
	binary: z.string().min(1).default("op"),
	auth: AuthConfigSchema.default({}),
	logging: LoggingConfigSchema.optional(),
});

export type ForwarderConfig = z.infer<typeof ForwarderConfigSchema>;
export type AuthConfig = z.infer<typeof AuthConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export type ConfigErrorReason = "missing" | "unreadable" | "invalid";

export class ConfigError extends Error {
	constructor(
		message: string,
		public readonly reason: ConfigErrorReason,
		public readonly configPath: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "ConfigError";
	}
}

let cachedConfig: ForwarderConfig | null = null;
let configMtime: number | null = null;
let cachedConfigPath: string | null = null;

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
		.join("; ");
}

/**
 * Validate an already-parsed config object.
 */
export function parseConfig(raw: unknown, configPath = "<inline>"): ForwarderConfig {
	const result = ForwarderConfigSchema.safeParse(raw);
	if (!result.success) {
		throw new ConfigError(
			`invalid configuration in ${configPath}: ${formatIssues(result.error)}`,
			"invalid",
			configPath,
		);
	}
	return result.data;
}

/**
 * Load and validate the configuration file.
 * Throws ConfigError when the file is missing, unreadable or invalid.
 */
export function loadConfig(configPath = resolveConfigPath()): ForwarderConfig {
	let stat: fs.Stats;
	try {
		stat = fs.statSync(configPath);
	} catch (err) {
		const code = (err as NodeJS.ErrnoException).code;
		if (code === "ENOENT") {
			throw new ConfigError(`config file not found at ${configPath}`, "missing", configPath, {
				cause: err,
			});
		}
		throw new ConfigError(`cannot access config file ${configPath}`, "unreadable", configPath, {
			cause: err,
		});
	}

	// Invalidate cache if path changed or mtime changed
	if (cachedConfig && cachedConfigPath === configPath && configMtime === stat.mtimeMs) {
		return cachedConfig;
	}

	let parsed: unknown;
	try {
		parsed = JSON5.parse(fs.readFileSync(configPath, "utf-8"));
	} catch (err) {
		throw new ConfigError(
			`failed to parse config file ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
			"invalid",
			configPath,
			{ cause: err },
		);
	}

	const validated = parseConfig(parsed, configPath);
	cachedConfig = validated;
	configMtime = stat.mtimeMs;
	cachedConfigPath = configPath;
	return validated;
}

/**
 * Like loadConfig, but returns null when no config file exists.
 */
export function tryLoadConfig(configPath = resolveConfigPath()): ForwarderConfig | null {
	try {
		return loadConfig(configPath);
	} catch (err) {
		if (err instanceof ConfigError && err.reason === "missing") {
			return null;
		}
		throw err;
	}
}

/**
 * Get the current config file path being used.
 */
export function getConfigPath(): string {
	return resolveConfigPath();
}

/**
 * Reset the config cache (useful for testing).
 */
export function resetConfigCache() {
	cachedConfig = null;
	configMtime = null;
	cachedConfigPath = null;
}
