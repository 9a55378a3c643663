import fs from "node:fs";
import path from "node:path";

import pino, { type Bindings, type LevelWithSilent, type Logger } from "pino";
import { type LoggingConfig, tryLoadConfig } from "./config/config.js";
import { isVerbose } from "./globals.js";
import { CONFIG_DIR } from "./utils.js";

const DEFAULT_LOG_DIR = path.join(CONFIG_DIR, "logs");
export const DEFAULT_LOG_FILE = path.join(DEFAULT_LOG_DIR, "opfwd.log");

/** Sentinel `logging.file` value that sends log lines to fd 2. */
export const STDERR_LOG_TARGET = "stderr";

const ALLOWED_LEVELS: readonly LevelWithSilent[] = [
	"silent",
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
];

export type LoggerSettings = {
	level?: LevelWithSilent;
	file?: string;
};

type ResolvedSettings = {
	level: LevelWithSilent;
	file: string;
};
export type LoggerResolvedSettings = ResolvedSettings;

type Destination = ReturnType<typeof pino.destination>;

let cachedLogger: Logger | null = null;
let cachedSettings: ResolvedSettings | null = null;
let cachedDestination: { stream: Destination; ownsFd: boolean } | null = null;
let overrideSettings: LoggerSettings | null = null;

function normalizeLevel(level?: string): LevelWithSilent {
	if (isVerbose()) return "debug";
	const candidate = level ?? "info";
	return ALLOWED_LEVELS.find((allowed) => allowed === candidate) ?? "info";
}

function configuredLogging(): LoggingConfig | undefined {
	try {
		return tryLoadConfig()?.logging;
	} catch {
		// An invalid config file is reported by the command that loads it; log with defaults meanwhile.
		return undefined;
	}
}

function resolveSettings(): ResolvedSettings {
	const cfg = overrideSettings ?? configuredLogging();
	const level = normalizeLevel(cfg?.level);
	const file = cfg?.file ?? DEFAULT_LOG_FILE;
	return { level, file };
}

function settingsChanged(a: ResolvedSettings | null, b: ResolvedSettings) {
	if (!a) return true;
	return a.level !== b.level || a.file !== b.file;
}

function closeDestination(dest: { stream: Destination; ownsFd: boolean }): void {
	// Flush before exit so CLI commands don't lose their last lines.
	try {
		dest.stream.flushSync();
	} catch {
		// best-effort
	}
	if (!dest.ownsFd) return;
	try {
		dest.stream.end();
	} catch {
		// best-effort
	}
}

function prepareLogFile(file: string): void {
	const logDir = path.dirname(file);
	fs.mkdirSync(logDir, { recursive: true, mode: 0o700 });
	try {
		fs.chmodSync(logDir, 0o700);
	} catch {
		// Best effort; continue even if chmod fails (e.g., on some filesystems)
	}

	// Ensure file exists with 0600 so logged commands are not world-readable
	try {
		const fd = fs.openSync(
			file,
			fs.constants.O_WRONLY | fs.constants.O_CREAT | fs.constants.O_EXCL,
			0o600,
		);
		fs.closeSync(fd);
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code === "EEXIST") {
			try {
				fs.chmodSync(file, 0o600);
			} catch {
				// Ignore chmod errors; destination below will still open the file
			}
		}
		// Other errors: let pino.destination handle it
	}
}

function buildLogger(settings: ResolvedSettings): {
	logger: Logger;
	destination: { stream: Destination; ownsFd: boolean };
} {
	let destination: { stream: Destination; ownsFd: boolean };
	if (settings.file === STDERR_LOG_TARGET) {
		destination = { stream: pino.destination({ dest: 2, sync: true }), ownsFd: false };
	} else {
		prepareLogFile(settings.file);
		destination = {
			stream: pino.destination({ dest: settings.file, mkdir: true, sync: true }),
			ownsFd: true,
		};
	}

	const logger = pino(
		{
			level: settings.level,
			base: undefined,
			timestamp: pino.stdTimeFunctions.isoTime,
		},
		destination.stream,
	);
	return { logger, destination };
}

export function getLogger(): Logger {
	return cachedLogger ?? refreshLogger();
}

/**
 * Re-read settings (config file, verbosity) and rebuild the logger if they changed.
 * Called once the CLI has applied its global options.
 */
export function refreshLogger(): Logger {
	const settings = resolveSettings();
	if (!cachedLogger || settingsChanged(cachedSettings, settings)) {
		if (cachedDestination) {
			closeDestination(cachedDestination);
			cachedDestination = null;
		}
		const built = buildLogger(settings);
		cachedLogger = built.logger;
		cachedDestination = built.destination;
		cachedSettings = settings;
	}
	return cachedLogger;
}

// Children are reused per parent; a rebuilt parent starts a fresh set
const childLoggers = new WeakMap<Logger, Map<string, Logger>>();

export function getChildLogger(bindings?: Bindings, opts?: { level?: LevelWithSilent }): Logger {
	const parent = getLogger();
	if (opts) return parent.child(bindings ?? {}, opts);

	let children = childLoggers.get(parent);
	if (!children) {
		children = new Map();
		childLoggers.set(parent, children);
	}
	const key = JSON.stringify(bindings ?? {});
	let child = children.get(key);
	if (!child) {
		child = parent.child(bindings ?? {});
		children.set(key, child);
	}
	return child;
}

export function getResolvedLoggerSettings(): LoggerResolvedSettings {
	return resolveSettings();
}

// Test helpers
export function setLoggerOverride(settings: LoggerSettings | null) {
	overrideSettings = settings;
	cachedLogger = null;
	cachedSettings = null;
}

export function resetLogger() {
	cachedLogger = null;
	cachedSettings = null;
	if (cachedDestination) {
		closeDestination(cachedDestination);
		cachedDestination = null;
	}
	overrideSettings = null;
}

export function closeLogger(): void {
	if (cachedDestination) {
		closeDestination(cachedDestination);
		cachedDestination = null;
	}
	cachedLogger = null;
	cachedSettings = null;
}
