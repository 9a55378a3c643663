/**
 * Wire protocol for the forwarding socket.
 *
 * Client → server: one UTF-8 line terminated by "\n".
 * Server → client: the tool's raw output, or a single "Error: ..." line, then close.
 */

import os from "node:os";
import path from "node:path";

/** Longest request line accepted before the connection is dropped without a reply. */
export const MAX_REQUEST_BYTES = 64 * 1024;

/**
 * Get the default socket path for the forwarder.
 * Uses ~/.ssh/opfwd.sock, the usual target of an SSH RemoteForward.
 */
export function getDefaultSocketPath(): string {
	return path.join(os.homedir(), ".ssh", "opfwd.sock");
}

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Decode a raw request line. Returns null when the bytes are not valid UTF-8.
 */
export function decodeRequestLine(bytes: Uint8Array): string | null {
	try {
		return utf8.decode(bytes);
	} catch {
		return null;
	}
}

/**
 * Split a command on runs of whitespace.
 *
 * No quote or escape handling: `--title='My Item'` becomes two tokens.
 */
export function tokenizeCommand(command: string): string[] {
	return command.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Build the tool's argument vector: the account flag, then the caller's tokens.
 */
export function buildArgumentVector(accountId: string, command: string): string[] {
	return ["--account", accountId, ...tokenizeCommand(command)];
}

/**
 * Format a single response line as sent back to the caller.
 */
export function formatErrorLine(message: string): string {
	return `Error: ${message}\n`;
}
