/**
 * Error classification utilities.
 *
 * Walks error cause chains to detect peer disconnects on the forwarding socket,
 * abort errors, and to format errors for logs and response lines.
 */

/** Error codes raised when the other end of a socket or pipe goes away. */
const PEER_DISCONNECT_CODES = new Set([
	"ECONNRESET",
	"ECONNREFUSED",
	"ECONNABORTED",
	"EPIPE",
	"ERR_STREAM_DESTROYED",
	"ERR_STREAM_WRITE_AFTER_END",
]);

const PEER_DISCONNECT_PATTERNS = [
	"socket hang up",
	"write epipe",
	"read econnreset",
	"this socket has been ended by the other party",
];

/**
 * Collect all error candidates from a (potentially nested) error.
 * BFS through `.cause`, `.reason`, `.errors` to find all relevant error objects.
 */
export function collectErrorCandidates(err: unknown, maxDepth = 5): unknown[] {
	const candidates: unknown[] = [];
	const queue: Array<{ value: unknown; depth: number }> = [{ value: err, depth: 0 }];
	const seen = new WeakSet<object>();

	while (queue.length > 0) {
		const item = queue.shift();
		if (!item) break;
		if (item.depth > maxDepth) continue;

		const val = item.value;
		if (val == null || typeof val !== "object") {
			if (val != null) candidates.push(val);
			continue;
		}

		if (seen.has(val)) continue;
		seen.add(val);
		candidates.push(val);

		const nextDepth = item.depth + 1;
		if ("cause" in val && val.cause != null) {
			queue.push({ value: val.cause, depth: nextDepth });
		}
		if ("reason" in val && val.reason != null) {
			queue.push({ value: val.reason, depth: nextDepth });
		}
		if ("errors" in val && Array.isArray(val.errors)) {
			for (const e of val.errors) {
				queue.push({ value: e, depth: nextDepth });
			}
		}
	}

	return candidates;
}

function extractCode(val: unknown): string | null {
	if (typeof val === "object" && val !== null && "code" in val && typeof val.code === "string") {
		return val.code;
	}
	return null;
}

function extractMessage(val: unknown): string | null {
	if (typeof val === "string") return val;
	if (val instanceof Error) return val.message;
	if (typeof val === "object" && val !== null && "message" in val) {
		if (typeof val.message === "string") return val.message;
	}
	return null;
}

/**
 * Check if an error (or any error in its cause chain) means the peer went away.
 */
export function isPeerDisconnectError(err: unknown): boolean {
	for (const candidate of collectErrorCandidates(err)) {
		const code = extractCode(candidate);
		if (code && PEER_DISCONNECT_CODES.has(code)) {
			return true;
		}
		const message = extractMessage(candidate)?.toLowerCase();
		if (message && PEER_DISCONNECT_PATTERNS.some((pattern) => message.includes(pattern))) {
			return true;
		}
	}
	return false;
}

/**
 * Check if an error is an AbortError (expected during shutdown / cancellation).
 */
export function isAbortError(err: unknown): boolean {
	for (const candidate of collectErrorCandidates(err)) {
		if (typeof candidate === "object" && candidate !== null) {
			if ("name" in candidate && candidate.name === "AbortError") return true;
			if (extractCode(candidate) === "ABORT_ERR") return true;
		}

		const message = extractMessage(candidate)?.toLowerCase();
		if (
			message &&
			(message.includes("this operation was aborted") ||
				message.includes("the operation was aborted") ||
				message.includes("signal is aborted"))
		) {
			return true;
		}
	}
	return false;
}

/**
 * Safely format an error to a string, avoiding circular references.
 */
export function formatErrorSafe(err: unknown, maxLength = 500): string {
	if (err == null) return "unknown error";

	try {
		if (err instanceof Error) {
			let msg = `${err.name}: ${err.message}`;
			if (err.cause) {
				msg += ` [cause: ${formatErrorSafe(err.cause, maxLength / 2)}]`;
			}
			return truncate(msg, maxLength);
		}
		return truncate(String(err), maxLength);
	} catch {
		return "error (could not format)";
	}
}

function truncate(str: string, maxLength: number): string {
	if (str.length <= maxLength) return str;
	return `${str.slice(0, maxLength - 3)}...`;
}
