/**
 * Runs the external tool and streams both of its output streams into the caller's
 * connection. Resolves only after the child has exited and stdout and stderr have
 * both been fully written to the sink; the sink is left open for the caller to close.
 */

import { type ChildProcessByStdio, spawn } from "node:child_process";
import type { Readable, Writable } from "node:stream";

import { formatErrorSafe } from "../infra/errors.js";
import { getChildLogger } from "../logging.js";
import { SpawnError } from "./errors.js";

const logger = () => getChildLogger({ module: "forwarder-relay" });

export type ExitOutcome = {
	code: number | null;
	signal: NodeJS.Signals | null;
};

export type RelayOptions = {
	binary: string;
	argv: readonly string[];
	sink: Writable;
};

export type Relay = (options: RelayOptions) => Promise<ExitOutcome>;

export const runRelay: Relay = ({ binary, argv, sink }) =>
	new Promise((resolve, reject) => {
		let spawned = false;
		let settled = false;

		// spawn throws synchronously on invalid arguments, e.g. a NUL byte in a token
		let proc: ChildProcessByStdio<null, Readable, Readable>;
		try {
			proc = spawn(binary, [...argv], {
				stdio: ["ignore", "pipe", "pipe"],
			});
		} catch (err) {
			logger().error({ binary, error: formatErrorSafe(err) }, "error starting command");
			reject(new SpawnError(binary, err));
			return;
		}

		// The caller went away: keep draining so the child never blocks on a full pipe.
		const onSinkError = (err: Error) => {
			logger().debug({ pid: proc.pid, error: formatErrorSafe(err) }, "sink error while relaying");
			proc.stdout.unpipe(sink);
			proc.stderr.unpipe(sink);
			proc.stdout.resume();
			proc.stderr.resume();
		};
		sink.on("error", onSinkError);

		const finish = () => {
			sink.off("error", onSinkError);
		};

		proc.stdout.pipe(sink, { end: false });
		proc.stderr.pipe(sink, { end: false });

		proc.on("spawn", () => {
			spawned = true;
			logger().debug({ pid: proc.pid }, "process started");
		});

		proc.on("error", (err) => {
			if (spawned) {
				logger().warn({ pid: proc.pid, error: formatErrorSafe(err) }, "process error");
				return;
			}
			if (settled) return;
			settled = true;
			finish();
			logger().error({ binary, error: formatErrorSafe(err) }, "error starting command");
			reject(new SpawnError(binary, err));
		});

		// "close" fires once the process has exited and both stdio streams have ended
		proc.on("close", (code, signal) => {
			if (settled) return;
			settled = true;
			finish();
			if (code !== 0) {
				// The child's stderr has already carried the failure detail to the caller
				logger().info({ pid: proc.pid, code, signal }, "command exited with non-zero status");
			} else {
				logger().debug({ pid: proc.pid }, "command completed");
			}
			resolve({ code, signal });
		});
	});
