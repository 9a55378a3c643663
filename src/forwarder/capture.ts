import { type ChildProcessByStdio, spawn } from "node:child_process";
import type { Readable } from "node:stream";

export type CapturedResult = {
	code: number | null;
	signal: NodeJS.Signals | null;
	/** stdout and stderr interleaved in arrival order */
	output: string;
	/** Set when the process could not be started */
	error?: Error;
};

export type CommandRunner = (binary: string, args: readonly string[]) => Promise<CapturedResult>;

/**
 * Run a command to completion, capturing its combined output.
 *
 * Never rejects: a process that fails to start resolves with `error` set and a null code.
 */
export const captureCommand: CommandRunner = (binary, args) =>
	new Promise((resolve) => {
		let settled = false;
		const chunks: Buffer[] = [];

		let proc: ChildProcessByStdio<null, Readable, Readable>;
		try {
			proc = spawn(binary, [...args], {
				stdio: ["ignore", "pipe", "pipe"],
			});
		} catch (err) {
			const error = err instanceof Error ? err : new Error(String(err));
			resolve({ code: null, signal: null, output: "", error });
			return;
		}

		proc.stdout.on("data", (data: Buffer) => {
			chunks.push(data);
		});
		proc.stderr.on("data", (data: Buffer) => {
			chunks.push(data);
		});

		proc.on("error", (error) => {
			if (settled) return;
			settled = true;
			resolve({ code: null, signal: null, output: Buffer.concat(chunks).toString("utf8"), error });
		});

		proc.on("close", (code, signal) => {
			if (settled) return;
			settled = true;
			resolve({ code, signal, output: Buffer.concat(chunks).toString("utf8") });
		});
	});
