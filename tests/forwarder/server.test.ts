import fs from "node:fs";
import { createConnection } from "node:net";
import os from "node:os";
import path from "node:path";
import { PassThrough } from "node:stream";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

import { sendCommand } from "../../src/forwarder/client.js";
import { CommandPolicy } from "../../src/forwarder/policy.js";
import type { RelayOptions } from "../../src/forwarder/relay.js";
import { type ServerHandle, type ServerOptions, startServer } from "../../src/forwarder/server.js";

const ACCOUNT = "test-account";

const policy = new CommandPolicy({
	exactCommands: ["read op://Employee/CONFIG/operator"],
	prefixes: ["item create"],
});

/**
 * A stand-in for the secret-manager CLI: records every invocation, keeps
 * sign-in state in a marker file, and answers a few commands.
 */
function writeFakeOp(dir: string): { binary: string; callsLog: string; denySignIn: string } {
	const binary = path.join(dir, "op");
	const callsLog = path.join(dir, "calls.log");
	const authed = path.join(dir, "authenticated");
	const denySignIn = path.join(dir, "deny-signin");
	const script = `#!/bin/sh
printf '%s\\n' "$*" >> '${callsLog}'
case "$*" in
	*"account get"*)
		if [ -f '${authed}' ]; then echo "Account is authenticated"; exit 0; fi
		echo "[ERROR] account is not signed in" >&2
		exit 1
		;;
	signin*)
		if [ -f '${denySignIn}' ]; then echo "[ERROR] sign-in denied" >&2; exit 1; fi
		touch '${authed}'
		echo "Signed in to test-account"
		;;
	*"read op://Employee/CONFIG/operator"*)
		echo "SECRET_VALUE_123"
		;;
	*"item create"*)
		echo "Item created successfully"
		echo "warning: no template given" >&2
		;;
	*)
		echo "Unrecognized command" >&2
		exit 1
		;;
esac
`;
	fs.writeFileSync(binary, script, { mode: 0o755 });
	return { binary, callsLog, denySignIn };
}

/**
 * Connect, optionally write, then read until the server closes the connection.
 */
function rawRequest(
	socketPath: string,
	payload: string | Buffer | null,
	opts: { halfClose?: boolean } = {},
): Promise<string> {
	return new Promise((resolve, reject) => {
		const client = createConnection(socketPath);
		const chunks: Buffer[] = [];
		client.on("connect", () => {
			if (payload !== null) client.write(payload);
			if (payload === null || opts.halfClose) client.end();
		});
		client.on("data", (chunk: Buffer) => chunks.push(chunk));
		client.on("close", () => resolve(Buffer.concat(chunks).toString("utf8")));
		client.on("error", reject);
	});
}

async function request(socketPath: string, command: string): Promise<string> {
	const output = new PassThrough();
	const chunks: Buffer[] = [];
	output.on("data", (chunk: Buffer) => chunks.push(chunk));
	await sendCommand({ socketPath, command, output });
	return Buffer.concat(chunks).toString("utf8");
}

function readCalls(callsLog: string): string[] {
	if (!fs.existsSync(callsLog)) return [];
	return fs.readFileSync(callsLog, "utf8").split("\n").filter(Boolean);
}

describe("forwarder server", () => {
	let tempDir = "";
	let socketPath = "";
	let fakeOp: ReturnType<typeof writeFakeOp>;
	let handle: ServerHandle | null = null;

	async function start(overrides: Partial<ServerOptions> = {}): Promise<ServerHandle> {
		handle = await startServer({
			socketPath,
			accountId: ACCOUNT,
			policy,
			binary: fakeOp.binary,
			...overrides,
		});
		return handle;
	}

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "opfwd-"));
		socketPath = path.join(tempDir, "opfwd.sock");
		fakeOp = writeFakeOp(tempDir);
	});

	afterEach(async () => {
		if (handle) {
			await handle.stop();
			await handle.drained;
			handle = null;
		}
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	it("runs an exact-match command after signing in", async () => {
		await start();

		const output = await request(socketPath, "read op://Employee/CONFIG/operator");

		expect(output).toBe("SECRET_VALUE_123\n");
		expect(readCalls(fakeOp.callsLog)).toEqual([
			"--account test-account account get",
			"signin --account test-account",
			"--account test-account read op://Employee/CONFIG/operator",
		]);
	});

	it("runs a prefix-match command and relays both output streams", async () => {
		await start();

		const output = await request(socketPath, "item create document --title='Test'");

		expect(output.split("\n").filter(Boolean).sort()).toEqual([
			"Item created successfully",
			"warning: no template given",
		]);
		expect(readCalls(fakeOp.callsLog).at(-1)).toBe(
			"--account test-account item create document --title='Test'",
		);
	});

	it("rejects a command outside the whitelist without running anything", async () => {
		await start();

		const first = await request(socketPath, "read op://Personal/SSH/passphrase");
		const second = await request(socketPath, "read op://Personal/SSH/passphrase");

		expect(first).toBe("Error: Command not allowed: read op://Personal/SSH/passphrase\n");
		expect(second).toBe(first);
		expect(readCalls(fakeOp.callsLog)).toEqual([]);
	});

	it("trims the request line before matching and echoing", async () => {
		await start();

		const output = await rawRequest(socketPath, "   item list  \r\n");

		expect(output).toBe("Error: Command not allowed: item list\n");
	});

	it("checks authentication again for every allowed command", async () => {
		await start();

		await request(socketPath, "read op://Employee/CONFIG/operator");
		await request(socketPath, "read op://Employee/CONFIG/operator");

		const statusChecks = readCalls(fakeOp.callsLog).filter((call) => call.endsWith("account get"));
		expect(statusChecks).toHaveLength(2);
	});

	it("reports a failed sign-in on one line and skips the command", async () => {
		fs.writeFileSync(fakeOp.denySignIn, "");
		await start();

		const output = await request(socketPath, "read op://Employee/CONFIG/operator");

		expect(output).toBe(
			"Error: Could not sign in: failed to sign in to account test-account: exit code 1: [ERROR] sign-in denied\n",
		);
		expect(readCalls(fakeOp.callsLog)).toEqual([
			"--account test-account account get",
			"signin --account test-account",
		]);
	});

	it("reports a tool that cannot be started", async () => {
		const missing = path.join(tempDir, "missing-op");
		await start({
			binary: missing,
			auth: { ensureSignedIn: async () => "authenticated" },
		});

		const output = await request(socketPath, "item create login");

		expect(output).toBe(`Error: failed to start ${missing}: spawn ${missing} ENOENT\n`);
	});

	it("reports an argument the tool cannot be started with", async () => {
		await start();

		const output = await rawRequest(socketPath, "item create a\0b\n");

		expect(output.startsWith(`Error: failed to start ${fakeOp.binary}: `)).toBe(true);
		expect(output).toMatch(/null bytes.*\n$/);
		expect(output.indexOf("\n")).toBe(output.length - 1);
	});

	it("refuses a request line that is not valid UTF-8", async () => {
		await start();

		const payload = Buffer.concat([Buffer.from("item create "), Buffer.from([0xff, 0x0a])]);
		const output = await rawRequest(socketPath, payload);

		expect(output).toBe("Error: request is not valid UTF-8\n");
		expect(readCalls(fakeOp.callsLog)).toEqual([]);
	});

	it("closes without a reply when the caller sends nothing", async () => {
		await start();

		await expect(rawRequest(socketPath, null)).resolves.toBe("");
	});

	it("accepts a final line without a newline when the caller half-closes", async () => {
		await start();

		const output = await rawRequest(socketPath, "item list", { halfClose: true });

		expect(output).toBe("Error: Command not allowed: item list\n");
	});

	it("drops a request line that is too long", async () => {
		await start({ maxRequestBytes: 16 });

		const output = await rawRequest(socketPath, "item create a-very-long-title\n");

		expect(output).toBe("");
		expect(readCalls(fakeOp.callsLog)).toEqual([]);
	});

	it("survives an unexpected fault in one connection", async () => {
		const relay = vi
			.fn<(options: RelayOptions) => Promise<{ code: number | null; signal: NodeJS.Signals | null }>>()
			.mockRejectedValueOnce(new Error("boom"))
			.mockImplementationOnce(async ({ sink }) => {
				sink.write("ok\n");
				return { code: 0, signal: null };
			});
		await start({ relay, auth: { ensureSignedIn: async () => "authenticated" } });

		await expect(rawRequest(socketPath, "item create a\n")).resolves.toBe("");
		await expect(request(socketPath, "item create b")).resolves.toBe("ok\n");
		expect(handle?.isRunning()).toBe(true);
	});

	it("serves connections concurrently", async () => {
		const releases: Array<() => void> = [];
		const relay = vi.fn(
			({ sink, argv }: RelayOptions) =>
				new Promise<{ code: number; signal: null }>((resolve) => {
					releases.push(() => {
						sink.write(`${argv.at(-1)}\n`);
						resolve({ code: 0, signal: null });
					});
				}),
		);
		const server = await start({ relay, auth: { ensureSignedIn: async () => "authenticated" } });

		const first = request(socketPath, "item create one");
		const second = request(socketPath, "item create two");
		await vi.waitFor(() => expect(releases).toHaveLength(2));
		expect(server.activeConnections()).toBe(2);

		for (const release of releases) release();
		await expect(Promise.all([first, second])).resolves.toEqual(["one\n", "two\n"]);
	});

	it("stops accepting and removes the socket on stop, letting in-flight work finish", async () => {
		let release: () => void = () => {};
		const relay = vi.fn(
			({ sink }: RelayOptions) =>
				new Promise<{ code: number; signal: null }>((resolve) => {
					release = () => {
						sink.write("late output\n");
						resolve({ code: 0, signal: null });
					};
				}),
		);
		const server = await start({ relay, auth: { ensureSignedIn: async () => "authenticated" } });

		const inFlight = request(socketPath, "item create slow");
		await vi.waitFor(() => expect(relay).toHaveBeenCalledTimes(1));

		await server.stop();
		expect(fs.existsSync(socketPath)).toBe(false);
		expect(server.isRunning()).toBe(false);
		await expect(rawRequest(socketPath, "item create again\n")).rejects.toThrow();

		release();
		await expect(inFlight).resolves.toBe("late output\n");
		await server.drained;
		expect(server.activeConnections()).toBe(0);
	});
});
