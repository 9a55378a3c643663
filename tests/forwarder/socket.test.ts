import fs from "node:fs";
import { createConnection, type Server, type Socket } from "node:net";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

import { AlreadyBoundError, SocketSetupError } from "../../src/forwarder/errors.js";
import { bindSocket, teardownSocket } from "../../src/forwarder/socket.js";

function closeServer(server: Server): Promise<void> {
	return new Promise((resolve) => server.close(() => resolve()));
}

describe("socket lifecycle", () => {
	let tempDir = "";
	let server: Server | null = null;

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "opfwd-"));
	});

	afterEach(async () => {
		if (server?.listening) {
			await closeServer(server);
		}
		server = null;
		vi.restoreAllMocks();
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	it("binds an owner-only socket that accepts connections", async () => {
		const socketPath = path.join(tempDir, "opfwd.sock");
		const accepted = vi.fn((socket: Socket) => {
			socket.end("hi\n", () => socket.destroy());
		});
		server = await bindSocket(socketPath, accepted);

		expect(fs.statSync(socketPath).isSocket()).toBe(true);
		expect(fs.statSync(socketPath).mode & 0o777).toBe(0o600);

		const reply = await new Promise<string>((resolve, reject) => {
			const client = createConnection(socketPath);
			let data = "";
			client.on("data", (chunk) => {
				data += chunk.toString();
			});
			client.on("end", () => resolve(data));
			client.on("error", reject);
		});
		expect(reply).toBe("hi\n");
		expect(accepted).toHaveBeenCalledTimes(1);
	});

	it("creates a missing parent directory with mode 0700", async () => {
		const socketDir = path.join(tempDir, "nested", "dir");
		const socketPath = path.join(socketDir, "opfwd.sock");
		server = await bindSocket(socketPath, () => {});

		expect(fs.statSync(socketDir).mode & 0o777).toBe(0o700);
	});

	it("refuses to bind over an existing file and leaves it alone", async () => {
		const socketPath = path.join(tempDir, "opfwd.sock");
		fs.writeFileSync(socketPath, "occupied");

		const error = await bindSocket(socketPath, () => {}).catch((err: unknown) => err);

		expect(error).toBeInstanceOf(AlreadyBoundError);
		expect(fs.readFileSync(socketPath, "utf8")).toBe("occupied");
	});

	it("refuses a second instance on a live socket", async () => {
		const socketPath = path.join(tempDir, "opfwd.sock");
		server = await bindSocket(socketPath, (socket) => socket.destroy());

		const error = await bindSocket(socketPath, () => {}).catch((err: unknown) => err);

		expect(error).toBeInstanceOf(AlreadyBoundError);
		if (!(error instanceof AlreadyBoundError)) return;
		expect(error.code).toBe("ALREADY_BOUND");
		expect(error.message).toContain(`rm ${socketPath}`);
		expect(fs.statSync(socketPath).isSocket()).toBe(true);
		expect(server.listening).toBe(true);
	});

	it("closes and removes the socket when permissions cannot be set", async () => {
		const socketPath = path.join(tempDir, "opfwd.sock");
		vi.spyOn(fs.promises, "chmod").mockRejectedValueOnce(new Error("EPERM: operation not permitted"));

		const error = await bindSocket(socketPath, () => {}).catch((err: unknown) => err);

		expect(error).toBeInstanceOf(SocketSetupError);
		if (!(error instanceof SocketSetupError)) return;
		expect(error.code).toBe("SOCKET_SETUP");
		expect(error.message).toMatch(/^failed to set permissions on socket /);
		expect(fs.existsSync(socketPath)).toBe(false);
	});

	it("tears down idempotently", async () => {
		const socketPath = path.join(tempDir, "opfwd.sock");
		fs.writeFileSync(socketPath, "");

		await teardownSocket(socketPath);
		expect(fs.existsSync(socketPath)).toBe(false);
		await expect(teardownSocket(socketPath)).resolves.toBeUndefined();
	});
});
