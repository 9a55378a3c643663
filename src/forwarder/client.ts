/**
 * Client for the forwarder daemon.
 *
 * Sends one command line and copies the response to `output` until the server
 * closes the connection.
 */

import { once } from "node:events";
import fs from "node:fs";
import { createConnection } from "node:net";
import type { Writable } from "node:stream";
import { pipeline } from "node:stream/promises";

import { getChildLogger } from "../logging.js";

const logger = () => getChildLogger({ module: "forwarder-client" });

export type SendCommandOptions = {
	socketPath: string;
	command: string;
	output: Writable;
};

export class ClientError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ClientError";
	}
}

export async function sendCommand({ socketPath, command, output }: SendCommandOptions): Promise<void> {
	if (!fs.existsSync(socketPath)) {
		throw new ClientError(
			`Socket ${socketPath} not found.\n` +
				"Make sure the opfwd server is running and the socket is accessible.",
		);
	}

	const socket = createConnection(socketPath);
	try {
		await once(socket, "connect");
	} catch (err) {
		socket.destroy();
		throw new ClientError(`Error connecting to socket: ${String(err)}`, { cause: err });
	}

	logger().debug({ socketPath }, "connected");
	// The write side stays open: the server closes the connection when the reply is complete
	socket.write(`${command}\n`);

	try {
		await pipeline(socket, output, { end: false });
	} catch (err) {
		throw new ClientError(`Error reading response: ${String(err)}`, { cause: err });
	} finally {
		socket.destroy();
	}
}
