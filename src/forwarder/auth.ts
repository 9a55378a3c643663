/**
 * Makes sure the external tool is signed in before a command runs.
 *
 * Per call: check status (`--account <id> account get`); on any failure run
 * `signin --account <id>`. Nothing is cached between calls. With single-flight
 * on, concurrent calls for one account share the run that is in progress.
 */

import { getChildLogger } from "../logging.js";
import { type CapturedResult, type CommandRunner, captureCommand } from "./capture.js";
import { AuthenticationError } from "./errors.js";

const logger = () => getChildLogger({ module: "forwarder-auth" });

export type AuthOutcome = "authenticated" | "signed-in";

export type AuthEnsurerOptions = {
	binary: string;
	singleFlight?: boolean;
	runner?: CommandRunner;
};

export function statusArgs(accountId: string): string[] {
	return ["--account", accountId, "account", "get"];
}

export function signInArgs(accountId: string): string[] {
	return ["signin", "--account", accountId];
}

function describeFailure(result: CapturedResult): string {
	if (result.error) return result.error.message;
	if (result.signal) return `terminated by ${result.signal}`;
	return `exit code ${result.code}`;
}

export class AuthEnsurer {
	private readonly binary: string;
	private readonly singleFlight: boolean;
	private readonly runner: CommandRunner;
	// Concurrent checks for the same account share a single run
	private readonly inFlight = new Map<string, Promise<AuthOutcome>>();

	constructor(options: AuthEnsurerOptions) {
		this.binary = options.binary;
		this.singleFlight = options.singleFlight ?? true;
		this.runner = options.runner ?? captureCommand;
	}

	async ensureSignedIn(accountId: string): Promise<AuthOutcome> {
		if (!this.singleFlight) {
			return this.checkAndRepair(accountId);
		}

		const existing = this.inFlight.get(accountId);
		if (existing) {
			logger().debug({ accountId }, "waiting for in-flight authentication check");
			return existing;
		}

		const pending = this.checkAndRepair(accountId);
		this.inFlight.set(accountId, pending);
		try {
			return await pending;
		} finally {
			this.inFlight.delete(accountId);
		}
	}

	private async checkAndRepair(accountId: string): Promise<AuthOutcome> {
		const status = await this.runner(this.binary, statusArgs(accountId));
		if (status.code === 0) {
			logger().debug({ accountId }, "account is already authenticated");
			return "authenticated";
		}

		logger().info(
			{ accountId, reason: describeFailure(status) },
			"account is not signed in, attempting to sign in",
		);

		const signIn = await this.runner(this.binary, signInArgs(accountId));
		if (signIn.code === 0) {
			logger().info({ accountId }, "signed in");
			return "signed-in";
		}

		logger().warn(
			{ accountId, reason: describeFailure(signIn), output: signIn.output },
			"sign in attempt failed",
		);
		throw new AuthenticationError(accountId, signIn.output, describeFailure(signIn), signIn.error);
	}
}
