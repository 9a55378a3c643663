import type { Command } from "commander";
import { loadConfig } from "../config/config.js";
import {
	CommandPolicy,
	CommandRejectedError,
	buildArgumentVector,
	formatErrorLine,
} from "../forwarder/index.js";
import { quoteArgs } from "../utils.js";

export type CheckResult = {
	allowed: boolean;
	lines: string[];
};

/**
 * Describe what the server would do with `input` under `policy`.
 */
export function describeDecision(
	policy: CommandPolicy,
	accountId: string,
	binary: string,
	input: string,
): CheckResult {
	const decision = policy.evaluate(input);
	if (!decision.allowed) {
		const rejection = new CommandRejectedError(decision.command);
		return { allowed: false, lines: [formatErrorLine(rejection.response).trimEnd()] };
	}
	return {
		allowed: true,
		lines: [
			`allowed (${decision.rule.kind} match: ${decision.rule.value})`,
			`would run: ${binary} ${quoteArgs(buildArgumentVector(accountId, decision.command))}`,
		],
	};
}

export function registerCheckCommand(program: Command): void {
	program
		.command("check")
		.description("Check a command against the configured whitelist without running it")
		.argument("<command...>", "command and arguments")
		.passThroughOptions()
		.action((command: string[]) => {
			try {
				const config = loadConfig();
				const result = describeDecision(
					CommandPolicy.fromConfig(config),
					config.account,
					config.binary,
					command.join(" "),
				);
				for (const line of result.lines) {
					console.log(line);
				}
				if (!result.allowed) {
					process.exitCode = 1;
				}
			} catch (err) {
				console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
				process.exitCode = 1;
			}
		});
}
