/**
 * Command whitelist.
 *
 * A command is allowed when its trimmed text equals an exact entry, or starts
 * with a prefix entry. Matching is case-sensitive and byte-for-byte; internal
 * whitespace is significant. An empty policy allows nothing.
 */

import type { ForwarderConfig } from "../config/config.js";

export type PolicyRule = { kind: "exact" | "prefix"; value: string };

export type PolicyDecision =
	| { allowed: true; command: string; rule: PolicyRule }
	| { allowed: false; command: string };

export type CommandPolicyInit = {
	exactCommands?: Iterable<string>;
	prefixes?: Iterable<string>;
};

export class CommandPolicy {
	private readonly exact: ReadonlySet<string>;
	private readonly prefixList: readonly string[];

	constructor(init: CommandPolicyInit = {}) {
		this.exact = new Set(init.exactCommands ?? []);
		this.prefixList = Object.freeze([...new Set(init.prefixes ?? [])]);
		Object.freeze(this);
	}

	static fromConfig(
		config: Pick<ForwarderConfig, "allowedCommands" | "allowedPrefixes">,
	): CommandPolicy {
		return new CommandPolicy({
			exactCommands: config.allowedCommands,
			prefixes: config.allowedPrefixes,
		});
	}

	get exactCommands(): readonly string[] {
		return [...this.exact];
	}

	get prefixes(): readonly string[] {
		return this.prefixList;
	}

	isEmpty(): boolean {
		return this.exact.size === 0 && this.prefixList.length === 0;
	}

	evaluate(input: string): PolicyDecision {
		const command = input.trim();

		if (this.exact.has(command)) {
			return { allowed: true, command, rule: { kind: "exact", value: command } };
		}

		const prefix = this.prefixList.find((candidate) => command.startsWith(candidate));
		if (prefix !== undefined) {
			return { allowed: true, command, rule: { kind: "prefix", value: prefix } };
		}

		return { allowed: false, command };
	}

	isAllowed(input: string): boolean {
		return this.evaluate(input).allowed;
	}
}
