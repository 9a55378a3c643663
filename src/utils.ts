import os from "node:os";
import path from "node:path";

/**
 * Expand a leading `~` to the current user's home directory.
 */
export function expandHome(p: string): string {
	if (p === "~") return os.homedir();
	if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
	return p;
}

/**
 * Quote each argument for log output: `'--account' 'acct' 'read'`.
 */
export function quoteArgs(args: readonly string[]): string {
	return args.map((arg) => `'${arg}'`).join(" ");
}

export const CONFIG_DIR = path.join(os.homedir(), ".config", "opfwd");
