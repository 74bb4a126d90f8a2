// CHANGE: Thin APP delegator
// WHY: main parses process.argv and delegates to app/runCounter
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value

import { runCli } from "./app/runCounter.js";
import type { ExitCode } from "./core/models.js";

/**
 * Entry for programmatic usage (without terminating the process).
 *
 * @returns ExitCode (0 | 1 | 2)
 */
export async function main(): Promise<ExitCode> {
	return runCli(process.argv.slice(2));
}
