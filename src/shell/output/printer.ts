// CHANGE: Console printer for the line report
// WHY: Logging stays in SHELL; CORE returns lines only
// PURITY: SHELL
// EFFECT: console output
// INVARIANT: Report goes to stdout, per-file skips to stderr

import { formatReport, formatSkippedEntry } from "../../core/report/format.js";
import type { Messages } from "../../core/report/messages.js";
import { formatUsage } from "../../core/report/usage.js";
import type { LineReport } from "../../core/types/index.js";

/**
 * Print skipped entries (stderr) followed by the report (stdout).
 *
 * @pure false (console I/O)
 */
export function printReport(report: LineReport, messages: Messages): void {
	for (const entry of report.skipped) {
		console.warn(`⚠️  ${formatSkippedEntry(entry, messages)}`);
	}
	for (const line of formatReport(report, messages)) {
		console.log(line);
	}
}

/**
 * @pure false (console I/O)
 */
export function printUsage(messages: Messages): void {
	for (const line of formatUsage(messages)) {
		console.log(line);
	}
}
