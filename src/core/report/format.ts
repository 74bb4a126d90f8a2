// CHANGE: Pure text layout of the line report
// WHY: Printer only writes lines; layout stays deterministic and testable
// PURITY: CORE
// FORMAT THEOREM: ∀report, messages: formatReport is a function of (report, messages) only
// INVARIANT: Percentages use one decimal; ratios of empty groups print as 0.0%
// COMPLEXITY: O(g) where g = |groups|

import type {
	LineReport,
	LineTotals,
	SkippedEntry,
} from "../types/index.js";
import type { Messages } from "./messages.js";

export const RULE_WIDTH = 80;

const RULE = "=".repeat(RULE_WIDTH);

/**
 * Render a ratio in [0, 1] as a percentage with one decimal.
 *
 * @example
 * formatPercent(2 / 3) // "66.7%"
 *
 * @pure true
 */
export function formatPercent(value: number): string {
	return `${(value * 100).toFixed(1)}%`;
}

function formatCounts(
	totals: LineTotals,
	messages: Messages,
	filesLabel: string,
): string[] {
	return [
		`  ${filesLabel}: ${totals.fileCount}`,
		`  ${messages.totalLines}: ${totals.totalLines}`,
		`  ${messages.codeLines}: ${totals.codeLines}`,
		`  ${messages.commentLines}: ${totals.commentLines}`,
		`  ${messages.blankLines}: ${totals.blankLines}`,
		`  ${messages.codeRatio}: ${formatPercent(totals.codeRatio)}`,
		`  ${messages.commentRatio}: ${formatPercent(totals.commentRatio)}`,
		`  ${messages.blankRatio}: ${formatPercent(totals.blankRatio)}`,
	];
}

/**
 * Lay out the full report: header, one block per extension, grand total, skip tally.
 *
 * @pure true
 */
export function formatReport(
	report: LineReport,
	messages: Messages,
): readonly string[] {
	const lines: string[] = [RULE, messages.results, RULE];

	for (const group of report.groups) {
		lines.push("", `${group.extension}:`);
		lines.push(...formatCounts(group, messages, messages.fileCount));
	}

	lines.push("", RULE, `${messages.total}:`);
	lines.push(...formatCounts(report.total, messages, messages.files));
	lines.push(`  ${messages.skippedFiles}: ${report.skipped.length}`);
	return lines;
}

/**
 * One stderr line per skipped entry.
 *
 * @pure true
 */
export function formatSkippedEntry(
	entry: SkippedEntry,
	messages: Messages,
): string {
	return `${messages.failedToRead} ${entry.path}: ${entry.reason}`;
}
