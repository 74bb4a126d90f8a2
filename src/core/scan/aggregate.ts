// CHANGE: Fold FileStats into per-extension summaries and a grand total
// WHY: Reporter renders groups; sums must be reproducible regardless of scan order
// PURITY: CORE
// FORMAT THEOREM: ∀g ∈ groups: g.X = Σ_{s ∈ stats, s.ext = g.ext} s.X ∧ total.X = Σ_g g.X
// INVARIANT: ratio = part / total, 0 when total = 0; groups sorted by extension
// COMPLEXITY: O(n + g log g) where n = |stats|, g = |groups|

import type {
	ExtensionSummary,
	FileStat,
	LineCounts,
	LineRatios,
	LineReport,
	LineTotals,
	ScanResult,
} from "../types/index.js";

interface MutableTotals {
	fileCount: number;
	totalLines: number;
	codeLines: number;
	commentLines: number;
	blankLines: number;
}

function emptyTotals(): MutableTotals {
	return {
		fileCount: 0,
		totalLines: 0,
		codeLines: 0,
		commentLines: 0,
		blankLines: 0,
	};
}

function addCounts(target: MutableTotals, counts: LineCounts): void {
	target.totalLines += counts.totalLines;
	target.codeLines += counts.codeLines;
	target.commentLines += counts.commentLines;
	target.blankLines += counts.blankLines;
}

/**
 * Share of `part` in `total`, defined as 0 for an empty total.
 *
 * @pure true
 */
export function ratio(part: number, total: number): number {
	return total === 0 ? 0 : part / total;
}

/**
 * @pure true
 */
export function computeRatios(counts: LineCounts): LineRatios {
	return {
		codeRatio: ratio(counts.codeLines, counts.totalLines),
		commentRatio: ratio(counts.commentLines, counts.totalLines),
		blankRatio: ratio(counts.blankLines, counts.totalLines),
	};
}

function freeze(totals: MutableTotals): LineTotals {
	return { ...totals, ...computeRatios(totals) };
}

function compareExtensions(a: string, b: string): number {
	if (a < b) return -1;
	return a > b ? 1 : 0;
}

/**
 * Group stats by extension and sum them.
 *
 * @pure true
 */
export function aggregate(stats: readonly FileStat[]): {
	readonly groups: readonly ExtensionSummary[];
	readonly total: LineTotals;
} {
	const byExtension = new Map<string, MutableTotals>();
	const total = emptyTotals();

	for (const stat of stats) {
		let group = byExtension.get(stat.extension);
		if (group === undefined) {
			group = emptyTotals();
			byExtension.set(stat.extension, group);
		}
		group.fileCount += 1;
		addCounts(group, stat);
		total.fileCount += 1;
		addCounts(total, stat);
	}

	const groups = [...byExtension.entries()]
		.sort(([a], [b]) => compareExtensions(a, b))
		.map(([extension, totals]) => ({ extension, ...freeze(totals) }));

	return { groups, total: freeze(total) };
}

/**
 * Aggregate a scan and carry its skip list along for the reporter.
 *
 * @pure true
 */
export function buildLineReport(result: ScanResult): LineReport {
	const { groups, total } = aggregate(result.files);
	return { groups, total, skipped: result.skipped };
}
