// CHANGE: Domain types for line classification and aggregation
// WHY: CORE works on immutable records only; SHELL produces them, reporter consumes them
// PURITY: CORE
// INVARIANT: ∀ stat: codeLines + commentLines + blankLines = totalLines
// COMPLEXITY: O(1) - type declarations only

/**
 * Open/close marker pair of a block comment.
 */
export interface BlockCommentPair {
	readonly open: string;
	readonly close: string;
}

/**
 * Comment syntax bound to a single extension.
 *
 * @property extension Lowercase, with leading dot (".py")
 * @property lineCommentMarkers Markers that turn the rest of a line into a comment
 * @property blockCommentPairs Ordered; the first pair whose `open` starts a line wins
 * @property ignoreCase Line comment markers match regardless of case (markers stored lowercase)
 */
export interface LanguageRule {
	readonly extension: string;
	readonly lineCommentMarkers: ReadonlySet<string>;
	readonly blockCommentPairs: readonly BlockCommentPair[];
	readonly ignoreCase?: boolean;
}

/**
 * A family of extensions sharing one comment syntax, as stored on disk.
 */
export interface LanguageDefinition {
	readonly name: string;
	readonly extensions: readonly string[];
	readonly lineComment: readonly string[];
	readonly blockComment: readonly BlockCommentPair[];
	readonly ignoreCase?: boolean;
}

/**
 * Category assigned to exactly one line.
 */
export type LineKind = "blank" | "comment" | "code";

/**
 * Per-file (or per-group) line counters.
 */
export interface LineCounts {
	readonly totalLines: number;
	readonly codeLines: number;
	readonly commentLines: number;
	readonly blankLines: number;
}

/**
 * Classification result of one file.
 *
 * @property path POSIX path relative to the scan root
 */
export interface FileStat extends LineCounts {
	readonly path: string;
	readonly extension: string;
}

/**
 * Share of each category in `totalLines`, each in [0, 1].
 */
export interface LineRatios {
	readonly codeRatio: number;
	readonly commentRatio: number;
	readonly blankRatio: number;
}

/**
 * Totals of a set of files together with their ratios.
 */
export interface LineTotals extends LineCounts, LineRatios {
	readonly fileCount: number;
}

/**
 * Aggregate of one extension group.
 */
export interface ExtensionSummary extends LineTotals {
	readonly extension: string;
}

/**
 * Entry excluded from statistics because it could not be read.
 */
export interface SkippedEntry {
	readonly path: string;
	readonly reason: string;
}

/**
 * Raw output of one tree scan.
 */
export interface ScanResult {
	readonly files: readonly FileStat[];
	readonly skipped: readonly SkippedEntry[];
}

/**
 * Aggregated view handed to the reporter.
 */
export interface LineReport {
	readonly groups: readonly ExtensionSummary[];
	readonly total: LineTotals;
	readonly skipped: readonly SkippedEntry[];
}
