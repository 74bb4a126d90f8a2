// CHANGE: Line classifier as an explicit two-state automaton
// WHY: Block comments span lines; state must be threaded line by line without ad hoc flags
// PURITY: CORE
// FORMAT THEOREM: ∀content, rule: classify(content).code + .comment + .blank = |splitLines(content)|
// INVARIANT: At most one state transition per line; nested open markers are ignored
// COMPLEXITY: O(n) where n = |content|

import { match } from "ts-pattern";

import type {
	BlockCommentPair,
	FileStat,
	LanguageRule,
	LineCounts,
	LineKind,
} from "../types/index.js";

/**
 * Automaton state between two lines.
 *
 * - outside: not inside a block comment
 * - insideBlock: inside a block comment closed by `close`
 */
export type ClassifierState =
	| { readonly kind: "outside" }
	| { readonly kind: "insideBlock"; readonly close: string };

export const OUTSIDE: ClassifierState = { kind: "outside" };

/**
 * Outcome of classifying one line.
 */
export interface LineStep {
	readonly lineKind: LineKind;
	readonly next: ClassifierState;
}

/**
 * Split text into lines the way line-oriented readers do.
 *
 * CRLF and lone CR become LF. A trailing newline terminates the last line
 * instead of opening an empty one; empty content has no lines.
 *
 * @pure true
 */
export function splitLines(content: string): readonly string[] {
	const normalized = content.replace(/\r\n?/g, "\n");
	if (normalized.length === 0) return [];
	const lines = normalized.split("\n");
	if (normalized.endsWith("\n")) {
		lines.pop();
	}
	return lines;
}

function findOpeningPair(
	stripped: string,
	rule: LanguageRule,
): BlockCommentPair | undefined {
	return rule.blockCommentPairs.find((pair) => stripped.startsWith(pair.open));
}

function startsWithLineComment(stripped: string, rule: LanguageRule): boolean {
	const subject = rule.ignoreCase === true ? stripped.toLowerCase() : stripped;
	for (const marker of rule.lineCommentMarkers) {
		if (subject.startsWith(marker)) return true;
		// "rem " also covers a bare "rem" line
		if (subject === marker.trimEnd()) return true;
	}
	return false;
}

function classifyOutside(stripped: string, rule: LanguageRule): LineStep {
	if (stripped.length === 0) {
		return { lineKind: "blank", next: OUTSIDE };
	}
	if (startsWithLineComment(stripped, rule)) {
		return { lineKind: "comment", next: OUTSIDE };
	}
	const pair = findOpeningPair(stripped, rule);
	if (pair === undefined) {
		return { lineKind: "code", next: OUTSIDE };
	}
	// Close is searched after the opener so `"""doc"""` closes but a lone `"""` opens
	const rest = stripped.slice(pair.open.length);
	return rest.includes(pair.close)
		? { lineKind: "comment", next: OUTSIDE }
		: { lineKind: "comment", next: { kind: "insideBlock", close: pair.close } };
}

/**
 * Classify a single line given the state left by the previous one.
 *
 * @example
 * classifyLine(OUTSIDE, "/* start", cRule)
 * // { lineKind: "comment", next: { kind: "insideBlock", close: "*\/" } }
 *
 * @pure true
 */
export function classifyLine(
	state: ClassifierState,
	line: string,
	rule: LanguageRule,
): LineStep {
	const stripped = line.trim();
	return match(state)
		.with(
			{ kind: "insideBlock" },
			(inside): LineStep => ({
				lineKind: "comment",
				next: stripped.includes(inside.close) ? OUTSIDE : inside,
			}),
		)
		.with({ kind: "outside" }, (): LineStep => classifyOutside(stripped, rule))
		.exhaustive();
}

/**
 * Count blank, comment and code lines of a text.
 *
 * A file ending inside a block comment is not an error; its trailing lines
 * are already counted as comment.
 *
 * @pure true
 * @invariant codeLines + commentLines + blankLines = totalLines
 */
export function classifyContent(
	content: string,
	rule: LanguageRule,
): LineCounts {
	const lines = splitLines(content);
	let state = OUTSIDE;
	let codeLines = 0;
	let commentLines = 0;
	let blankLines = 0;

	for (const line of lines) {
		const step = classifyLine(state, line, rule);
		state = step.next;
		if (step.lineKind === "blank") blankLines += 1;
		else if (step.lineKind === "comment") commentLines += 1;
		else codeLines += 1;
	}

	return {
		totalLines: lines.length,
		codeLines,
		commentLines,
		blankLines,
	};
}

/**
 * Classify file content and attach its identity.
 *
 * @pure true
 */
export function classifyFile(
	path: string,
	content: string,
	rule: LanguageRule,
): FileStat {
	return {
		path,
		extension: rule.extension,
		...classifyContent(content, rule),
	};
}
