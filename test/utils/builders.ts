// CHANGE: Centralize test builders for rules, stats and messages
// WHY: Pure helpers shared by CORE and SHELL tests

import type { Messages } from "../../src/core/report/messages.js";
import type {
	BlockCommentPair,
	FileStat,
	LanguageRule,
} from "../../src/core/types/index.js";

/** Build a LanguageRule from plain arrays. */
export const makeRule = (
	extension: string,
	lineComment: readonly string[] = [],
	blockComment: readonly BlockCommentPair[] = [],
): LanguageRule => ({
	extension,
	lineCommentMarkers: new Set(lineComment),
	blockCommentPairs: blockComment,
});

/** C-family syntax: `//` and `/* *\/`. */
export const C_RULE = makeRule(".c", ["//"], [{ open: "/*", close: "*/" }]);

/** Python syntax with triple quotes as block comments. */
export const PY_RULE = makeRule(
	".py",
	["#"],
	[
		{ open: '"""', close: '"""' },
		{ open: "'''", close: "'''" },
	],
);

/** Build a FileStat; total is derived from the three categories. */
export const makeStat = (
	path: string,
	extension: string,
	code: number,
	comment: number,
	blank: number,
): FileStat => ({
	path,
	extension,
	totalLines: code + comment + blank,
	codeLines: code,
	commentLines: comment,
	blankLines: blank,
});

/** English strings, matching data/locales/en.json. */
export const EN_MESSAGES: Messages = {
	title: "Code Line Counter",
	results: "Code Line Statistics Results",
	total: "Total",
	files: "Files",
	fileCount: "File Count",
	totalLines: "Total Lines",
	codeLines: "Code Lines",
	commentLines: "Comment Lines",
	blankLines: "Blank Lines",
	codeRatio: "Code Line Ratio",
	commentRatio: "Comment Line Ratio",
	blankRatio: "Blank Line Ratio",
	failedToRead: "Failed to read file",
	skippedFiles: "Skipped Files",
	usage: "Usage",
};
