// CHANGE: Report string table shape
// WHY: Locale files are data; CORE only needs a typed record to format with
// PURITY: CORE

/**
 * Keys every locale table must define.
 */
export const MESSAGE_KEYS = [
	"title",
	"results",
	"total",
	"files",
	"fileCount",
	"totalLines",
	"codeLines",
	"commentLines",
	"blankLines",
	"codeRatio",
	"commentRatio",
	"blankRatio",
	"failedToRead",
	"skippedFiles",
	"usage",
] as const;

export type MessageKey = (typeof MESSAGE_KEYS)[number];

/**
 * One localized string per key.
 */
export type Messages = Readonly<Record<MessageKey, string>>;
