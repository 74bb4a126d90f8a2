// CHANGE: Help text for -h/--help
// WHY: Title and "usage" label follow the selected report language; option help stays English
// PURITY: CORE

import { DEFAULT_EXCLUDED_DIRS } from "../config/defaults.js";
import type { Messages } from "./messages.js";

export const PROGRAM_NAME = "loc-tally";

const OPTION_HELP: readonly (readonly [string, string])[] = [
	["path", "Directory to analyze (default: current directory)"],
	[
		"-e, --exclude <name>...",
		`Directory names to skip at any depth (default: ${[...DEFAULT_EXCLUDED_DIRS].join(" ")})`,
	],
	["-i, --include <ext>...", "Only count these file extensions, e.g. .py .ts"],
	["--lang <en|chs|cht|ja>", "Report language (default: en)"],
	[
		"--unknown <skip|plain>",
		"Unrecognized extensions: skip them or count them as plain text (default: skip)",
	],
	["-h, --help", "Show this help and exit"],
];

/**
 * @pure true
 */
export function formatUsage(messages: Messages): readonly string[] {
	const width = Math.max(...OPTION_HELP.map(([flag]) => flag.length)) + 2;
	return [
		messages.title,
		"",
		`${messages.usage}: ${PROGRAM_NAME} [path] [-e <name>...] [-i <ext>...] [--lang <code>] [--unknown <policy>]`,
		"",
		...OPTION_HELP.map(([flag, help]) => `  ${flag.padEnd(width)}${help}`),
	];
}
