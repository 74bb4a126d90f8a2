// CHANGE: Defaults for CLI-derived configuration
// WHY: One place for values used when a flag is absent
// PURITY: CORE

import type {
	ReportLanguage,
	UnknownExtensionPolicy,
} from "../types/index.js";

export const DEFAULT_ROOT_PATH = ".";

/**
 * Directories pruned when no `--exclude` is given. Passing `--exclude` replaces this set.
 */
export const DEFAULT_EXCLUDED_DIRS: ReadonlySet<string> = new Set([
	".git",
	"__pycache__",
	"node_modules",
	".vscode",
	".idea",
]);

export const DEFAULT_LANGUAGE: ReportLanguage = "en";

export const DEFAULT_UNKNOWN_POLICY: UnknownExtensionPolicy = "skip";

export const REPORT_LANGUAGES: readonly ReportLanguage[] = [
	"en",
	"chs",
	"cht",
	"ja",
];

export const UNKNOWN_POLICIES: readonly UnknownExtensionPolicy[] = [
	"skip",
	"plain",
];

/**
 * Type guard narrowing a raw token to a report language.
 *
 * @pure true
 */
export function isReportLanguage(value: string): value is ReportLanguage {
	return REPORT_LANGUAGES.some((language) => language === value);
}

/**
 * Type guard narrowing a raw token to an unknown-extension policy.
 *
 * @pure true
 */
export function isUnknownPolicy(
	value: string,
): value is UnknownExtensionPolicy {
	return UNKNOWN_POLICIES.some((policy) => policy === value);
}
