// CHANGE: Pure traversal filters (extension, exclusion, rule selection)
// WHY: Scanner keeps IO only; every accept/reject decision is testable without a filesystem
// PURITY: CORE
// INVARIANT: includeExtensions non-empty ⇒ only members are ever selected
// COMPLEXITY: O(k) where k = |fileName|

import type { LanguageRegistry } from "../languages/registry.js";
import { plainTextRule } from "../languages/registry.js";
import type { LanguageRule, ScanConfig } from "../types/index.js";

/**
 * Lowercased extension of a base name, from its last dot.
 *
 * Names without a dot, with only a leading dot (".bashrc") or ending
 * in a dot have no extension.
 *
 * @example
 * extensionOf("Main.Java") // ".java"
 * extensionOf("archive.tar.gz") // ".gz"
 * extensionOf("Makefile") // null
 *
 * @pure true
 */
export function extensionOf(fileName: string): string | null {
	const dot = fileName.lastIndexOf(".");
	if (dot <= 0 || dot === fileName.length - 1) return null;
	return fileName.slice(dot).toLowerCase();
}

/**
 * Whether a directory subtree is pruned. Matches the base name exactly.
 *
 * @pure true
 */
export function isExcludedDirectory(
	dirName: string,
	config: ScanConfig,
): boolean {
	return config.excludeDirNames.has(dirName);
}

/**
 * Pick the rule a file is classified with, or null when it is filtered out.
 *
 * - include filter set: members only; a member the registry does not know is plain text
 * - no include filter: registry hit, else plain text under the "plain" policy
 *
 * @pure true
 */
export function resolveRule(
	extension: string,
	config: ScanConfig,
	registry: LanguageRegistry,
): LanguageRule | null {
	const known = registry.lookup(extension);
	if (config.includeExtensions.size > 0) {
		if (!config.includeExtensions.has(extension)) return null;
		return known ?? plainTextRule(extension);
	}
	if (known !== undefined) return known;
	return config.unknownExtensions === "plain"
		? plainTextRule(extension)
		: null;
}
