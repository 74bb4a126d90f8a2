// CHANGE: Extension → comment syntax registry
// WHY: Classifier needs one LanguageRule per file; definitions are grouped by language family on disk
// PURITY: CORE
// FORMAT THEOREM: ∀ext ∈ definitions: lookup(ext) = rule(family(ext)) ∧ lookup is case-insensitive
// INVARIANT: Extension is a unique key, lowercase, with leading dot
// COMPLEXITY: O(n) build, O(1) lookup

import { Either } from "effect";

import { ResourceError } from "../errors.js";
import type {
	LanguageDefinition,
	LanguageRule,
} from "../types/index.js";

/**
 * Read-only view over the language table.
 */
export interface LanguageRegistry {
	readonly lookup: (extension: string) => LanguageRule | undefined;
	readonly extensions: readonly string[];
}

/**
 * Lowercase an extension and prefix it with "." when missing.
 *
 * @example
 * normalizeExtension("PY") // ".py"
 * normalizeExtension(".Ts") // ".ts"
 *
 * @pure true
 */
export function normalizeExtension(raw: string): string {
	const lower = raw.trim().toLowerCase();
	return lower.startsWith(".") ? lower : `.${lower}`;
}

/**
 * Rule without any comment markers: every non-blank line is code.
 *
 * @pure true
 */
export function plainTextRule(extension: string): LanguageRule {
	return {
		extension: normalizeExtension(extension),
		lineCommentMarkers: new Set(),
		blockCommentPairs: [],
	};
}

/**
 * Build the registry, rejecting extensions claimed by two families.
 *
 * @returns Right(registry) or Left(ResourceError) naming the duplicate
 * @pure true
 */
export function createLanguageRegistry(
	definitions: readonly LanguageDefinition[],
	resource = "languages",
): Either.Either<LanguageRegistry, ResourceError> {
	const rules = new Map<string, LanguageRule>();
	const owners = new Map<string, string>();

	for (const definition of definitions) {
		const ignoreCase = definition.ignoreCase === true;
		const lineCommentMarkers = new Set(
			ignoreCase
				? definition.lineComment.map((marker) => marker.toLowerCase())
				: definition.lineComment,
		);
		for (const raw of definition.extensions) {
			const extension = normalizeExtension(raw);
			const owner = owners.get(extension);
			if (owner !== undefined) {
				return Either.left(
					new ResourceError({
						resource,
						detail: `extension ${extension} is declared by both ${owner} and ${definition.name}`,
					}),
				);
			}
			owners.set(extension, definition.name);
			rules.set(extension, {
				extension,
				lineCommentMarkers,
				blockCommentPairs: definition.blockComment,
				...(ignoreCase ? { ignoreCase: true } : {}),
			});
		}
	}

	const extensions = [...rules.keys()].sort();
	return Either.right({
		lookup: (extension: string) => rules.get(normalizeExtension(extension)),
		extensions,
	});
}
