// CHANGE: Load the bundled language table into a registry
// WHY: Comment syntax is data (data/languages.json); CORE builds the lookup from validated definitions
// PURITY: SHELL
// EFFECT: Effect<LanguageRegistry, ResourceError>
// INVARIANT: Every definition has a name, ≥1 extension, string markers and complete block pairs
// INVARIANT: Optional "ignoreCase" is a boolean when present

import { Effect, Either } from "effect";

import { ResourceError } from "../../core/errors.js";
import {
	createLanguageRegistry,
	type LanguageRegistry,
} from "../../core/languages/registry.js";
import type {
	BlockCommentPair,
	LanguageDefinition,
} from "../../core/types/index.js";
import {
	asStringArray,
	isArray,
	isJSONObject,
	isString,
	type JSONValue,
	readJsonResource,
} from "./json.js";

export const LANGUAGES_RESOURCE = "languages.json";

function parseBlockPair(value: JSONValue): BlockCommentPair | null {
	if (!isJSONObject(value)) return null;
	const { open, close } = value;
	if (open === undefined || close === undefined) return null;
	if (!isString(open) || !isString(close)) return null;
	if (open.length === 0 || close.length === 0) return null;
	return { open, close };
}

/**
 * Validate one raw definition.
 *
 * @returns Definition, or null when any field is missing or mistyped
 * @pure true
 */
export function parseLanguageDefinition(
	value: JSONValue,
): LanguageDefinition | null {
	if (!isJSONObject(value)) return null;
	const { name, blockComment, ignoreCase } = value;
	const extensions = asStringArray(value["extensions"]);
	const lineComment = asStringArray(value["lineComment"]);
	if (name === undefined || !isString(name)) return null;
	if (extensions === null || extensions.length === 0) return null;
	if (lineComment === null || lineComment.some((m) => m.length === 0)) {
		return null;
	}
	if (blockComment === undefined || !isArray(blockComment)) return null;
	if (ignoreCase !== undefined && typeof ignoreCase !== "boolean") return null;

	const pairs: BlockCommentPair[] = [];
	for (const raw of blockComment) {
		const pair = parseBlockPair(raw);
		if (pair === null) return null;
		pairs.push(pair);
	}
	return {
		name,
		extensions,
		lineComment,
		blockComment: pairs,
		...(ignoreCase === true ? { ignoreCase: true } : {}),
	};
}

/**
 * Validate the whole table document `{ "languages": [...] }`.
 *
 * @pure true
 */
export function parseLanguageTable(
	document: JSONValue,
	resource = LANGUAGES_RESOURCE,
): Either.Either<readonly LanguageDefinition[], ResourceError> {
	if (!isJSONObject(document)) {
		return Either.left(
			new ResourceError({ resource, detail: "expected a JSON object" }),
		);
	}
	const languages = document["languages"];
	if (languages === undefined || !isArray(languages)) {
		return Either.left(
			new ResourceError({ resource, detail: "missing \"languages\" array" }),
		);
	}

	const definitions: LanguageDefinition[] = [];
	for (const [index, raw] of languages.entries()) {
		const definition = parseLanguageDefinition(raw);
		if (definition === null) {
			return Either.left(
				new ResourceError({
					resource,
					detail: `malformed language entry at index ${index}`,
				}),
			);
		}
		definitions.push(definition);
	}
	return Either.right(definitions);
}

/**
 * Read data/languages.json and build the registry.
 */
export function loadLanguageRegistryEffect(): Effect.Effect<
	LanguageRegistry,
	ResourceError
> {
	return readJsonResource(LANGUAGES_RESOURCE).pipe(
		Effect.flatMap((document) => parseLanguageTable(document)),
		Effect.flatMap((definitions) =>
			createLanguageRegistry(definitions, LANGUAGES_RESOURCE),
		),
	);
}
