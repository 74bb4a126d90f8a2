// CHANGE: JSON resource reading with typed guards
// WHY: Bundled tables are validated before CORE ever sees them
// PURITY: SHELL
// EFFECT: Effect<JSONValue, ResourceError>
// INVARIANT: A resource either parses into JSONValue or fails with ResourceError naming it

import { Effect } from "effect";

import { ResourceError } from "../../core/errors.js";
import { fileURLToPath, fs } from "../utils/node-mods.js";

/**
 * Type representing any valid JSON value.
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

export type JSONObject = { readonly [key: string]: JSONValue };

/**
 * Bundled data directory (`<package>/data/`), same depth from src/ and dist/.
 */
export const DATA_DIR = new URL("../../../data/", import.meta.url);

export function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isString(value: JSONValue): value is string {
	return typeof value === "string";
}

export function isArray(value: JSONValue): value is ReadonlyArray<JSONValue> {
	return Array.isArray(value);
}

/**
 * Array of strings or null when any element is not a string.
 *
 * @pure true
 */
export function asStringArray(value: JSONValue | undefined): string[] | null {
	if (value === undefined || !isArray(value)) return null;
	const strings = value.filter(isString);
	return strings.length === value.length ? strings : null;
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Read and parse a JSON file under DATA_DIR.
 *
 * @param relativePath Path below `data/`, e.g. "locales/en.json"
 */
export function readJsonResource(
	relativePath: string,
): Effect.Effect<JSONValue, ResourceError> {
	const location = fileURLToPath(new URL(relativePath, DATA_DIR));
	return Effect.tryPromise({
		try: () => fs.promises.readFile(location, "utf8"),
		catch: (error) =>
			new ResourceError({ resource: relativePath, detail: describe(error) }),
	}).pipe(
		Effect.flatMap((raw) =>
			Effect.try({
				try: () => JSON.parse(raw) as JSONValue,
				catch: (error) =>
					new ResourceError({ resource: relativePath, detail: describe(error) }),
			}),
		),
	);
}
