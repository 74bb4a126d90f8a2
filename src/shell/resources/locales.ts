// CHANGE: Load localized report strings
// WHY: Report language is chosen per run and passed explicitly; tables live in data/locales
// PURITY: SHELL
// EFFECT: Effect<Messages, ResourceError>
// INVARIANT: A loaded table defines every MESSAGE_KEYS entry as a non-empty string

import { Effect, Either } from "effect";

import { ResourceError } from "../../core/errors.js";
import {
	MESSAGE_KEYS,
	type MessageKey,
	type Messages,
} from "../../core/report/messages.js";
import type { ReportLanguage } from "../../core/types/index.js";
import { isJSONObject, type JSONValue, readJsonResource } from "./json.js";

/**
 * Validate a locale document against MESSAGE_KEYS.
 *
 * @pure true
 */
export function parseMessages(
	document: JSONValue,
	resource: string,
): Either.Either<Messages, ResourceError> {
	if (!isJSONObject(document)) {
		return Either.left(
			new ResourceError({ resource, detail: "expected a JSON object" }),
		);
	}
	const entries = new Map<MessageKey, string>();
	const missing: MessageKey[] = [];
	for (const key of MESSAGE_KEYS) {
		const value = document[key];
		if (typeof value === "string" && value.length > 0) {
			entries.set(key, value);
		} else {
			missing.push(key);
		}
	}
	if (missing.length > 0) {
		return Either.left(
			new ResourceError({
				resource,
				detail: `missing keys: ${missing.join(", ")}`,
			}),
		);
	}
	const pick = (key: MessageKey): string => entries.get(key) ?? key;
	return Either.right({
		title: pick("title"),
		results: pick("results"),
		total: pick("total"),
		files: pick("files"),
		fileCount: pick("fileCount"),
		totalLines: pick("totalLines"),
		codeLines: pick("codeLines"),
		commentLines: pick("commentLines"),
		blankLines: pick("blankLines"),
		codeRatio: pick("codeRatio"),
		commentRatio: pick("commentRatio"),
		blankRatio: pick("blankRatio"),
		failedToRead: pick("failedToRead"),
		skippedFiles: pick("skippedFiles"),
		usage: pick("usage"),
	});
}

/**
 * Read data/locales/<language>.json.
 */
export function loadMessagesEffect(
	language: ReportLanguage,
): Effect.Effect<Messages, ResourceError> {
	const resource = `locales/${language}.json`;
	return readJsonResource(resource).pipe(
		Effect.flatMap((document) => parseMessages(document, resource)),
	);
}
