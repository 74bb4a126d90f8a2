// CHANGE: Read a source file as strict UTF-8 text
// WHY: Binary or mis-encoded files must be skipped, not counted as garbage lines
// PURITY: SHELL
// EFFECT: Effect<string, ReadError>
// INVARIANT: Success ⇒ content decoded without replacement characters and contains no NUL in the probe window

import { Effect, Either } from "effect";

import { ReadError } from "../../core/errors.js";
import { fs } from "../utils/node-mods.js";

/**
 * Bytes inspected for NUL when detecting binary files.
 */
export const BINARY_PROBE_BYTES = 8000;

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decode raw bytes, rejecting binary content and invalid UTF-8. A leading BOM is dropped.
 *
 * @pure true
 */
export function decodeSourceText(
	bytes: Uint8Array,
	path: string,
): Either.Either<string, ReadError> {
	if (bytes.subarray(0, BINARY_PROBE_BYTES).includes(0)) {
		return Either.left(new ReadError({ path, detail: "binary content" }));
	}
	return Either.try({
		try: () => utf8.decode(bytes),
		catch: () => new ReadError({ path, detail: "invalid UTF-8 text" }),
	});
}

/**
 * Read and decode one file.
 *
 * @param absolutePath Location on disk
 * @param path Path reported in the error (relative to the scan root)
 */
export function readSourceTextEffect(
	absolutePath: string,
	path: string,
): Effect.Effect<string, ReadError> {
	return Effect.tryPromise({
		try: () => fs.promises.readFile(absolutePath),
		catch: (error) =>
			new ReadError({
				path,
				detail: error instanceof Error ? error.message : String(error),
			}),
	}).pipe(Effect.flatMap((bytes) => decodeSourceText(bytes, path)));
}
