// CHANGE: Typed domain error ADT using Effect.Data
// WHY: Errors are values in signatures; only APP maps them to exit codes
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Why the scan root cannot be walked.
 */
export type FatalPathReason = "missing" | "notDirectory" | "unreadable";

/**
 * Root path missing, not a directory or unreadable. Aborts the whole run.
 *
 * @pure true (Data class)
 */
export class FatalPathError extends Data.TaggedError("FatalPath")<{
	readonly path: string;
	readonly reason: FatalPathReason;
	readonly detail: string;
}> {}

/**
 * Single file could not be read or decoded as text.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class ReadError extends Data.TaggedError("Read")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Command line could not be parsed.
 *
 * @pure true (Data class)
 */
export class UsageError extends Data.TaggedError("Usage")<{
	readonly detail: string;
}> {}

/**
 * Bundled data file (language table, locale) missing or malformed.
 *
 * @pure true (Data class)
 */
export class ResourceError extends Data.TaggedError("Resource")<{
	readonly resource: string;
	readonly detail: string;
}> {}

/**
 * Union of errors that reach the APP layer.
 */
export type AppError = FatalPathError | UsageError | ResourceError;
