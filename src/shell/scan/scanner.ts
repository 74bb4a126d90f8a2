// CHANGE: Shell tree scanner for line statistics
// WHY: Separate IO-bound traversal from pure classification and filtering
// PURITY: SHELL
// EFFECT: Effect<ScanResult, FatalPathError>
// INVARIANT: Only the root can fail the scan; every other read error becomes a SkippedEntry
// INVARIANT: Excluded directories and symlinked directories are never descended into
// INVARIANT: Filter policy runs before any stat, so filtered names never reach the skip tally
// COMPLEXITY: O(n) where n = entries under the root

import { Effect, Either } from "effect";

import { classifyFile } from "../../core/classify/classifier.js";
import { FatalPathError, ReadError } from "../../core/errors.js";
import type { LanguageRegistry } from "../../core/languages/registry.js";
import {
	extensionOf,
	isExcludedDirectory,
	resolveRule,
} from "../../core/scan/filters.js";
import type {
	FileStat,
	LanguageRule,
	ScanConfig,
	ScanResult,
	SkippedEntry,
} from "../../core/types/index.js";
import { type Dirent, fs, path } from "../utils/node-mods.js";
import { readSourceTextEffect } from "./reader.js";

type LeafKind = "file" | "linkedDirectory" | "other";

interface ScanContext {
	readonly config: ScanConfig;
	readonly registry: LanguageRegistry;
	readonly files: FileStat[];
	readonly skipped: SkippedEntry[];
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

function isMissingPath(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Join a name onto a POSIX relative base ("" for the root).
 *
 * @pure true
 */
export function joinRelative(base: string, name: string): string {
	if (base.length === 0) return name;
	return `${base}/${name}`;
}

function compareNames(a: Dirent, b: Dirent): number {
	if (a.name < b.name) return -1;
	return a.name > b.name ? 1 : 0;
}

function listDirectoryEffect(
	absoluteDir: string,
	relativeDir: string,
): Effect.Effect<readonly Dirent[], ReadError> {
	return Effect.tryPromise({
		try: () => fs.promises.readdir(absoluteDir, { withFileTypes: true }),
		catch: (error) =>
			new ReadError({
				path: relativeDir.length === 0 ? "." : relativeDir,
				detail: errorMessage(error),
			}),
	}).pipe(Effect.map((dirents) => [...dirents].sort(compareNames)));
}

/**
 * Resolve what a non-directory entry is. Symlinks are stat'ed: file targets
 * are read through, directory targets are reported as "linkedDirectory" and
 * not followed.
 */
function resolveLeafKindEffect(
	dirent: Dirent,
	absolutePath: string,
	relativePath: string,
): Effect.Effect<LeafKind, ReadError> {
	if (dirent.isFile()) return Effect.succeed("file");
	if (!dirent.isSymbolicLink()) return Effect.succeed("other");
	return Effect.tryPromise({
		try: () => fs.promises.stat(absolutePath),
		catch: (error) =>
			new ReadError({ path: relativePath, detail: errorMessage(error) }),
	}).pipe(
		Effect.map((stats): LeafKind => {
			if (stats.isFile()) return "file";
			return stats.isDirectory() ? "linkedDirectory" : "other";
		}),
	);
}

function selectRule(name: string, context: ScanContext): LanguageRule | null {
	const extension = extensionOf(name);
	if (extension === null) return null;
	return resolveRule(extension, context.config, context.registry);
}

function recordSkip(context: ScanContext, error: ReadError): void {
	context.skipped.push({ path: error.path, reason: error.detail });
}

function processFileEffect(
	context: ScanContext,
	absolutePath: string,
	relativePath: string,
	rule: LanguageRule,
): Effect.Effect<void> {
	return readSourceTextEffect(absolutePath, relativePath).pipe(
		Effect.map((text) => classifyFile(relativePath, text, rule)),
		Effect.match({
			onFailure: (error) => {
				recordSkip(context, error);
			},
			onSuccess: (stat) => {
				context.files.push(stat);
			},
		}),
	);
}

function processEntriesEffect(
	context: ScanContext,
	absoluteDir: string,
	relativeDir: string,
	dirents: readonly Dirent[],
): Effect.Effect<void> {
	return Effect.gen(function* () {
		for (const dirent of dirents) {
			const { name } = dirent;
			const relativePath = joinRelative(relativeDir, name);
			const absolutePath = path.join(absoluteDir, name);

			if (dirent.isDirectory()) {
				if (isExcludedDirectory(name, context.config)) continue;
				yield* walkDirectoryEffect(context, absolutePath, relativePath);
				continue;
			}

			const rule = selectRule(name, context);
			if (rule === null) continue;

			const kind = yield* Effect.either(
				resolveLeafKindEffect(dirent, absolutePath, relativePath),
			);
			if (Either.isLeft(kind)) {
				recordSkip(context, kind.left);
				continue;
			}
			if (kind.right !== "file") continue;

			yield* processFileEffect(context, absolutePath, relativePath, rule);
		}
	});
}

function walkDirectoryEffect(
	context: ScanContext,
	absoluteDir: string,
	relativeDir: string,
): Effect.Effect<void> {
	return listDirectoryEffect(absoluteDir, relativeDir).pipe(
		Effect.matchEffect({
			onFailure: (error) => {
				recordSkip(context, error);
				return Effect.void;
			},
			onSuccess: (dirents) =>
				processEntriesEffect(context, absoluteDir, relativeDir, dirents),
		}),
	);
}

/**
 * Check that the root exists and is a directory.
 *
 * @returns Absolute root path
 */
export function resolveRootEffect(
	rootPath: string,
): Effect.Effect<string, FatalPathError> {
	const absoluteRoot = path.resolve(process.cwd(), rootPath);
	return Effect.tryPromise({
		try: () => fs.promises.stat(absoluteRoot),
		catch: (error) =>
			new FatalPathError({
				path: rootPath,
				reason: isMissingPath(error) ? "missing" : "unreadable",
				detail: errorMessage(error),
			}),
	}).pipe(
		Effect.flatMap((stats) =>
			stats.isDirectory()
				? Effect.succeed(absoluteRoot)
				: Effect.fail(
						new FatalPathError({
							path: rootPath,
							reason: "notDirectory",
							detail: `${absoluteRoot} is not a directory`,
						}),
					),
		),
	);
}

/**
 * Walk `config.rootPath` depth-first and classify every selected file.
 *
 * Entries are visited in code-unit order of their names, so two scans of an
 * unchanged tree return identical results.
 */
export function scanTreeEffect(
	config: ScanConfig,
	registry: LanguageRegistry,
): Effect.Effect<ScanResult, FatalPathError> {
	return Effect.gen(function* () {
		const absoluteRoot = yield* resolveRootEffect(config.rootPath);
		const dirents = yield* listDirectoryEffect(absoluteRoot, "").pipe(
			Effect.mapError(
				(error) =>
					new FatalPathError({
						path: config.rootPath,
						reason: "unreadable",
						detail: error.detail,
					}),
			),
		);

		const context: ScanContext = { config, registry, files: [], skipped: [] };
		yield* processEntriesEffect(context, absoluteRoot, "", dirents);
		return { files: context.files, skipped: context.skipped };
	});
}
