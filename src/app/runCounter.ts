// CHANGE: Application layer orchestration (APP) for the line counter
// WHY: APP composes CORE (classify, aggregate, format) with SHELL (fs walk, resources, console)
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, AppError>
// INVARIANT: Per-file skips never change the exit code; only FatalPath/Resource/Usage errors do
// COMPLEXITY: O(n) where n = entries under the scan root

import { Effect, Either } from "effect";
import { match } from "ts-pattern";

import type { AppError } from "../core/errors.js";
import {
	EXIT_FATAL,
	EXIT_OK,
	EXIT_USAGE,
	type ExitCode,
} from "../core/models.js";
import { PROGRAM_NAME } from "../core/report/usage.js";
import { buildLineReport } from "../core/scan/aggregate.js";
import type { CLIOptions, LineReport, ReportLanguage } from "../core/types/index.js";
import { parseCLIArgs } from "../shell/config/index.js";
import { printReport, printUsage } from "../shell/output/printer.js";
import { loadLanguageRegistryEffect } from "../shell/resources/languages.js";
import { loadMessagesEffect } from "../shell/resources/locales.js";
import { scanTreeEffect } from "../shell/scan/scanner.js";

/**
 * Scan and aggregate without printing.
 *
 * @pure false (filesystem reads)
 * @effect Effect<LineReport, FatalPathError | ResourceError>
 */
export function collectLineReportEffect(
	options: CLIOptions,
): Effect.Effect<LineReport, AppError> {
	return Effect.gen(function* () {
		const registry = yield* loadLanguageRegistryEffect();
		const result = yield* scanTreeEffect(options.scan, registry);
		return buildLineReport(result);
	});
}

/**
 * Scan, aggregate and print the localized report.
 *
 * @pure false (filesystem reads, console output)
 */
export function runCounterEffect(
	options: CLIOptions,
): Effect.Effect<ExitCode, AppError> {
	return Effect.gen(function* () {
		const messages = yield* loadMessagesEffect(options.language);
		const report = yield* collectLineReportEffect(options);
		printReport(report, messages);
		return EXIT_OK;
	});
}

/**
 * Print an application error to stderr and map it to an exit code.
 *
 * @pure false (console output)
 */
export function reportAppError(error: AppError): ExitCode {
	return match(error)
		.with({ _tag: "FatalPath" }, (fatal) => {
			const text = match(fatal.reason)
				.with("missing", () => `path not found: ${fatal.path}`)
				.with("notDirectory", () => `not a directory: ${fatal.path}`)
				.with("unreadable", () => `cannot read ${fatal.path}: ${fatal.detail}`)
				.exhaustive();
			console.error(`❌ ${text}`);
			return EXIT_FATAL;
		})
		.with({ _tag: "Resource" }, (resource) => {
			console.error(`❌ cannot load ${resource.resource}: ${resource.detail}`);
			return EXIT_FATAL;
		})
		.with({ _tag: "Usage" }, (usage) => {
			console.error(`❌ ${usage.detail}`);
			console.error(`Run "${PROGRAM_NAME} --help" for usage.`);
			return EXIT_USAGE;
		})
		.exhaustive();
}

function recover(
	effect: Effect.Effect<ExitCode, AppError>,
): Effect.Effect<ExitCode> {
	return effect.pipe(
		Effect.catchAll((error) => Effect.sync(() => reportAppError(error))),
	);
}

function helpEffect(language: ReportLanguage): Effect.Effect<ExitCode, AppError> {
	return loadMessagesEffect(language).pipe(
		Effect.map((messages) => {
			printUsage(messages);
			return EXIT_OK;
		}),
	);
}

/**
 * Run one scan with already-parsed options.
 *
 * @returns ExitCode (0 = scanned, 1 = fatal)
 */
export async function runCounter(options: CLIOptions): Promise<ExitCode> {
	return Effect.runPromise(recover(runCounterEffect(options)));
}

/**
 * Parse argv and dispatch to help or scan.
 *
 * @returns ExitCode (0 = ok, 1 = fatal, 2 = usage)
 */
export async function runCli(argv: readonly string[]): Promise<ExitCode> {
	const parsed = parseCLIArgs(argv);
	if (Either.isLeft(parsed)) {
		return reportAppError(parsed.left);
	}
	const command = parsed.right;
	const program =
		command.kind === "help"
			? helpEffect(command.language)
			: runCounterEffect(command.options);
	return Effect.runPromise(recover(program));
}
