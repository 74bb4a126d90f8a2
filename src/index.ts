// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration and CORE utilities; SHELL internals stay private
// PURITY: Re-exports only (meta-module)

// ═══════════════════════════════════════════════════════════════════════════════
// APP (Programmatic Entry Points)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * @example
 * ```typescript
 * import { runCli } from 'loc-tally';
 *
 * const exitCode = await runCli(['src', '-i', '.ts', '--lang', 'en']);
 * ```
 */
export {
	collectLineReportEffect,
	runCli,
	runCounter,
	runCounterEffect,
} from "./app/runCounter.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE (Pure Functions)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	classifyContent,
	classifyFile,
	classifyLine,
	OUTSIDE,
	splitLines,
	type ClassifierState,
	type LineStep,
} from "./core/classify/classifier.js";
export {
	FatalPathError,
	ReadError,
	ResourceError,
	UsageError,
	type AppError,
} from "./core/errors.js";
export {
	createLanguageRegistry,
	normalizeExtension,
	plainTextRule,
	type LanguageRegistry,
} from "./core/languages/registry.js";
export type { ExitCode } from "./core/models.js";
export { formatReport } from "./core/report/format.js";
export type { Messages } from "./core/report/messages.js";
export { aggregate, buildLineReport } from "./core/scan/aggregate.js";
export { extensionOf, resolveRule } from "./core/scan/filters.js";
export type * from "./core/types/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL (Loaders and scanner)
// ═══════════════════════════════════════════════════════════════════════════════

export { parseCLIArgs } from "./shell/config/index.js";
export { loadLanguageRegistryEffect } from "./shell/resources/languages.js";
export { loadMessagesEffect } from "./shell/resources/locales.js";
export { scanTreeEffect } from "./shell/scan/scanner.js";
