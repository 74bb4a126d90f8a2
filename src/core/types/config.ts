// CHANGE: Configuration types for a single scan invocation
// WHY: Report language is an explicit value next to the scan config, never process-wide state
// PURITY: CORE
// INVARIANT: Config values are immutable for the duration of one run

/**
 * Report string table selector.
 */
export type ReportLanguage = "en" | "chs" | "cht" | "ja";

/**
 * What to do with extensions the language table does not know.
 *
 * - "skip": leave them out of the statistics
 * - "plain": classify them as text without comment markers
 */
export type UnknownExtensionPolicy = "skip" | "plain";

/**
 * Scan parameters.
 *
 * @property rootPath Directory to walk (absolute or relative to cwd)
 * @property includeExtensions Normalized extensions; empty set means no include filter
 * @property excludeDirNames Directory base names pruned at any depth
 * @property unknownExtensions Policy for unrecognized extensions without an include filter
 */
export interface ScanConfig {
	readonly rootPath: string;
	readonly includeExtensions: ReadonlySet<string>;
	readonly excludeDirNames: ReadonlySet<string>;
	readonly unknownExtensions: UnknownExtensionPolicy;
}

/**
 * Everything the APP layer needs to run one invocation.
 */
export interface CLIOptions {
	readonly scan: ScanConfig;
	readonly language: ReportLanguage;
}

/**
 * Parsed command line: either a scan or a help request.
 */
export type CLICommand =
	| { readonly kind: "scan"; readonly options: CLIOptions }
	| { readonly kind: "help"; readonly language: ReportLanguage };
