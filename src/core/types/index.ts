// CHANGE: Central export file for all type definitions
// WHY: Single import point for types used across CORE, SHELL and APP

export type {
	CLICommand,
	CLIOptions,
	ReportLanguage,
	ScanConfig,
	UnknownExtensionPolicy,
} from "./config.js";
export type {
	BlockCommentPair,
	ExtensionSummary,
	FileStat,
	LanguageDefinition,
	LanguageRule,
	LineCounts,
	LineKind,
	LineRatios,
	LineReport,
	LineTotals,
	ScanResult,
	SkippedEntry,
} from "./line-stats.js";
