// CHANGE: CLI argument parsing for the line counter
// WHY: argv → typed CLICommand; malformed input is a UsageError value, never a throw
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: `-e`/`-i` consume every following token up to the next flag
// COMPLEXITY: O(n) where n = |args|

import { Either } from "effect";

import {
	DEFAULT_EXCLUDED_DIRS,
	DEFAULT_LANGUAGE,
	DEFAULT_ROOT_PATH,
	DEFAULT_UNKNOWN_POLICY,
	isReportLanguage,
	isUnknownPolicy,
	REPORT_LANGUAGES,
	UNKNOWN_POLICIES,
} from "../../core/config/defaults.js";
import { UsageError } from "../../core/errors.js";
import { normalizeExtension } from "../../core/languages/registry.js";
import type {
	CLICommand,
	ReportLanguage,
	UnknownExtensionPolicy,
} from "../../core/types/index.js";

interface ParseState {
	readonly rootPath: string | undefined;
	readonly include: readonly string[];
	readonly exclude: readonly string[] | undefined;
	readonly language: ReportLanguage;
	readonly unknownExtensions: UnknownExtensionPolicy;
	readonly help: boolean;
}

// consumed counts the flag itself plus its values
interface StepResult {
	readonly state: ParseState;
	readonly consumed: number;
}

type FlagHandler = (
	args: readonly string[],
	index: number,
	state: ParseState,
) => Either.Either<StepResult, UsageError>;

const INITIAL_STATE: ParseState = {
	rootPath: undefined,
	include: [],
	exclude: undefined,
	language: DEFAULT_LANGUAGE,
	unknownExtensions: DEFAULT_UNKNOWN_POLICY,
	help: false,
};

function isFlag(token: string): boolean {
	return token.startsWith("-") && token.length > 1;
}

/**
 * Tokens following `index` up to (not including) the next flag.
 *
 * @pure true
 */
export function takeValues(
	args: readonly string[],
	index: number,
): readonly string[] {
	const values: string[] = [];
	for (const token of args.slice(index + 1)) {
		if (isFlag(token)) break;
		values.push(token);
	}
	return values;
}

function createListHandler(
	flag: string,
	apply: (state: ParseState, values: readonly string[]) => ParseState,
): FlagHandler {
	return (args, index, state) => {
		const values = takeValues(args, index);
		if (values.length === 0) {
			return Either.left(
				new UsageError({ detail: `${flag} expects at least one value` }),
			);
		}
		return Either.right({
			state: apply(state, values),
			consumed: values.length + 1,
		});
	};
}

function createChoiceHandler<T extends string>(
	flag: string,
	choices: readonly T[],
	guard: (value: string) => value is T,
	apply: (state: ParseState, value: T) => ParseState,
): FlagHandler {
	return (args, index, state) => {
		const value = args[index + 1];
		if (value === undefined || isFlag(value)) {
			return Either.left(new UsageError({ detail: `${flag} expects a value` }));
		}
		if (!guard(value)) {
			return Either.left(
				new UsageError({
					detail: `${flag} must be one of ${choices.join(", ")} (got "${value}")`,
				}),
			);
		}
		return Either.right({ state: apply(state, value), consumed: 2 });
	};
}

const excludeHandler = createListHandler("--exclude", (state, values) => ({
	...state,
	exclude: [...(state.exclude ?? []), ...values],
}));

const includeHandler = createListHandler("--include", (state, values) => ({
	...state,
	include: [...state.include, ...values],
}));

const helpHandler: FlagHandler = (_args, _index, state) =>
	Either.right({ state: { ...state, help: true }, consumed: 1 });

const flagHandlers: ReadonlyMap<string, FlagHandler> = new Map([
	["-e", excludeHandler],
	["--exclude", excludeHandler],
	["-i", includeHandler],
	["--include", includeHandler],
	[
		"--lang",
		createChoiceHandler(
			"--lang",
			REPORT_LANGUAGES,
			isReportLanguage,
			(state, language) => ({ ...state, language }),
		),
	],
	[
		"--unknown",
		createChoiceHandler(
			"--unknown",
			UNKNOWN_POLICIES,
			isUnknownPolicy,
			(state, unknownExtensions) => ({ ...state, unknownExtensions }),
		),
	],
	["-h", helpHandler],
	["--help", helpHandler],
]);

/**
 * Split `--flag=value` tokens into `--flag value`.
 *
 * @pure true
 */
export function expandInlineValues(args: readonly string[]): readonly string[] {
	return args.flatMap((arg) => {
		const eq = arg.indexOf("=");
		if (!arg.startsWith("--") || eq < 0) return [arg];
		return [arg.slice(0, eq), arg.slice(eq + 1)];
	});
}

function processArgument(
	args: readonly string[],
	index: number,
	state: ParseState,
): Either.Either<StepResult, UsageError> {
	const arg = args[index] ?? "";
	if (arg.length === 0) return Either.right({ state, consumed: 1 });

	if (isFlag(arg)) {
		const handler = flagHandlers.get(arg);
		if (handler === undefined) {
			return Either.left(new UsageError({ detail: `unknown option ${arg}` }));
		}
		return handler(args, index, state);
	}

	if (state.rootPath !== undefined) {
		return Either.left(
			new UsageError({ detail: `unexpected argument ${arg}` }),
		);
	}
	return Either.right({ state: { ...state, rootPath: arg }, consumed: 1 });
}

function toCommand(state: ParseState): CLICommand {
	if (state.help) {
		return { kind: "help", language: state.language };
	}
	return {
		kind: "scan",
		options: {
			language: state.language,
			scan: {
				rootPath: state.rootPath ?? DEFAULT_ROOT_PATH,
				includeExtensions: new Set(state.include.map(normalizeExtension)),
				excludeDirNames:
					state.exclude === undefined
						? DEFAULT_EXCLUDED_DIRS
						: new Set(state.exclude),
				unknownExtensions: state.unknownExtensions,
			},
		},
	};
}

/**
 * Parse command line arguments.
 *
 * @param argv Arguments without the node/script prefix
 * @returns Right(command) or Left(UsageError)
 *
 * @example
 * ```ts
 * // Command: loc-tally src -e dist build -i py .TS --lang ja
 * parseCLIArgs(["src", "-e", "dist", "build", "-i", "py", ".TS", "--lang", "ja"]);
 * // Right({ kind: "scan", options: { language: "ja", scan: { rootPath: "src",
 * //   includeExtensions: {".py", ".ts"}, excludeDirNames: {"dist", "build"}, ... } } })
 * ```
 */
export function parseCLIArgs(
	argv: readonly string[] = process.argv.slice(2),
): Either.Either<CLICommand, UsageError> {
	const args = expandInlineValues(argv);
	let state = INITIAL_STATE;
	let index = 0;

	while (index < args.length) {
		const step = processArgument(args, index, state);
		if (Either.isLeft(step)) return Either.left(step.left);
		state = step.right.state;
		index += step.right.consumed;
	}

	return Either.right(toCommand(state));
}
