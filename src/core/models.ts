// CHANGE: Exit code model for the counter process
// WHY: APP returns the code as a value; BIN is the only place that exits
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code of the process.
 *
 * @remarks
 * - 0: scan completed (per-file skips included)
 * - 1: fatal path or resource error
 * - 2: usage error
 */
export type ExitCode = 0 | 1 | 2;

export const EXIT_OK: ExitCode = 0;
export const EXIT_FATAL: ExitCode = 1;
export const EXIT_USAGE: ExitCode = 2;
