// CHANGE: Barrel for CLI configuration
// WHY: BIN/APP import parsing and usage text from one place

export { expandInlineValues, parseCLIArgs, takeValues } from "./cli.js";
