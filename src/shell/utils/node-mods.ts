/**
 * CHANGE: Centralized re-exports of Node built-ins used by SHELL modules
 * WHY: One import block for fs/path/url across scanner and resource loaders
 *
 * Invariant: re-export through constants; node:path and node:fs use `export =`.
 */
import * as fsNS from "node:fs";
import * as pathNS from "node:path";

export type { Dirent } from "node:fs";
export { fileURLToPath } from "node:url";

export const fs = fsNS;
export const path = pathNS;
