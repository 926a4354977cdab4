/**
 * CHANGE: Centralized re-exports of the Node built-ins the shell uses
 * WHY: One import block for child_process/util instead of repeating it per module
 *
 * Invariant: re-export compatible objects/functions, avoiding `export *` for modules with `export =`.
 */
export { execFile } from "node:child_process";
export { promisify } from "node:util";
