// CHANGE: Central export file for all type definitions
// WHY: Single import point for types used across core, shell and app

export type {
	CLIOptions,
	ColorMode,
	ExecError,
	TerminalEnvironment,
} from "./config.js";
export type {
	ParsedStatus,
	StatusCode,
	StatusEntry,
	StatusHeader,
	StatusLetter,
	StatusRecord,
} from "./status.js";
export { isStatusCode } from "./status.js";
export type { StatusForest, TreeNode, TreeNodeKind } from "./tree.js";
