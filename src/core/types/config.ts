// CHANGE: Configuration types for the status-tree CLI
// WHY: Shell resolves argv/env/TTY once; APP consumes an immutable value
// PURITY: CORE
// COMPLEXITY: O(1) - type declarations only

/**
 * How the user asked for color.
 */
export type ColorMode = "auto" | "always" | "never";

/**
 * Options for one status-tree run.
 *
 * @property gitArgs Arguments forwarded verbatim to `git status`
 * @property colorMode Mode requested on the command line
 * @property color Resolved decision (mode + NO_COLOR/FORCE_COLOR + TTY)
 */
export interface CLIOptions {
	readonly gitArgs: ReadonlyArray<string>;
	readonly colorMode: ColorMode;
	readonly color: boolean;
}

/**
 * Environment facts the color decision depends on.
 *
 * @property isTTY Whether stdout is an interactive terminal
 * @property noColor Value of NO_COLOR, if set
 * @property forceColor Value of FORCE_COLOR, if set
 */
export interface TerminalEnvironment {
	readonly isTTY: boolean;
	readonly noColor: string | undefined;
	readonly forceColor: string | undefined;
}

/**
 * Error shape of a failed child process (promisified execFile).
 */
export interface ExecError extends Error {
	readonly code?: number | string;
	readonly stdout?: string | Buffer;
	readonly stderr?: string | Buffer;
}
