// CHANGE: Functional Core domain models (pure, immutable)
// WHY: APP returns the exit code as a value; only BIN terminates the process
// PURITY: CORE
// COMPLEXITY: O(1)

/**
 * Exit code for the status-tree process.
 *
 * @remarks
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Line sinks used by APP; the shell binds them to console, tests to arrays.
 */
export interface OutputSink {
	readonly writeLine: (line: string) => void;
	readonly writeError: (line: string) => void;
}
