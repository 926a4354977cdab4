#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point where the exit code is set
// WHY: APP returns ExitCode; BIN hands it to the process
// FORMAT THEOREM: ∀run: returns exitCode ∈ {0,1} → process.exitCode is assigned exactly once
// PURITY: SHELL (BIN layer)
// INVARIANT: exitCode instead of exit() so buffered stdout to a pipe is flushed
// COMPLEXITY: O(1) (delegates to APP)

import { Effect } from "effect";

import { main } from "../app/runStatusTree.js";

/**
 * CLI entry point: `git-status-tree [git status args…]`.
 *
 * @remarks
 * - @invariant exit code is 0 when the tree was printed, otherwise 1
 * - @postcondition exit code assigned exactly once
 */
void Effect.runPromise(main()).then(
	(code) => {
		process.exitCode = code;
	},
	(error: Error) => {
		// Shell boundary: defects only; typed failures were reported by APP
		console.error("Fatal error:", error);
		process.exitCode = 1;
	},
);
