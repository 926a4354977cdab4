// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration and CORE pipeline; keep SHELL internals private
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed errors or interfaces

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Run status-tree against the current repository.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { runStatusTree } from "status-tree";
 *
 * const exitCode = await Effect.runPromise(
 *   runStatusTree({ gitArgs: ["--ignored"], colorMode: "never", color: false }),
 * );
 * ```
 */
export {
	defaultDependencies,
	main,
	runStatusTree,
	type StatusTreeDependencies,
} from "./app/runStatusTree.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type { ExitCode, OutputSink } from "./core/models.js";
export type {
	CLIOptions,
	ColorMode,
	ParsedStatus,
	StatusCode,
	StatusEntry,
	StatusForest,
	StatusHeader,
	StatusRecord,
	TreeNode,
	TreeNodeKind,
} from "./core/types/index.js";
export { isStatusCode } from "./core/types/index.js";
export {
	type AppError,
	describeAppError,
	MalformedRecordError,
	UpstreamProducerError,
	UsageError,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * bytes → lines in one call.
 *
 * @pure true
 */
export { formatStatusTree } from "./core/pipeline.js";
export { parseStatusRecords } from "./core/status/parser.js";
export { scanStatusRecords } from "./core/status/records.js";
export { pathDepth, sortStatusEntries } from "./core/status/sort.js";
export { buildStatusForest, StatusTreeBuilder } from "./core/tree/builder.js";
export { formatNodeLabel, renderStatusForest } from "./core/tree/render.js";
export {
	ANSI_STYLE,
	classifyStatus,
	colorStatus,
	PLAIN_STYLE,
	selectStyle,
	type StyleRole,
	type TerminalStyle,
} from "./core/format/status-color.js";
