// CHANGE: Command-line and environment resolution for status-tree
// WHY: Everything except our own --color option belongs to `git status`
// PURITY: SHELL (reads process.argv / env / stdout only in the default arguments)
// INVARIANT: Forwarded arguments keep their order and spelling
// COMPLEXITY: O(n) where n = |argv|

import { Either } from "effect";

import { UsageError } from "../../core/errors.js";
import type {
	CLIOptions,
	ColorMode,
	TerminalEnvironment,
} from "../../core/types/index.js";

const COLOR_FLAG = "--color";
const END_OF_OPTIONS = "--";

const COLOR_MODES: ReadonlyMap<string, ColorMode> = new Map([
	["auto", "auto"],
	["always", "always"],
	["never", "never"],
]);

interface ArgState {
	readonly gitArgs: ReadonlyArray<string>;
	readonly colorMode: ColorMode;
}

interface ArgStep {
	readonly state: ArgState;
	readonly consumed: number;
}

function parseColorMode(raw: string): Either.Either<ColorMode, UsageError> {
	const mode = COLOR_MODES.get(raw);
	return mode === undefined
		? Either.left(
				new UsageError({
					detail: `invalid --color mode '${raw}' (expected auto, always or never)`,
				}),
			)
		: Either.right(mode);
}

function processArgument(
	args: ReadonlyArray<string>,
	index: number,
	state: ArgState,
): Either.Either<ArgStep, UsageError> {
	const arg = args[index] ?? "";
	if (arg.startsWith(`${COLOR_FLAG}=`)) {
		return Either.map(parseColorMode(arg.slice(COLOR_FLAG.length + 1)), (colorMode) => ({
			state: { ...state, colorMode },
			consumed: 1,
		}));
	}
	if (arg === COLOR_FLAG) {
		// Bare --color means always; the next argument is taken only when it is a mode.
		const next = COLOR_MODES.get(args[index + 1] ?? "");
		return Either.right({
			state: { ...state, colorMode: next ?? "always" },
			consumed: next === undefined ? 1 : 2,
		});
	}
	if (arg === END_OF_OPTIONS) {
		// Pathspecs after `--` go to git untouched, `--` included.
		return Either.right({
			state: { ...state, gitArgs: [...state.gitArgs, ...args.slice(index)] },
			consumed: args.length - index,
		});
	}
	return Either.right({
		state: { ...state, gitArgs: [...state.gitArgs, arg] },
		consumed: 1,
	});
}

/**
 * Color decision for a requested mode.
 *
 * `auto` honours FORCE_COLOR (anything but "0") first, then a non-empty
 * NO_COLOR, then whether stdout is a terminal.
 *
 * @pure true
 */
export function resolveColor(
	mode: ColorMode,
	terminal: TerminalEnvironment,
): boolean {
	if (mode !== "auto") return mode === "always";
	if (terminal.forceColor !== undefined && terminal.forceColor !== "0") {
		return true;
	}
	if (terminal.noColor !== undefined && terminal.noColor.length > 0) {
		return false;
	}
	return terminal.isTTY;
}

/**
 * @pure false (reads process state)
 */
export function readTerminalEnvironment(): TerminalEnvironment {
	return {
		isTTY: process.stdout.isTTY === true,
		noColor: process.env["NO_COLOR"],
		forceColor: process.env["FORCE_COLOR"],
	};
}

/**
 * Parses command-line arguments.
 *
 * @returns Right(options) or Left(UsageError) for a bad --color value
 *
 * @example
 * ```ts
 * // Command: git-status-tree --ignored --color=never src
 * parseCLIArgs(["--ignored", "--color=never", "src"], terminal);
 * // Right({ gitArgs: ["--ignored", "src"], colorMode: "never", color: false })
 * ```
 */
export function parseCLIArgs(
	args: ReadonlyArray<string> = process.argv.slice(2),
	terminal: TerminalEnvironment = readTerminalEnvironment(),
): Either.Either<CLIOptions, UsageError> {
	let state: ArgState = { gitArgs: [], colorMode: "auto" };
	let index = 0;
	while (index < args.length) {
		const step = processArgument(args, index, state);
		if (Either.isLeft(step)) return Either.left(step.left);
		state = step.right.state;
		index += step.right.consumed;
	}
	return Either.right({
		gitArgs: state.gitArgs,
		colorMode: state.colorMode,
		color: resolveColor(state.colorMode, terminal),
	});
}
