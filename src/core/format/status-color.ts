// CHANGE: Pure status-code coloring with an injected style policy
// WHY: Renderer must be testable without a terminal; color on/off is decided in the shell
// SOURCE: git-status(1) "Short Format" table of unmerged states
// FORMAT THEOREM: ∀code: classifyStatus(code) ∈ {"alert","split"} (exclusive, exhaustive)
// PURITY: CORE
// INVARIANT: stripAnsi(colorStatus(code, style)) = code for every style
// COMPLEXITY: O(1)

import type { StatusCode } from "../types/index.js";

export type StyleRole = "alert" | "staged" | "unstaged";

/**
 * Formatting policy handed to the renderer.
 */
export interface TerminalStyle {
	readonly paint: (role: StyleRole, text: string) => string;
}

const RESET = "\x1b[0m";

const ANSI_CODES: Readonly<Record<StyleRole, string>> = {
	alert: "\x1b[31m",
	staged: "\x1b[32m",
	unstaged: "\x1b[31m",
};

export const ANSI_STYLE: TerminalStyle = {
	paint: (role, text) => `${ANSI_CODES[role]}${text}${RESET}`,
};

export const PLAIN_STYLE: TerminalStyle = {
	paint: (_role, text) => text,
};

/**
 * @pure true
 */
export const selectStyle = (color: boolean): TerminalStyle =>
	color ? ANSI_STYLE : PLAIN_STYLE;

/**
 * Both-sides-unmerged and added/deleted-by-one-side pairs.
 */
export const CONFLICT_CODES: ReadonlySet<string> = new Set([
	"DD",
	"AU",
	"UD",
	"UA",
	"DU",
	"AA",
	"UU",
]);

/**
 * "alert": whole code painted once; "split": X and Y painted independently.
 *
 * @pure true
 */
export function classifyStatus(code: StatusCode): "alert" | "split" {
	const staged = code.charAt(0);
	if (staged === "?" || staged === "!" || CONFLICT_CODES.has(code)) {
		return "alert";
	}
	return "split";
}

const paintSide = (
	style: TerminalStyle,
	role: StyleRole,
	letter: string,
): string => (letter === "." ? letter : style.paint(role, letter));

/**
 * Renders an XY pair with the given style.
 *
 * @pure true
 *
 * @example
 * ```ts
 * colorStatus("M.", ANSI_STYLE); // "\x1b[32mM\x1b[0m."
 * colorStatus("UU", ANSI_STYLE); // "\x1b[31mUU\x1b[0m"
 * ```
 */
export function colorStatus(code: StatusCode, style: TerminalStyle): string {
	if (classifyStatus(code) === "alert") {
		return style.paint("alert", code);
	}
	return (
		paintSide(style, "staged", code.charAt(0)) +
		paintSide(style, "unstaged", code.charAt(1))
	);
}
