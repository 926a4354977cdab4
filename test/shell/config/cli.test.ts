// CHANGE: Unit tests for status-tree argument parsing and color resolution
// WHY: Only --color is ours; everything else must reach git untouched
// INVARIANT: ∀args without --color: parse(args).gitArgs = args

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import type { TerminalEnvironment } from "../../../src/core/types/index.js";
import { parseCLIArgs, resolveColor } from "../../../src/shell/config/cli.js";
import { unwrapLeft, unwrapRight } from "../../core/fixtures.js";

const PIPE: TerminalEnvironment = {
	isTTY: false,
	noColor: undefined,
	forceColor: undefined,
};
const TTY: TerminalEnvironment = { ...PIPE, isTTY: true };

describe("parseCLIArgs", () => {
	it("defaults to auto with nothing forwarded", () => {
		expect(unwrapRight(parseCLIArgs([], PIPE))).toEqual({
			gitArgs: [],
			colorMode: "auto",
			color: false,
		});
	});

	it("removes --color=<mode> and keeps the rest in order", () => {
		expect(
			unwrapRight(parseCLIArgs(["--ignored", "--color=never", "src"], TTY)),
		).toEqual({ gitArgs: ["--ignored", "src"], colorMode: "never", color: false });
	});

	it("accepts the mode as a separate argument", () => {
		expect(unwrapRight(parseCLIArgs(["--color", "always", "-uall"], PIPE))).toEqual({
			gitArgs: ["-uall"],
			colorMode: "always",
			color: true,
		});
	});

	it("lets the last --color win", () => {
		expect(
			unwrapRight(parseCLIArgs(["--color=always", "--color=never"], PIPE)).colorMode,
		).toBe("never");
	});

	it("forwards everything after -- including the separator", () => {
		expect(
			unwrapRight(parseCLIArgs(["-s", "--", "--color=always", "a b.txt"], PIPE)).gitArgs,
		).toEqual(["-s", "--", "--color=always", "a b.txt"]);
	});

	it("rejects an unknown color mode", () => {
		expect(unwrapLeft(parseCLIArgs(["--color=sometimes"], PIPE)).detail).toBe(
			"invalid --color mode 'sometimes' (expected auto, always or never)",
		);
	});

	it("treats a trailing bare --color as always", () => {
		expect(unwrapRight(parseCLIArgs(["src", "--color"], PIPE))).toEqual({
			gitArgs: ["src"],
			colorMode: "always",
			color: true,
		});
	});

	it("leaves a non-mode argument after bare --color for git", () => {
		const result = parseCLIArgs(["--color", "--ignored"], PIPE);
		expect(Either.isRight(result)).toBe(true);
		expect(unwrapRight(result)).toEqual({
			gitArgs: ["--ignored"],
			colorMode: "always",
			color: true,
		});
	});
});

describe("resolveColor", () => {
	it.each([
		["always", PIPE, true],
		["never", { ...TTY, forceColor: "1" }, false],
		["auto", TTY, true],
		["auto", PIPE, false],
		["auto", { ...TTY, noColor: "1" }, false],
		["auto", { ...TTY, noColor: "" }, true],
		["auto", { ...PIPE, forceColor: "1" }, true],
		["auto", { ...PIPE, forceColor: "0" }, false],
		["auto", { ...TTY, noColor: "1", forceColor: "3" }, true],
	] as const)("mode %s in %o → %s", (mode, terminal, expected) => {
		expect(resolveColor(mode, terminal)).toBe(expected);
	});
});
