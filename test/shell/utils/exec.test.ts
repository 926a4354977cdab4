import { describe, expect, it } from "vitest";

import { STATUS_FORMAT_ARGS } from "../../../src/shell/git/status.js";
import { toProducerError } from "../../../src/shell/utils/exec.js";

describe("toProducerError", () => {
	it("keeps git's stderr and numeric exit code", () => {
		const failure = Object.assign(new Error("Command failed: git status"), {
			code: 128,
			stderr: Buffer.from("fatal: not a git repository\n"),
		});
		const error = toProducerError("git status", failure);
		expect(error._tag).toBe("UpstreamProducerError");
		expect(error.exitCode).toBe(128);
		expect(error.detail).toBe("fatal: not a git repository\n");
		expect(error.command).toBe("git status");
	});

	it("falls back to the message when nothing reached stderr", () => {
		const failure = Object.assign(new Error("spawn git ENOENT"), {
			code: "ENOENT",
		});
		const error = toProducerError("git status", failure);
		expect(error.exitCode).toBeNull();
		expect(error.detail).toBe("spawn git ENOENT");
	});

	it("wraps a non-Error rejection", () => {
		expect(toProducerError("git", "boom").detail).toBe("boom");
	});
});

describe("STATUS_FORMAT_ARGS", () => {
	it("requests NUL-terminated porcelain v2", () => {
		expect(STATUS_FORMAT_ARGS).toEqual(["status", "--porcelain=v2", "-z"]);
	});
});
