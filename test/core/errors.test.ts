import { describe, expect, it } from "vitest";

import {
	describeAppError,
	MalformedRecordError,
	UpstreamProducerError,
	UsageError,
} from "../../src/core/errors.js";

describe("describeAppError", () => {
	it("names the offset and excerpt of a malformed record", () => {
		expect(
			describeAppError(new MalformedRecordError({ offset: 12, excerpt: "X junk\\0" })),
		).toBe("malformed status record at offset 12: X junk\\0");
	});

	it("passes git's stderr through unchanged", () => {
		const detail = "fatal: not a git repository (or any of the parent directories): .git\n";
		expect(
			describeAppError(
				new UpstreamProducerError({ command: "git status", exitCode: 128, detail }),
			),
		).toBe(detail);
	});

	it("uses the usage detail as is", () => {
		expect(describeAppError(new UsageError({ detail: "bad flag" }))).toBe("bad flag");
	});

	it("tags each error for matching", () => {
		expect(new UsageError({ detail: "x" })._tag).toBe("UsageError");
	});
});
