// CHANGE: Compose parser → sorter → builder → renderer into one pure transform
// WHY: APP and library consumers need bytes → lines without repeating the wiring
// FORMAT THEOREM: formatStatusTree(b, s) = render(build(sort(parse(b))), s)
// PURITY: CORE
// INVARIANT: Left ⇒ no lines at all (the forest is never built from partial input)
// COMPLEXITY: O(n log n)

import { Either, pipe } from "effect";

import type { MalformedRecordError } from "./errors.js";
import type { TerminalStyle } from "./format/status-color.js";
import { parseStatusRecords } from "./status/parser.js";
import { sortStatusEntries } from "./status/sort.js";
import { buildStatusForest } from "./tree/builder.js";
import { renderStatusForest } from "./tree/render.js";

/**
 * @pure true
 */
export const formatStatusTree = (
	input: string | Uint8Array,
	style: TerminalStyle,
): Either.Either<ReadonlyArray<string>, MalformedRecordError> =>
	pipe(
		parseStatusRecords(input),
		Either.map(sortStatusEntries),
		Either.map(buildStatusForest),
		Either.map((forest) => renderStatusForest(forest, style)),
	);
