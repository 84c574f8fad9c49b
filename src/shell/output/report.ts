// PURITY: SHELL
// EFFECT: Effect<void, never>
// INVARIANT: Lines are printed verbatim, one console call per line
// COMPLEXITY: O(n) where n = number of lines

import { Effect } from "effect";
import { match } from "ts-pattern";

import type { AnalyzerError } from "../../core/errors.js";

/**
 * @effect Effect<void, never>
 */
export function printLines(lines: readonly string[]): Effect.Effect<void> {
	return Effect.sync(() => {
		for (const line of lines) {
			console.log(line);
		}
	});
}

/**
 * One-line description of an analyzer failure.
 *
 * @pure true
 */
export function describeError(error: AnalyzerError): string {
	return match(error)
		.with(
			{ _tag: "UnreadableFile" },
			(e) => `Could not parse ${e.path}: ${e.detail}`,
		)
		.with(
			{ _tag: "UnreadableDirectory" },
			(e) => `Unable to read directory ${e.path}: ${e.detail}`,
		)
		.with(
			{ _tag: "EmptyDiscovery" },
			(e) =>
				`No source files found under ${e.projectRoot} (roots: ${e.roots.join(", ")})`,
		)
		.with(
			{ _tag: "ExportWriteFailure" },
			(e) => `Failed to write DOT graph to ${e.path}: ${e.detail}`,
		)
		.with(
			{ _tag: "InvalidConfig" },
			(e) => `Invalid configuration ${e.path}: ${e.detail}`,
		)
		.with({ _tag: "InvalidArguments" }, (e) => `Invalid arguments: ${e.detail}`)
		.exhaustive();
}

/**
 * @effect Effect<void, never>
 */
export function printError(error: AnalyzerError): Effect.Effect<void> {
	return Effect.sync(() => {
		console.error(`❌ ${describeError(error)}`);
	});
}
