// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value
// COMPLEXITY: O(1)

import { Effect, Either } from "effect";

import { runAnalyzer } from "./app/runAnalyzer.js";
import type { ExitCode } from "./core/models.js";
import { parseCLIArgs, USAGE } from "./shell/config/index.js";
import { describeError } from "./shell/output/report.js";

/**
 * Entry for programmatic usage (without terminating the process).
 *
 * @param args - Command-line style arguments, e.g. `["kernel", "--check-cycles"]`
 * @returns ExitCode (0 | 1); invalid arguments print the usage and give 1
 *
 * @pure false (delegates to app orchestration), but does not call process.exit
 */
export async function main(
	args: readonly string[] = process.argv.slice(2),
): Promise<ExitCode> {
	const parsed = parseCLIArgs(args);
	if (Either.isLeft(parsed)) {
		console.error(`❌ ${describeError(parsed.left)}`);
		console.error(USAGE.join("\n"));
		return 1;
	}
	if (parsed.right.help) {
		console.log(USAGE.join("\n"));
		return 0;
	}
	return Effect.runPromise(runAnalyzer(parsed.right));
}
