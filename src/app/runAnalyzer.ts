// PURITY: APP (no process.exit; console output goes through shell printers)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Returns ExitCode as value; no termination side effects
// COMPLEXITY: O(n + V + E) where n = bytes scanned, V/E = graph size

import { Effect } from "effect";

import { computeExitCode } from "../core/decision.js";
import { EmptyDiscovery } from "../core/errors.js";
import { findCycle } from "../core/graph/cycles.js";
import { computeBuildOrder } from "../core/graph/order.js";
import type { ExitCode } from "../core/models.js";
import { renderDot } from "../core/report/dot.js";
import {
	formatBanner,
	formatBuildOrder,
	formatCollisions,
	formatCycleReport,
	formatDotSaved,
	formatResolutionTally,
	formatStatistics,
} from "../core/report/format.js";
import { computeStatistics } from "../core/report/statistics.js";
import type { CLIOptions } from "../core/types/index.js";
import { loadAnalyzerConfig } from "../shell/config/index.js";
import { discoverSourceFiles } from "../shell/discovery/walker.js";
import { analyzeIncludes } from "../shell/graph/analyze.js";
import { writeDotFile } from "../shell/output/dot-writer.js";
import { printError, printLines } from "../shell/output/report.js";

/**
 * Write the DOT file and report the outcome.
 *
 * A write failure is reported but does not change the exit code.
 *
 * @effect Effect<void, never>
 */
function exportDot(dotPath: string, text: string): Effect.Effect<void> {
	return writeDotFile(dotPath, text).pipe(
		Effect.zipRight(printLines(formatDotSaved(dotPath))),
		Effect.catchTag("ExportWriteFailure", printError),
	);
}

/**
 * Orchestrates one analysis run and returns ExitCode as value.
 *
 * Order of output: banner and statistics, resolution details (verbose),
 * cycle report, build order, DOT export.
 *
 * @param options - Parsed CLI options
 * @returns Effect<ExitCode, never>
 *
 * @pure false (reads the project, prints, may write the DOT file)
 * @invariant ExitCode ∈ {0,1}
 * @postcondition invalid configuration ∨ empty discovery → 1 else 0
 */
export function runAnalyzer(
	options: CLIOptions,
): Effect.Effect<ExitCode, never> {
	return Effect.gen(function* () {
		const config = yield* loadAnalyzerConfig(
			options.projectRoot,
			options.configPath,
		);

		const discovery = yield* discoverSourceFiles(options.projectRoot, config);
		if (discovery.files.size === 0) {
			return yield* Effect.fail(
				new EmptyDiscovery({
					projectRoot: options.projectRoot,
					roots: config.sourceRoots,
				}),
			);
		}

		const { graph, tally } = yield* analyzeIncludes(
			options.projectRoot,
			discovery,
			config,
		);

		yield* printLines([
			...formatBanner(),
			...formatStatistics(computeStatistics(discovery, graph)),
		]);

		if (options.verbose) {
			yield* printLines([
				...formatResolutionTally(tally),
				...formatCollisions(discovery.collisions),
			]);
		}

		if (options.checkCycles) {
			yield* printLines(formatCycleReport(findCycle(graph.forward)));
		}

		if (options.buildOrder) {
			yield* printLines(
				formatBuildOrder(
					computeBuildOrder(graph, options.orderDirection),
					options.orderDirection,
				),
			);
		}

		if (options.dotPath !== undefined) {
			yield* exportDot(options.dotPath, renderDot(discovery, graph));
		}

		return computeExitCode({
			discoveredFiles: discovery.files.size,
			hasFatalError: false,
		});
	}).pipe(
		Effect.catchTags({
			InvalidConfig: (error) =>
				printError(error).pipe(Effect.as<ExitCode>(1)),
			EmptyDiscovery: (error) =>
				printError(error).pipe(Effect.as<ExitCode>(1)),
		}),
	);
}
