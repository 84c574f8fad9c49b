// PURITY: Re-exports only (meta-module)
// INVARIANT: Exports are the APP orchestrator, pure CORE functions and typed interfaces
// COMPLEXITY: O(1)

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Analysis orchestrator for programmatic usage.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { runAnalyzer } from "include-deps";
 *
 * const exitCode = await Effect.runPromise(
 *   runAnalyzer({
 *     projectRoot: "kernel",
 *     checkCycles: true,
 *     buildOrder: false,
 *     orderDirection: "includers-first",
 *     verbose: false,
 *     help: false,
 *   }),
 * );
 * ```
 */
export { runAnalyzer } from "./app/runAnalyzer.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type { ExitCode } from "./core/models.js";
export type {
	AnalyzerConfig,
	CLIOptions,
	Cycle,
	DirectoryCategory,
	DiscoveryResult,
	FilenameCollision,
	GraphStatistics,
	OrderDirection,
	RankedNode,
	ResolutionTally,
	ResolveOutcome,
	SourceFile,
	SourceKind,
} from "./core/types/index.js";
export type { AnalyzerError } from "./core/errors.js";
export {
	EmptyDiscovery,
	ExportWriteFailure,
	InvalidArguments,
	InvalidConfig,
	UnreadableDirectory,
	UnreadableFile,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE ALGORITHMS (Pure Functions)
// ═══════════════════════════════════════════════════════════════════════════════

export { DEFAULT_CONFIG, mergeConfig } from "./core/config/defaults.js";
export {
	type Adjacency,
	DependencyGraph,
} from "./core/graph/dependency-graph.js";
export {
	buildDependencyGraph,
	type FileScan,
	type GraphBuildResult,
} from "./core/graph/builder.js";
export { findCycle } from "./core/graph/cycles.js";
export { computeBuildOrder, kahnOrder } from "./core/graph/order.js";
export { extractIncludes } from "./core/includes/extractor.js";
export {
	type ResolveContext,
	resolveInclude,
} from "./core/includes/resolver.js";
export { renderDot } from "./core/report/dot.js";
export { computeStatistics } from "./core/report/statistics.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL ENTRY POINTS (Effects)
// ═══════════════════════════════════════════════════════════════════════════════

export { loadAnalyzerConfig } from "./shell/config/index.js";
export { discoverSourceFiles } from "./shell/discovery/walker.js";
export { analyzeIncludes } from "./shell/graph/analyze.js";
