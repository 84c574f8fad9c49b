// PURITY: SHELL
// EFFECT: Effect<GraphBuildResult, never>
// INVARIANT: Resolution stats only paths below the project root
// COMPLEXITY: O(Σ|includes| · d) where d = |includeDirectories|

import { Effect } from "effect";

import { discoveredPaths } from "../../core/discovery/registry.js";
import {
	buildDependencyGraph,
	type GraphBuildResult,
} from "../../core/graph/builder.js";
import type { ResolveContext } from "../../core/includes/resolver.js";
import type { AnalyzerConfig, DiscoveryResult } from "../../core/types/index.js";
import { scanDiscoveredFiles } from "../includes/reader.js";
import { path } from "../utils/node-mods.js";
import { isRegularFile } from "../utils/stat.js";

/**
 * Resolution context backed by the real filesystem.
 *
 * @pure false (`exists` stats files)
 */
export function createResolveContext(
	projectRoot: string,
	discovery: DiscoveryResult,
	config: AnalyzerConfig,
): ResolveContext {
	const absoluteRoot = path.resolve(projectRoot);
	return {
		files: discovery.files,
		discovered: discoveredPaths(discovery),
		includeDirectories: config.includeDirectories,
		systemIncludePrefixes: config.systemIncludePrefixes,
		exists: (relativePath) =>
			!relativePath.startsWith("..") &&
			isRegularFile(path.join(absoluteRoot, relativePath)),
	};
}

/**
 * Scan the discovered files and build the include graph.
 *
 * @effect Effect<GraphBuildResult, never>
 */
export function analyzeIncludes(
	projectRoot: string,
	discovery: DiscoveryResult,
	config: AnalyzerConfig,
): Effect.Effect<GraphBuildResult> {
	return Effect.gen(function* () {
		const scans = yield* scanDiscoveredFiles(projectRoot, discovery);
		return buildDependencyGraph(
			scans,
			createResolveContext(projectRoot, discovery, config),
		);
	});
}
