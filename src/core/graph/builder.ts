// FORMAT THEOREM: edges(build(scans)) = { (f, r) | (f, t) ∈ scans, resolve(t) = resolved(r), r ≠ f }
// PURITY: CORE
// INVARIANT: Each scan contributes at most one edge per distinct resolved target
// COMPLEXITY: O(Σ|includes| · d) where d = |includeDirectories|

import { match } from "ts-pattern";

import type { ResolutionTally, SourceFile } from "../types/index.js";
import { type ResolveContext, resolveInclude } from "../includes/resolver.js";
import { DependencyGraph } from "./dependency-graph.js";

/**
 * Raw include targets of one discovered file.
 *
 * `includes` is null when the file could not be read; it then counts as a
 * file without includes.
 */
export interface FileScan {
	readonly file: SourceFile;
	readonly includes: ReadonlySet<string> | null;
}

export interface GraphBuildResult {
	readonly graph: DependencyGraph;
	readonly tally: ResolutionTally;
}

interface MutableTally {
	scannedFiles: number;
	unreadableFiles: number;
	resolved: number;
	selfIncludes: number;
	undiscovered: number;
	system: number;
	unresolved: number;
}

/**
 * Build the include graph from per-file scans, in scan order.
 *
 * @pure true (given a pure `context.exists`)
 * @postcondition graph.reverse = transpose(graph.forward)
 */
export function buildDependencyGraph(
	scans: readonly FileScan[],
	context: ResolveContext,
): GraphBuildResult {
	const graph = new DependencyGraph();
	const tally: MutableTally = {
		scannedFiles: 0,
		unreadableFiles: 0,
		resolved: 0,
		selfIncludes: 0,
		undiscovered: 0,
		system: 0,
		unresolved: 0,
	};

	for (const { file, includes } of scans) {
		tally.scannedFiles += 1;
		if (includes === null) {
			tally.unreadableFiles += 1;
			continue;
		}
		for (const target of includes) {
			match(resolveInclude(target, context))
				.with({ kind: "resolved" }, ({ path }) => {
					if (path === file.path) {
						tally.selfIncludes += 1;
						return;
					}
					tally.resolved += 1;
					graph.addEdge(file.path, path);
				})
				.with({ kind: "undiscovered" }, () => {
					tally.undiscovered += 1;
				})
				.with({ kind: "system" }, () => {
					tally.system += 1;
				})
				.with({ kind: "unresolved" }, () => {
					tally.unresolved += 1;
				})
				.exhaustive();
		}
	}

	return { graph, tally };
}
