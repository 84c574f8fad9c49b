// PURITY: CORE
// INVARIANT: Argmax keeps the first maximal entry in iteration order
// COMPLEXITY: O(V)

import type { Adjacency, DependencyGraph } from "../graph/dependency-graph.js";
import type {
	DiscoveryResult,
	GraphStatistics,
	RankedNode,
} from "../types/index.js";

/**
 * Entry of an adjacency with the largest neighbour set.
 *
 * @pure true
 * @returns null for an empty adjacency
 */
export function maxByNeighbors(adjacency: Adjacency): RankedNode | null {
	let best: RankedNode | null = null;
	for (const [path, neighbors] of adjacency) {
		if (best === null || neighbors.size > best.count) {
			best = { path, count: neighbors.size };
		}
	}
	return best;
}

/**
 * Aggregate counts of one analysis.
 *
 * Source files are `.c` and `.S` entries of the discovery mapping; headers are
 * its `.h` entries.
 *
 * @pure true
 * @complexity O(V)
 */
export function computeStatistics(
	discovery: DiscoveryResult,
	graph: DependencyGraph,
): GraphStatistics {
	let sourceFiles = 0;
	let headerFiles = 0;
	for (const file of discovery.files.values()) {
		if (file.kind === "header") {
			headerFiles += 1;
		} else {
			sourceFiles += 1;
		}
	}

	return {
		sourceFiles,
		headerFiles,
		edges: graph.edgeCount,
		mostDependencies: maxByNeighbors(graph.forward),
		mostDependents: maxByNeighbors(graph.reverse),
	};
}
