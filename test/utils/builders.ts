// Pure builders shared by the core tests.

import { collectDiscovery } from "../../src/core/discovery/registry.js";
import { DependencyGraph } from "../../src/core/graph/dependency-graph.js";
import {
	directoryCategoryOf,
	normalizeSegments,
	sourceKindOf,
} from "../../src/core/discovery/classify.js";
import { DEFAULT_CONFIG } from "../../src/core/config/defaults.js";
import type {
	DiscoveryResult,
	SourceFile,
} from "../../src/core/types/index.js";

/** Build a discovered file from its relative path. */
export const sourceFile = (path: string): SourceFile => {
	const segments = normalizeSegments(path);
	const fileName = segments.at(-1) ?? path;
	return {
		path,
		fileName,
		kind: sourceKindOf(fileName) ?? "source",
		category: directoryCategoryOf(segments.slice(0, -1), DEFAULT_CONFIG),
	};
};

/** Discovery result over the given paths, in order. */
export const discoveryOf = (...paths: readonly string[]): DiscoveryResult =>
	collectDiscovery(paths.map(sourceFile));

/** Graph holding the given edges, inserted in order. */
export const graphOf = (
	...edges: ReadonlyArray<readonly [string, string]>
): DependencyGraph => {
	const graph = new DependencyGraph();
	for (const [from, to] of edges) {
		graph.addEdge(from, to);
	}
	return graph;
};

/** Plain-object view of an adjacency, for `toEqual`. */
export const adjacencyToRecord = (
	adjacency: ReadonlyMap<string, ReadonlySet<string>>,
): Record<string, string[]> => {
	const record: Record<string, string[]> = {};
	for (const [node, neighbors] of adjacency) {
		record[node] = [...neighbors];
	}
	return record;
};
