// FORMAT THEOREM: acyclic(G) ⇒ order(G) is a permutation of nodes(G) respecting every edge
// PURITY: CORE
// INVARIANT: Nodes on a cycle never reach in-degree 0 and are omitted
// COMPLEXITY: O(V + E)

import { match } from "ts-pattern";

import type { OrderDirection } from "../types/index.js";
import type { Adjacency, DependencyGraph } from "./dependency-graph.js";

const EMPTY: ReadonlySet<string> = new Set();

/**
 * In-degree of every node, registered in adjacency-key order: each key with 0
 * when first seen, each of its neighbours incremented once per edge.
 *
 * @pure true
 * @complexity O(V + E)
 */
export function computeInDegrees(adjacency: Adjacency): Map<string, number> {
	const inDegree = new Map<string, number>();
	for (const [node, neighbors] of adjacency) {
		if (!inDegree.has(node)) {
			inDegree.set(node, 0);
		}
		for (const neighbor of neighbors) {
			inDegree.set(neighbor, (inDegree.get(neighbor) ?? 0) + 1);
		}
	}
	return inDegree;
}

/**
 * Kahn's algorithm with a FIFO queue.
 *
 * Ties among nodes that are simultaneously at zero keep registration order;
 * there is no secondary key.
 *
 * @pure true
 * @complexity O(V + E)
 */
export function kahnOrder(adjacency: Adjacency): readonly string[] {
	const inDegree = computeInDegrees(adjacency);
	const queue: string[] = [];
	for (const [node, degree] of inDegree) {
		if (degree === 0) queue.push(node);
	}

	const order: string[] = [];
	for (let head = 0; head < queue.length; head += 1) {
		const node = queue[head];
		if (node === undefined) break;
		order.push(node);

		for (const neighbor of adjacency.get(node) ?? EMPTY) {
			const remaining = (inDegree.get(neighbor) ?? 0) - 1;
			inDegree.set(neighbor, remaining);
			if (remaining === 0) {
				queue.push(neighbor);
			}
		}
	}

	return order;
}

/**
 * Build order of the graph in the requested direction.
 *
 * - `includers-first` walks the forward mapping: a file precedes the files it
 *   includes, so translation units come first and leaf headers last.
 * - `dependencies-first` walks the reverse index: a file follows everything it
 *   includes, the order a compiler would need.
 *
 * @pure true
 * @complexity O(V + E)
 */
export function computeBuildOrder(
	graph: DependencyGraph,
	direction: OrderDirection,
): readonly string[] {
	return match(direction)
		.with("includers-first", () => kahnOrder(graph.forward))
		.with("dependencies-first", () => kahnOrder(graph.reverse))
		.exhaustive();
}
