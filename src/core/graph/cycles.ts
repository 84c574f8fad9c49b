// FORMAT THEOREM: findCycle(G) = null ⇔ G is acyclic
// PURITY: CORE
// INVARIANT: Returned cycle c satisfies c[0] = c[|c|-1] ∧ ∀i: (c[i], c[i+1]) ∈ E
// COMPLEXITY: O(V + E)

import type { Cycle } from "../types/index.js";
import type { Adjacency } from "./dependency-graph.js";

/**
 * One DFS frame: a node and the position reached in its neighbour list.
 */
interface Frame {
	readonly node: string;
	readonly neighbors: readonly string[];
	position: number;
}

const EMPTY: ReadonlySet<string> = new Set();

/**
 * Find the first circular include path.
 *
 * Depth-first search from every forward key (insertion order) not yet
 * visited, with an explicit frame stack instead of recursion. `onPath`
 * mirrors the frames currently on the stack; reaching a neighbour in `onPath`
 * closes a loop, returned from that neighbour's position to the current node
 * with the neighbour appended.
 *
 * Traversal stops at the first loop; it is not necessarily the shortest one.
 *
 * @pure true
 * @complexity O(V + E)
 *
 * @example
 * ```ts
 * const graph = new DependencyGraph();
 * graph.addEdge("a.h", "b.h");
 * graph.addEdge("b.h", "a.h");
 * findCycle(graph.forward); // ["a.h", "b.h", "a.h"]
 * ```
 */
export function findCycle(forward: Adjacency): Cycle | null {
	const visited = new Set<string>();

	const enter = (
		node: string,
		stack: Frame[],
		path: string[],
		onPath: Set<string>,
	): void => {
		visited.add(node);
		onPath.add(node);
		path.push(node);
		stack.push({
			node,
			neighbors: [...(forward.get(node) ?? EMPTY)],
			position: 0,
		});
	};

	for (const root of forward.keys()) {
		if (visited.has(root)) continue;

		const stack: Frame[] = [];
		const path: string[] = [];
		const onPath = new Set<string>();
		enter(root, stack, path, onPath);

		while (stack.length > 0) {
			const frame = stack.at(-1);
			if (frame === undefined) break;

			const neighbor = frame.neighbors[frame.position];
			if (neighbor === undefined) {
				stack.pop();
				path.pop();
				onPath.delete(frame.node);
				continue;
			}
			frame.position += 1;

			if (onPath.has(neighbor)) {
				return [...path.slice(path.indexOf(neighbor)), neighbor];
			}
			if (!visited.has(neighbor)) {
				enter(neighbor, stack, path, onPath);
			}
		}
	}

	return null;
}

/**
 * Check that a sequence is a closed walk over real edges.
 *
 * @pure true
 * @complexity O(|cycle|)
 */
export function isClosedWalk(forward: Adjacency, cycle: Cycle): boolean {
	if (cycle.length < 2 || cycle[0] !== cycle.at(-1)) return false;
	for (let index = 0; index + 1 < cycle.length; index += 1) {
		const from = cycle[index];
		const to = cycle[index + 1];
		if (from === undefined || to === undefined) return false;
		if (forward.get(from)?.has(to) !== true) return false;
	}
	return true;
}
