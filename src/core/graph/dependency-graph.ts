// FORMAT THEOREM: ∀x,y: y ∈ forward(x) ⇔ x ∈ reverse(y)
// PURITY: CORE (mutation confined to the owning instance)
// INVARIANT: reverse = transpose(forward) after every insertion; ∀x: x ∉ forward(x)
// COMPLEXITY: O(1) amortized per insertion

/**
 * Read-only adjacency: node → set of neighbours, both in insertion order.
 */
export type Adjacency = ReadonlyMap<string, ReadonlySet<string>>;

/**
 * Include dependency graph owned by one analyzer run.
 *
 * The forward mapping holds "X includes Y" edges keyed by X; the reverse index
 * is its transpose keyed by Y. Both are updated together by `addEdge`, the
 * only mutator, and exposed read-only to the algorithms.
 */
export class DependencyGraph {
	private readonly forwardEdges = new Map<string, Set<string>>();
	private readonly reverseEdges = new Map<string, Set<string>>();
	private readonly nodeOrder = new Set<string>();
	private edgeTotal = 0;

	/**
	 * Record that `from` includes `to`.
	 *
	 * @returns true when a new edge was stored; false for a self-edge or a
	 * duplicate
	 * @complexity O(1)
	 */
	addEdge(from: string, to: string): boolean {
		if (from === to) return false;

		let targets = this.forwardEdges.get(from);
		if (targets?.has(to) === true) return false;
		if (targets === undefined) {
			targets = new Set();
			this.forwardEdges.set(from, targets);
		}
		let sources = this.reverseEdges.get(to);
		if (sources === undefined) {
			sources = new Set();
			this.reverseEdges.set(to, sources);
		}

		targets.add(to);
		sources.add(from);
		this.nodeOrder.add(from);
		this.nodeOrder.add(to);
		this.edgeTotal += 1;
		return true;
	}

	/** Forward mapping: file → files it includes. */
	get forward(): Adjacency {
		return this.forwardEdges;
	}

	/** Reverse index: file → files including it. */
	get reverse(): Adjacency {
		return this.reverseEdges;
	}

	/** Every path that is an edge endpoint, in first-seen order. */
	get nodes(): ReadonlySet<string> {
		return this.nodeOrder;
	}

	get edgeCount(): number {
		return this.edgeTotal;
	}

	/**
	 * Every edge as a `[from, to]` pair, forward-key order then target order.
	 *
	 * @complexity O(E)
	 */
	edges(): ReadonlyArray<readonly [string, string]> {
		const pairs: Array<readonly [string, string]> = [];
		for (const [from, targets] of this.forwardEdges) {
			for (const to of targets) {
				pairs.push([from, to]);
			}
		}
		return pairs;
	}
}
