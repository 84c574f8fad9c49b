// FORMAT THEOREM: |nodeStatements(dot)| = |discovery| ∧ |edgeStatements(dot)| = |E|
// PURITY: CORE
// INVARIANT: Output is deterministic for a given discovery order and graph
// COMPLEXITY: O(V + E)

import { match } from "ts-pattern";

import type { DependencyGraph } from "../graph/dependency-graph.js";
import type { DiscoveryResult, SourceKind } from "../types/index.js";

/**
 * Escape a string for use inside a DOT double-quoted ID.
 *
 * @pure true
 */
export function quoteDotId(value: string): string {
	return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

const fillColorOf = (kind: SourceKind): string =>
	match(kind)
		.with("header", () => "lightblue")
		.with("source", "assembly", () => "lightgreen")
		.exhaustive();

/**
 * Render the graph as DOT text, one statement per line.
 *
 * Node statements cover every discovered file (mapping order), labelled with
 * its bare filename; edge statements cover every forward edge.
 *
 * @pure true
 * @complexity O(V + E)
 */
export function renderDotLines(
	discovery: DiscoveryResult,
	graph: DependencyGraph,
): readonly string[] {
	const lines: string[] = [
		"digraph dependencies {",
		"  rankdir=TB;",
		"  node [shape=box];",
	];

	for (const file of discovery.files.values()) {
		lines.push(
			`  ${quoteDotId(file.path)} [label=${quoteDotId(file.fileName)} fillcolor="${fillColorOf(file.kind)}" style=filled];`,
		);
	}

	for (const [from, to] of graph.edges()) {
		lines.push(`  ${quoteDotId(from)} -> ${quoteDotId(to)};`);
	}

	lines.push("}");
	return lines;
}

/**
 * Render the graph as a complete DOT document (trailing newline included).
 *
 * @pure true
 */
export function renderDot(
	discovery: DiscoveryResult,
	graph: DependencyGraph,
): string {
	return `${renderDotLines(discovery, graph).join("\n")}\n`;
}
