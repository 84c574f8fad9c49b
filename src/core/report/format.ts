// PURITY: CORE
// INVARIANT: Formatters return lines; printing belongs to the shell
// COMPLEXITY: O(n) in the size of the formatted data

import type {
	Cycle,
	FilenameCollision,
	GraphStatistics,
	OrderDirection,
	ResolutionTally,
} from "../types/index.js";

export const REPORT_TITLE = "Include Dependency Analysis";

/**
 * Title and rule printed before the statistics.
 *
 * @pure true
 */
export function formatBanner(): readonly string[] {
	return [REPORT_TITLE, "=".repeat(40)];
}

/**
 * @pure true
 * @postcondition result.length = 5
 */
export function formatStatistics(stats: GraphStatistics): readonly string[] {
	const mostDependencies =
		stats.mostDependencies === null
			? "none"
			: `${stats.mostDependencies.path} (${stats.mostDependencies.count} deps)`;
	const mostDependents =
		stats.mostDependents === null
			? "none"
			: `${stats.mostDependents.path} (${stats.mostDependents.count} dependents)`;
	return [
		`Source files: ${stats.sourceFiles}`,
		`Header files: ${stats.headerFiles}`,
		`Dependencies: ${stats.edges}`,
		`Most dependencies: ${mostDependencies}`,
		`Most dependents: ${mostDependents}`,
	];
}

/**
 * @pure true
 */
export function formatCycleReport(cycle: Cycle | null): readonly string[] {
	const verdict =
		cycle === null
			? "No circular dependencies found."
			: `Circular dependency found: ${cycle.join(" -> ")}`;
	return ["", "Checking for circular dependencies...", verdict];
}

/**
 * Numbered build order, 1-based, index right-aligned to three columns.
 *
 * @pure true
 */
export function formatBuildOrder(
	order: readonly string[],
	direction: OrderDirection,
): readonly string[] {
	const title =
		direction === "includers-first"
			? "Build order:"
			: "Build order (dependencies first):";
	return [
		"",
		title,
		...order.map((file, index) => `${String(index + 1).padStart(3)}. ${file}`),
	];
}

/**
 * Image file suggested next to a DOT file.
 *
 * @pure true
 */
export function imagePathFor(dotPath: string): string {
	return dotPath.endsWith(".dot")
		? `${dotPath.slice(0, -".dot".length)}.png`
		: `${dotPath}.png`;
}

/**
 * @pure true
 */
export function formatDotSaved(dotPath: string): readonly string[] {
	return [
		"",
		`DOT graph saved to ${dotPath}`,
		`Generate image with: dot -Tpng ${dotPath} -o ${imagePathFor(dotPath)}`,
	];
}

/**
 * @pure true
 */
export function formatResolutionTally(tally: ResolutionTally): readonly string[] {
	return [
		"",
		"Include resolution:",
		`  Files scanned: ${tally.scannedFiles}`,
		`  Unreadable files: ${tally.unreadableFiles}`,
		`  Resolved includes: ${tally.resolved}`,
		`  Self includes: ${tally.selfIncludes}`,
		`  Outside discovery: ${tally.undiscovered}`,
		`  System headers: ${tally.system}`,
		`  Unresolved: ${tally.unresolved}`,
	];
}

/**
 * Filename collisions of discovery; empty when there were none.
 *
 * @pure true
 */
export function formatCollisions(
	collisions: readonly FilenameCollision[],
): readonly string[] {
	if (collisions.length === 0) return [];
	return [
		"",
		"Filename collisions (later path wins):",
		...collisions.map(
			(c) => `  ${c.fileName}: ${c.replacedPath} -> ${c.keptPath}`,
		),
	];
}
