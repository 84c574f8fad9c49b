// FORMAT THEOREM: ∀name: files(name) = last candidate c with c.fileName = name
// PURITY: CORE
// INVARIANT: Map position of a filename is fixed by its first writer
// COMPLEXITY: O(n) where n = |candidates|

import type {
	DiscoveryResult,
	FilenameCollision,
	SourceFile,
} from "../types/index.js";

/**
 * Fold discovered candidates into the filename-keyed mapping.
 *
 * Resolution is by bare filename: when two directories hold the same name the
 * later candidate replaces the earlier one and a collision is recorded. The
 * same path seen twice (overlapping roots) is not a collision.
 *
 * @pure true
 * @complexity O(n)
 */
export function collectDiscovery(
	candidates: readonly SourceFile[],
): DiscoveryResult {
	const files = new Map<string, SourceFile>();
	const collisions: FilenameCollision[] = [];

	for (const candidate of candidates) {
		const previous = files.get(candidate.fileName);
		if (previous !== undefined && previous.path !== candidate.path) {
			collisions.push({
				fileName: candidate.fileName,
				replacedPath: previous.path,
				keptPath: candidate.path,
			});
		}
		files.set(candidate.fileName, candidate);
	}

	return { files, collisions };
}

/**
 * Set of discovered paths, in mapping order.
 *
 * @pure true
 */
export function discoveredPaths(
	discovery: DiscoveryResult,
): ReadonlySet<string> {
	return new Set([...discovery.files.values()].map((file) => file.path));
}
