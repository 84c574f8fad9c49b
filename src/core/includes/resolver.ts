// FORMAT THEOREM: resolve(t) = discovery(t) ⊕ searchPath(t) ⊕ system(t) ⊕ unresolved
// PURITY: CORE (filesystem access is an injected predicate)
// INVARIANT: Only `resolved` outcomes carry a discovered path
// COMPLEXITY: O(d) per target where d = |includeDirectories|

import { match, P } from "ts-pattern";

import type { ResolveOutcome, SourceFile } from "../types/index.js";

/**
 * Everything the resolver needs to classify a target.
 *
 * @property files Discovery mapping (bare filename → file)
 * @property discovered Paths present in the discovery mapping
 * @property includeDirectories Search directories, tried in order
 * @property systemIncludePrefixes Prefixes of platform headers
 * @property exists Whether a project-relative path names an existing file
 */
export interface ResolveContext {
	readonly files: ReadonlyMap<string, SourceFile>;
	readonly discovered: ReadonlySet<string>;
	readonly includeDirectories: readonly string[];
	readonly systemIncludePrefixes: readonly string[];
	readonly exists: (relativePath: string) => boolean;
}

/**
 * Lexically normalize a "/"-separated relative path ("." and ".." folded).
 *
 * Leading ".." segments that climb above the root are kept.
 *
 * @pure true
 * @complexity O(k)
 */
export function normalizeRelativePath(relativePath: string): string {
	const out: string[] = [];
	for (const segment of relativePath.replace(/\\/g, "/").split("/")) {
		if (segment.length === 0 || segment === ".") continue;
		if (segment === ".." && out.length > 0 && out.at(-1) !== "..") {
			out.pop();
			continue;
		}
		out.push(segment);
	}
	return out.join("/");
}

function searchIncludeDirectories(
	target: string,
	context: ResolveContext,
): string | null {
	for (const directory of context.includeDirectories) {
		const candidate = normalizeRelativePath(`${directory}/${target}`);
		if (context.exists(candidate)) {
			return candidate;
		}
	}
	return null;
}

/**
 * Classify one raw include target.
 *
 * 1. exact bare-filename lookup in the discovery mapping
 * 2. first include directory holding `dir/target`
 * 3. system prefix → ignored on purpose
 * 4. otherwise unresolved
 *
 * A search-path hit outside the discovery mapping is `undiscovered`: the file
 * exists but discovery pruned it, so it never becomes an edge.
 *
 * @pure true (given a pure `exists`)
 * @complexity O(d)
 */
export function resolveInclude(
	target: string,
	context: ResolveContext,
): ResolveOutcome {
	const byName = context.files.get(target);
	if (byName !== undefined) {
		return { kind: "resolved", path: byName.path, via: "discovery" };
	}

	const hit = searchIncludeDirectories(target, context);
	return match(hit)
		.with(P.string, (path): ResolveOutcome =>
			context.discovered.has(path)
				? { kind: "resolved", path, via: "search-path" }
				: { kind: "undiscovered", path },
		)
		.otherwise((): ResolveOutcome =>
			context.systemIncludePrefixes.some((prefix) => target.startsWith(prefix))
				? { kind: "system" }
				: { kind: "unresolved" },
		);
}
