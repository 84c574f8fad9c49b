// PURITY: CORE
// INVARIANT: All paths are project-relative with "/" separators
// COMPLEXITY: O(1) - type declarations only

/**
 * Kind of a source file, derived from its extension.
 *
 * `.h` → header, `.c` → source, `.S` → assembly (case-sensitive).
 */
export type SourceKind = "header" | "source" | "assembly";

/**
 * Category of the directory holding a file; decides discovery eligibility only.
 */
export type DirectoryCategory = "ordinary" | "application" | "guest-payload";

/**
 * A discovered file.
 *
 * @property path Relative path, the identity of the file
 * @property fileName Bare filename (discovery key)
 * @property kind Kind derived from the extension
 * @property category Category of the containing directory
 */
export interface SourceFile {
	readonly path: string;
	readonly fileName: string;
	readonly kind: SourceKind;
	readonly category: DirectoryCategory;
}

/**
 * Two directories held a file with the same bare filename; the later one won.
 */
export interface FilenameCollision {
	readonly fileName: string;
	readonly replacedPath: string;
	readonly keptPath: string;
}

/**
 * Output of file discovery.
 *
 * @property files Bare filename → discovered file (last writer wins)
 * @property collisions Overwrites observed while filling `files`
 */
export interface DiscoveryResult {
	readonly files: ReadonlyMap<string, SourceFile>;
	readonly collisions: readonly FilenameCollision[];
}

/**
 * Classification of one raw include target.
 *
 * Only `resolved` produces a graph edge.
 */
export type ResolveOutcome =
	| {
			readonly kind: "resolved";
			readonly path: string;
			readonly via: "discovery" | "search-path";
	  }
	| { readonly kind: "undiscovered"; readonly path: string }
	| { readonly kind: "system" }
	| { readonly kind: "unresolved" };

/**
 * Counters collected while building the graph.
 */
export interface ResolutionTally {
	readonly scannedFiles: number;
	readonly unreadableFiles: number;
	readonly resolved: number;
	readonly selfIncludes: number;
	readonly undiscovered: number;
	readonly system: number;
	readonly unresolved: number;
}

/**
 * Closed path of edges; first element equals the last.
 */
export type Cycle = readonly string[];

/**
 * Node with its edge count, used by the statistics report.
 */
export interface RankedNode {
	readonly path: string;
	readonly count: number;
}

/**
 * Aggregate statistics of one analysis.
 *
 * @property mostDependencies Node with the most outgoing edges (null without edges)
 * @property mostDependents Node with the most incoming edges (null without edges)
 */
export interface GraphStatistics {
	readonly sourceFiles: number;
	readonly headerFiles: number;
	readonly edges: number;
	readonly mostDependencies: RankedNode | null;
	readonly mostDependents: RankedNode | null;
}
