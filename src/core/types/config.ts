// PURITY: CORE
// INVARIANT: Configuration values are immutable once parsed
// COMPLEXITY: O(1) - type declarations only

/**
 * Direction in which the build order is read off the graph.
 *
 * - `includers-first`: edges as stored (X includes Y ⇒ X before Y)
 * - `dependencies-first`: edges of the reverse index (Y before X)
 */
export type OrderDirection = "includers-first" | "dependencies-first";

/**
 * Command-line options.
 *
 * @property projectRoot Directory every source root is relative to
 * @property checkCycles Run cycle detection
 * @property buildOrder Print the topological order
 * @property orderDirection Direction used by the build order
 * @property dotPath Destination of the DOT export, when requested
 * @property configPath Explicit configuration file, when given
 * @property verbose Print resolution tallies and filename collisions
 * @property help Print usage and stop
 */
export interface CLIOptions {
	readonly projectRoot: string;
	readonly checkCycles: boolean;
	readonly buildOrder: boolean;
	readonly orderDirection: OrderDirection;
	readonly dotPath?: string;
	readonly configPath?: string;
	readonly verbose: boolean;
	readonly help: boolean;
}

/**
 * Analyzer configuration (defaults merged with include-deps.config.json).
 *
 * All paths are relative to the project root and use "/" separators.
 */
export interface AnalyzerConfig {
	readonly sourceRoots: readonly string[];
	readonly includeDirectories: readonly string[];
	readonly excludedDirectories: readonly string[];
	readonly systemIncludePrefixes: readonly string[];
	readonly applicationDirectories: readonly string[];
	readonly applicationExcludedFiles: readonly string[];
	readonly guestPayloadDirectories: readonly string[];
	readonly guestPayloadAllowedFiles: readonly string[];
	readonly guestPayloadAllowedSubdirectories: readonly string[];
}

export type AnalyzerConfigKey = keyof AnalyzerConfig;
