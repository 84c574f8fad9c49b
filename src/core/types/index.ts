export type {
	AnalyzerConfig,
	AnalyzerConfigKey,
	CLIOptions,
	OrderDirection,
} from "./config.js";
export type {
	Cycle,
	DirectoryCategory,
	DiscoveryResult,
	FilenameCollision,
	GraphStatistics,
	RankedNode,
	ResolutionTally,
	ResolveOutcome,
	SourceFile,
	SourceKind,
} from "./graph.js";
