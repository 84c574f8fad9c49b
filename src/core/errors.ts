// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * A file could not be read while extracting its includes.
 *
 * Recovered locally: the file counts as having zero includes.
 *
 * @pure true (Data class)
 */
export class UnreadableFile extends Data.TaggedError("UnreadableFile")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * A directory could not be listed during discovery.
 *
 * Recovered locally: the subtree contributes no files.
 *
 * @pure true (Data class)
 */
export class UnreadableDirectory extends Data.TaggedError(
	"UnreadableDirectory",
)<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Discovery produced no file under any configured root.
 *
 * @pure true (Data class)
 * @invariant roots.length ≥ 0
 */
export class EmptyDiscovery extends Data.TaggedError("EmptyDiscovery")<{
	readonly projectRoot: string;
	readonly roots: readonly string[];
}> {}

/**
 * The DOT file could not be created or written.
 *
 * @pure true (Data class)
 */
export class ExportWriteFailure extends Data.TaggedError("ExportWriteFailure")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * The configuration file is missing (when named explicitly), not JSON,
 * or holds a value of the wrong shape.
 *
 * @pure true (Data class)
 */
export class InvalidConfig extends Data.TaggedError("InvalidConfig")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Command-line arguments could not be parsed.
 *
 * @pure true (Data class)
 */
export class InvalidArguments extends Data.TaggedError("InvalidArguments")<{
	readonly detail: string;
}> {}

/**
 * Union of every error the analyzer can produce.
 */
export type AnalyzerError =
	| UnreadableFile
	| UnreadableDirectory
	| EmptyDiscovery
	| ExportWriteFailure
	| InvalidConfig
	| InvalidArguments;
