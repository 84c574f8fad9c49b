// PURITY: SHELL
// EFFECT: Effect<FileScan[], never>
// INVARIANT: One scan per discovered file, in discovery order
// COMPLEXITY: O(n) where n = total bytes of the discovered files

import { TextDecoder } from "node:util";

import { Effect } from "effect";

import { UnreadableFile } from "../../core/errors.js";
import type { FileScan } from "../../core/graph/builder.js";
import { extractIncludes } from "../../core/includes/extractor.js";
import type { DiscoveryResult, SourceFile } from "../../core/types/index.js";
import { getErrorMessage } from "../utils/error-message.js";
import { fs, path } from "../utils/node-mods.js";

const utf8 = new TextDecoder("utf-8");

/**
 * Decode file bytes as text. Invalid UTF-8 sequences become U+FFFD.
 *
 * @throws Error when the content holds a NUL byte
 */
function decodeText(bytes: Uint8Array): string {
	if (bytes.includes(0)) {
		throw new Error("binary content");
	}
	return utf8.decode(bytes);
}

/**
 * Read the include targets of one file.
 *
 * @effect Effect<ReadonlySet<string>, UnreadableFile>
 */
export function readIncludes(
	projectRoot: string,
	relativePath: string,
): Effect.Effect<ReadonlySet<string>, UnreadableFile> {
	return Effect.try({
		try: () =>
			extractIncludes(
				decodeText(fs.readFileSync(path.join(projectRoot, relativePath))),
			),
		catch: (error) =>
			new UnreadableFile({ path: relativePath, detail: getErrorMessage(error) }),
	});
}

function scanFile(
	projectRoot: string,
	file: SourceFile,
): Effect.Effect<FileScan> {
	return readIncludes(projectRoot, file.path).pipe(
		Effect.map((includes): FileScan => ({ file, includes })),
		Effect.catchTag("UnreadableFile", (error) => {
			console.warn(`⚠️  Could not parse ${error.path}: ${error.detail}`);
			return Effect.succeed<FileScan>({ file, includes: null });
		}),
	);
}

/**
 * Scan every discovered file for include directives.
 *
 * Unreadable files are reported and yield `includes: null`.
 *
 * @pure false (reads the filesystem, warns on unreadable files)
 * @effect Effect<FileScan[], never>
 */
export function scanDiscoveredFiles(
	projectRoot: string,
	discovery: DiscoveryResult,
): Effect.Effect<readonly FileScan[]> {
	return Effect.forEach([...discovery.files.values()], (file) =>
		scanFile(projectRoot, file),
	);
}
