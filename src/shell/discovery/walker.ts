// FORMAT THEOREM: discover(root) = collectDiscovery(walk(r₁) ++ … ++ walk(rₙ))
// PURITY: SHELL
// EFFECT: Effect<DiscoveryResult, never>
// INVARIANT: Pruned directories are never listed; entries visited in sorted order
// COMPLEXITY: O(n) where n = entries under the configured roots

import type { Dirent } from "node:fs";

import { Effect } from "effect";

import {
	directoryCategoryOf,
	isEligibleFile,
	joinRelative,
	normalizeSegments,
	shouldDescend,
	sourceKindOf,
} from "../../core/discovery/classify.js";
import { collectDiscovery } from "../../core/discovery/registry.js";
import { UnreadableDirectory } from "../../core/errors.js";
import type {
	AnalyzerConfig,
	DiscoveryResult,
	SourceFile,
} from "../../core/types/index.js";
import { getErrorMessage } from "../utils/error-message.js";
import { fs, path } from "../utils/node-mods.js";
import { isDirectory, isRegularFile } from "../utils/stat.js";

/**
 * List a directory, sorted by name.
 *
 * @effect Effect<Dirent[], UnreadableDirectory>
 */
function listDirectory(
	absoluteDir: string,
): Effect.Effect<readonly Dirent[], UnreadableDirectory> {
	return Effect.try({
		try: () =>
			fs
				.readdirSync(absoluteDir, { withFileTypes: true })
				.sort((a, b) => a.name.localeCompare(b.name)),
		catch: (error) =>
			new UnreadableDirectory({
				path: absoluteDir,
				detail: getErrorMessage(error),
			}),
	});
}

/**
 * Regular files, and symlinks that resolve to one. Symlinked directories
 * are listed but never descended into.
 */
function isFileEntry(absoluteDir: string, dirent: Dirent): boolean {
	if (dirent.isFile()) {
		return true;
	}
	return (
		dirent.isSymbolicLink() && isRegularFile(path.join(absoluteDir, dirent.name))
	);
}

/**
 * Walk one directory, descending only where `shouldDescend` allows.
 *
 * @param relativeDir - Project-relative path of `absoluteDir` ("" for the root)
 * @effect Effect<SourceFile[], never> (unreadable directories are reported and skipped)
 */
function walkDirectory(
	absoluteDir: string,
	relativeDir: string,
	config: AnalyzerConfig,
): Effect.Effect<readonly SourceFile[]> {
	return Effect.gen(function* () {
		const dirents = yield* listDirectory(absoluteDir);
		const category = directoryCategoryOf(normalizeSegments(relativeDir), config);
		const files: SourceFile[] = [];

		for (const dirent of dirents) {
			const { name } = dirent;
			const relativePath = joinRelative(relativeDir, name);

			if (dirent.isDirectory()) {
				if (!shouldDescend(normalizeSegments(relativePath), config)) {
					continue;
				}
				const nested = yield* walkDirectory(
					path.join(absoluteDir, name),
					relativePath,
					config,
				);
				files.push(...nested);
				continue;
			}

			const kind = sourceKindOf(name);
			if (
				kind !== null &&
				isFileEntry(absoluteDir, dirent) &&
				isEligibleFile(name, category, config)
			) {
				files.push({ path: relativePath, fileName: name, kind, category });
			}
		}

		return files;
	}).pipe(
		Effect.catchTag("UnreadableDirectory", (error) => {
			console.warn(`⚠️  Unable to read directory ${error.path}: ${error.detail}`);
			return Effect.succeed<readonly SourceFile[]>([]);
		}),
	);
}

/**
 * Discover the analyzable files of a project.
 *
 * Each configured source root is walked in order; roots that do not exist
 * or are not directories are skipped. Files are keyed by bare filename, the
 * later root winning on duplicates.
 *
 * @param projectRoot - Directory the source roots are relative to
 * @pure false (reads the filesystem, warns on unreadable directories)
 * @effect Effect<DiscoveryResult, never>
 */
export function discoverSourceFiles(
	projectRoot: string,
	config: AnalyzerConfig,
): Effect.Effect<DiscoveryResult> {
	return Effect.gen(function* () {
		const absoluteRoot = path.resolve(projectRoot);
		const candidates: SourceFile[] = [];

		for (const root of config.sourceRoots) {
			const segments = normalizeSegments(root);
			const relativeRoot = segments.join("/");
			const absoluteDir = path.join(absoluteRoot, ...segments);
			if (!isDirectory(absoluteDir) || !shouldDescend(segments, config)) {
				continue;
			}
			const found = yield* walkDirectory(absoluteDir, relativeRoot, config);
			candidates.push(...found);
		}

		return collectDiscovery(candidates);
	});
}
