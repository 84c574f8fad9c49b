// FORMAT THEOREM: ∀file: eligible(file) ⇒ kind(file) ≠ null
// PURITY: CORE
// INVARIANT: Decisions depend only on path segments and configuration
// COMPLEXITY: O(d + k) per decision where d = path depth, k = list sizes

import { match } from "ts-pattern";

import type {
	AnalyzerConfig,
	DirectoryCategory,
	SourceKind,
} from "../types/index.js";

const KIND_BY_EXTENSION: ReadonlyArray<readonly [string, SourceKind]> = [
	[".h", "header"],
	[".c", "source"],
	[".S", "assembly"],
];

/**
 * Normalize a relative path into POSIX segments.
 *
 * @pure true
 * @invariant Returns [] for "" and "."; no segment is empty or "."
 * @complexity O(k) where k = |path|
 */
export function normalizeSegments(relativePath: string): readonly string[] {
	return relativePath
		.replace(/\\/g, "/")
		.split("/")
		.map((segment) => segment.trim())
		.filter((segment) => segment.length > 0 && segment !== ".");
}

/**
 * Join a relative base and an entry name with "/".
 *
 * @pure true
 * @invariant Never starts or ends with "/"
 */
export function joinRelative(base: string, name: string): string {
	if (base.length === 0) return name;
	return `${base}/${name}`;
}

/**
 * Kind of a file from its extension; null when the file is not analyzed.
 *
 * The match is case-sensitive: `.S` is preprocessed assembly, `.s` is not.
 *
 * @pure true
 */
export function sourceKindOf(fileName: string): SourceKind | null {
	for (const [extension, kind] of KIND_BY_EXTENSION) {
		if (fileName.length > extension.length && fileName.endsWith(extension)) {
			return kind;
		}
	}
	return null;
}

/**
 * Category of a directory from its project-relative segments.
 *
 * @pure true
 * @invariant guest-payload takes precedence over application
 */
export function directoryCategoryOf(
	segments: readonly string[],
	config: AnalyzerConfig,
): DirectoryCategory {
	if (segments.some((s) => config.guestPayloadDirectories.includes(s))) {
		return "guest-payload";
	}
	if (segments.some((s) => config.applicationDirectories.includes(s))) {
		return "application";
	}
	return "ordinary";
}

function isAllowedGuestSubpath(
	subpath: string,
	allowed: readonly string[],
): boolean {
	return allowed
		.map((entry) => normalizeSegments(entry).join("/"))
		.some(
			(entry) =>
				entry.length > 0 &&
				(entry === subpath ||
					entry.startsWith(`${subpath}/`) ||
					subpath.startsWith(`${entry}/`)),
		);
}

/**
 * Decide whether the walker may enter a directory.
 *
 * A directory is pruned when any of its segments is excluded, or when it sits below a
 * guest-payload directory and is neither an allow-listed sub-path, an ancestor
 * of one, nor inside one.
 *
 * @param segments - Project-relative segments of the directory itself
 * @pure true
 * @complexity O(d + k)
 */
export function shouldDescend(
	segments: readonly string[],
	config: AnalyzerConfig,
): boolean {
	if (segments.some((s) => config.excludedDirectories.includes(s))) {
		return false;
	}

	const guestIndex = segments.findIndex((s) =>
		config.guestPayloadDirectories.includes(s),
	);
	if (guestIndex === -1 || guestIndex === segments.length - 1) return true;

	const subpath = segments.slice(guestIndex + 1).join("/");
	return isAllowedGuestSubpath(
		subpath,
		config.guestPayloadAllowedSubdirectories,
	);
}

/**
 * Decide whether a file in a directory of the given category is discovered.
 *
 * @pure true
 * @postcondition result ⇒ sourceKindOf(fileName) ≠ null
 */
export function isEligibleFile(
	fileName: string,
	category: DirectoryCategory,
	config: AnalyzerConfig,
): boolean {
	if (sourceKindOf(fileName) === null) return false;
	return match(category)
		.with("guest-payload", () =>
			config.guestPayloadAllowedFiles.includes(fileName),
		)
		.with(
			"application",
			() => !config.applicationExcludedFiles.includes(fileName),
		)
		.with("ordinary", () => true)
		.exhaustive();
}
