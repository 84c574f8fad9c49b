// PURITY: SHELL
// INVARIANT: Any stat failure reads as an absent entry
// COMPLEXITY: O(1) syscalls

import type { Stats } from "node:fs";

import { Either } from "effect";

import { fs } from "./node-mods.js";

/**
 * Stat a path, following symlinks.
 *
 * @returns `undefined` on any stat error, not only ENOENT
 * @pure false
 */
export function statPath(absolutePath: string): Stats | undefined {
	return Either.getOrUndefined(Either.try(() => fs.statSync(absolutePath)));
}

/**
 * @pure false
 */
export function isRegularFile(absolutePath: string): boolean {
	return statPath(absolutePath)?.isFile() === true;
}

/**
 * @pure false
 */
export function isDirectory(absolutePath: string): boolean {
	return statPath(absolutePath)?.isDirectory() === true;
}
