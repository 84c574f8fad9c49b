// FORMAT THEOREM: ∀text: extractIncludes(text) = { target(l) | l ∈ lines(text), parse(l) ≠ null }
// PURITY: CORE
// INVARIANT: Lines are matched independently; duplicates collapse to first occurrence
// COMPLEXITY: O(n) where n = |text|

/**
 * Grammar of one directive line, after trimming leading/trailing whitespace:
 *
 * ```
 * line   := "#" ws* "include" ws* open target close rest
 * open   := '"' | '<'
 * close  := '"' | '>'
 * target := (any char except '"' and '>')+
 * ws     := " " | "\t"
 * ```
 *
 * `rest` is ignored (trailing comments and the like). A line that starts with
 * "#" but does not match yields nothing.
 */
const DIRECTIVE = "include";

const isBlank = (ch: string | undefined): boolean => ch === " " || ch === "\t";

const isTargetTerminator = (ch: string): boolean => ch === '"' || ch === ">";

/**
 * Parse one line into its raw include target.
 *
 * @returns The target between the delimiters, or null when the line is not
 * an include directive
 *
 * @pure true
 * @complexity O(k) where k = |line|
 */
export function parseIncludeLine(line: string): string | null {
	const trimmed = line.trim();
	if (!trimmed.startsWith("#")) return null;

	let cursor = 1;
	while (isBlank(trimmed[cursor])) cursor += 1;
	if (!trimmed.startsWith(DIRECTIVE, cursor)) return null;
	cursor += DIRECTIVE.length;
	while (isBlank(trimmed[cursor])) cursor += 1;

	const open = trimmed[cursor];
	if (open !== '"' && open !== "<") return null;
	cursor += 1;

	const start = cursor;
	while (cursor < trimmed.length) {
		const ch = trimmed.charAt(cursor);
		if (isTargetTerminator(ch)) {
			return cursor > start ? trimmed.slice(start, cursor) : null;
		}
		cursor += 1;
	}
	return null;
}

/**
 * Extract the distinct raw include targets of a file's text.
 *
 * Both `#include "x.h"` and `#include <x.h>` are recognized; a directive must
 * begin its line once leading whitespace is removed.
 *
 * @pure true
 * @postcondition result preserves the order of first occurrence
 * @complexity O(n)
 *
 * @example
 * ```ts
 * extractIncludes('#include "a.h"\n  #include <sys/types.h>\n#include "a.h"');
 * // Set { "a.h", "sys/types.h" }
 * ```
 */
export function extractIncludes(text: string): ReadonlySet<string> {
	const targets = new Set<string>();
	for (const line of text.split("\n")) {
		const target = parseIncludeLine(line);
		if (target !== null) {
			targets.add(target);
		}
	}
	return targets;
}
