// PURITY: SHELL
// EFFECT: Effect<void, ExportWriteFailure>
// INVARIANT: The target file is replaced as a whole
// COMPLEXITY: O(n) where n = |text|

import { Effect } from "effect";

import { ExportWriteFailure } from "../../core/errors.js";
import { getErrorMessage } from "../utils/error-message.js";
import { fs } from "../utils/node-mods.js";

/**
 * Write a rendered DOT document.
 *
 * @effect Effect<void, ExportWriteFailure>
 */
export function writeDotFile(
	dotPath: string,
	text: string,
): Effect.Effect<void, ExportWriteFailure> {
	return Effect.try({
		try: () => {
			fs.writeFileSync(dotPath, text, { encoding: "utf8" });
		},
		catch: (error) =>
			new ExportWriteFailure({ path: dotPath, detail: getErrorMessage(error) }),
	});
}
