// PURITY: SHELL
// EFFECT: Effect<AnalyzerConfig, InvalidConfig>
// INVARIANT: A missing default file yields DEFAULT_CONFIG; a missing explicit file fails
// COMPLEXITY: O(n) where n = |config file|

import { Effect, Either } from "effect";

import {
	DEFAULT_CONFIG,
	DEFAULT_CONFIG_FILE,
	mergeConfig,
} from "../../core/config/defaults.js";
import {
	type JSONValue,
	parseConfigOverrides,
} from "../../core/config/validate.js";
import { InvalidConfig } from "../../core/errors.js";
import type { AnalyzerConfig } from "../../core/types/index.js";
import { getErrorMessage } from "../utils/error-message.js";
import { fs, path } from "../utils/node-mods.js";

/**
 * Read and validate a configuration file.
 *
 * @pure false (reads the filesystem)
 * @effect Effect<AnalyzerConfig, InvalidConfig>
 */
function readConfigFile(
	configPath: string,
): Effect.Effect<AnalyzerConfig, InvalidConfig> {
	return Effect.gen(function* () {
		const raw = yield* Effect.try({
			try: () => fs.readFileSync(configPath, "utf8"),
			catch: (error) =>
				new InvalidConfig({ path: configPath, detail: getErrorMessage(error) }),
		});
		const parsed = yield* Effect.try({
			try: () => JSON.parse(raw) as JSONValue,
			catch: (error) =>
				new InvalidConfig({ path: configPath, detail: getErrorMessage(error) }),
		});
		const overrides = parseConfigOverrides(parsed);
		if (Either.isLeft(overrides)) {
			return yield* Effect.fail(
				new InvalidConfig({ path: configPath, detail: overrides.left }),
			);
		}
		return mergeConfig(DEFAULT_CONFIG, overrides.right);
	});
}

/**
 * Load the analyzer configuration for a project.
 *
 * Without `explicitPath` the file `include-deps.config.json` in the project
 * root is used when present; otherwise the defaults apply. An explicit path is
 * resolved against the current directory and must exist.
 *
 * @pure false (reads the filesystem)
 * @effect Effect<AnalyzerConfig, InvalidConfig>
 */
export function loadAnalyzerConfig(
	projectRoot: string,
	explicitPath?: string,
): Effect.Effect<AnalyzerConfig, InvalidConfig> {
	if (explicitPath !== undefined) {
		return readConfigFile(path.resolve(process.cwd(), explicitPath));
	}
	const defaultPath = path.resolve(projectRoot, DEFAULT_CONFIG_FILE);
	return fs.existsSync(defaultPath)
		? readConfigFile(defaultPath)
		: Effect.succeed(DEFAULT_CONFIG);
}
