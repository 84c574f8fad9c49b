// FORMAT THEOREM: parseConfigOverrides(v) = Right(o) ⇒ ∀k ∈ keys(o): o[k] ∈ string[]
// PURITY: CORE
// INVARIANT: Unknown keys are ignored; a known key with a wrong type rejects the document
// COMPLEXITY: O(n) where n = total number of array entries

import { Either } from "effect";

import type { AnalyzerConfig, AnalyzerConfigKey } from "../types/index.js";

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

/**
 * Type guard to check if value is a JSON object.
 */
function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isArray(value: JSONValue): value is ReadonlyArray<JSONValue> {
	return Array.isArray(value);
}

function isString(value: JSONValue): value is string {
	return typeof value === "string";
}

const CONFIG_KEYS: readonly AnalyzerConfigKey[] = [
	"sourceRoots",
	"includeDirectories",
	"excludedDirectories",
	"systemIncludePrefixes",
	"applicationDirectories",
	"applicationExcludedFiles",
	"guestPayloadDirectories",
	"guestPayloadAllowedFiles",
	"guestPayloadAllowedSubdirectories",
];

/**
 * Validate one key as an array of strings.
 *
 * @returns Right(undefined) when the key is absent
 */
function readStringArray(
	document: JSONObject,
	key: AnalyzerConfigKey,
): Either.Either<readonly string[] | undefined, string> {
	if (!(key in document)) return Either.right(undefined);
	const value = document[key];
	if (value === undefined) return Either.right(undefined);
	if (!isArray(value)) {
		return Either.left(`"${key}" must be an array of strings`);
	}
	const strings = value.filter(isString);
	if (strings.length !== value.length) {
		return Either.left(`"${key}" must contain only strings`);
	}
	return Either.right(strings);
}

/**
 * Turn a parsed JSON document into configuration overrides.
 *
 * @pure true
 * @returns Right(overrides) or Left(reason)
 *
 * @example
 * ```ts
 * parseConfigOverrides({ sourceRoots: ["kernel"] });
 * // Either.right({ sourceRoots: ["kernel"] })
 * parseConfigOverrides({ sourceRoots: "kernel" });
 * // Either.left('"sourceRoots" must be an array of strings')
 * ```
 */
export function parseConfigOverrides(
	document: JSONValue,
): Either.Either<Partial<AnalyzerConfig>, string> {
	if (!isJSONObject(document)) {
		return Either.left("configuration must be a JSON object");
	}

	const overrides: { -readonly [K in AnalyzerConfigKey]?: readonly string[] } =
		{};
	for (const key of CONFIG_KEYS) {
		const result = readStringArray(document, key);
		if (Either.isLeft(result)) {
			return Either.left(result.left);
		}
		if (result.right !== undefined) {
			overrides[key] = result.right;
		}
	}
	return Either.right(overrides);
}
