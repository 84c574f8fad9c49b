// PURITY: SHELL (reads process.argv by default)
// INVARIANT: Every flag is either boolean or consumes exactly one following value
// COMPLEXITY: O(n) where n = |args|

import { Either } from "effect";

import { InvalidArguments } from "../../core/errors.js";
import type { CLIOptions } from "../../core/types/index.js";

type MutableOptions = { -readonly [K in keyof CLIOptions]: CLIOptions[K] };

type BooleanFlagHandler = (current: MutableOptions) => MutableOptions;

type ValueFlagHandler = (
	current: MutableOptions,
	value: string,
) => MutableOptions;

const booleanHandlers: ReadonlyMap<string, BooleanFlagHandler> = new Map<
	string,
	BooleanFlagHandler
>([
	["--check-cycles", (current) => ({ ...current, checkCycles: true })],
	["--build-order", (current) => ({ ...current, buildOrder: true })],
	[
		"--dependencies-first",
		(current) => ({ ...current, orderDirection: "dependencies-first" }),
	],
	["--verbose", (current) => ({ ...current, verbose: true })],
	["--help", (current) => ({ ...current, help: true })],
	["-h", (current) => ({ ...current, help: true })],
]);

const valueHandlers: ReadonlyMap<string, ValueFlagHandler> = new Map<
	string,
	ValueFlagHandler
>([
	["--dot", (current, value) => ({ ...current, dotPath: value })],
	["--config", (current, value) => ({ ...current, configPath: value })],
]);

export const USAGE: readonly string[] = [
	"Usage: include-deps [projectRoot] [options]",
	"",
	"Options:",
	"  --check-cycles         Report the first circular include path",
	"  --build-order          Print a topological order of the files",
	"  --dependencies-first   Order included files before their includers",
	"  --dot <path>           Write the graph in DOT format to <path>",
	"  --config <path>        Read configuration from <path>",
	"  --verbose              Print include resolution details",
	"  -h, --help             Show this message",
];

/**
 * Parse command-line arguments.
 *
 * @param args - Arguments after the node executable and script
 * @returns Right(options) or Left(InvalidArguments) for an unknown flag, a
 * flag missing its value, or a second positional argument
 *
 * @example
 * ```ts
 * // Command: include-deps kernel --check-cycles --dot deps.dot
 * parseCLIArgs(["kernel", "--check-cycles", "--dot", "deps.dot"]);
 * // Right({ projectRoot: "kernel", checkCycles: true, dotPath: "deps.dot", ... })
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): Either.Either<CLIOptions, InvalidArguments> {
	let state: MutableOptions = {
		projectRoot: ".",
		checkCycles: false,
		buildOrder: false,
		orderDirection: "includers-first",
		verbose: false,
		help: false,
	};
	let positionalSeen = false;

	for (let i = 0; i < args.length; i++) {
		const arg: string = args.at(i) ?? "";
		if (arg.length === 0) continue;

		const booleanHandler = booleanHandlers.get(arg);
		if (booleanHandler !== undefined) {
			state = booleanHandler(state);
			continue;
		}

		const valueHandler = valueHandlers.get(arg);
		if (valueHandler !== undefined) {
			const value = args.at(i + 1);
			if (value === undefined || value.length === 0 || value.startsWith("-")) {
				return Either.left(
					new InvalidArguments({ detail: `${arg} requires a value` }),
				);
			}
			state = valueHandler(state, value);
			i++;
			continue;
		}

		if (arg.startsWith("-")) {
			return Either.left(
				new InvalidArguments({ detail: `unknown option ${arg}` }),
			);
		}
		if (positionalSeen) {
			return Either.left(
				new InvalidArguments({ detail: `unexpected argument ${arg}` }),
			);
		}
		state = { ...state, projectRoot: arg };
		positionalSeen = true;
	}

	return Either.right(state);
}
