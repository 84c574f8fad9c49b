import { Either } from "effect";
import { describe, expect, it } from "vitest";

import { parseCLIArgs, USAGE } from "../../../src/shell/config/cli.js";

const parse = (args: readonly string[]) =>
	Either.match(parseCLIArgs(args), {
		onLeft: (error) => ({ error: error.detail }),
		onRight: (options) => ({ options }),
	});

describe("parseCLIArgs", () => {
	it("applies defaults for an empty command line", () => {
		expect(parse([])).toEqual({
			options: {
				projectRoot: ".",
				checkCycles: false,
				buildOrder: false,
				orderDirection: "includers-first",
				verbose: false,
				help: false,
			},
		});
	});

	it("reads the project root and every flag", () => {
		expect(
			parse([
				"kernel",
				"--check-cycles",
				"--build-order",
				"--dependencies-first",
				"--dot",
				"deps.dot",
				"--config",
				"deps.json",
				"--verbose",
			]),
		).toEqual({
			options: {
				projectRoot: "kernel",
				checkCycles: true,
				buildOrder: true,
				orderDirection: "dependencies-first",
				dotPath: "deps.dot",
				configPath: "deps.json",
				verbose: true,
				help: false,
			},
		});
	});

	it("accepts both help spellings", () => {
		expect(parse(["-h"])).toMatchObject({ options: { help: true } });
		expect(parse(["--help"])).toMatchObject({ options: { help: true } });
	});

	it("skips empty arguments", () => {
		expect(parse(["", "src"])).toMatchObject({ options: { projectRoot: "src" } });
	});

	it("rejects a value flag at the end of the line", () => {
		expect(parse(["--dot"])).toEqual({ error: "--dot requires a value" });
	});

	it("rejects an option in place of a value", () => {
		expect(parse(["--dot", "--check-cycles"])).toEqual({
			error: "--dot requires a value",
		});
	});

	it("rejects unknown options", () => {
		expect(parse(["--graph"])).toEqual({ error: "unknown option --graph" });
	});

	it("rejects a second positional argument", () => {
		expect(parse(["kernel", "drivers"])).toEqual({
			error: "unexpected argument drivers",
		});
	});
});

describe("USAGE", () => {
	it("documents every option", () => {
		const text = USAGE.join("\n");
		for (const flag of [
			"--check-cycles",
			"--build-order",
			"--dependencies-first",
			"--dot <path>",
			"--config <path>",
			"--verbose",
			"-h, --help",
		]) {
			expect(text).toContain(flag);
		}
	});
});
