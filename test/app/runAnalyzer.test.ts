import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";
import { afterEach, describe, expect, it, vi } from "vitest";

import { runAnalyzer } from "../../src/app/runAnalyzer.js";
import type { CLIOptions } from "../../src/core/types/index.js";
import { main } from "../../src/main.js";
import { createTempProject, type TempProject } from "../utils/tempProject.js";

const optionsFor = (
	projectRoot: string,
	over: Partial<CLIOptions> = {},
): CLIOptions => ({
	projectRoot,
	checkCycles: false,
	buildOrder: false,
	orderDirection: "includers-first",
	verbose: false,
	help: false,
	...over,
});

const captureConsole = () => {
	const log = vi.spyOn(console, "log").mockImplementation(() => {});
	const error = vi.spyOn(console, "error").mockImplementation(() => {});
	vi.spyOn(console, "warn").mockImplementation(() => {});
	return {
		logLines: () => log.mock.calls.map((call) => String(call[0])),
		errorLines: () => error.mock.calls.map((call) => String(call[0])),
	};
};

describe("runAnalyzer", () => {
	let project: TempProject | undefined;

	afterEach(() => {
		project?.cleanup();
		project = undefined;
	});

	it("reports statistics, cycles, build order and the DOT export", async () => {
		project = createTempProject({ "a.c": '#include "b.h"\n', "b.h": "" });
		const dotPath = path.join(project.cwd, "deps.dot");
		const output = captureConsole();

		const code = await Effect.runPromise(
			runAnalyzer(
				optionsFor(project.cwd, { checkCycles: true, buildOrder: true, dotPath }),
			),
		);

		expect(code).toBe(0);
		expect(output.logLines()).toEqual([
			"Include Dependency Analysis",
			"========================================",
			"Source files: 1",
			"Header files: 1",
			"Dependencies: 1",
			"Most dependencies: a.c (1 deps)",
			"Most dependents: b.h (1 dependents)",
			"",
			"Checking for circular dependencies...",
			"No circular dependencies found.",
			"",
			"Build order:",
			"  1. a.c",
			"  2. b.h",
			"",
			`DOT graph saved to ${dotPath}`,
			`Generate image with: dot -Tpng ${dotPath} -o ${path.join(project.cwd, "deps.png")}`,
		]);
		expect(fs.readFileSync(dotPath, "utf8")).toBe(
			[
				"digraph dependencies {",
				"  rankdir=TB;",
				"  node [shape=box];",
				'  "a.c" [label="a.c" fillcolor="lightgreen" style=filled];',
				'  "b.h" [label="b.h" fillcolor="lightblue" style=filled];',
				'  "a.c" -> "b.h";',
				"}",
				"",
			].join("\n"),
		);
	});

	it("reports a circular include between two headers", async () => {
		project = createTempProject({
			"a.h": '#include "b.h"\n',
			"b.h": '#include "a.h"\n',
		});
		const output = captureConsole();

		const code = await Effect.runPromise(
			runAnalyzer(optionsFor(project.cwd, { checkCycles: true })),
		);

		expect(code).toBe(0);
		expect(output.logLines().at(-1)).toBe(
			"Circular dependency found: a.h -> b.h -> a.h",
		);
	});

	it("orders dependencies first when asked", async () => {
		project = createTempProject({ "a.c": '#include "b.h"\n', "b.h": "" });
		const output = captureConsole();

		await Effect.runPromise(
			runAnalyzer(
				optionsFor(project.cwd, {
					buildOrder: true,
					orderDirection: "dependencies-first",
				}),
			),
		);

		expect(output.logLines().slice(-3)).toEqual([
			"Build order (dependencies first):",
			"  1. b.h",
			"  2. a.c",
		]);
	});

	it("prints resolution details and collisions in verbose mode", async () => {
		project = createTempProject({
			"include-deps.config.json": JSON.stringify({ sourceRoots: ["fs", "lib"] }),
			"fs/util.h": "",
			"lib/util.h": "",
			"lib/main.c": '#include "util.h"\n#include <sys/types.h>\n',
		});
		const output = captureConsole();

		const code = await Effect.runPromise(
			runAnalyzer(optionsFor(project.cwd, { verbose: true })),
		);

		expect(code).toBe(0);
		expect(output.logLines().slice(2)).toEqual([
			"Source files: 1",
			"Header files: 1",
			"Dependencies: 1",
			"Most dependencies: lib/main.c (1 deps)",
			"Most dependents: lib/util.h (1 dependents)",
			"",
			"Include resolution:",
			"  Files scanned: 2",
			"  Unreadable files: 0",
			"  Resolved includes: 1",
			"  Self includes: 0",
			"  Outside discovery: 0",
			"  System headers: 1",
			"  Unresolved: 0",
			"",
			"Filename collisions (later path wins):",
			"  util.h: fs/util.h -> lib/util.h",
		]);
	});

	it("classifies targets the filesystem refuses to stat as unresolved", async () => {
		project = createTempProject({
			include: "",
			"main.c": `#include "${"x".repeat(300)}.h"\n#include "x/y.h"\n`,
		});
		const output = captureConsole();

		const code = await Effect.runPromise(
			runAnalyzer(optionsFor(project.cwd, { verbose: true })),
		);

		expect(code).toBe(0);
		expect(output.logLines()).toContain("  Unresolved: 2");
		expect(output.errorLines()).toEqual([]);
	});

	it("prints none for the rankings of an edgeless graph", async () => {
		project = createTempProject({ "start.S": "" });
		const output = captureConsole();

		await Effect.runPromise(runAnalyzer(optionsFor(project.cwd)));

		expect(output.logLines().slice(-2)).toEqual([
			"Most dependencies: none",
			"Most dependents: none",
		]);
	});

	it("fails when nothing is discovered", async () => {
		project = createTempProject({ "README.md": "" });
		const output = captureConsole();

		const code = await Effect.runPromise(runAnalyzer(optionsFor(project.cwd)));

		expect(code).toBe(1);
		expect(output.logLines()).toEqual([]);
		expect(output.errorLines()).toHaveLength(1);
		expect(output.errorLines()[0]).toMatch(
			/^❌ No source files found under .+ \(roots: \., boot, /,
		);
	});

	it("fails on an invalid configuration file", async () => {
		project = createTempProject({
			"include-deps.config.json": '{"sourceRoots": "kernel"}',
			"main.c": "",
		});
		const output = captureConsole();

		const code = await Effect.runPromise(runAnalyzer(optionsFor(project.cwd)));

		expect(code).toBe(1);
		expect(output.errorLines()).toEqual([
			`❌ Invalid configuration ${path.join(project.cwd, "include-deps.config.json")}: "sourceRoots" must be an array of strings`,
		]);
	});

	it("keeps a zero exit code when the DOT file cannot be written", async () => {
		project = createTempProject({ "main.c": "" });
		const dotPath = path.join(project.cwd, "missing", "deps.dot");
		const output = captureConsole();

		const code = await Effect.runPromise(
			runAnalyzer(optionsFor(project.cwd, { dotPath })),
		);

		expect(code).toBe(0);
		expect(output.errorLines()).toHaveLength(1);
		expect(output.errorLines()[0]).toContain(
			`❌ Failed to write DOT graph to ${dotPath}: `,
		);
	});
});

describe("main", () => {
	it("prints the usage for --help", async () => {
		const output = captureConsole();
		expect(await main(["--help"])).toBe(0);
		expect(output.logLines()[0]?.split("\n")[0]).toBe(
			"Usage: include-deps [projectRoot] [options]",
		);
	});

	it("rejects unknown options with exit code 1", async () => {
		const output = captureConsole();
		expect(await main(["--graph"])).toBe(1);
		expect(output.errorLines()[0]).toBe(
			"❌ Invalid arguments: unknown option --graph",
		);
	});
});
