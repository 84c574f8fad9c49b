import { Effect, Either } from "effect";
import { afterEach, describe, expect, it } from "vitest";

import { DEFAULT_CONFIG } from "../../../src/core/config/defaults.js";
import { loadAnalyzerConfig } from "../../../src/shell/config/loader.js";
import { createTempProject, type TempProject } from "../../utils/tempProject.js";

const load = (projectRoot: string, explicitPath?: string) =>
	Effect.runSync(Effect.either(loadAnalyzerConfig(projectRoot, explicitPath)));

describe("loadAnalyzerConfig", () => {
	let project: TempProject | undefined;

	afterEach(() => {
		project?.cleanup();
		project = undefined;
	});

	it("falls back to the defaults without a configuration file", () => {
		project = createTempProject({ "main.c": "" });
		const result = load(project.cwd);
		expect(Either.isRight(result) && result.right).toBe(DEFAULT_CONFIG);
	});

	it("merges the project configuration file over the defaults", () => {
		project = createTempProject({
			"include-deps.config.json": JSON.stringify({
				sourceRoots: ["kernel"],
				excludedDirectories: ["vendor"],
			}),
		});
		const result = load(project.cwd);
		expect(Either.isRight(result) && result.right).toEqual({
			...DEFAULT_CONFIG,
			sourceRoots: ["kernel"],
			excludedDirectories: ["vendor"],
		});
	});

	it("reads an explicit path", () => {
		project = createTempProject({
			"conf/deps.json": JSON.stringify({ includeDirectories: ["inc"] }),
		});
		const result = load(project.cwd, `${project.cwd}/conf/deps.json`);
		expect(Either.isRight(result) && result.right.includeDirectories).toEqual([
			"inc",
		]);
	});

	it("fails when an explicit path is missing", () => {
		project = createTempProject({});
		const missing = `${project.cwd}/absent.json`;
		const result = load(project.cwd, missing);
		expect(Either.isLeft(result) && result.left._tag).toBe("InvalidConfig");
		expect(Either.isLeft(result) && result.left.path).toBe(missing);
	});

	it("fails on malformed JSON", () => {
		project = createTempProject({ "include-deps.config.json": "{ roots: " });
		const result = load(project.cwd);
		expect(Either.isLeft(result) && result.left._tag).toBe("InvalidConfig");
	});

	it("fails on a value of the wrong shape", () => {
		project = createTempProject({
			"include-deps.config.json": JSON.stringify({ sourceRoots: [1, 2] }),
		});
		const result = load(project.cwd);
		expect(Either.isLeft(result) && result.left.detail).toBe(
			'"sourceRoots" must contain only strings',
		);
	});
});
