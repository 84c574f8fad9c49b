import { Effect, Either } from "effect";
import { afterEach, describe, expect, it, vi } from "vitest";

import { discoveryOf } from "../../utils/builders.js";
import {
	readIncludes,
	scanDiscoveredFiles,
} from "../../../src/shell/includes/reader.js";
import { createTempProject, type TempProject } from "../../utils/tempProject.js";

describe("readIncludes", () => {
	let project: TempProject | undefined;

	afterEach(() => {
		project?.cleanup();
		project = undefined;
	});

	it("extracts the targets of a readable file", () => {
		project = createTempProject({
			"mem/vm.c": '#include "vm.h"\n#include <sys/types.h>\n',
		});
		const result = Effect.runSync(
			Effect.either(readIncludes(project.cwd, "mem/vm.c")),
		);
		expect(Either.isRight(result) && [...result.right]).toEqual([
			"vm.h",
			"sys/types.h",
		]);
	});

	it("fails for a missing file", () => {
		project = createTempProject({});
		const result = Effect.runSync(
			Effect.either(readIncludes(project.cwd, "gone.c")),
		);
		expect(Either.isLeft(result) && result.left._tag).toBe("UnreadableFile");
		expect(Either.isLeft(result) && result.left.path).toBe("gone.c");
	});

	it("fails on binary content", () => {
		project = createTempProject({
			"blob.c": new Uint8Array([0x23, 0x69, 0x00, 0x01]),
		});
		const result = Effect.runSync(
			Effect.either(readIncludes(project.cwd, "blob.c")),
		);
		expect(Either.isLeft(result) && result.left.detail).toBe("binary content");
	});

	it("reads past bytes that are not valid UTF-8", () => {
		const encoder = new TextEncoder();
		project = createTempProject({
			"a.c": Uint8Array.from([
				...encoder.encode("/* (c) "),
				0xa9,
				...encoder.encode(' 2020 */\n#include "b.h"\n'),
			]),
		});
		const result = Effect.runSync(Effect.either(readIncludes(project.cwd, "a.c")));
		expect(Either.isRight(result) && [...result.right]).toEqual(["b.h"]);
	});
});

describe("scanDiscoveredFiles", () => {
	let project: TempProject | undefined;

	afterEach(() => {
		project?.cleanup();
		project = undefined;
	});

	it("scans in discovery order and recovers from unreadable files", () => {
		project = createTempProject({
			"a.c": '#include "b.h"\n',
			"bad.h": new Uint8Array([0xff, 0xfe, 0x00, 0x23]),
			"b.h": "",
		});
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

		const scans = Effect.runSync(
			scanDiscoveredFiles(project.cwd, discoveryOf("a.c", "bad.h", "b.h")),
		);

		expect(
			scans.map((scan) => [
				scan.file.path,
				scan.includes === null ? null : [...scan.includes],
			]),
		).toEqual([
			["a.c", ["b.h"]],
			["bad.h", null],
			["b.h", []],
		]);
		expect(warn).toHaveBeenCalledTimes(1);
		expect(warn).toHaveBeenCalledWith(
			"⚠️  Could not parse bad.h: binary content",
		);
	});
});
