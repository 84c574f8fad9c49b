import { describe, expect, it } from "vitest";

import { computeExitCode } from "../../src/core/decision.js";

describe("computeExitCode", () => {
	it("succeeds when files were discovered", () => {
		expect(computeExitCode({ discoveredFiles: 3, hasFatalError: false })).toBe(0);
	});

	it("fails when nothing was discovered", () => {
		expect(computeExitCode({ discoveredFiles: 0, hasFatalError: false })).toBe(1);
	});

	it("fails on a fatal error", () => {
		expect(computeExitCode({ discoveredFiles: 3, hasFatalError: true })).toBe(1);
	});
});
