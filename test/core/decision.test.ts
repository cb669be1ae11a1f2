import { describe, expect, it } from "vitest";

import { computeExitCode } from "../../src/core/decision.js";
import { makeLintResult } from "../../src/core/models.js";
import { diag } from "../utils/builders.js";

describe("computeExitCode", () => {
	it("returns 0 for a clean result", () => {
		expect(computeExitCode(makeLintResult([]))).toBe(0);
	});

	it("returns 1 when any diagnostic remains", () => {
		expect(computeExitCode(makeLintResult([diag("x", 0)]))).toBe(1);
	});
});

describe("makeLintResult", () => {
	it("derives success from the error count", () => {
		expect(makeLintResult([]).success).toBe(true);
		expect(makeLintResult([diag("x")]).success).toBe(false);
	});
});
