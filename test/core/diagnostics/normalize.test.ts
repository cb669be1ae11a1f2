import { describe, expect, it } from "vitest";

import { toDiagnostic, toPosition } from "../../../src/core/diagnostics/index.js";

describe("toPosition", () => {
	it("shifts a 1-based location to 0-based", () => {
		expect(toPosition(5, 3)).toEqual({ line: 4, column: 2 });
	});

	it("places a finding without column at column 0", () => {
		expect(toPosition(2, undefined)).toEqual({ line: 1, column: 0 });
	});

	it("never goes below zero", () => {
		expect(toPosition(0, 0)).toEqual({ line: 0, column: 0 });
	});
});

describe("toDiagnostic", () => {
	it("keeps the message verbatim and marks it as an error", () => {
		expect(toDiagnostic({ message: "S2- Illegal: _x", line: 1, column: 1 })).toEqual({
			message: "S2- Illegal: _x",
			severity: "error",
			position: { line: 0, column: 0 },
		});
	});

	it("omits position when the finding has no line", () => {
		const diagnostic = toDiagnostic({ message: "syntax failed: boom" });
		expect(diagnostic).toEqual({ message: "syntax failed: boom", severity: "error" });
		expect("position" in diagnostic).toBe(false);
	});
});
