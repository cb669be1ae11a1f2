import { describe, expect, it } from "vitest";

import {
	containsNullBytes,
	NULL_BYTES_MESSAGE,
	syntaxFailureFields,
} from "../../../src/core/python/index.js";
import { parseModule } from "../../../src/shell/parser/python.js";

describe("parseModule", () => {
	it("parses a well-formed module", () => {
		expect(parseModule("x = 1\n")._tag).toBe("Parsed");
	});

	it("parses the empty module", () => {
		expect(parseModule("")._tag).toBe("Parsed");
	});

	it("rejects null bytes before parsing", () => {
		expect(parseModule("x = 1\u0000\n")).toEqual({
			_tag: "Failed",
			failure: { message: NULL_BYTES_MESSAGE },
		});
	});

	it("reports broken source as a located failure", () => {
		const outcome = parseModule("x = 1\ny = = 2\n");
		expect(outcome._tag).toBe("Failed");
		if (outcome._tag === "Failed") {
			expect(outcome.failure.location?.line).toBe(2);
		}
	});

	it("parses sources longer than one input chunk", () => {
		const body = Array.from({ length: 2000 }, (_, i) => `v${i} = ${i}`).join("\n");
		expect(parseModule(`${body}\n`)._tag).toBe("Parsed");
	});
});

describe("parseModule: Python 2 only forms", () => {
	const failureOf = (content: string) => {
		const outcome = parseModule(content);
		return outcome._tag === "Failed" ? outcome.failure : undefined;
	};

	it("rejects a print statement", () => {
		expect(failureOf("print 'hi'\n")).toEqual({
			message: "Missing parentheses in call to 'print'. Did you mean print(...)?",
			location: { line: 1, column: 1 },
		});
	});

	it("rejects an exec statement", () => {
		expect(failureOf("exec 'x = 1'\n")).toEqual({
			message: "Missing parentheses in call to 'exec'. Did you mean exec(...)?",
			location: { line: 1, column: 1 },
		});
	});

	it("rejects the <> operator", () => {
		expect(failureOf("x = 1 <> 2\n")).toEqual({
			message: "invalid syntax",
			location: { line: 1, column: 7 },
		});
	});

	it("rejects backtick repr", () => {
		expect(failureOf("x = `1`\n")?.message).toBe("invalid syntax");
	});

	it("accepts print as a call", () => {
		expect(parseModule("print('hi')\n")._tag).toBe("Parsed");
	});
});

describe("syntaxFailureFields", () => {
	it("carries the location when there is one", () => {
		expect(
			syntaxFailureFields({ message: "invalid syntax", location: { line: 3, column: 7 } }),
		).toEqual({ message: "invalid syntax", lineno: 3, col: 7 });
	});

	it("has no location for whole-source failures", () => {
		expect(syntaxFailureFields({ message: NULL_BYTES_MESSAGE })).toEqual({
			message: NULL_BYTES_MESSAGE,
		});
	});
});

describe("containsNullBytes", () => {
	it("detects the NUL character anywhere", () => {
		expect(containsNullBytes("a\u0000b")).toBe(true);
		expect(containsNullBytes("ab")).toBe(false);
	});
});
