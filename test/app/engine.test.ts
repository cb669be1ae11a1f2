import { Effect } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { lint, lintPromise, lintSync, makeLinter } from "../../src/app/engine.js";
import { diagnosticKey, matchesWhitelist } from "../../src/core/diagnostics/index.js";
import { makeSourceText } from "../../src/core/models.js";
import type { RawFinding } from "../../src/core/types/index.js";
import type { Checker } from "../../src/shell/linters/index.js";
import { diag, fixedChecker, src, throwingChecker } from "../utils/builders.js";

const SCENARIO = src("import os", "def f():", "    undefined_var");

describe("lint with the default checkers", () => {
	it("orders syntax findings before contract findings, with 0-based positions", () => {
		expect(lintSync(SCENARIO)).toEqual({
			success: false,
			errors: [
				diag("'os' imported but unused", 0, 0),
				diag("undefined name 'undefined_var'", 2, 4),
				diag("S14- Illegal use of a builtin: os", 0, 0),
				diag("S13- No valid contracting decorator found", 1, 0),
			],
		});
	});

	it("applies caller patterns on top of the defaults", () => {
		expect(lintSync(SCENARIO, ["S14", "imported but unused"]).errors).toEqual([
			diag("undefined name 'undefined_var'", 2, 4),
			diag("S13- No valid contracting decorator found", 1, 0),
		]);
	});

	it("succeeds on empty input", () => {
		expect(lintSync(makeSourceText(""))).toEqual({ success: true, errors: [] });
	});

	it("accepts a contract that only uses runtime-injected names", () => {
		const token = src(
			"balances = Hash(default_value=0)",
			"",
			"@export",
			"def transfer(amount: int, to: str):",
			"    balances[to] += amount",
		);
		expect(lintSync(token)).toEqual({ success: true, errors: [] });
	});

	it("reports a whole-source failure once, without position", () => {
		expect(lintSync(makeSourceText("x = 1\u0000\n"))).toEqual({
			success: false,
			errors: [diag("source code string cannot contain null bytes")],
		});
	});

	it("merges the same builtin finding reported for the call and the name", () => {
		const source = src("@export", "def f(a: int):", "    return eval(a)");
		expect(lintSync(source).errors).toEqual([diag("S14- Illegal use of a builtin: eval", 2, 11)]);
	});

	it("reports a Python 2 print statement once, from both checkers", () => {
		expect(lintSync(makeSourceText("print 'hi'\n"))).toEqual({
			success: false,
			errors: [diag("Missing parentheses in call to 'print'. Did you mean print(...)?", 0, 0)],
		});
	});

	it("fails every Python 2 only form", () => {
		for (const content of ["print 'hi'\n", "exec 'x = 1'\n", "x = 1 <> 2\n", "x = `1`\n"]) {
			expect(lintSync(makeSourceText(content)).success).toBe(false);
		}
	});

	it("is idempotent", async () => {
		const first = await lintPromise(SCENARIO, ["S13"]);
		const second = await lintPromise(SCENARIO, ["S13"]);
		expect(second).toEqual(first);
	});
});

describe("makeLinter", () => {
	it("turns a checker fault into one position-less diagnostic and keeps the other findings", () => {
		const linter = makeLinter(
			[
				throwingChecker("syntax", new Error("boom")),
				fixedChecker("contracting", [{ message: "S13- No valid contracting decorator found", line: 2, column: 1 }]),
			],
			[],
		);
		expect(Effect.runSync(linter(makeSourceText("")))).toEqual({
			success: false,
			errors: [diag("syntax failed: boom"), diag("S13- No valid contracting decorator found", 1, 0)],
		});
	});

	it("folds a checker that dies outside its typed failure channel", () => {
		const crashing: Checker = {
			id: "rules",
			check: () =>
				Effect.sync(() => {
					throw new Error("boom");
				}),
		};
		expect(Effect.runSync(makeLinter([crashing], [])(makeSourceText("")))).toEqual({
			success: false,
			errors: [diag("rules failed: boom")],
		});
	});

	it("merges in checker order regardless of completion order", async () => {
		const slow: Checker = {
			id: "slow",
			check: () => Effect.as(Effect.sleep("20 millis"), [{ message: "first", line: 1 }]),
		};
		const fast = fixedChecker("fast", [{ message: "second", line: 1 }]);
		const result = await Effect.runPromise(makeLinter([slow, fast], [])(makeSourceText("")));
		expect(result.errors.map((d) => d.message)).toEqual(["first", "second"]);
	});

	it("filters before deduplicating", () => {
		const linter = makeLinter(
			[fixedChecker("a", [{ message: "keep", line: 1 }, { message: "drop me", line: 1 }, { message: "keep", line: 1 }])],
			["drop"],
		);
		expect(Effect.runSync(linter(makeSourceText(""))).errors).toEqual([diag("keep", 0, 0)]);
	});

	it("places a finding without column at column 0", () => {
		const linter = makeLinter([fixedChecker("a", [{ message: "m", line: 5 }])], []);
		expect(Effect.runSync(linter(makeSourceText(""))).errors).toEqual([diag("m", 4, 0)]);
	});
});

const findingArb: fc.Arbitrary<RawFinding> = fc.record(
	{
		message: fc.constantFrom("alpha", "beta", "gamma delta", "S1- x", "S2- y"),
		line: fc.integer({ min: 1, max: 4 }),
		column: fc.integer({ min: 1, max: 3 }),
	},
	{ requiredKeys: ["message"] },
);

describe("makeLinter properties", () => {
	it("never returns two diagnostics with the same message and position", () => {
		fc.assert(
			fc.property(fc.array(findingArb), fc.array(findingArb), (a, b) => {
				const linter = makeLinter([fixedChecker("a", a), fixedChecker("b", b)], []);
				const keys = Effect.runSync(linter(makeSourceText(""))).errors.map(diagnosticKey);
				expect(new Set(keys).size).toBe(keys.length);
			}),
		);
	});

	it("never returns a whitelisted diagnostic", () => {
		fc.assert(
			fc.property(
				fc.array(findingArb),
				fc.array(fc.constantFrom("alpha", "delta", "S1", "zzz", "")),
				(findings, patterns) => {
					const linter = makeLinter([fixedChecker("a", findings)], []);
					const result = Effect.runSync(linter(makeSourceText(""), patterns));
					for (const diagnostic of result.errors) {
						expect(matchesWhitelist(diagnostic.message, patterns)).toBe(false);
					}
					expect(result.success).toBe(result.errors.length === 0);
				},
			),
		);
	});

	it("keeps every diagnostic of the first checker ahead of those only the second reports", () => {
		fc.assert(
			fc.property(fc.array(findingArb, { minLength: 1 }), fc.array(findingArb), (a, b) => {
				const linter = makeLinter([fixedChecker("a", a), fixedChecker("b", b)], []);
				const result = Effect.runSync(linter(makeSourceText("")));
				const fromA = new Set(
					Effect.runSync(makeLinter([fixedChecker("a", a)], [])(makeSourceText(""))).errors.map(diagnosticKey),
				);
				const keys = result.errors.map(diagnosticKey);
				const firstOther = keys.findIndex((key) => !fromA.has(key));
				const boundary = firstOther < 0 ? keys.length : firstOther;
				expect(keys.slice(0, boundary)).toEqual([...fromA]);
			}),
		);
	});

	it("lint is deterministic on the same input", () => {
		expect(Effect.runSync(lint(SCENARIO))).toEqual(Effect.runSync(lint(SCENARIO)));
	});
});
