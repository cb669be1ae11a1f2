import { describe, expect, it } from "vitest";

import { lintContract } from "../../../../src/shell/linters/contract/index.js";

type Located = readonly [message: string, line: number | undefined, column: number | undefined];

const violations = (...lines: readonly string[]): Located[] =>
	lintContract(`${lines.join("\n")}\n`).map((v) => [v.message, v.lineno, v.col]);

const TOKEN = [
	"balances = Hash(default_value=0)",
	"",
	"@construct",
	"def seed():",
	"    balances['me'] = 100",
	"",
	"@export",
	"def transfer(amount: int, to: str):",
	"    balances[to] += amount",
];

describe("lintContract: accepted contracts", () => {
	it("accepts a small token contract", () => {
		expect(violations(...TOKEN)).toEqual([]);
	});

	it("accepts the empty module", () => {
		expect(lintContract("")).toEqual([]);
	});
});

describe("lintContract: names and imports", () => {
	it("reports leading underscores on every use", () => {
		expect(
			violations("@export", "def f(a: int):", "    _x = a", "    return _x"),
		).toEqual([
			["S2- Illicit use of '_' before variable: _x", 3, 5],
			["S2- Illicit use of '_' before variable: _x", 4, 12],
		]);
	});

	it("reports from-imports", () => {
		expect(violations("from foo import bar")).toEqual([
			["S4- ImportFrom compilation nodes not implemented", 1, 1],
		]);
	});

	it("reports standard library imports", () => {
		expect(violations("import os")).toEqual([["S14- Illegal use of a builtin: os", 1, 1]]);
	});

	it("reports imports nested in a function", () => {
		expect(
			violations("@export", "def f(a: int):", "    import json", "    return a"),
		).toEqual([
			["S3- Illicit use of Nested imports", 2, 1],
			["S14- Illegal use of a builtin: json", 3, 5],
		]);
	});

	it("reports an illegal builtin as call and as name", () => {
		expect(violations("@export", "def f(a: int):", "    return eval(a)")).toEqual([
			["S14- Illegal use of a builtin: eval", 3, 12],
			["S14- Illegal use of a builtin: eval", 3, 12],
		]);
	});

	it("reports the reserved runtime name", () => {
		expect(violations("@export", "def f(a: int):", "    return rt.x")).toEqual([
			["S14- Illegal use of a builtin: rt", 3, 12],
		]);
	});
});

describe("lintContract: definitions", () => {
	it("reports a module without exports at its first function", () => {
		expect(violations("def f():", "    return 1")).toEqual([
			["S13- No valid contracting decorator found", 1, 1],
		]);
	});

	it("reports classes", () => {
		expect(violations("class A:", "    pass")).toEqual([
			["S6- Illicit use of classes", 1, 1],
			["S1- Illegal contracting syntax type used", 1, 1],
		]);
	});

	it("reports async functions", () => {
		expect(violations("@export", "async def f():", "    return 1")).toEqual([
			["S7- Illicit use of Async functions", 2, 1],
			["S1- Illegal contracting syntax type used", 2, 1],
		]);
	});

	it("reports lambdas", () => {
		expect(
			violations("@export", "def f(a: int):", "    g = lambda y: y", "    return g(a)"),
		).toEqual([["S1- Illegal contracting syntax type used", 3, 9]]);
	});

	it("reports nested functions", () => {
		expect(
			violations("@export", "def f(a: int):", "    def g():", "        return a", "    return g()"),
		).toEqual([["S19- No nested functions allowed", 2, 1]]);
	});

	it("reports extra and unknown decorators", () => {
		expect(violations("@export", "@other", "def f(a: int):", "    return a")).toEqual([
			["S10- Illicit use of multiple decorators: Detected: 2 MAX limit: 1", 3, 1],
			["S8- Invalid decorator used: Invalid decorator 'other'. Valid list: construct, export", 3, 1],
		]);
	});

	it("reports a second constructor", () => {
		expect(
			violations(
				"@construct",
				"def a():",
				"    pass",
				"",
				"@construct",
				"def b():",
				"    pass",
				"",
				"@export",
				"def c(x: int):",
				"    return x",
			),
		).toEqual([["S9- Multiple use of constructors detected", 6, 1]]);
	});
});

describe("lintContract: exported signatures", () => {
	it("reports missing and disallowed annotations, then the return annotation", () => {
		expect(violations("@export", "def f(a, b: bytes) -> int:", "    return 1")).toEqual([
			["S17- No valid argument annotation found", 2, 1],
			["S16- Illegal argument annotation used: bytes", 2, 1],
			["S18- Illegal return annotation used: int", 2, 1],
		]);
	});

	it("accepts dotted annotations from the allowed set", () => {
		expect(
			violations("@export", "def f(when: datetime.datetime):", "    return when"),
		).toEqual([]);
	});
});

describe("lintContract: storage definitions", () => {
	it("reports keyword overloading and tuple targets", () => {
		expect(
			violations("balances = Hash(contract='x', name='y')", "foo, bar = Variable()"),
		).toEqual([
			["S11- Illicit keyword overloading for ORM assignments", 1, 1],
			["S12- Multiple targets to ORM definition detected", 2, 1],
		]);
	});

	it("reports arguments that reuse a storage name", () => {
		expect(
			violations("owner = Variable()", "", "@export", "def f(owner: str):", "    return owner"),
		).toEqual([
			["S15- Reuse of ORM name definition in a function definition argument name", 4, 1],
		]);
	});
});
