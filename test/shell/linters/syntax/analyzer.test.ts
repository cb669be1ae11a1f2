import { describe, expect, it } from "vitest";

import { analyzeSyntax } from "../../../../src/shell/linters/syntax/index.js";

type Located = readonly [message: string, line: number | undefined, column: number | undefined];

const findings = (...lines: readonly string[]): Located[] =>
	analyzeSyntax(`${lines.join("\n")}\n`).map((m) => [m.message, m.lineno, m.col]);

describe("analyzeSyntax: names", () => {
	it("reports an unused import at the import statement", () => {
		expect(findings("import os")).toEqual([["'os' imported but unused", 1, 1]]);
	});

	it("reports the dotted name of an unused submodule import", () => {
		expect(findings("import os.path")).toEqual([["'os.path' imported but unused", 1, 1]]);
	});

	it("reports an undefined name inside a function", () => {
		expect(findings("def f():", "    return undefined_var")).toEqual([
			["undefined name 'undefined_var'", 2, 12],
		]);
	});

	it("lets function bodies see module names bound later", () => {
		expect(findings("def g():", "    return h()", "", "def h():", "    return 1")).toEqual([]);
	});

	it("reports an unused local variable", () => {
		expect(findings("def f():", "    x = 1")).toEqual([
			["local variable 'x' is assigned to but never used", 2, 5],
		]);
	});

	it("treats an augmented assignment as a load, never as an unused local", () => {
		expect(findings("def f(a: int):", "    x += 1")).toEqual([["undefined name 'x'", 2, 5]]);
	});

	it("does not report unused module-level assignments", () => {
		expect(findings("x = 1")).toEqual([]);
	});

	it("hides class attributes from nested functions", () => {
		expect(
			findings("class A:", "    x = 1", "    def f(self):", "        return x"),
		).toEqual([["undefined name 'x'", 4, 16]]);
	});

	it("resolves builtins", () => {
		expect(findings("def f(xs):", "    return len(xs)")).toEqual([]);
	});
});

describe("analyzeSyntax: redefinitions", () => {
	it("reports an import redefined before use", () => {
		expect(findings("import os", "import os", "os.getcwd()")).toEqual([
			["redefinition of unused 'os' from line 1", 2, 1],
		]);
	});

	it("accepts alternatives in try/except", () => {
		expect(
			findings("try:", "    import json", "except ImportError:", "    json = None", "json"),
		).toEqual([]);
	});

	it("reports a duplicate argument once", () => {
		expect(findings("def f(a, a):", "    return a")).toEqual([
			["duplicate argument 'a' in function definition", 1, 1],
		]);
	});
});

describe("analyzeSyntax: star imports", () => {
	it("reports the star import and each name it might provide", () => {
		expect(findings("from os import *", "path")).toEqual([
			["'from os import *' used; unable to detect undefined names", 1, 1],
			["'path' may be undefined, or defined from star imports: os", 2, 1],
		]);
	});
});

describe("analyzeSyntax: statement checks", () => {
	it("reports return outside a function", () => {
		expect(findings("return 1")).toEqual([["'return' outside function", 1, 1]]);
	});

	it("reports break outside a loop", () => {
		expect(findings("break")).toEqual([["'break' outside loop", 1, 1]]);
	});

	it("accepts break inside a loop", () => {
		expect(findings("for i in range(3):", "    break")).toEqual([]);
	});

	it("reports an f-string without placeholders", () => {
		expect(findings('x = f"hello"')).toEqual([["f-string is missing placeholders", 1, 5]]);
	});

	it("accepts an f-string with a placeholder", () => {
		expect(findings("y = 1", 'x = f"{y}"')).toEqual([]);
	});

	it("reports identity comparison with a literal", () => {
		expect(findings("def f(x):", '    return x is "a"')).toEqual([
			["use ==/!= to compare constant literals (str, bytes, int, float, tuple)", 2, 12],
		]);
	});

	it("accepts identity comparison with None", () => {
		expect(findings("def f(x):", "    return x is None")).toEqual([]);
	});

	it("reports every occurrence of a key repeated with different values", () => {
		expect(findings('d = {"a": 1, "a": 2}')).toEqual([
			["dictionary key 'a' repeated with different values", 1, 6],
			["dictionary key 'a' repeated with different values", 1, 14],
		]);
	});
});

describe("analyzeSyntax: unparsable source", () => {
	it("returns only the null-byte failure, without location", () => {
		expect(analyzeSyntax("x = 1\u0000\n")).toEqual([
			{ kind: "SyntaxError", message: "source code string cannot contain null bytes" },
		]);
	});
});
