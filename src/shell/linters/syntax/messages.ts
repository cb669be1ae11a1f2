// PURITY: CORE-like
// INVARIANT: message texts are fixed; only the quoted name varies

import { locationOf, type SyntaxNode } from "../../../core/python/index.js";

export type FlakeKind =
	| "SyntaxError"
	| "UndefinedName"
	| "UndefinedExport"
	| "UnusedImport"
	| "UnusedVariable"
	| "RedefinedWhileUnused"
	| "ImportShadowedByLoopVar"
	| "ImportStarUsed"
	| "ImportStarUsage"
	| "DuplicateArgument"
	| "ReturnOutsideFunction"
	| "YieldOutsideFunction"
	| "BreakOutsideLoop"
	| "ContinueOutsideLoop"
	| "FStringMissingPlaceholders"
	| "IsLiteral"
	| "AssertTuple"
	| "MultiValueRepeatedKeyLiteral"
	| "MultiValueRepeatedKeyVariable";

/**
 * Native finding of the syntax analyzer. `lineno` and `col` are both
 * 1-based; whole-source failures carry neither.
 */
export interface FlakeMessage {
	readonly kind: FlakeKind;
	readonly message: string;
	readonly lineno?: number;
	readonly col?: number;
}

export const flakeAt = (
	kind: FlakeKind,
	node: SyntaxNode,
	message: string,
): FlakeMessage => {
	const { line, column } = locationOf(node);
	return { kind, message, lineno: line, col: column };
};

export const MESSAGE_TEXT = {
	UndefinedName: (name: string) => `undefined name '${name}'`,
	UndefinedExport: (name: string) => `undefined name '${name}' in __all__`,
	UnusedImport: (name: string) => `'${name}' imported but unused`,
	UnusedVariable: (name: string) =>
		`local variable '${name}' is assigned to but never used`,
	RedefinedWhileUnused: (name: string, line: number) =>
		`redefinition of unused '${name}' from line ${line}`,
	ImportShadowedByLoopVar: (name: string, line: number) =>
		`import '${name}' from line ${line} shadowed by loop variable`,
	ImportStarUsed: (module: string) =>
		`'from ${module} import *' used; unable to detect undefined names`,
	ImportStarUsage: (name: string, from: string) =>
		`'${name}' may be undefined, or defined from star imports: ${from}`,
	DuplicateArgument: (name: string) =>
		`duplicate argument '${name}' in function definition`,
	ReturnOutsideFunction: () => "'return' outside function",
	YieldOutsideFunction: () => "'yield' outside function",
	BreakOutsideLoop: () => "'break' outside loop",
	ContinueOutsideLoop: () => "'continue' not properly in loop",
	FStringMissingPlaceholders: () => "f-string is missing placeholders",
	IsLiteral: () =>
		"use ==/!= to compare constant literals (str, bytes, int, float, tuple)",
	AssertTuple: () =>
		"assertion is always true, perhaps remove parentheses?",
	MultiValueRepeatedKeyLiteral: (key: string) =>
		`dictionary key ${key} repeated with different values`,
	MultiValueRepeatedKeyVariable: (key: string) =>
		`dictionary key variable ${key} repeated with different values`,
} as const;
