// PURITY: CORE-like (pure record builders)
// INVARIANT: every violation carries its rule code and a 1-based location

import { locationOf, type SyntaxNode } from "../../../core/python/index.js";

/**
 * Trigger text per violation code; the code is part of the message so
 * callers can whitelist a whole rule by its prefix.
 */
export const VIOLATION_TRIGGERS = {
	S1: "S1- Illegal contracting syntax type used",
	S2: "S2- Illicit use of '_' before variable",
	S3: "S3- Illicit use of Nested imports",
	S4: "S4- ImportFrom compilation nodes not implemented",
	S6: "S6- Illicit use of classes",
	S7: "S7- Illicit use of Async functions",
	S8: "S8- Invalid decorator used",
	S9: "S9- Multiple use of constructors detected",
	S10: "S10- Illicit use of multiple decorators",
	S11: "S11- Illicit keyword overloading for ORM assignments",
	S12: "S12- Multiple targets to ORM definition detected",
	S13: "S13- No valid contracting decorator found",
	S14: "S14- Illegal use of a builtin",
	S15: "S15- Reuse of ORM name definition in a function definition argument name",
	S16: "S16- Illegal argument annotation used",
	S17: "S17- No valid argument annotation found",
	S18: "S18- Illegal return annotation used",
	S19: "S19- No nested functions allowed",
} as const;

export type ViolationCode = keyof typeof VIOLATION_TRIGGERS;

/**
 * Native finding of the contract linter. `code` is "syntax" when the module
 * did not parse; lineno and col are 1-based.
 */
export interface Violation {
	readonly code: ViolationCode | "syntax";
	readonly message: string;
	readonly lineno?: number;
	readonly col?: number;
}

export const violationAt = (
	code: ViolationCode,
	node: SyntaxNode,
	detail?: string,
): Violation => {
	const { line, column } = locationOf(node);
	const trigger = VIOLATION_TRIGGERS[code];
	return {
		code,
		message: detail === undefined ? trigger : `${trigger}: ${detail}`,
		lineno: line,
		col: column,
	};
};
