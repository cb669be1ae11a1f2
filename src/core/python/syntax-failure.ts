// PURITY: CORE
// INVARIANT: both checkers derive the same failure from the same source, so the
//            engine's dedup step collapses them into one diagnostic
// COMPLEXITY: O(n)

import type { RawLocation } from "../types/index.js";
import { locationOf, preorder, type SyntaxNode } from "./tree.js";

export const NULL_BYTES_MESSAGE = "source code string cannot contain null bytes";
export const INVALID_SYNTAX_MESSAGE = "invalid syntax";

/**
 * Reason a source cannot be analyzed.
 *
 * @property message Text reported verbatim by every checker
 * @property location 1-based location; absent for whole-source failures
 */
export interface SyntaxFailure {
	readonly message: string;
	readonly location?: RawLocation;
}

export const containsNullBytes = (content: string): boolean =>
	content.includes("\u0000");

const isMissingLeaf = (node: SyntaxNode): boolean =>
	node.childCount === 0 && node.startIndex === node.endIndex && node.parent !== null;

const missingMessage = (node: SyntaxNode): string =>
	node.type === "block" ? "expected an indented block" : `expected '${node.type}'`;

const missingParentheses = (keyword: string): string =>
	`Missing parentheses in call to '${keyword}'. Did you mean ${keyword}(...)?`;

// The grammar still accepts these Python 2 forms; Python 3 rejects them.
const LEGACY_STATEMENTS: ReadonlyMap<string, string> = new Map([
	["print_statement", missingParentheses("print")],
	["exec_statement", missingParentheses("exec")],
]);
const LEGACY_TOKENS = new Set(["`", "<>"]);

const legacyMessage = (node: SyntaxNode): string | undefined => {
	const statement = LEGACY_STATEMENTS.get(node.type);
	if (statement !== undefined) return statement;
	return node.childCount === 0 && LEGACY_TOKENS.has(node.type) ? INVALID_SYNTAX_MESSAGE : undefined;
};

/**
 * First parse error in document order: an ERROR node, a token the
 * parser had to insert, or a Python 2 only construct.
 *
 * @pure true
 * @postcondition undefined ↔ the tree contains no recovery node and no legacy syntax
 */
export const findSyntaxFailure = (root: SyntaxNode): SyntaxFailure | undefined => {
	for (const node of preorder(root)) {
		if (node.type === "ERROR") {
			return { message: INVALID_SYNTAX_MESSAGE, location: locationOf(node) };
		}
		if (isMissingLeaf(node)) {
			return { message: missingMessage(node), location: locationOf(node) };
		}
		const legacy = legacyMessage(node);
		if (legacy !== undefined) {
			return { message: legacy, location: locationOf(node) };
		}
	}
	return undefined;
};

/**
 * Location-or-nothing fields of a failure, in the 1-based `lineno`/`col`
 * shape the checkers' native findings use.
 */
export const syntaxFailureFields = (
	failure: SyntaxFailure,
): { readonly message: string; readonly lineno?: number; readonly col?: number } =>
	failure.location === undefined
		? { message: failure.message }
		: { message: failure.message, lineno: failure.location.line, col: failure.location.column };
